/**
 * Error taxonomy. AppError subclasses carry the HTTP status the API maps them to.
 */

export class AppError extends Error {
  readonly statusCode: number
  readonly code: string

  constructor(message: string, statusCode: number, code: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.statusCode = statusCode
    this.code = code
  }
}

/** Malformed or missing submission fields. Raised before any job exists. */
export class InvalidRequestError extends AppError {
  constructor(message: string) {
    super(message, 400, 'INVALID_REQUEST')
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Job not found') {
    super(message, 404, 'NOT_FOUND')
  }
}

/** Job store invariant breach (duplicate id, illegal transition). Never expected; raised loudly. */
export class JobStateError extends AppError {
  constructor(message: string) {
    super(message, 500, 'JOB_STATE')
  }
}

export type PipelineStage = 'transcription' | 'translation' | 'synthesis' | 'composition'

export class StageError extends AppError {
  readonly stage: PipelineStage

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, 502, 'STAGE_FAILED', options)
    this.stage = stage
  }
}

export class IngestionError extends StageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transcription', message, options)
  }
}

export class TranslationError extends StageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('translation', message, options)
  }
}

export class SynthesisError extends StageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('synthesis', message, options)
  }
}

export class CompositionError extends StageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('composition', message, options)
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name
  if (typeof err === 'string') return err
  return 'Unknown error'
}
