import type pino from 'pino'
import {
  errorMessage,
  IngestionError,
  JobStateError,
  NotFoundError,
  StageError,
  TranslationError,
  type PipelineStage,
} from '../lib/errors'
import { withJobContext } from '../lib/logger'
import { captureJobError } from '../lib/sentry'
import type { DubbingRequest, DubbingResult, JobStore } from '../models/Job'
import { removeFiles } from '../utils/fileCleanup'
import { getLanguageName, getSupportedLanguageMap, SUPPORTED_LANGUAGES } from '../utils/languages'
import { fireWebhook } from '../utils/webhook'
import type { JobRunner } from '../workers/jobRunner'
import { parseDubbingRequest, parsePreviewRequest } from './dubbingRequest'
import type {
  IngestedVideo,
  PipelineAdapters,
  TranscriptionResult,
  TranslatedSegment,
  Translator,
  TranscriptSegment,
  Voice,
  VoiceSelector,
} from './pipeline'

/** Progress checkpoints written when each stage starts (transcription) or finishes. */
export const PROGRESS = {
  started: 10,
  transcribed: 30,
  translated: 60,
  synthesized: 85,
  completed: 100,
} as const

const STAGE_LABELS: Record<PipelineStage, string> = {
  transcription: 'ingestion/transcription',
  translation: 'translation',
  synthesis: 'voice synthesis',
  composition: 'composition',
}

export const DEMO_MODE_NOTE =
  'Voice synthesis is unavailable; the original video is returned with the translated transcript only.'

export const CLONED_VOICE_NOTE =
  'The cloned voice was temporary and has been deleted; voiceId cannot be reused for another job.'

export interface SubmitResponse {
  jobId: string
  status: 'started'
}

export interface PreviewResult {
  originalTranscript: { text: string; segments: TranscriptSegment[] }
  translatedTranscript: TranslatedSegment[]
  sourceLanguage: string
  targetLanguage: string
}

export interface DubbingOrchestratorOptions {
  store: JobStore
  runner: JobRunner
  adapters: PipelineAdapters
  supportedLanguages?: readonly string[]
}

/** Same-language input is passed through with originalText filled in instead of calling the translator. */
export async function translateTranscript(
  translator: Translator,
  transcript: TranscriptionResult,
  targetLanguage: string
): Promise<TranslatedSegment[]> {
  if (transcript.sourceLanguage === targetLanguage) {
    return transcript.segments.map((s) => ({ ...s, originalText: s.text }))
  }
  return translator.translate(transcript.segments, targetLanguage)
}

export function selectVoice(request: DubbingRequest, video: IngestedVideo): VoiceSelector {
  if (request.cloneOriginalVoice) {
    return { kind: 'clone', language: request.targetLanguage, video }
  }
  if (request.voiceId) {
    return { kind: 'explicit', voiceId: request.voiceId }
  }
  return { kind: 'default', language: request.targetLanguage }
}

/**
 * Drives each dubbing job through transcription -> translation -> synthesis -> composition.
 * submit() only validates, records and schedules; the pipeline runs on the JobRunner and is
 * the sole writer of its job record. Stage failures end the job as `failed` and never escape.
 */
export class DubbingOrchestrator {
  private readonly store: JobStore
  private readonly runner: JobRunner
  private readonly adapters: PipelineAdapters
  private readonly supportedLanguages: readonly string[]

  constructor(options: DubbingOrchestratorOptions) {
    this.store = options.store
    this.runner = options.runner
    this.adapters = options.adapters
    this.supportedLanguages = options.supportedLanguages ?? SUPPORTED_LANGUAGES
  }

  submit(input: unknown, requestId?: string): SubmitResponse {
    const request = parseDubbingRequest(input, this.supportedLanguages)
    if (requestId) request.requestId = requestId
    const job = this.store.create(request)
    const log = withJobContext(job.id, requestId)
    log.info({
      msg: 'Dubbing job created',
      targetLanguage: request.targetLanguage,
      voiceId: request.voiceId,
      cloneOriginalVoice: request.cloneOriginalVoice,
    })
    this.runner.enqueue(() => this.runPipeline(job.id, request, log))
    return { jobId: job.id, status: 'started' }
  }

  /** Stages 1-2 inline, for a translation sample. No job record is created. */
  async preview(input: unknown): Promise<PreviewResult> {
    const { sourceUrl, targetLanguage } = parsePreviewRequest(input, this.supportedLanguages)
    let transcript: TranscriptionResult
    try {
      transcript = await this.adapters.transcriber.transcribe(sourceUrl)
    } catch (err) {
      throw err instanceof StageError ? err : new IngestionError(errorMessage(err), { cause: err })
    }
    try {
      const translated = await translateTranscript(this.adapters.translator, transcript, targetLanguage)
      return {
        originalTranscript: { text: transcript.text, segments: transcript.segments },
        translatedTranscript: translated,
        sourceLanguage: transcript.sourceLanguage,
        targetLanguage,
      }
    } catch (err) {
      throw err instanceof StageError ? err : new TranslationError(errorMessage(err), { cause: err })
    } finally {
      await removeFiles(transcript.tempFiles ?? [])
    }
  }

  listLanguages(): Record<string, string> {
    return getSupportedLanguageMap(this.supportedLanguages)
  }

  listVoices(language?: string): Promise<Voice[]> {
    return this.adapters.synthesizer.listVoices(language)
  }

  private async runPipeline(jobId: string, request: DubbingRequest, log: pino.Logger): Promise<void> {
    const { transcriber, translator, synthesizer, composer } = this.adapters
    const startedAt = Date.now()
    const tempFiles: string[] = []
    const targetName = getLanguageName(request.targetLanguage)
    let stage: PipelineStage = 'transcription'

    try {
      this.store.update(jobId, {
        status: 'processing',
        progress: PROGRESS.started,
        message: 'Downloading and transcribing video...',
      })
      log.info({ msg: 'Stage started', stage })
      const transcript = await transcriber.transcribe(request.sourceUrl)
      tempFiles.push(...(transcript.tempFiles ?? []))
      log.info({
        msg: 'Transcript extracted',
        segments: transcript.segments.length,
        sourceLanguage: transcript.sourceLanguage,
      })
      this.store.update(jobId, {
        progress: PROGRESS.transcribed,
        message: `Transcript extracted (${transcript.segments.length} segments, ${getLanguageName(transcript.sourceLanguage)}). Translating to ${targetName}...`,
      })

      stage = 'translation'
      const translated = await translateTranscript(translator, transcript, request.targetLanguage)
      log.info({ msg: 'Translation completed', segments: translated.length })

      const baseResult = {
        targetLanguage: request.targetLanguage,
        sourceLanguage: transcript.sourceLanguage,
        segmentCount: transcript.segments.length,
        translatedSegmentCount: translated.length,
      }

      this.store.update(jobId, {
        progress: PROGRESS.translated,
        message: synthesizer.available
          ? `Translation complete (${translated.length} segments). Generating ${targetName} voice...`
          : `Translation complete (${translated.length} segments).`,
      })

      if (!synthesizer.available) {
        log.warn({ msg: 'Voice synthesis unavailable, completing in demo mode' })
        await this.complete(jobId, request, log, 'Dubbing completed in demo mode (voice synthesis unavailable).', {
          ...baseResult,
          videoUrl: request.sourceUrl,
          voiceId: request.voiceId,
          demoMode: true,
          note: DEMO_MODE_NOTE,
          processingTimeMs: Date.now() - startedAt,
        })
        return
      }

      stage = 'synthesis'
      const audio = await synthesizer.synthesize(translated, selectVoice(request, transcript.video))
      tempFiles.push(audio.path, ...(audio.tempFiles ?? []))
      log.info({ msg: 'Speech synthesized', voiceId: audio.voiceId })
      this.store.update(jobId, {
        progress: PROGRESS.synthesized,
        message: 'Voice generated. Composing dubbed video...',
      })

      stage = 'composition'
      const output = await composer.compose(transcript.video, audio)
      await this.complete(jobId, request, log, 'Dubbing completed successfully.', {
        ...baseResult,
        videoUrl: output.reference,
        voiceId: audio.voiceId,
        demoMode: false,
        ...(audio.clonedVoice ? { note: CLONED_VOICE_NOTE } : {}),
        processingTimeMs: Date.now() - startedAt,
      })
    } catch (err) {
      if (err instanceof JobStateError) throw err
      const error = `${STAGE_LABELS[stage]} failed: ${errorMessage(err)}`
      log.error({ msg: 'Dubbing job failed', stage, err, processingTimeMs: Date.now() - startedAt })
      captureJobError(jobId, request.requestId, stage, err)
      if (this.markFailed(jobId, error, log)) {
        await fireWebhook(request.webhookUrl, { jobId, status: 'failed', error })
      }
    } finally {
      await removeFiles(tempFiles, log)
    }
  }

  private async complete(
    jobId: string,
    request: DubbingRequest,
    log: pino.Logger,
    message: string,
    result: DubbingResult
  ): Promise<void> {
    this.store.update(jobId, { status: 'completed', progress: PROGRESS.completed, message, result })
    log.info({ msg: 'Dubbing job completed', processingTimeMs: result.processingTimeMs, demoMode: result.demoMode })
    await fireWebhook(request.webhookUrl, { jobId, status: 'completed', result })
  }

  /** Returns false when the job no longer exists (evicted or store reset while running). */
  private markFailed(jobId: string, error: string, log: pino.Logger): boolean {
    try {
      this.store.update(jobId, { status: 'failed', message: `Dubbing failed: ${error}`, error })
      return true
    } catch (err) {
      if (err instanceof NotFoundError) {
        log.warn({ msg: 'Job disappeared before its failure could be recorded' })
        return false
      }
      throw err
    }
  }
}
