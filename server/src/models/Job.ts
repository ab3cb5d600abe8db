import { v4 as uuidv4 } from 'uuid'
import { JobStateError, NotFoundError } from '../lib/errors'

export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed'

/** Validated submission, kept on the job for the result echo. */
export interface DubbingRequest {
  sourceUrl: string
  targetLanguage: string
  voiceId?: string
  cloneOriginalVoice: boolean
  webhookUrl?: string
  /** x-request-id of the submitting call, for log correlation. */
  requestId?: string
}

export interface DubbingResult {
  videoUrl: string
  targetLanguage: string
  voiceId?: string
  sourceLanguage: string
  segmentCount: number
  translatedSegmentCount: number
  /** True when synthesis was unavailable and the original video is returned. */
  demoMode: boolean
  note?: string
  processingTimeMs: number
}

export interface JobRecord {
  id: string
  status: JobStatus
  progress: number
  message: string
  request: DubbingRequest

  // Terminal payload: exactly one of these once completed/failed
  result?: DubbingResult
  error?: string

  createdAt: string
  updatedAt: string
  completedAt?: string
}

export type JobPatch = Partial<Pick<JobRecord, 'status' | 'progress' | 'message' | 'result' | 'error'>>

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['queued', 'processing', 'failed'],
  processing: ['processing', 'completed', 'failed'],
  completed: [],
  failed: [],
}

export function isTerminalStatus(status: JobStatus): boolean {
  return status === 'completed' || status === 'failed'
}

export interface JobStoreOptions {
  /** How long terminal jobs stay pollable; 0 or undefined keeps them for the process lifetime. */
  retentionMs?: number
  generateId?: () => string
  now?: () => Date
}

/**
 * In-memory job table. Single writer per job (its pipeline task); any number of pollers.
 * Every update swaps in a new record object, and reads hand out deep copies, so a poller never
 * sees a half-applied patch and cannot mutate stored state.
 */
export class JobStore {
  private readonly jobs = new Map<string, JobRecord>()
  private readonly retentionMs: number
  private readonly generateId: () => string
  private readonly now: () => Date

  constructor(options: JobStoreOptions = {}) {
    this.retentionMs = options.retentionMs ?? 0
    this.generateId = options.generateId ?? uuidv4
    this.now = options.now ?? (() => new Date())
  }

  create(request: DubbingRequest): JobRecord {
    const id = this.generateId()
    if (this.jobs.has(id)) {
      throw new JobStateError(`Duplicate job id generated: ${id}`)
    }
    const ts = this.now().toISOString()
    const job: JobRecord = {
      id,
      status: 'queued',
      progress: 0,
      message: 'Queued',
      request: { ...request },
      createdAt: ts,
      updatedAt: ts,
    }
    this.jobs.set(id, job)
    return structuredClone(job)
  }

  update(jobId: string, patch: JobPatch): JobRecord {
    const existing = this.jobs.get(jobId)
    if (!existing) throw new NotFoundError(`Job not found: ${jobId}`)

    if (isTerminalStatus(existing.status)) {
      throw new JobStateError(`Job ${jobId} is already ${existing.status}`)
    }

    const nextStatus = patch.status ?? existing.status
    if (!ALLOWED_TRANSITIONS[existing.status].includes(nextStatus)) {
      throw new JobStateError(`Job ${jobId}: illegal transition ${existing.status} -> ${nextStatus}`)
    }

    if (patch.progress !== undefined) {
      if (!Number.isInteger(patch.progress) || patch.progress < 0 || patch.progress > 100) {
        throw new JobStateError(`Job ${jobId}: progress must be an integer 0-100, got ${patch.progress}`)
      }
      if (patch.progress < existing.progress) {
        throw new JobStateError(`Job ${jobId}: progress cannot go back from ${existing.progress} to ${patch.progress}`)
      }
    }

    if (patch.result !== undefined && nextStatus !== 'completed') {
      throw new JobStateError(`Job ${jobId}: result is only set on completion`)
    }
    if (patch.error !== undefined && nextStatus !== 'failed') {
      throw new JobStateError(`Job ${jobId}: error is only set on failure`)
    }
    if (nextStatus === 'completed' && patch.result === undefined) {
      throw new JobStateError(`Job ${jobId}: completion requires a result`)
    }
    if (nextStatus === 'failed' && patch.error === undefined) {
      throw new JobStateError(`Job ${jobId}: failure requires an error`)
    }

    const ts = this.now().toISOString()
    const updated: JobRecord = {
      ...existing,
      status: nextStatus,
      progress: nextStatus === 'completed' ? 100 : patch.progress ?? existing.progress,
      message: patch.message ?? existing.message,
      updatedAt: ts,
    }
    if (patch.result !== undefined) updated.result = structuredClone(patch.result)
    if (patch.error !== undefined) updated.error = patch.error
    if (isTerminalStatus(nextStatus)) updated.completedAt = ts

    this.jobs.set(jobId, updated)
    return structuredClone(updated)
  }

  get(jobId: string): JobRecord {
    const job = this.jobs.get(jobId)
    if (!job) throw new NotFoundError(`Job not found: ${jobId}`)
    return structuredClone(job)
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId)
  }

  get size(): number {
    return this.jobs.size
  }

  counts(): Record<JobStatus, number> {
    const out: Record<JobStatus, number> = { queued: 0, processing: 0, completed: 0, failed: 0 }
    for (const job of this.jobs.values()) out[job.status]++
    return out
  }

  /** Drop terminal jobs finished more than retentionMs ago. Running and queued jobs are never evicted. */
  evictExpired(now: Date = this.now()): number {
    if (this.retentionMs <= 0) return 0
    const cutoff = now.getTime() - this.retentionMs
    let removed = 0
    for (const [id, job] of this.jobs) {
      if (!job.completedAt) continue
      if (Date.parse(job.completedAt) <= cutoff) {
        this.jobs.delete(id)
        removed++
      }
    }
    return removed
  }

  clear(): void {
    this.jobs.clear()
  }
}
