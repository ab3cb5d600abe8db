import path from 'path'

/**
 * In-process job limits. Jobs beyond MAX_CONCURRENT_JOBS wait as `queued`; retention only applies to finished jobs.
 */

export function readInt(value: string | undefined, fallback: number): number {
  if (value == null || value.trim() === '') return fallback
  const n = parseInt(value, 10)
  return Number.isFinite(n) && n >= 0 ? n : fallback
}

/** 0 = unlimited. */
export const MAX_CONCURRENT_JOBS = readInt(process.env.MAX_CONCURRENT_JOBS, 0)

/** Minutes a completed/failed job stays pollable. 0 = keep forever. */
export const JOB_RETENTION_MINUTES = readInt(process.env.JOB_RETENTION_MINUTES, 24 * 60)

export const JOB_EVICTION_INTERVAL_MS = 10 * 60 * 1000

/** Per-call timeout for provider HTTP/API calls (OpenAI, ElevenLabs, downloads). */
export const PROVIDER_TIMEOUT_MS = readInt(process.env.PROVIDER_TIMEOUT_MS, 120_000)

export const tempDir =
  process.env.TEMP_FILE_PATH ||
  (process.platform === 'win32' ? path.join(process.cwd(), 'temp') : '/tmp')
