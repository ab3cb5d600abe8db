import { getLogger } from '../lib/logger'
import type { DubbingResult } from '../models/Job'

export interface WebhookPayload {
  jobId: string
  status: 'completed' | 'failed'
  result?: DubbingResult
  error?: string
}

const WEBHOOK_TIMEOUT_MS = 10_000

export function isWebhookUrl(value: string): boolean {
  const url = value.trim()
  return url.startsWith('https://') || url.startsWith('http://')
}

/**
 * Fire webhook on job completion (optional). Failures are logged only; the job state is already final.
 */
export async function fireWebhook(webhookUrl: string | undefined, payload: WebhookPayload): Promise<void> {
  if (!webhookUrl || !isWebhookUrl(webhookUrl)) return
  const url = webhookUrl.trim()
  const log = getLogger('worker')
  try {
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(WEBHOOK_TIMEOUT_MS),
    })
    if (!res.ok) {
      log.warn({ msg: 'Webhook returned non-2xx', jobId: payload.jobId, status: res.status })
    }
  } catch (err) {
    log.warn({ msg: 'Webhook delivery failed', jobId: payload.jobId, err })
  }
}
