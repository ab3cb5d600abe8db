/**
 * Sentry for API and pipeline: errors + performance. Enabled only when SENTRY_DSN is set.
 * Env: SENTRY_DSN, SENTRY_ENV (default development), SENTRY_TRACES_SAMPLE_RATE (default 0.05), RELEASE.
 * Uses @sentry/node v8: setupExpressErrorHandler(app) after routes; no request handler (auto-instrumentation).
 */
import * as Sentry from '@sentry/node'
import type { Express, Request, Response, NextFunction } from 'express'
import { getRequestId } from '../middleware/requestId'
import { getLogger } from './logger'

const DSN = process.env.SENTRY_DSN
const ENV = process.env.SENTRY_ENV || process.env.NODE_ENV || 'development'
const RELEASE = process.env.RELEASE || undefined
const TRACES_SAMPLE_RATE = Math.min(
  1,
  Math.max(0, parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || '0.05') || 0.05)
)

export function isSentryEnabled(): boolean {
  return Boolean(DSN && DSN.trim())
}

export function initSentry(): void {
  if (!isSentryEnabled()) return
  try {
    Sentry.init({
      dsn: DSN,
      environment: ENV,
      release: RELEASE,
      tracesSampleRate: TRACES_SAMPLE_RATE,
      integrations: [Sentry.expressIntegration()],
    })
  } catch (err) {
    getLogger('api').warn({ msg: 'Sentry init failed', err })
  }
}

/** Call after all routes, before the JSON error handler. No-op if SENTRY_DSN not set. */
export function setupSentryErrorHandler(app: Express): void {
  if (!isSentryEnabled()) return
  Sentry.setupExpressErrorHandler(app)
}

/** Set requestId on Sentry scope for correlation. Run after requestIdMiddleware. */
export function sentryRequestIdScope(_req: Request, res: Response, next: NextFunction): void {
  const id = getRequestId(res)
  if (id && isSentryEnabled()) Sentry.getCurrentScope().setTag('request_id', id)
  next()
}

/** Capture a failed dubbing job with jobId/requestId/stage tags. */
export function captureJobError(jobId: string, requestId: string | undefined, stage: string, err: unknown): void {
  if (!isSentryEnabled()) return
  Sentry.withScope((scope) => {
    scope.setTag('service', 'worker')
    scope.setTag('job_id', jobId)
    scope.setTag('stage', stage)
    if (requestId) scope.setTag('request_id', requestId)
    Sentry.captureException(err)
  })
}
