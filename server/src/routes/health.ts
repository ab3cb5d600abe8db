/**
 * Health, readiness, version and ops endpoints (no /api prefix).
 */
import { Router, Request, Response } from 'express'
import type { JobStore } from '../models/Job'
import type { JobRunner } from '../workers/jobRunner'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const BUILD_TIME = process.env.BUILD_TIME || undefined

/** Provider keys the full pipeline needs. ElevenLabs missing only means demo mode, but it is still reported. */
const REQUIRED_KEYS = ['OPENAI_API_KEY', 'ELEVENLABS_API_KEY'] as const

export function missingProviderKeys(source: NodeJS.ProcessEnv = process.env): string[] {
  return REQUIRED_KEYS.filter((key) => !source[key]?.trim())
}

export function createHealthRouter(deps: { store: JobStore; runner: JobRunner }): Router {
  const router = Router()

  /** GET /healthz: process up, no dependency check */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' })
  })

  /** GET /readyz: 503 with the missing keys when a provider is not configured */
  router.get('/readyz', (_req: Request, res: Response) => {
    const missing = missingProviderKeys()
    if (missing.length > 0) {
      res.status(503).json({ status: 'unhealthy', missing })
      return
    }
    res.status(200).json({ status: 'ok' })
  })

  router.get('/version', (_req: Request, res: Response) => {
    res.json({
      service: 'api',
      release,
      buildTime: BUILD_TIME,
      env,
    })
  })

  /** GET /ops/jobs: store counts by status plus runner load */
  router.get('/ops/jobs', (_req: Request, res: Response) => {
    res.json({
      jobs: deps.store.counts(),
      total: deps.store.size,
      active: deps.runner.activeCount,
      pending: deps.runner.pendingCount,
    })
  })

  return router
}
