import path from 'path'
import fs from 'fs'
import express from 'express'
import cors from 'cors'
import { setupSentryErrorHandler, sentryRequestIdScope } from './lib/sentry'
import { errorHandler } from './middleware/errorHandler'
import { requestIdMiddleware } from './middleware/requestId'
import type { JobStore } from './models/Job'
import { createCatalogRouter } from './routes/catalog'
import { createDownloadRouter } from './routes/download'
import { createDubRouter } from './routes/dub'
import { createHealthRouter } from './routes/health'
import { createJobsRouter } from './routes/jobs'
import { createPreviewRouter } from './routes/preview'
import type { DubbingOrchestrator } from './services/dubbing'
import type { JobRunner } from './workers/jobRunner'

export interface AppDeps {
  orchestrator: DubbingOrchestrator
  store: JobStore
  runner: JobRunner
  /** Directory composed videos are served from; defaults to the temp dir. */
  downloadDir?: string
  /** Built web client to serve at /, when present. */
  clientDist?: string
}

function normalizeOrigin(origin: string): string {
  return origin.trim().replace(/\/$/, '')
}

/** In dev, allow any origin that is localhost, 127.0.0.1, or [::1] (any port). */
function isLocalOrigin(origin: string): boolean {
  try {
    const host = new URL(origin).hostname.toLowerCase()
    return host === 'localhost' || host === '127.0.0.1' || host === '[::1]' || host === '::1'
  } catch {
    return false
  }
}

/** CORS_ORIGINS (comma-separated) plus local origins outside production. `*` allows everything. */
export function createOriginCheck(
  rawOrigins: string = process.env.CORS_ORIGINS || '',
  production: boolean = process.env.NODE_ENV === 'production'
): (origin?: string) => boolean {
  const allowed = new Set(rawOrigins.split(',').map(normalizeOrigin).filter(Boolean))
  return (origin?: string) => {
    if (!origin) return true // curl, server-to-server
    if (allowed.has('*')) return true
    const norm = normalizeOrigin(origin)
    if (allowed.has(norm)) return true
    return !production && isLocalOrigin(norm)
  }
}

export function createApp(deps: AppDeps): express.Express {
  const app = express()
  app.disable('etag')
  app.disable('x-powered-by')
  app.set('trust proxy', 1)

  const isAllowedOrigin = createOriginCheck()
  app.use(
    cors({
      origin: (origin, callback) => callback(null, isAllowedOrigin(origin)),
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Request-Id'],
      exposedHeaders: ['X-Request-Id'],
      optionsSuccessStatus: 204,
    })
  )

  // Request ID: correlate client -> API -> pipeline job
  app.use(requestIdMiddleware)
  app.use(sentryRequestIdScope)
  app.use(express.json({ limit: '100kb' }))

  app.use('/api/dub', createDubRouter(deps.orchestrator))
  app.use('/api/job', createJobsRouter(deps.store))
  app.use('/api/preview', createPreviewRouter(deps.orchestrator))
  app.use('/api', createCatalogRouter(deps.orchestrator))
  app.use('/api/download', createDownloadRouter(deps.downloadDir))
  app.use(createHealthRouter({ store: deps.store, runner: deps.runner }))

  app.use('/api', (_req, res) => {
    res.status(404).json({ message: 'Not found' })
  })

  // Optional: serve the web client from a dist folder when running combined
  const clientDist = deps.clientDist
  if (clientDist && fs.existsSync(clientDist)) {
    app.use(express.static(clientDist, { index: false }))
    app.get('*', (_req, res) => {
      res.setHeader('Cache-Control', 'no-cache')
      res.sendFile(path.join(clientDist, 'index.html'))
    })
  }

  // Sentry error handler (after all routes), then the JSON error handler
  setupSentryErrorHandler(app)
  app.use(errorHandler)

  return app
}
