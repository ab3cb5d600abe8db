import express, { Request, Response, NextFunction } from 'express'
import type { JobRecord, JobStore } from '../models/Job'

const NO_CACHE_HEADERS = {
  'Cache-Control': 'no-store, no-cache, must-revalidate, proxy-revalidate',
  Pragma: 'no-cache',
  Expires: '0',
  'Surrogate-Control': 'no-store',
}

export interface JobStatusResponse {
  status: JobRecord['status']
  progress: number
  message: string
  result?: JobRecord['result']
  error?: string
}

export function toJobStatusResponse(job: JobRecord): JobStatusResponse {
  const body: JobStatusResponse = { status: job.status, progress: job.progress, message: job.message }
  if (job.status === 'completed' && job.result) body.result = job.result
  if (job.status === 'failed' && job.error) body.error = job.error
  return body
}

/** GET /api/job/:jobId. Polled every few seconds, so never cached. */
export function createJobsRouter(store: JobStore): express.Router {
  const router = express.Router()

  router.get('/:jobId', (req: Request, res: Response, next: NextFunction) => {
    res.set(NO_CACHE_HEADERS)
    const { jobId } = req.params
    if (!store.has(jobId)) {
      res.status(404).json({ message: 'Job not found' })
      return
    }
    try {
      res.json(toJobStatusResponse(store.get(jobId)))
    } catch (err) {
      next(err)
    }
  })

  return router
}
