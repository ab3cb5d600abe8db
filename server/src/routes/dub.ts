import express, { Request, Response, NextFunction } from 'express'
import { getRequestId } from '../middleware/requestId'
import type { DubbingOrchestrator } from '../services/dubbing'

/**
 * POST /api/dub: validate, create the job and answer 202 right away.
 * The pipeline runs in the background; clients poll GET /api/job/:jobId.
 */
export function createDubRouter(orchestrator: DubbingOrchestrator): express.Router {
  const router = express.Router()

  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const response = orchestrator.submit(req.body, getRequestId(res))
      res.status(202).json(response)
    } catch (err) {
      next(err)
    }
  })

  return router
}
