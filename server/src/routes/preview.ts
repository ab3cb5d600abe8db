import express, { Request, Response, NextFunction } from 'express'
import type { DubbingOrchestrator } from '../services/dubbing'

/** POST /api/preview: transcribe + translate inline, no job. Can take as long as the provider calls do. */
export function createPreviewRouter(orchestrator: DubbingOrchestrator): express.Router {
  const router = express.Router()

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await orchestrator.preview(req.body))
    } catch (err) {
      next(err)
    }
  })

  return router
}
