import express, { Request, Response, NextFunction } from 'express'
import type { DubbingOrchestrator } from '../services/dubbing'

/** GET /api/languages and GET /api/voices?language=xx */
export function createCatalogRouter(orchestrator: DubbingOrchestrator): express.Router {
  const router = express.Router()

  router.get('/languages', (_req: Request, res: Response) => {
    res.json({ languages: orchestrator.listLanguages() })
  })

  router.get('/voices', async (req: Request, res: Response, next: NextFunction) => {
    const language = typeof req.query.language === 'string' && req.query.language.trim()
      ? req.query.language.trim().toLowerCase()
      : undefined
    try {
      res.json({ voices: await orchestrator.listVoices(language) })
    } catch (err) {
      next(err)
    }
  })

  return router
}
