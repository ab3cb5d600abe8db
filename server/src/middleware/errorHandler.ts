import type { Request, Response, NextFunction } from 'express'
import { AppError, StageError } from '../lib/errors'
import { withRequestId } from '../lib/logger'
import { getRequestId } from './requestId'

/** body-parser marks malformed JSON with type "entity.parse.failed" and a 4xx status. */
function isBodyParseError(err: unknown): err is Error & { status: number } {
  if (!(err instanceof Error)) return false
  const type: unknown = Reflect.get(err, 'type')
  const status: unknown = Reflect.get(err, 'status')
  return type === 'entity.parse.failed' && typeof status === 'number'
}

/**
 * Last middleware: AppError -> its status and { message } (plus `stage` for stage failures),
 * anything else -> 500 with a generic message.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err)
    return
  }
  const log = withRequestId(getRequestId(res))
  if (err instanceof StageError) {
    log.warn({ msg: 'Pipeline stage failed', stage: err.stage, err })
    res.status(err.statusCode).json({ message: err.message, stage: err.stage })
    return
  }
  if (err instanceof AppError) {
    if (err.statusCode >= 500) log.error({ msg: 'Request failed', err })
    res.status(err.statusCode).json({ message: err.message })
    return
  }
  if (isBodyParseError(err)) {
    res.status(400).json({ message: 'Request body must be valid JSON' })
    return
  }
  log.error({ msg: 'Unhandled request error', err })
  res.status(500).json({ message: 'Internal server error' })
}
