/**
 * Request ID middleware: read x-request-id from the edge or generate a UUID.
 * Kept on res.locals and echoed in the response header so a poll can be tied to the job it created.
 */
import type { Request, Response, NextFunction } from 'express'
import { v4 as uuidv4 } from 'uuid'

export const REQUEST_ID_HEADER = 'x-request-id'

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers[REQUEST_ID_HEADER]
  const id = typeof incoming === 'string' && incoming.trim() ? incoming.trim().slice(0, 128) : uuidv4()
  res.locals.requestId = id
  res.setHeader(REQUEST_ID_HEADER, id)
  next()
}

export function getRequestId(res: Response): string | undefined {
  const id: unknown = res.locals.requestId
  return typeof id === 'string' ? id : undefined
}
