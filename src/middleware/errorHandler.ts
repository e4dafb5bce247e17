import type { ErrorRequestHandler, Request, Response } from 'express'
import type { Logger } from 'pino'
import { NotFoundError, ValidationError } from '../core/errors.js'

function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed'
}

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({ success: false, error: `Route ${req.method} ${req.path} not found` })
}

/**
 * Maps store errors to HTTP responses. Anything unrecognised is logged and
 * reported as a 500 without its message.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (err instanceof ValidationError) {
      return res.status(400).json({
        success: false,
        error: err.message,
        ...(err.details !== undefined ? { details: err.details } : {})
      })
    }
    if (err instanceof NotFoundError) {
      return res.status(404).json({ success: false, error: err.message })
    }
    if (isMalformedJson(err)) {
      return res.status(400).json({ success: false, error: 'Malformed JSON body' })
    }

    logger.error({ err, method: req.method, path: req.path }, 'Request failed')
    return res.status(500).json({ success: false, error: 'Internal server error' })
  }
}
