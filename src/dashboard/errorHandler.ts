import type { ErrorRequestHandler } from 'express'
import type { Logger } from '../utils/logger'
import { PosErrorCode, isPosError } from '../utils/errors'

const STATUS_BY_CODE: Record<PosErrorCode, number> = {
  VALIDATION: 400,
  INVALID_QUANTITY: 400,
  EMPTY_CART: 400,
  NOT_FOUND: 404,
  DUPLICATE_BARCODE: 409,
  INSUFFICIENT_STOCK: 409,
  COMMIT_FAILURE: 500,
}

export type ErrorBody = {
  success: false
  code: PosErrorCode | 'INTERNAL'
  message: string
  details?: Record<string, unknown>
}

export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (isPosError(err)) {
    const body: ErrorBody = { success: false, code: err.code, message: err.message }
    if (err.details) body.details = err.details
    return { status: STATUS_BY_CODE[err.code], body }
  }
  // express.json() raises SyntaxError on a malformed body
  if (err instanceof SyntaxError) {
    return { status: 400, body: { success: false, code: 'VALIDATION', message: 'Malformed JSON body' } }
  }
  return { status: 500, body: { success: false, code: 'INTERNAL', message: 'Internal server error' } }
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err, req, res, _next) => {
    const { status, body } = toErrorResponse(err)
    if (status >= 500) {
      logger.error('Request failed', { method: req.method, path: req.path, err })
    } else {
      logger.debug('Request rejected', { method: req.method, path: req.path, code: body.code })
    }
    res.status(status).json(body)
  }
}
