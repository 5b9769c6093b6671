import type { NextFunction, Request, Response } from 'express'
import { ZodError } from 'zod'
import { DomainError, RenderFailedError } from './errors'

type ErrorBody = { error: string; detail: string; diagnostics?: string; issues?: Array<{ path: string; message: string }> }

// Maps DomainError subclasses (and body validation failures) to JSON responses.
export function domainErrorMiddleware(err: unknown, _req: Request, res: Response, next: NextFunction) {
  if (err instanceof ZodError) {
    const body: ErrorBody = {
      error: 'invalid_body',
      detail: 'request body failed validation',
      issues: err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    }
    res.status(400).json(body)
    return
  }
  if (!(err instanceof DomainError)) return next(err)
  const status = err.status ?? 400
  const body: ErrorBody = { error: err.code || 'error', detail: err.message }
  if (err instanceof RenderFailedError && err.diagnostics) body.diagnostics = err.diagnostics
  res.status(status).json(body)
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
