export class DomainError extends Error {
  readonly name: string
  readonly code: string
  readonly status?: number
  constructor(message: string, code = 'domain_error', status?: number) {
    super(message)
    this.name = this.constructor.name
    this.code = code
    this.status = status
  }
}

export class NotFoundError extends DomainError {
  constructor(message = 'not_found') { super(message, 'not_found', 404) }
}

// A clip listed in a project whose media blob is absent from storage.
export class MissingSourceError extends DomainError {
  readonly clipId: string
  constructor(clipId: string) {
    super(`Source video ${clipId} not found in storage.`, 'missing_source', 404)
    this.clipId = clipId
  }
}

// Analysis for a clip is absent or still running; the client should retry later.
export class NotReadyError extends DomainError {
  readonly clipId: string
  constructor(clipId: string) {
    super(`Video analysis for ${clipId} not found or not completed.`, 'not_ready', 409)
    this.clipId = clipId
  }
}

export class FormatError extends DomainError {
  constructor(message = 'invalid_format') { super(message, 'invalid_format', 400) }
}

export class RenderFailedError extends DomainError {
  readonly diagnostics: string
  constructor(message: string, diagnostics = '') {
    super(message, 'render_failed', 502)
    this.diagnostics = diagnostics
  }
}

export class EmptyResultError extends DomainError {
  constructor(message = 'No segments to keep for rendering.') { super(message, 'empty_result', 400) }
}

export class ValidationError extends DomainError {
  constructor(message = 'invalid_body') { super(message, 'invalid_body', 400) }
}
