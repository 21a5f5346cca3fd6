export type Doc2MdErrorCode =
  | 'INPUT_NOT_FOUND'
  | 'INPUT_UNREADABLE'
  | 'UNSUPPORTED_FORMAT'
  | 'NO_PDF_FILES'
  | 'CONFIG_INVALID'
  | 'CONFIG_NOT_FOUND'
  | 'PDF_OPEN_FAILED'
  | 'PAGE_RENDER_FAILED'
  | 'ENCODING_FAILED'
  | 'CONNECTION_FAILED'
  | 'TIMEOUT'
  | 'API_ERROR'
  | 'MALFORMED_RESPONSE'
  | 'EMPTY_COMPLETION'
  | 'OUTPUT_WRITE_FAILED'
  | 'PAGE_FAILED'

export class Doc2MdError extends Error {
  readonly code: Doc2MdErrorCode

  constructor(code: Doc2MdErrorCode, detail?: string, options?: { cause?: unknown }) {
    super(detail ? `${code}: ${detail}` : code, options)
    this.name = new.target.name
    this.code = code
  }
}

export class InputError extends Doc2MdError {}

export class ConfigError extends Doc2MdError {}

export class RenderError extends Doc2MdError {}

export class PdfOpenError extends RenderError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super('PDF_OPEN_FAILED', detail, options)
  }
}

export class PageRenderError extends RenderError {
  readonly pageIndex: number

  constructor(pageIndex: number, detail: string, options?: { cause?: unknown }) {
    super('PAGE_RENDER_FAILED', `page ${pageIndex}: ${detail}`, options)
    this.pageIndex = pageIndex
  }
}

export class EncodingError extends Doc2MdError {
  constructor(detail: string) {
    super('ENCODING_FAILED', detail)
  }
}

export class NetworkError extends Doc2MdError {}

export class ApiError extends Doc2MdError {
  readonly statusCode: number
  readonly body: string

  constructor(statusCode: number, body: string) {
    super('API_ERROR', `${statusCode} ${body}`.trim())
    this.statusCode = statusCode
    this.body = body
  }
}

export class ResponseFormatError extends Doc2MdError {}

export class OutputWriteError extends Doc2MdError {
  constructor(outputPath: string, options?: { cause?: unknown }) {
    super('OUTPUT_WRITE_FAILED', `${outputPath}: ${describeError(options?.cause)}`, options)
  }
}

// Wraps whatever broke while a single page was being transcribed.
export class PageFailedError extends Doc2MdError {
  readonly pageIndex: number

  constructor(pageIndex: number, cause: unknown) {
    super('PAGE_FAILED', `page ${pageIndex}: ${describeError(cause)}`, { cause })
    this.pageIndex = pageIndex
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error ?? 'unknown error')
}
