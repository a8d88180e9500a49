export class ApiError extends Error {
  status: number
  statusText: string
  body: unknown

  constructor(status: number, statusText: string, message?: string, body?: unknown) {
    super(message ?? `${status} ${statusText}`)
    this.name = 'ApiError'
    this.status = status
    this.statusText = statusText
    this.body = body
  }
}

export class TimeoutError extends Error {
  url: string
  ms: number

  constructor(url: string, ms: number, message?: string) {
    super(message ?? `Request to ${url} timed out after ${ms}ms`)
    this.name = 'TimeoutError'
    this.url = url
    this.ms = ms
  }
}

/** Connection refused, DNS, TLS and any other transport-level rejection. */
export class NetworkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'NetworkError'
  }
}

export class CancelledError extends Error {
  constructor(message = 'Request cancelled') {
    super(message)
    this.name = 'CancelledError'
  }
}

/** The payload arrived but could not be turned into the expected shape. */
export class ParsingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ParsingError'
  }
}
