import { ZodError } from 'zod'
import { ApiError, CancelledError, NetworkError, ParsingError, TimeoutError } from '@/api/errors'

export const FAILURE_KINDS = [
  'server',
  'cache',
  'validation',
  'network',
  'auth',
  'notFound',
  'permission',
  'parsing',
  'unknown',
] as const

export type FailureKind = (typeof FAILURE_KINDS)[number]
export type FailureReason = 'timeout' | 'cancelled'

export interface Failure {
  readonly kind: FailureKind
  readonly message: string
  readonly statusCode: number | null
  readonly reason?: FailureReason
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: Failure }

export function ok<T>(value: T): Result<T> {
  return { ok: true, value }
}

export function fail(failure: Failure): { readonly ok: false; readonly failure: Failure } {
  return { ok: false, failure }
}

export function makeFailure(
  kind: FailureKind,
  message: string,
  statusCode: number | null = null,
  reason?: FailureReason,
): Failure {
  return Object.freeze(reason ? { kind, message, statusCode, reason } : { kind, message, statusCode })
}

export function validationFailure(message: string): Failure {
  return makeFailure('validation', message)
}

const KIND_SET: ReadonlySet<string> = new Set(FAILURE_KINDS)

export function isFailure(value: unknown): value is Failure {
  if (typeof value !== 'object' || value === null) return false
  const kind: unknown = Reflect.get(value, 'kind')
  const message: unknown = Reflect.get(value, 'message')
  const statusCode: unknown = Reflect.get(value, 'statusCode')
  return (
    typeof kind === 'string' &&
    KIND_SET.has(kind) &&
    typeof message === 'string' &&
    (statusCode === null || typeof statusCode === 'number')
  )
}

function fromStatus(status: number, message: string): Failure {
  switch (status) {
    case 401:
      return makeFailure('auth', message, status)
    case 403:
      return makeFailure('permission', message, status)
    case 404:
      return makeFailure('notFound', message, status)
    default:
      return makeFailure('server', message, status)
  }
}

/**
 * Collapses anything thrown below the repository boundary into a Failure.
 * Total, and idempotent: a Failure comes back as the same reference.
 */
export function normalize(error: unknown): Failure {
  if (isFailure(error)) return error
  if (error instanceof ApiError) return fromStatus(error.status, error.message)
  if (error instanceof TimeoutError) return makeFailure('network', error.message, null, 'timeout')
  if (error instanceof NetworkError) return makeFailure('network', error.message)
  if (error instanceof CancelledError) return makeFailure('unknown', error.message, null, 'cancelled')
  if (error instanceof ParsingError) return makeFailure('parsing', error.message)
  if (error instanceof ZodError) {
    const issue = error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
    return makeFailure('parsing', `Data parsing failed${where}`)
  }
  if (error instanceof SyntaxError) return makeFailure('parsing', 'Data parsing failed')
  if (error instanceof Error && error.name === 'AbortError') {
    return makeFailure('unknown', 'Request cancelled', null, 'cancelled')
  }
  if (error instanceof Error) return makeFailure('unknown', error.message || error.name)
  return makeFailure('unknown', String(error))
}

/** Cancellations are user-initiated and never shown as an error. */
export function isUserVisible(failure: Failure): boolean {
  return failure.reason !== 'cancelled'
}

/** Outcome of a secondary call whose failure must not fail the primary one. */
export type BestEffort<T> =
  | { readonly available: true; readonly value: T }
  | { readonly available: false; readonly failure: Failure }

export function bestEffort<T>(result: Result<T>): BestEffort<T> {
  return result.ok ? { available: true, value: result.value } : { available: false, failure: result.failure }
}
