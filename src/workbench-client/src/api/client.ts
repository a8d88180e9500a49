import { ApiError, CancelledError, NetworkError, ParsingError, TimeoutError } from './errors'

export const DEFAULT_TIMEOUT_MS = 30_000

export type QueryValue = string | number | boolean | null | undefined

export interface RequestOptions {
  /** Message used when the server gives no structured error body. */
  fallback: string
  query?: Record<string, QueryValue>
  signal?: AbortSignal
  responseType?: 'json' | 'text'
}

export interface ApiClientConfig {
  baseUrl: string
  timeoutMs?: number
  getToken?: () => string | null
  fetch?: typeof fetch
}

export interface ApiClient {
  readonly baseUrl: string
  get(path: string, options: RequestOptions): Promise<unknown>
  post(path: string, body: unknown, options: RequestOptions): Promise<unknown>
  put(path: string, body: unknown, options: RequestOptions): Promise<unknown>
  del(path: string, options: RequestOptions): Promise<unknown>
}

type Method = 'GET' | 'POST' | 'PUT' | 'DELETE'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function buildUrl(baseUrl: string, path: string, query?: Record<string, QueryValue>): string {
  const url = `${baseUrl.replace(/\/+$/, '')}${path.startsWith('/') ? path : `/${path}`}`
  if (!query) return url
  const params = new URLSearchParams()
  for (const [key, value] of Object.entries(query)) {
    if (value === null || value === undefined) continue
    params.set(key, String(value))
  }
  const search = params.toString()
  return search ? `${url}?${search}` : url
}

/**
 * Pulls the human-readable message out of an error body. Notes, chat and
 * translator endpoints use `message`; FastAPI-style endpoints use `detail`.
 */
export function errorMessage(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined
  for (const field of ['message', 'detail', 'error']) {
    const value = body[field]
    if (typeof value === 'string' && value.trim() !== '') return value
  }
  return undefined
}

function parseErrorBody(text: string): unknown {
  if (text.trim() === '') return undefined
  try {
    return JSON.parse(text)
  } catch {
    // Plain-text error pages carry no structured message; keep the raw text.
    return text
  }
}

function parseBody(text: string, fallback: string): unknown {
  if (text.trim() === '') return undefined
  try {
    return JSON.parse(text)
  } catch (err) {
    throw new ParsingError(`${fallback}: response was not valid JSON`, { cause: err })
  }
}

export function createApiClient(config: ApiClientConfig): ApiClient {
  const baseUrl = config.baseUrl.replace(/\/+$/, '')
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS
  const fetchImpl = config.fetch ?? globalThis.fetch

  function headers(hasBody: boolean): Record<string, string> {
    const result: Record<string, string> = { Accept: 'application/json' }
    if (hasBody) result['Content-Type'] = 'application/json'
    const token = config.getToken?.()
    if (token) result.Authorization = `Bearer ${token}`
    return result
  }

  async function send(method: Method, url: string, body: unknown, options: RequestOptions) {
    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    const onAbort = () => controller.abort()
    if (options.signal?.aborted) controller.abort()
    options.signal?.addEventListener('abort', onAbort, { once: true })

    try {
      const response = await fetchImpl(url, {
        method,
        headers: headers(body !== undefined),
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      })
      // The body read counts against the same timeout as the connect.
      const text = await response.text()
      return { response, text }
    } catch (err) {
      if (timedOut) throw new TimeoutError(url, timeoutMs, options.fallback)
      if (controller.signal.aborted) throw new CancelledError()
      throw new NetworkError(options.fallback, { cause: err })
    } finally {
      clearTimeout(timeoutId)
      options.signal?.removeEventListener('abort', onAbort)
    }
  }

  async function request(method: Method, path: string, body: unknown, options: RequestOptions): Promise<unknown> {
    const url = buildUrl(baseUrl, path, options.query)
    const { response, text } = await send(method, url, body, options)

    if (!response.ok) {
      const errorBody = parseErrorBody(text)
      throw new ApiError(response.status, response.statusText, errorMessage(errorBody) ?? options.fallback, errorBody)
    }
    if (response.status === 204) return undefined
    if (options.responseType === 'text') return text
    return parseBody(text, options.fallback)
  }

  return {
    baseUrl,
    get: (path, options) => request('GET', path, undefined, options),
    post: (path, body, options) => request('POST', path, body, options),
    put: (path, body, options) => request('PUT', path, body, options),
    del: (path, options) => request('DELETE', path, undefined, options),
  }
}
