import { vi } from 'vitest'
import { createApiClient, type ApiClient } from '@/api/client'

export const BASE_URL = 'http://api.test'

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(body === undefined ? null : JSON.stringify(body), {
    status,
    statusText: status >= 200 && status < 300 ? 'OK' : 'Error',
    headers: { 'Content-Type': 'application/json' },
  })
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status, statusText: status === 200 ? 'OK' : 'Error' })
}

export function noContent(): Response {
  return new Response(null, { status: 204 })
}

/** Answers successive calls with the given responses, in order. */
export function mockFetch(...responses: Response[]) {
  const fetchMock = vi.fn<typeof fetch>()
  for (const response of responses) fetchMock.mockResolvedValueOnce(response)
  return fetchMock
}

/** A fetch that never answers until its signal aborts. */
export function hangingFetch() {
  return vi.fn<typeof fetch>(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          const error = new Error('The operation was aborted')
          error.name = 'AbortError'
          reject(error)
        })
      }),
  )
}

export function testClient(fetchMock: typeof fetch, options: { timeoutMs?: number; token?: string } = {}): ApiClient {
  return createApiClient({
    baseUrl: `${BASE_URL}/`,
    timeoutMs: options.timeoutMs ?? 1_000,
    getToken: () => options.token ?? null,
    fetch: fetchMock,
  })
}

type FetchMock = ReturnType<typeof mockFetch>

export function calledUrl(fetchMock: FetchMock, call = 0): string {
  return String(fetchMock.mock.calls[call]?.[0])
}

export function calledMethod(fetchMock: FetchMock, call = 0): string | undefined {
  return fetchMock.mock.calls[call]?.[1]?.method
}

export function calledBody(fetchMock: FetchMock, call = 0): unknown {
  const body = fetchMock.mock.calls[call]?.[1]?.body
  return typeof body === 'string' ? JSON.parse(body) : undefined
}

export function calledHeaders(fetchMock: FetchMock, call = 0): Record<string, string> {
  const headers = fetchMock.mock.calls[call]?.[1]?.headers
  return headers && !Array.isArray(headers) && !(headers instanceof Headers) ? { ...headers } : {}
}
