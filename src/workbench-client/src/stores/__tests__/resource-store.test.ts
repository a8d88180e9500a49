import { describe, it, expect, vi } from 'vitest'
import { makeFailure, ok, fail, type Result } from '@/domain/failure'
import { ResourceStore, type ResourceState } from '@/stores/resource-store'

function deferred<T>() {
  const handlers: { resolve: (value: T) => void } = { resolve: () => {} }
  const promise = new Promise<T>((resolve) => {
    handlers.resolve = resolve
  })
  return { promise, resolve: (value: T) => handlers.resolve(value) }
}

const serverDown = makeFailure('server', 'Unable to load notes', 500)

describe('ResourceStore', () => {
  it('moves idle -> loading -> data and notifies subscribers', async () => {
    const store = new ResourceStore<string[]>(() => Promise.resolve(ok(['a'])), { name: 'test' })
    const seen: ResourceState<string[]>['status'][] = []
    store.subscribe((state) => seen.push(state.status))

    expect(store.state).toEqual({ status: 'idle' })
    const final = await store.load()

    expect(final).toEqual({ status: 'data', data: ['a'], stale: false })
    expect(seen).toEqual(['loading', 'data'])
  })

  it('issues one fetch for concurrent loads of the same params', async () => {
    const pending = deferred<Result<number>>()
    const fetcher = vi.fn((_id: string) => pending.promise)
    const store = new ResourceStore<number, string>(fetcher, { name: 'test' })

    const first = store.load('n-1')
    const second = store.load('n-1')
    const refresh = store.refresh()
    pending.resolve(ok(7))

    expect(fetcher).toHaveBeenCalledTimes(1)
    expect(await first).toEqual({ status: 'data', data: 7, stale: false })
    expect(await second).toBe(await first)
    expect(await refresh).toBe(await first)
  })

  it('drops the result of a superseded load', async () => {
    const slow = deferred<Result<string>>()
    const fast = deferred<Result<string>>()
    const fetcher = vi.fn((query: string) => (query === 'a' ? slow.promise : fast.promise))
    const store = new ResourceStore<string, string>(fetcher, { name: 'test' })

    const first = store.load('a')
    const second = store.load('b')
    fast.resolve(ok('results for b'))
    await second
    slow.resolve(ok('results for a'))
    await first

    expect(store.state).toEqual({ status: 'data', data: 'results for b', stale: false })
    expect(console.debug).toHaveBeenCalledWith('[resource:test] discarded superseded result')
  })

  it('keeps waiting callers of a superseded load until the newer one lands', async () => {
    const slow = deferred<Result<string>>()
    const fast = deferred<Result<string>>()
    const store = new ResourceStore<string, string>((q) => (q === 'a' ? slow.promise : fast.promise), { name: 'test' })

    const first = store.load('a')
    void store.load('b')
    slow.resolve(ok('results for a'))
    fast.resolve(ok('results for b'))

    expect(await first).toEqual({ status: 'data', data: 'results for b', stale: false })
  })

  it('keeps last-known-good data when a refresh fails', async () => {
    const fetcher = vi
      .fn<() => Promise<Result<string>>>()
      .mockResolvedValueOnce(ok('v1'))
      .mockResolvedValueOnce(fail(serverDown))
    const store = new ResourceStore<string>(fetcher, { name: 'notes' })

    await store.load()
    const loading = store.refresh()
    expect(store.state).toEqual({ status: 'loading', previous: 'v1' })
    await loading

    expect(store.state).toEqual({ status: 'error', failure: serverDown, previous: 'v1' })
    expect(store.data).toBe('v1')
    expect(console.warn).toHaveBeenCalledWith('[resource:notes] load failed:', 'Unable to load notes')
  })

  it('normalizes a fetcher that throws', async () => {
    const store = new ResourceStore<string>(() => Promise.reject(new Error('boom')), { name: 'test' })

    await store.load()

    expect(store.state).toEqual({
      status: 'error',
      failure: { kind: 'unknown', message: 'boom', statusCode: null },
      previous: null,
    })
  })

  it('clear returns to idle and ignores the in-flight result', async () => {
    const pending = deferred<Result<string>>()
    const fetcher = vi.fn(() => pending.promise)
    const store = new ResourceStore<string>(fetcher, { name: 'test' })

    const load = store.load()
    store.clear()
    pending.resolve(ok('late'))
    await load

    expect(store.state).toEqual({ status: 'idle' })
    expect(store.data).toBeNull()
    expect(fetcher).toHaveBeenCalledTimes(1)
  })

  it('refresh without a previous load does nothing', async () => {
    const fetcher = vi.fn(() => Promise.resolve(ok('x')))
    const store = new ResourceStore<string>(fetcher, { name: 'test' })

    await expect(store.refresh()).resolves.toEqual({ status: 'idle' })
    expect(fetcher).not.toHaveBeenCalled()
  })

  it('a forced refresh supersedes the request in flight', async () => {
    const before = deferred<Result<string>>()
    const after = deferred<Result<string>>()
    const fetcher = vi.fn<() => Promise<Result<string>>>().mockReturnValueOnce(before.promise).mockReturnValueOnce(after.promise)
    const store = new ResourceStore<string>(fetcher, { name: 'test' })

    const first = store.load()
    const forced = store.refresh({ force: true })
    before.resolve(ok('old'))
    after.resolve(ok('new'))
    await Promise.all([first, forced])

    expect(fetcher).toHaveBeenCalledTimes(2)
    expect(store.state).toEqual({ status: 'data', data: 'new', stale: false })
  })

  it('invalidate marks data stale without fetching', async () => {
    const fetcher = vi.fn(() => Promise.resolve(ok(1)))
    const store = new ResourceStore<number>(fetcher, { name: 'test' })
    await store.load()

    store.invalidate()

    expect(store.state).toEqual({ status: 'data', data: 1, stale: true })
    expect(fetcher).toHaveBeenCalledTimes(1)
  })

  it('lands a fetch that was in flight during invalidate as stale', async () => {
    const pending = deferred<Result<number>>()
    const fetcher = vi
      .fn<() => Promise<Result<number>>>()
      .mockReturnValueOnce(pending.promise)
      .mockResolvedValueOnce(ok(2))
    const store = new ResourceStore<number>(fetcher, { name: 'test' })

    const load = store.load()
    store.invalidate()
    pending.resolve(ok(1))

    expect(await load).toEqual({ status: 'data', data: 1, stale: true })
    expect(await store.refresh()).toEqual({ status: 'data', data: 2, stale: false })
  })

  it('stops notifying after unsubscribe', async () => {
    const store = new ResourceStore<number>(() => Promise.resolve(ok(1)), { name: 'test' })
    const listener = vi.fn()
    const unsubscribe = store.subscribe(listener)
    unsubscribe()

    await store.load()

    expect(listener).not.toHaveBeenCalled()
  })
})
