import { fail, normalize, type Failure, type Result } from '@/domain/failure'

export type ResourceState<T> =
  | { readonly status: 'idle' }
  | { readonly status: 'loading'; readonly previous: T | null }
  | { readonly status: 'data'; readonly data: T; readonly stale: boolean }
  | { readonly status: 'error'; readonly failure: Failure; readonly previous: T | null }

export type Fetcher<T, P> = (params: P) => Promise<Result<T>>
export type Listener<T> = (state: ResourceState<T>) => void

export interface ResourceStoreOptions<P> {
  /** Used in log lines, e.g. `[resource:notes]`. */
  name: string
  /** Identifies equal requests; defaults to the JSON form of the params. */
  key?: (params: P) => string
}

const IDLE = Object.freeze({ status: 'idle' as const })

/**
 * Owns the snapshot of one remote resource for one screen. At most one
 * fetch is in flight; a result that has been superseded by a newer load,
 * a forced refresh or a clear is dropped.
 */
export class ResourceStore<T, P = void> {
  #state: ResourceState<T> = IDLE
  #listeners = new Set<Listener<T>>()
  #generation = 0
  /** Fetches started at or before this generation land as stale. */
  #invalidatedAt = 0
  #inFlight: { key: string; promise: Promise<ResourceState<T>> } | null = null
  #lastParams: { value: P } | null = null

  constructor(
    private readonly fetcher: Fetcher<T, P>,
    private readonly options: ResourceStoreOptions<P>,
  ) {}

  get state(): ResourceState<T> {
    return this.#state
  }

  /** Current data, or the last data seen before a reload or an error. */
  get data(): T | null {
    switch (this.#state.status) {
      case 'data':
        return this.#state.data
      case 'loading':
      case 'error':
        return this.#state.previous
      case 'idle':
        return null
    }
  }

  get isLoading(): boolean {
    return this.#state.status === 'loading'
  }

  subscribe(listener: Listener<T>): () => void {
    this.#listeners.add(listener)
    return () => {
      this.#listeners.delete(listener)
    }
  }

  load(params: P): Promise<ResourceState<T>> {
    const key = this.#keyOf(params)
    if (this.#inFlight && this.#inFlight.key === key) return this.#inFlight.promise
    return this.#start(params, key)
  }

  /**
   * Re-runs the last load. Joins a request already in flight unless
   * `force` is set, in which case the data is fetched anew.
   */
  refresh(options: { force?: boolean } = {}): Promise<ResourceState<T>> {
    if (!this.#lastParams) return Promise.resolve(this.#state)
    if (this.#inFlight && !options.force) return this.#inFlight.promise
    const params = this.#lastParams.value
    return this.#start(params, this.#keyOf(params))
  }

  /**
   * Marks the current data as out of date without fetching. A fetch
   * already in flight began before the change, so its data lands stale too.
   */
  invalidate(): void {
    this.#invalidatedAt = this.#generation
    if (this.#state.status === 'data' && !this.#state.stale) {
      this.#set({ ...this.#state, stale: true })
    }
  }

  clear(): void {
    this.#generation++
    this.#inFlight = null
    this.#lastParams = null
    this.#set(IDLE)
  }

  #keyOf(params: P): string {
    return this.options.key ? this.options.key(params) : (JSON.stringify(params) ?? '')
  }

  #start(params: P, key: string): Promise<ResourceState<T>> {
    const generation = ++this.#generation
    this.#lastParams = { value: params }
    this.#set({ status: 'loading', previous: this.data })
    const promise = this.#run(params, generation)
    this.#inFlight = { key, promise }
    return promise
  }

  async #run(params: P, generation: number): Promise<ResourceState<T>> {
    let result: Result<T>
    try {
      result = await this.fetcher(params)
    } catch (error) {
      result = fail(normalize(error))
    }

    if (generation !== this.#generation) {
      console.debug(`[resource:${this.options.name}] discarded superseded result`)
      return this.#inFlight ? this.#inFlight.promise : this.#state
    }

    this.#inFlight = null
    if (result.ok) {
      this.#set({ status: 'data', data: result.value, stale: generation <= this.#invalidatedAt })
    } else {
      console.warn(`[resource:${this.options.name}] load failed:`, result.failure.message)
      this.#set({ status: 'error', failure: result.failure, previous: this.data })
    }
    return this.#state
  }

  #set(state: ResourceState<T>): void {
    this.#state = state
    for (const listener of this.#listeners) listener(state)
  }
}
