import type { Result } from '@/domain/failure'
import type { DirectoryConfig, FileSearchResult, SearchParams, SearchStatistics } from '@/domain/types'
import type { FileSearchRepository } from '@/repositories/file-search-repository'
import { ResourceStore, type ResourceState } from './resource-store'

function searchKey(params: SearchParams): string {
  return JSON.stringify([
    params.query.trim(),
    params.fileTypes ?? null,
    params.directories ?? null,
    params.maxResults ?? null,
  ])
}

/**
 * Search results, watched directories and index statistics for the file
 * search screen. Index mutations mark the statistics stale; a reindex
 * reloads both directories and statistics before it resolves. Starting a
 * new search aborts the request of the one it replaces.
 */
export class FileSearchStore {
  readonly results: ResourceStore<FileSearchResult[], SearchParams>
  readonly directories: ResourceStore<DirectoryConfig[]>
  readonly statistics: ResourceStore<SearchStatistics>
  #searchAbort: AbortController | null = null

  constructor(private readonly repository: FileSearchRepository) {
    this.results = new ResourceStore<FileSearchResult[], SearchParams>(
      (params) => repository.searchFiles(params, this.#nextSearchSignal()),
      { name: 'file-search', key: searchKey },
    )
    this.directories = new ResourceStore<DirectoryConfig[]>(() => repository.listWatchedDirectories(), { name: 'watched-directories' })
    this.statistics = new ResourceStore<SearchStatistics>(() => repository.getSearchStatistics(), { name: 'search-statistics' })
  }

  search(params: SearchParams): Promise<ResourceState<FileSearchResult[]>> {
    return this.results.load(params)
  }

  refreshSearch(): Promise<ResourceState<FileSearchResult[]>> {
    return this.results.refresh()
  }

  clearSearch(): void {
    this.#searchAbort?.abort()
    this.#searchAbort = null
    this.results.clear()
  }

  #nextSearchSignal(): AbortSignal {
    this.#searchAbort?.abort()
    this.#searchAbort = new AbortController()
    return this.#searchAbort.signal
  }

  loadDirectories(): Promise<ResourceState<DirectoryConfig[]>> {
    return this.directories.load()
  }

  loadStatistics(): Promise<ResourceState<SearchStatistics>> {
    return this.statistics.load()
  }

  async addToIndex(path: string, includeSubdirectories = true): Promise<Result<void>> {
    const result = await this.repository.addToIndex(path, includeSubdirectories)
    if (result.ok) this.statistics.invalidate()
    return result
  }

  async removeFromIndex(path: string): Promise<Result<void>> {
    const result = await this.repository.removeFromIndex(path)
    if (result.ok) this.statistics.invalidate()
    return result
  }

  async addWatchedDirectory(
    path: string,
    includeSubdirectories = true,
    fileExtensions?: string[],
  ): Promise<Result<void>> {
    const result = await this.repository.addWatchedDirectory(path, includeSubdirectories, fileExtensions)
    if (result.ok) {
      this.statistics.invalidate()
      await reload(this.directories)
    }
    return result
  }

  async removeWatchedDirectory(path: string): Promise<Result<void>> {
    const result = await this.repository.removeWatchedDirectory(path)
    if (result.ok) {
      this.statistics.invalidate()
      await reload(this.directories)
    }
    return result
  }

  /** Both follow-up fetches start strictly after the reindex call has returned. */
  async reindexAll(): Promise<Result<void>> {
    const result = await this.repository.reindexAll()
    if (result.ok) {
      await Promise.all([reload(this.directories), reload(this.statistics)])
    }
    return result
  }
}

function reload<T>(store: ResourceStore<T>): Promise<ResourceState<T>> {
  return store.state.status === 'idle' ? store.load() : store.refresh({ force: true })
}
