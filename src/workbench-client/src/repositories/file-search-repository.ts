import type { FileSearchApi } from '@/api/file-search'
import { validationFailure, type Result } from '@/domain/failure'
import type { DirectoryConfig, FileSearchResult, SearchParams, SearchStatistics } from '@/domain/types'
import { directoryConfigMapper, fileSearchResultMapper, searchStatisticsMapper } from '@/mappers/file-search-mapper'
import { attempt, isBlank, rejected } from './repository'

export class FileSearchRepository {
  constructor(private readonly api: FileSearchApi) {}

  searchFiles(params: SearchParams, signal?: AbortSignal): Promise<Result<FileSearchResult[]>> {
    const query = params.query.trim()
    if (query === '') return rejected(validationFailure('Search query cannot be empty'))
    if (params.maxResults !== undefined && (!Number.isInteger(params.maxResults) || params.maxResults < 1)) {
      return rejected(validationFailure('Max results must be greater than 0'))
    }
    return attempt(async () => {
      const results = await this.api.search(
        {
          query,
          fileTypes: params.fileTypes,
          directories: params.directories,
          maxResults: params.maxResults,
        },
        signal,
      )
      return results.map((dto) => fileSearchResultMapper.toEntity(dto))
    })
  }

  getFileInfo(path: string, signal?: AbortSignal): Promise<Result<FileSearchResult>> {
    if (isBlank(path)) return rejected(validationFailure('File path cannot be empty'))
    return attempt(async () => fileSearchResultMapper.toEntity(await this.api.info(path.trim(), signal)))
  }

  addToIndex(path: string, includeSubdirectories = true): Promise<Result<void>> {
    if (isBlank(path)) return rejected(validationFailure('Path cannot be empty'))
    return attempt(() => this.api.addToIndex(path.trim(), includeSubdirectories))
  }

  removeFromIndex(path: string): Promise<Result<void>> {
    if (isBlank(path)) return rejected(validationFailure('Path cannot be empty'))
    return attempt(() => this.api.removeFromIndex(path.trim()))
  }

  listWatchedDirectories(): Promise<Result<DirectoryConfig[]>> {
    return attempt(async () => (await this.api.directories()).map((dto) => directoryConfigMapper.toEntity(dto)))
  }

  addWatchedDirectory(path: string, includeSubdirectories = true, fileExtensions?: string[]): Promise<Result<void>> {
    if (isBlank(path)) return rejected(validationFailure('Directory path cannot be empty'))
    if (fileExtensions?.some((extension) => isBlank(extension))) {
      return rejected(validationFailure('File extensions cannot be empty'))
    }
    const extensions = fileExtensions?.map((extension) => extension.trim().toLowerCase())
    return attempt(() => this.api.addDirectory(path.trim(), includeSubdirectories, extensions))
  }

  removeWatchedDirectory(path: string): Promise<Result<void>> {
    if (isBlank(path)) return rejected(validationFailure('Directory path cannot be empty'))
    return attempt(() => this.api.removeDirectory(path.trim()))
  }

  getSearchStatistics(): Promise<Result<SearchStatistics>> {
    return attempt(async () => searchStatisticsMapper.toEntity(await this.api.statistics()))
  }

  reindexAll(): Promise<Result<void>> {
    return attempt(() => this.api.reindex())
  }
}
