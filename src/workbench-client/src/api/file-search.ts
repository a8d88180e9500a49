import { z } from 'zod'
import type { ApiClient } from './client'
import { decode, flag, stringList, timestamp, wireList, wireObject } from './decode'
import { endpoints } from './endpoints'
import { uniqueBy } from '@/lib/list'

const count = z.number().int().nonnegative()

export const fileSearchResultSchema = wireObject({
  filePath: z.string().min(1),
  fileName: z.string().nullish(),
  fileType: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  fileSize: count.nullish().transform((value) => value ?? 0),
  lastModified: timestamp,
  relevanceScore: z.number(),
  matchedKeywords: stringList,
  fileContent: z
    .string()
    .nullish()
    .transform((value) => value ?? null),
  metadata: z
    .record(z.unknown())
    .nullish()
    .transform((value) => value ?? {}),
}).transform(({ fileName, ...rest }) => ({
  ...rest,
  fileName: fileName || (rest.filePath.split(/[\\/]/).pop() ?? rest.filePath),
}))

export type FileSearchResultDto = z.output<typeof fileSearchResultSchema>

export const directoryConfigSchema = wireObject({
  path: z.string().min(1),
  isWatched: z
    .boolean()
    .nullish()
    .transform((value) => value ?? true),
  includeSubdirectories: flag,
  fileExtensions: stringList,
  lastIndexed: timestamp,
  indexedFileCount: count.nullish().transform((value) => value ?? null),
})

export type DirectoryConfigDto = z.output<typeof directoryConfigSchema>

export const searchStatisticsSchema = wireObject({
  totalFiles: count,
  indexedFiles: count,
  totalDirectories: count.nullish(),
  indexedDirectories: count.nullish(),
  lastIndexTime: timestamp,
  fileTypeDistribution: z
    .record(count)
    .nullish()
    .transform((value) => value ?? {}),
}).transform(({ totalDirectories, indexedDirectories, ...rest }) => ({
  ...rest,
  indexedDirectories: indexedDirectories ?? totalDirectories ?? 0,
}))

export type SearchStatisticsDto = z.output<typeof searchStatisticsSchema>

export interface SearchFilesRequest {
  query: string
  fileTypes?: string[]
  directories?: string[]
  maxResults?: number
}

export function createFileSearchApi(http: ApiClient) {
  return {
    /** Result paths are unique within a response; later duplicates are dropped. */
    async search(request: SearchFilesRequest, signal?: AbortSignal): Promise<FileSearchResultDto[]> {
      const body: Record<string, unknown> = { query: request.query }
      if (request.fileTypes) body.file_types = request.fileTypes
      if (request.directories) body.directories = request.directories
      if (request.maxResults !== undefined) body.max_results = request.maxResults
      const raw = await http.post(endpoints.fileSearch, body, { fallback: 'Failed to search files', signal })
      const results = decode(wireList(fileSearchResultSchema, 'results'), raw, 'Search')
      return uniqueBy(results, (result) => result.filePath)
    },

    async info(filePath: string, signal?: AbortSignal): Promise<FileSearchResultDto> {
      const raw = await http.get(endpoints.fileInfo, {
        fallback: 'Failed to get file info',
        query: { file_path: filePath },
        signal,
      })
      return decode(fileSearchResultSchema, raw, 'File info')
    },

    async addToIndex(path: string, includeSubdirectories: boolean): Promise<void> {
      await http.post(
        endpoints.fileIndex,
        { path, include_subdirectories: includeSubdirectories },
        { fallback: 'Failed to add to index' },
      )
    },

    async removeFromIndex(path: string): Promise<void> {
      await http.del(endpoints.fileIndex, { fallback: 'Failed to remove from index', query: { path } })
    },

    async statistics(): Promise<SearchStatisticsDto> {
      const raw = await http.get(endpoints.fileStats, { fallback: 'Failed to get search statistics' })
      return decode(searchStatisticsSchema, raw, 'Search statistics')
    },

    async directories(): Promise<DirectoryConfigDto[]> {
      const raw = await http.get(endpoints.fileDirectories, { fallback: 'Failed to get watched directories' })
      return decode(wireList(directoryConfigSchema, 'directories'), raw, 'Watched directories')
    },

    async addDirectory(path: string, includeSubdirectories: boolean, fileExtensions?: string[]): Promise<void> {
      const body: Record<string, unknown> = { path, include_subdirectories: includeSubdirectories }
      if (fileExtensions && fileExtensions.length > 0) body.file_extensions = fileExtensions
      await http.post(endpoints.fileDirectories, body, { fallback: 'Failed to add watched directory' })
    },

    async removeDirectory(path: string): Promise<void> {
      await http.del(endpoints.fileDirectories, { fallback: 'Failed to remove watched directory', query: { path } })
    },

    async reindex(): Promise<void> {
      await http.post(endpoints.fileReindex, undefined, { fallback: 'Failed to trigger reindex' })
    },
  }
}

export type FileSearchApi = ReturnType<typeof createFileSearchApi>
