import type { DirectoryConfigDto, FileSearchResultDto, SearchStatisticsDto } from '@/api/file-search'
import type { DirectoryConfig, FileSearchResult, SearchStatistics } from '@/domain/types'
import { toDate, toIso, type Mapper } from './mapper'

export const fileSearchResultMapper: Mapper<FileSearchResultDto, FileSearchResult> = {
  toEntity(dto) {
    return {
      path: dto.filePath,
      name: dto.fileName,
      fileType: dto.fileType,
      size: dto.fileSize,
      lastModified: toDate(dto.lastModified),
      score: dto.relevanceScore,
      matchedKeywords: [...dto.matchedKeywords],
      content: dto.fileContent,
      metadata: { ...dto.metadata },
    }
  },

  fromEntity(result) {
    return {
      filePath: result.path,
      fileName: result.name,
      fileType: result.fileType,
      fileSize: result.size,
      lastModified: toIso(result.lastModified),
      relevanceScore: result.score,
      matchedKeywords: [...result.matchedKeywords],
      fileContent: result.content,
      metadata: { ...result.metadata },
    }
  },
}

export const directoryConfigMapper: Mapper<DirectoryConfigDto, DirectoryConfig> = {
  toEntity(dto) {
    return {
      path: dto.path,
      includeSubdirectories: dto.includeSubdirectories,
      fileExtensions: [...dto.fileExtensions],
      isWatched: dto.isWatched,
      lastIndexed: toDate(dto.lastIndexed),
      indexedFileCount: dto.indexedFileCount,
    }
  },

  fromEntity(directory) {
    return {
      path: directory.path,
      isWatched: directory.isWatched,
      includeSubdirectories: directory.includeSubdirectories,
      fileExtensions: [...directory.fileExtensions],
      lastIndexed: toIso(directory.lastIndexed),
      indexedFileCount: directory.indexedFileCount,
    }
  },
}

export const searchStatisticsMapper: Mapper<SearchStatisticsDto, SearchStatistics> = {
  toEntity(dto) {
    return {
      totalFiles: dto.totalFiles,
      indexedFiles: dto.indexedFiles,
      indexedDirectories: dto.indexedDirectories,
      lastIndexTime: toDate(dto.lastIndexTime),
      fileTypeDistribution: { ...dto.fileTypeDistribution },
    }
  },

  fromEntity(statistics) {
    return {
      totalFiles: statistics.totalFiles,
      indexedFiles: statistics.indexedFiles,
      indexedDirectories: statistics.indexedDirectories,
      lastIndexTime: toIso(statistics.lastIndexTime),
      fileTypeDistribution: { ...statistics.fileTypeDistribution },
    }
  },
}
