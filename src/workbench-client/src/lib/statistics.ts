import type { SearchStatistics } from '@/domain/types'

export function indexingPercentage(stats: SearchStatistics): number {
  if (stats.totalFiles === 0) return 0
  return Math.min(100, Math.max(0, (stats.indexedFiles / stats.totalFiles) * 100))
}

export function isIndexingComplete(stats: SearchStatistics): boolean {
  return stats.indexedFiles >= stats.totalFiles
}

/** File types by descending count; ties keep the backend's order. */
export function topFileTypes(stats: SearchStatistics, limit = 5): [type: string, count: number][] {
  return Object.entries(stats.fileTypeDistribution)
    .sort(([, a], [, b]) => b - a)
    .slice(0, limit)
}

export function mostCommonFileType(stats: SearchStatistics): string | null {
  const [top] = topFileTypes(stats, 1)
  return top ? top[0] : null
}
