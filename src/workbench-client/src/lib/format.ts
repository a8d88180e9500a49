import { differenceInCalendarDays, format, formatDistance } from 'date-fns'
import categories from '@/data/file-categories.json'

export function relativeDate(date: Date, now: Date = new Date()): string {
  if (Math.abs(differenceInCalendarDays(now, date)) < 7) {
    return formatDistance(date, now, { addSuffix: true })
  }
  return format(date, 'MMM d, yyyy')
}

export function lastIndexedLabel(lastIndexed: Date | null, now: Date = new Date()): string {
  return lastIndexed === null ? 'Never indexed' : relativeDate(lastIndexed, now)
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 ** 2) return `${(bytes / 1024).toFixed(1)} KB`
  if (bytes < 1024 ** 3) return `${(bytes / 1024 ** 2).toFixed(1)} MB`
  return `${(bytes / 1024 ** 3).toFixed(2)} GB`
}

export function fileExtension(fileName: string): string {
  const parts = fileName.split('.')
  return parts.length > 1 ? (parts[parts.length - 1] ?? '').toLowerCase() : ''
}

export type FileCategory = keyof typeof categories | 'other'

const CATEGORY_BY_EXTENSION = new Map<string, FileCategory>()
for (const category of ['code', 'document', 'config', 'image'] as const) {
  for (const extension of categories[category]) CATEGORY_BY_EXTENSION.set(extension, category)
}

export function fileCategory(fileName: string): FileCategory {
  return CATEGORY_BY_EXTENSION.get(fileExtension(fileName)) ?? 'other'
}

export function directoryName(path: string): string {
  const parts = path.split(/[/\\]/).filter((part) => part !== '')
  return parts[parts.length - 1] ?? path
}

export function fileExtensionsLabel(extensions: readonly string[], shown = 3): string {
  if (extensions.length === 0) return 'All file types'
  const listed = extensions
    .slice(0, shown)
    .map((extension) => `.${extension}`)
    .join(', ')
  return extensions.length > shown ? `${listed} +${extensions.length - shown} more` : listed
}
