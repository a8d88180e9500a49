import { describe, it, expect } from 'vitest'
import type { SearchStatistics } from '@/domain/types'
import {
  directoryName,
  fileCategory,
  fileExtension,
  fileExtensionsLabel,
  formatFileSize,
  lastIndexedLabel,
  relativeDate,
} from '@/lib/format'
import { indexingPercentage, isIndexingComplete, mostCommonFileType, topFileTypes } from '@/lib/statistics'

const now = new Date(2025, 5, 15, 12, 0, 0)

describe('relativeDate', () => {
  it('is relative within a week and absolute beyond', () => {
    expect(relativeDate(new Date(2025, 5, 15, 10, 0, 0), now)).toBe('about 2 hours ago')
    expect(relativeDate(new Date(2025, 0, 15), now)).toBe('Jan 15, 2025')
  })

  it('labels directories that were never indexed', () => {
    expect(lastIndexedLabel(null, now)).toBe('Never indexed')
    expect(lastIndexedLabel(new Date(2025, 5, 15, 11, 55, 0), now)).toBe('5 minutes ago')
  })
})

describe('file helpers', () => {
  it('formats sizes in binary units', () => {
    expect(formatFileSize(512)).toBe('512 B')
    expect(formatFileSize(1536)).toBe('1.5 KB')
    expect(formatFileSize(5 * 1024 * 1024)).toBe('5.0 MB')
    expect(formatFileSize(3 * 1024 ** 3)).toBe('3.00 GB')
  })

  it('classifies by extension', () => {
    expect(fileExtension('Archive.TAR.GZ')).toBe('gz')
    expect(fileExtension('Makefile')).toBe('')
    expect(fileCategory('main.ts')).toBe('code')
    expect(fileCategory('notes.MD')).toBe('document')
    expect(fileCategory('settings.yaml')).toBe('config')
    expect(fileCategory('logo.svg')).toBe('image')
    expect(fileCategory('data.bin')).toBe('other')
  })

  it('names directories and their extension filters', () => {
    expect(directoryName('/home/sam/notes/')).toBe('notes')
    expect(directoryName('C:\\work\\repo')).toBe('repo')
    expect(fileExtensionsLabel([])).toBe('All file types')
    expect(fileExtensionsLabel(['md', 'txt'])).toBe('.md, .txt')
    expect(fileExtensionsLabel(['a', 'b', 'c', 'd', 'e'])).toBe('.a, .b, .c +2 more')
  })
})

describe('statistics helpers', () => {
  const stats: SearchStatistics = {
    totalFiles: 200,
    indexedFiles: 150,
    indexedDirectories: 3,
    lastIndexTime: null,
    fileTypeDistribution: { txt: 20, md: 90, ts: 40 },
  }

  it('computes progress and completion', () => {
    expect(indexingPercentage(stats)).toBe(75)
    expect(indexingPercentage({ ...stats, totalFiles: 0 })).toBe(0)
    expect(indexingPercentage({ ...stats, indexedFiles: 300 })).toBe(100)
    expect(isIndexingComplete(stats)).toBe(false)
  })

  it('ranks file types', () => {
    expect(topFileTypes(stats, 2)).toEqual([
      ['md', 90],
      ['ts', 40],
    ])
    expect(mostCommonFileType(stats)).toBe('md')
    expect(mostCommonFileType({ ...stats, fileTypeDistribution: {} })).toBeNull()
  })
})
