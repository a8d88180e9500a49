/**
 * Backend list fields arrive either as arrays or as comma-joined strings.
 * Both forms collapse to the same ordered list of trimmed, non-empty items.
 */
export function normalizeList(raw: unknown): string[] {
  const items: unknown[] = typeof raw === 'string' ? raw.split(',') : Array.isArray(raw) ? raw : []
  const result: string[] = []
  for (const item of items) {
    if (typeof item !== 'string' && typeof item !== 'number' && typeof item !== 'boolean') continue
    const text = String(item).trim()
    if (text !== '') result.push(text)
  }
  return result
}

export function uniqueBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>()
  return items.filter((item) => {
    const k = key(item)
    if (seen.has(k)) return false
    seen.add(k)
    return true
  })
}
