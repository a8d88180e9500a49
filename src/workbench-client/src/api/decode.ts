import { z } from 'zod'
import { format, isValid, parseISO } from 'date-fns'
import { normalizeList } from '@/lib/list'
import { ParsingError } from './errors'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toCamel(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase())
}

/**
 * Camelizes top-level keys. When both spellings are present the non-null
 * value wins; snake_case wins a tie.
 */
export function camelizeKeys(raw: unknown): unknown {
  if (!isRecord(raw)) return raw
  const out: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(raw)) {
    if (!key.includes('_')) out[key] = value
  }
  for (const [key, value] of Object.entries(raw)) {
    if (!key.includes('_')) continue
    const camel = toCamel(key)
    if ((value !== null && value !== undefined) || out[camel] === null || out[camel] === undefined) {
      out[camel] = value
    }
  }
  return out
}

export function wireObject<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess(camelizeKeys, z.object(shape))
}

/** Accepts a bare array, or an object carrying the array under `field`. */
export function wireList<S extends z.ZodTypeAny>(item: S, field?: string) {
  return z.preprocess(
    (raw) => (field && isRecord(raw) && Array.isArray(raw[field]) ? raw[field] : raw),
    z.array(item),
  )
}

export const wireId = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1, 'id must not be empty'))

export const optionalId = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null
    const text = String(value).trim()
    return text === '' ? null : text
  })

export const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? null)

export const stringList = z
  .union([z.array(z.unknown()), z.string()])
  .nullish()
  .transform((value) => normalizeList(value))

export const flag = z
  .boolean()
  .nullish()
  .transform((value) => value ?? false)

export const metadata = z
  .record(z.unknown())
  .nullish()
  .transform((value) => value ?? null)

export function isIsoTimestamp(value: string): boolean {
  return isValid(parseISO(value))
}

/** ISO-8601 instant, or null when absent. Unparseable text fails closed. */
export const timestamp = z
  .string()
  .nullish()
  .transform((value, ctx) => {
    if (value === null || value === undefined || value.trim() === '') return null
    if (!isIsoTimestamp(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid ISO-8601 timestamp: ${value}` })
      return z.NEVER
    }
    return value
  })

/** Calendar date travelling as `yyyy-MM-dd`; a full timestamp is cut to its date. */
export const dateOnly = z.string().transform((value, ctx) => {
  const date = parseISO(value.slice(0, 10))
  if (!/^\d{4}-\d{2}-\d{2}/.test(value) || !isValid(date)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date: ${value}` })
    return z.NEVER
  }
  return format(date, 'yyyy-MM-dd')
})

export function decode<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> {
  if (raw === undefined || raw === null || raw === '') {
    throw new ParsingError(`${what} response was empty`)
  }
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw new ParsingError(`Failed to parse ${what} response`, { cause: parsed.error })
  }
  return parsed.data
}
