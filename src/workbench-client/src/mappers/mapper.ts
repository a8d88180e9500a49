import { format, parseISO } from 'date-fns'

/** Pure, total conversion between a wire DTO and the entity the app works with. */
export interface Mapper<TDto, TEntity> {
  toEntity(dto: TDto): TEntity
  fromEntity(entity: TEntity): TDto
}

export function toDate(iso: string | null): Date | null {
  return iso === null ? null : parseISO(iso)
}

export function toIso(date: Date | null): string | null {
  return date === null ? null : date.toISOString()
}

/** `yyyy-MM-dd` to local midnight, so the calendar day survives any timezone. */
export function fromDateOnly(value: string): Date {
  return parseISO(value)
}

export function toDateOnly(date: Date): string {
  return format(date, 'yyyy-MM-dd')
}

/** An update can never precede the creation it follows. */
export function notBefore(date: Date | null, floor: Date | null): Date | null {
  if (date === null || floor === null) return date
  return date.getTime() < floor.getTime() ? floor : date
}

export function copyRecord<T extends Record<string, unknown>>(value: T | null): T | null {
  return value === null ? null : { ...value }
}
