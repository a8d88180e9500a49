import { z } from 'zod'
import type { ServiceStatus, MetricsSummary } from '@/domain/types'
import type { ApiClient } from './client'
import { decode } from './decode'
import { endpoints } from './endpoints'

export interface HealthReportDto {
  backendOk: boolean
  version: string | null
  services: ServiceStatus[]
}

const OK_STATUSES = new Set(['healthy', 'up', 'true'])

function isHealthyStatus(value: unknown): boolean {
  if (value === true) return true
  const text = String(value ?? '').toLowerCase()
  return text.includes('ok') || OK_STATUSES.has(text)
}

function text(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value)
}

const reportSchema = z.record(z.unknown())

const SERVICE_KEYS: [name: string, keys: string[]][] = [
  ['Service Registry', ['service_registry']],
  ['LM Studio', ['lmstudio', 'lm_studio']],
  ['Database', ['database', 'db']],
  ['Router', ['router']],
  ['Vector Store', ['vector_store', 'qdrant']],
]

function toService(name: string, value: unknown): ServiceStatus {
  if (typeof value === 'object' && value !== null) {
    const record = reportSchema.parse(value)
    return {
      name,
      status: String(record.status ?? record.state ?? record.ok ?? 'unknown'),
      detail: text(record.message ?? record.detail),
    }
  }
  return { name, status: String(value), detail: null }
}

export function parseExtendedHealth(raw: unknown): HealthReportDto {
  const report = decode(reportSchema, raw, 'Extended health')
  const services: ServiceStatus[] = []
  for (const [name, keys] of SERVICE_KEYS) {
    const value = keys.map((key) => report[key]).find((candidate) => candidate !== undefined && candidate !== null)
    if (value !== undefined) services.push(toService(name, value))
  }
  return {
    backendOk: report.ok === true || isHealthyStatus(report.status ?? report.ok ?? 'unknown'),
    version: text(report.version),
    services,
  }
}

/** `/health` answers either with a JSON object or with a bare word such as `OK`. */
export function parseBasicHealth(body: string): HealthReportDto {
  const trimmed = body.trim()
  if (!trimmed.startsWith('{')) {
    return { backendOk: trimmed === '' || isHealthyStatus(trimmed), version: null, services: [] }
  }
  const report = decode(reportSchema, JSON.parse(trimmed), 'Health')
  return {
    backendOk: isHealthyStatus(report.status ?? report.state ?? report.ok ?? 'unknown'),
    version: text(report.version),
    services: [],
  }
}

export function summarizeMetrics(body: string, sampleSize = 3): MetricsSummary {
  const lines = body.split('\n')
  const sample = lines.filter((line) => line.trim() !== '' && !line.trimStart().startsWith('#')).slice(0, sampleSize)
  return { lineCount: lines.length, sample }
}

export function createHealthApi(http: ApiClient) {
  return {
    async basic(): Promise<HealthReportDto> {
      const body = await http.get(endpoints.health, { fallback: 'Health check failed', responseType: 'text' })
      return parseBasicHealth(typeof body === 'string' ? body : '')
    },

    async extended(): Promise<HealthReportDto> {
      const raw = await http.get(endpoints.healthExtended, { fallback: 'Extended health check failed' })
      return parseExtendedHealth(raw)
    },

    async metrics(): Promise<MetricsSummary> {
      const body = await http.get(endpoints.metrics, { fallback: 'Metrics unavailable', responseType: 'text' })
      return summarizeMetrics(typeof body === 'string' ? body : '')
    },
  }
}

export type HealthApi = ReturnType<typeof createHealthApi>
