import type { HealthApi } from '@/api/health'
import { bestEffort, ok, type BestEffort, type Result } from '@/domain/failure'
import type { MetricsSummary, ServiceStatus } from '@/domain/types'
import { attempt } from './repository'

export interface HealthOverview {
  backendOk: boolean
  version: string | null
  /** Per-subsystem status from the extended probe, which not every deployment exposes. */
  services: BestEffort<ServiceStatus[]>
  metrics: BestEffort<MetricsSummary>
}

export class HealthRepository {
  constructor(private readonly api: HealthApi) {}

  /**
   * The extended probe is tried first and the basic `/health` check only
   * when it is unavailable. Metrics are always best-effort.
   */
  async getHealthOverview(): Promise<Result<HealthOverview>> {
    const [extended, metrics] = await Promise.all([
      attempt(() => this.api.extended()),
      attempt(() => this.api.metrics()),
    ])
    if (extended.ok) {
      return ok({
        backendOk: extended.value.backendOk,
        version: extended.value.version,
        services: { available: true, value: extended.value.services },
        metrics: bestEffort(metrics),
      })
    }

    const basic = await attempt(() => this.api.basic())
    if (!basic.ok) return basic
    return ok({
      backendOk: basic.value.backendOk,
      version: basic.value.version,
      services: { available: false, failure: extended.failure },
      metrics: bestEffort(metrics),
    })
  }
}
