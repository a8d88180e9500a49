import { z } from 'zod'
import { DEFAULT_TIMEOUT_MS } from '@/api/client'

export const DEFAULT_BASE_URL = 'http://localhost:24801'

export interface WorkbenchConfig {
  /** Backend origin, without a trailing slash. */
  baseUrl: string
  /** Connect-plus-read budget for every request. */
  timeoutMs: number
  getToken?: () => string | null
  fetch?: typeof fetch
}

/**
 * Environment variables read by {@link loadConfig}
 */
export interface EnvConfig {
  WORKBENCH_API_BASE_URL?: string
  WORKBENCH_API_TOKEN?: string
  WORKBENCH_API_TIMEOUT_MS?: string
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

const envSchema = z.object({
  WORKBENCH_API_BASE_URL: z.string().trim().url().optional(),
  WORKBENCH_API_TOKEN: z.string().trim().min(1).optional(),
  WORKBENCH_API_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
})

export function loadConfig(env: EnvConfig = process.env): WorkbenchConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ConfigError(`Invalid configuration: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`)
  }

  const { WORKBENCH_API_BASE_URL, WORKBENCH_API_TOKEN, WORKBENCH_API_TIMEOUT_MS } = parsed.data
  if (!WORKBENCH_API_BASE_URL) {
    console.warn(`[config] WORKBENCH_API_BASE_URL not set, using ${DEFAULT_BASE_URL}`)
  }
  const token = WORKBENCH_API_TOKEN ?? null
  return {
    baseUrl: (WORKBENCH_API_BASE_URL ?? DEFAULT_BASE_URL).replace(/\/+$/, ''),
    timeoutMs: WORKBENCH_API_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
    getToken: () => token,
  }
}
