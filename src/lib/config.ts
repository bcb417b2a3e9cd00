import { z } from 'zod'
import { ConfigurationError } from '@/lib/utils/errors'

export const REFRESH_INTERVALS = [0, 60, 300, 900] as const
export type RefreshInterval = (typeof REFRESH_INTERVALS)[number]

export const CONFIG = {
  app: {
    name: 'Economic Dashboard',
    description: 'US macro indicators, markets and news from Trading Economics',
    version: '1.0.0',
  },
  api: {
    tradingEconomics: {
      baseUrl: 'https://api.tradingeconomics.com',
      country: 'united states',
      timeoutMs: 10_000,
      maxConcurrent: 4,
      retry: {
        // one retry on transport failures
        maxAttempts: 2,
        baseDelayMs: 500,
      },
    },
  },
  refresh: {
    intervals: REFRESH_INTERVALS,
    defaultInterval: 300,
  },
  news: {
    limit: 25,
  },
  tables: {
    pageSize: 30,
    recentValues: 20,
  },
} as const

const EnvSchema = z.object({
  TE_BASE_URL: z.string().url().optional(),
  TE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  TE_REFRESH_INTERVAL: z.coerce
    .number()
    .refine(isRefreshInterval, {
      message: `TE_REFRESH_INTERVAL must be one of ${REFRESH_INTERVALS.join(', ')}`,
    })
    .optional(),
})

export interface RuntimeConfig {
  baseUrl: string
  country: string
  timeoutMs: number
  maxConcurrent: number
  retry: { maxAttempts: number; baseDelayMs: number }
  refreshInterval: RefreshInterval
  newsLimit: number
}

export function isRefreshInterval(value: number): value is RefreshInterval {
  return REFRESH_INTERVALS.some((interval) => interval === value)
}

/**
 * Validate the environment and merge it over CONFIG defaults.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new ConfigurationError(`Invalid environment: ${issues}`)
  }
  const te = CONFIG.api.tradingEconomics
  return {
    baseUrl: parsed.data.TE_BASE_URL ?? te.baseUrl,
    country: te.country,
    timeoutMs: parsed.data.TE_TIMEOUT_MS ?? te.timeoutMs,
    maxConcurrent: te.maxConcurrent,
    retry: { ...te.retry },
    refreshInterval: parsed.data.TE_REFRESH_INTERVAL ?? CONFIG.refresh.defaultInterval,
    newsLimit: CONFIG.news.limit,
  }
}
