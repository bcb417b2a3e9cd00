import { ConcurrencyLimiter } from '@/lib/api-clients/concurrency'
import { TradingEconomicsClient, type Transport } from '@/lib/api-clients/trading-economics'
import { ResponseCache, systemClock, type Clock } from '@/lib/cache/memory'
import { readEnvConfig, type RuntimeConfig } from '@/lib/config'
import { CredentialHolder } from '@/lib/credentials'
import { DashboardService, type MarketRefreshSummary } from '@/lib/dashboard/service'
import { RefreshScheduler, type Timer } from '@/lib/refresh/scheduler'

export interface AppContext {
  config: RuntimeConfig
  credentials: CredentialHolder
  transport: Transport
  cache: ResponseCache
  dashboard: DashboardService
  scheduler: RefreshScheduler<MarketRefreshSummary>
}

export interface AppContextOptions {
  env?: NodeJS.ProcessEnv
  fetchImpl?: typeof fetch
  clock?: Clock
  timer?: Timer
  /** Replaces the HTTP transport entirely (tests) */
  transport?: Transport
}

/**
 * Wire every component explicitly. Fails fast with ConfigurationError when
 * the credential or environment is invalid.
 */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const env = options.env ?? process.env
  const clock = options.clock ?? systemClock
  const config = readEnvConfig(env)

  const credentials = new CredentialHolder()
  credentials.load(env)

  const transport =
    options.transport ??
    new TradingEconomicsClient({
      credentials,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      limiter: new ConcurrencyLimiter(config.maxConcurrent),
      retry: config.retry,
      fetchImpl: options.fetchImpl,
      now: () => clock.now(),
    })

  const cache = new ResponseCache({ clock })
  const dashboard = new DashboardService({
    adapters: { transport, country: config.country },
    cache,
    newsLimit: config.newsLimit,
  })
  const scheduler = new RefreshScheduler<MarketRefreshSummary>({
    refresh: () => dashboard.refreshMarkets(),
    interval: config.refreshInterval,
    timer: options.timer,
    clock,
  })

  console.log(`[context] ready: country=${config.country} refresh=${config.refreshInterval}s`)
  return { config, credentials, transport, cache, dashboard, scheduler }
}

let shared: AppContext | undefined

/**
 * Process-wide context for the route handlers, built on first use.
 */
export function getAppContext(): AppContext {
  if (!shared) shared = createAppContext()
  return shared
}
