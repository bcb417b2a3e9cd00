/**
 * Data Freshness Utilities
 *
 * Every dataset the dashboard shows carries an "as of" time and a status
 * derived from its cache tier's TTL.
 */

export type DataFreshnessStatus = 'live' | 'delayed' | 'stale' | 'error'

export interface DataFreshnessInfo {
  status: DataFreshnessStatus
  label: string
  ageInMinutes: number
  ageInHours: number
  asOf: string
  formattedAge: string
  isStale: boolean
  warningMessage?: string
}

export interface FreshnessInput {
  fetchedAt: number
  ttlSeconds: number
  /** True when the payload was served as a fallback after a failed refresh */
  servedStale?: boolean
  staleReason?: string
}

/**
 * live: within TTL. delayed: past TTL, no refresh attempted yet.
 * stale: a refresh failed and the previous payload was served.
 */
export function calculateDataFreshness(input: FreshnessInput, now: number = Date.now()): DataFreshnessInfo {
  const ageMs = now - input.fetchedAt
  const ageInMinutes = Math.floor(ageMs / (1000 * 60))
  const ageInHours = Math.floor(ageInMinutes / 60)

  let status: DataFreshnessStatus
  let warningMessage: string | undefined

  if (ageMs < 0) {
    status = 'error'
    warningMessage = 'Data timestamp is in the future - system clock may be incorrect'
  } else if (input.servedStale) {
    status = 'stale'
    warningMessage = `Showing data from ${formatAge(ageInMinutes)}${input.staleReason ? ` - refresh failed: ${input.staleReason}` : ''}`
  } else if (ageMs < input.ttlSeconds * 1000) {
    status = 'live'
  } else {
    status = 'delayed'
  }

  return {
    status,
    label: getFreshnessLabel(status),
    ageInMinutes,
    ageInHours,
    asOf: new Date(input.fetchedAt).toISOString(),
    formattedAge: formatAge(ageInMinutes),
    isStale: status === 'stale' || status === 'error',
    warningMessage,
  }
}

// [unit suffix, minutes per unit], largest first
const AGE_UNITS: Array<[string, number]> = [
  ['y', 60 * 24 * 30 * 12],
  ['mo', 60 * 24 * 30],
  ['d', 60 * 24],
  ['h', 60],
  ['m', 1],
]

/** Compact age for badges: "just now", "5m ago", "3h ago", "2mo ago". */
export function formatAge(ageInMinutes: number): string {
  for (const [suffix, minutes] of AGE_UNITS) {
    const count = Math.floor(ageInMinutes / minutes)
    if (count >= 1) return `${count}${suffix} ago`
  }
  return 'just now'
}

const FRESHNESS_LABELS: Record<DataFreshnessStatus, string> = {
  live: 'Live',
  delayed: 'Delayed',
  stale: 'Stale',
  error: 'Error',
}

export function getFreshnessLabel(status: DataFreshnessStatus): string {
  return FRESHNESS_LABELS[status]
}
