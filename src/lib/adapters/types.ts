/**
 * Domain records produced by the endpoint adapters.
 *
 * `null` in a numeric or date field means the upstream did not supply a usable
 * value; adapters never substitute a default.
 */

// ============================================================================
// Categories
// ============================================================================

export const ECONOMY_GROUPS = ['GDP', 'Labour', 'Prices', 'Housing', 'Consumer', 'Business', 'Trade', 'Money', 'Government', 'Energy'] as const
export type EconomyGroup = (typeof ECONOMY_GROUPS)[number]

export const MARKET_CATEGORIES = ['index', 'bond', 'currency', 'commodity'] as const
export type MarketCategory = (typeof MARKET_CATEGORIES)[number]

export function isEconomyGroup(value: string): value is EconomyGroup {
  return ECONOMY_GROUPS.some((g) => g === value)
}

export function isMarketCategory(value: string): value is MarketCategory {
  return MARKET_CATEGORIES.some((c) => c === value)
}

/** Inclusive ISO date bounds (YYYY-MM-DD). Either side may be open. */
export interface DateRange {
  start?: string
  end?: string
}

// ============================================================================
// Records
// ============================================================================

export interface IndicatorRecord {
  category: EconomyGroup
  name: string
  title: string
  latestValue: number | null
  unit: string | null
  referencePeriod: string | null
  previousValue: number | null
  previousPeriod: string | null
  change: number | null
  pctChange: number | null
  frequency: string | null
  source: string | null
}

export interface HistoricalPoint {
  id: string
  timestamp: string
  value: number | null
}

export type ForecastHorizon = 'q1' | 'q2' | 'q3' | 'q4'

export interface ForecastPoint {
  indicator: string
  horizon: ForecastHorizon
  targetPeriod: string
  value: number | null
}

export interface MarketQuote {
  symbol: string
  name: string | null
  category: MarketCategory
  last: number | null
  close: number | null
  dailyChange: number | null
  dailyPctChange: number | null
  weeklyPctChange: number | null
  monthlyPctChange: number | null
  yearlyPctChange: number | null
  ytdPctChange: number | null
  asOf: string | null
}

export interface OHLCBar {
  symbol: string
  timestamp: string
  open: number | null
  high: number | null
  low: number | null
  close: number | null
}

export interface NewsItem {
  id: string | null
  headline: string
  description: string | null
  timestamp: string | null
  category: string | null
  importance: number | null
  url: string | null
}

export interface CalendarEvent {
  id: string | null
  timestamp: string | null
  event: string
  category: string | null
  reference: string | null
  actual: string | null
  consensus: string | null
  teForecast: string | null
  previous: string | null
  importance: number | null
  unit: string | null
}
