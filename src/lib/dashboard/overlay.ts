import type { ForecastHorizon, ForecastPoint, HistoricalPoint } from '@/lib/adapters'

export interface SeriesPoint {
  timestamp: string
  actual: number | null
  forecast: number | null
  horizon?: ForecastHorizon
}

/**
 * Merge forecast points for one indicator into its history. A forecast whose
 * target day matches an observation is attached to it; others are appended
 * as forecast-only points. Result is ascending by timestamp.
 */
export function overlayForecast(history: HistoricalPoint[], forecasts: ForecastPoint[], indicator: string): SeriesPoint[] {
  const wanted = indicator.trim().toLowerCase()
  const series: SeriesPoint[] = history.map((p) => ({ timestamp: p.timestamp, actual: p.value, forecast: null }))
  const byDay = new Map(series.map((p) => [p.timestamp.slice(0, 10), p]))

  for (const f of forecasts) {
    if (f.indicator.trim().toLowerCase() !== wanted) continue
    const existing = byDay.get(f.targetPeriod.slice(0, 10))
    if (existing) {
      existing.forecast = f.value
      existing.horizon = f.horizon
      continue
    }
    const point: SeriesPoint = { timestamp: f.targetPeriod, actual: null, forecast: f.value, horizon: f.horizon }
    series.push(point)
    byDay.set(f.targetPeriod.slice(0, 10), point)
  }

  return series.sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0))
}

/** The `count` most recent observations, newest first. */
export function recentValues(history: HistoricalPoint[], count: number): HistoricalPoint[] {
  return history.slice(-count).reverse()
}
