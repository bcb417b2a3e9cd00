import { TEForecastRowSchema, type TEForecastRow } from '@/lib/api-clients/types'
import type { AdapterContext } from './context'
import { encodeSegment, parseNumeric, parseRows, parseTimestamp } from './parse'
import type { ForecastHorizon, ForecastPoint } from './types'

const QUARTERS: Array<[ForecastHorizon, (row: TEForecastRow) => [unknown, string | null | undefined]]> = [
  ['q1', (r) => [r.q1, r.q1_date]],
  ['q2', (r) => [r.q2, r.q2_date]],
  ['q3', (r) => [r.q3, r.q3_date]],
  ['q4', (r) => [r.q4, r.q4_date]],
]

/**
 * Quarterly forecasts for every indicator of the country. Quarters without a
 * target date are skipped since they cannot be placed on a series.
 */
export async function fetchForecasts(ctx: AdapterContext): Promise<ForecastPoint[]> {
  const json = await ctx.transport.execute(`/forecast/country/${encodeSegment(ctx.country)}`)
  const rows = parseRows(TEForecastRowSchema, json, 'forecast')

  const points: ForecastPoint[] = []
  for (const row of rows) {
    for (const [horizon, pick] of QUARTERS) {
      const [value, date] = pick(row)
      const targetPeriod = parseTimestamp(date)
      if (!targetPeriod) continue
      points.push({ indicator: row.Category, horizon, targetPeriod, value: parseNumeric(value) })
    }
  }
  return points
}
