import { TEHistoricalRowSchema } from '@/lib/api-clients/types'
import type { AdapterContext } from './context'
import { byTimestampAsc, encodeSegment, inRange, parseNumeric, parseRows, parseTimestamp } from './parse'
import type { DateRange, HistoricalPoint } from './types'

/**
 * Full history for one indicator, ascending by timestamp. The upstream only
 * accepts an end date after a start date, so bounds are also applied locally.
 */
export async function fetchHistorical(ctx: AdapterContext, indicator: string, range: DateRange = {}): Promise<HistoricalPoint[]> {
  let path = `/historical/country/${encodeSegment(ctx.country)}/indicator/${encodeSegment(indicator)}`
  if (range.start) {
    path += `/${range.start}`
    if (range.end) path += `/${range.end}`
  }

  const json = await ctx.transport.execute(path)
  const rows = parseRows(TEHistoricalRowSchema, json, 'historical')

  const points: HistoricalPoint[] = []
  for (const row of rows) {
    const timestamp = parseTimestamp(row.DateTime)
    if (!timestamp || !inRange(timestamp, range)) continue
    points.push({ id: row.Category ?? indicator, timestamp, value: parseNumeric(row.Value) })
  }
  return points.sort(byTimestampAsc)
}
