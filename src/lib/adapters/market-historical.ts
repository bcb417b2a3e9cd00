import { TEMarketHistoricalRowSchema } from '@/lib/api-clients/types'
import type { AdapterContext } from './context'
import { byTimestampAsc, encodeSegment, inRange, parseDayFirstDate, parseNumeric, parseRows } from './parse'
import type { DateRange, OHLCBar } from './types'

/**
 * OHLC history for a market symbol such as "USGG10YR:IND", ascending.
 */
export async function fetchMarketHistorical(ctx: AdapterContext, symbol: string, range: DateRange = {}): Promise<OHLCBar[]> {
  const json = await ctx.transport.execute(`/markets/historical/${encodeSegment(symbol, true)}`, { d1: range.start, d2: range.end })
  const rows = parseRows(TEMarketHistoricalRowSchema, json, 'market historical')

  const bars: OHLCBar[] = []
  for (const row of rows) {
    const timestamp = parseDayFirstDate(row.Date)
    if (!timestamp || !inRange(timestamp, range)) continue
    bars.push({
      symbol: row.Symbol ?? symbol,
      timestamp,
      open: parseNumeric(row.Open),
      high: parseNumeric(row.High),
      low: parseNumeric(row.Low),
      close: parseNumeric(row.Close),
    })
  }
  return bars.sort(byTimestampAsc)
}
