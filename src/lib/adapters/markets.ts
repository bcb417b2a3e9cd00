import { TEMarketRowSchema } from '@/lib/api-clients/types'
import type { AdapterContext } from './context'
import { parseNumeric, parseRows, parseText, parseTimestamp } from './parse'
import type { MarketCategory, MarketQuote } from './types'

const MARKET_PATHS: Record<MarketCategory, string> = {
  index: '/markets/index',
  bond: '/markets/bond',
  currency: '/markets/currency',
  commodity: '/markets/commodities',
}

export async function fetchMarkets(ctx: AdapterContext, category: MarketCategory): Promise<MarketQuote[]> {
  const json = await ctx.transport.execute(MARKET_PATHS[category])
  const rows = parseRows(TEMarketRowSchema, json, `markets/${category}`)

  return rows.map((row) => ({
    symbol: row.Symbol,
    name: parseText(row.Name),
    category,
    last: parseNumeric(row.Last),
    close: parseNumeric(row.Close),
    dailyChange: parseNumeric(row.DailyChange),
    dailyPctChange: parseNumeric(row.DailyPercentualChange),
    weeklyPctChange: parseNumeric(row.WeeklyPercentualChange),
    monthlyPctChange: parseNumeric(row.MonthlyPercentualChange),
    yearlyPctChange: parseNumeric(row.YearlyPercentualChange),
    ytdPctChange: parseNumeric(row.YTDPercentualChange),
    asOf: parseTimestamp(row.Date),
  }))
}
