import type { MarketCategory, MarketQuote } from '@/lib/adapters'
import { formatNumber, formatPercentage } from '@/lib/utils/format'

export interface TickerSpec {
  label: string
  category: MarketCategory
  symbol?: string
  namePattern?: RegExp
}

export interface TickerItem {
  label: string
  symbol: string
  value: number | null
  change: number | null
  display: { value: string; change: string }
}

// Curated ticker bar: key indices, 10Y yield, dollar index, crude
export const TICKER_SPECS: TickerSpec[] = [
  { label: 'S&P 500', category: 'index', symbol: 'US500' },
  { label: 'Dow', category: 'index', symbol: 'US30' },
  { label: 'Nasdaq', category: 'index', symbol: 'US100' },
  { label: 'VIX', category: 'index', symbol: 'USVIX' },
  { label: '10Y Yield', category: 'bond', namePattern: /US 10Y/i },
  { label: 'DXY', category: 'currency', symbol: 'DXY', namePattern: /DXY|Dollar Index/i },
  { label: 'WTI', category: 'commodity', namePattern: /Crude Oil/i },
]

function findQuote(spec: TickerSpec, quotes: MarketQuote[]): MarketQuote | undefined {
  if (spec.symbol) {
    const bySymbol = quotes.find((q) => q.symbol === spec.symbol)
    if (bySymbol) return bySymbol
  }
  const pattern = spec.namePattern
  if (pattern) return quotes.find((q) => q.name !== null && pattern.test(q.name))
  return undefined
}

/**
 * Build ticker items from whatever market categories loaded. Specs whose
 * category is missing or whose quote is not found are skipped.
 */
export function buildTicker(quotes: Partial<Record<MarketCategory, MarketQuote[]>>, specs: TickerSpec[] = TICKER_SPECS): TickerItem[] {
  const items: TickerItem[] = []
  for (const spec of specs) {
    const quote = findQuote(spec, quotes[spec.category] ?? [])
    if (!quote) continue
    items.push({
      label: spec.label,
      symbol: quote.symbol,
      value: quote.last,
      change: quote.dailyPctChange,
      display: { value: formatNumber(quote.last), change: formatPercentage(quote.dailyPctChange) },
    })
  }
  return items
}
