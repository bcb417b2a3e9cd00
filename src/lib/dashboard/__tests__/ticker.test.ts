import type { MarketQuote } from '@/lib/adapters'
import { buildTicker } from '../ticker'

function quote(overrides: Partial<MarketQuote> & Pick<MarketQuote, 'symbol' | 'category'>): MarketQuote {
  return {
    name: null,
    last: null,
    close: null,
    dailyChange: null,
    dailyPctChange: null,
    weeklyPctChange: null,
    monthlyPctChange: null,
    yearlyPctChange: null,
    ytdPctChange: null,
    asOf: null,
    ...overrides,
  }
}

describe('buildTicker', () => {
  it('picks curated quotes by symbol or name in display order', () => {
    const items = buildTicker({
      index: [
        quote({ symbol: 'US30', category: 'index', name: 'Dow Jones', last: 37592.98, dailyPctChange: -0.31 }),
        quote({ symbol: 'US500', category: 'index', name: 'S&P 500', last: 4783.83, dailyPctChange: 0.254 }),
      ],
      bond: [quote({ symbol: 'USGG10YR:IND', category: 'bond', name: 'US 10Y', last: 4.06, dailyPctChange: -1.1 })],
    })

    expect(items).toEqual([
      { label: 'S&P 500', symbol: 'US500', value: 4783.83, change: 0.254, display: { value: '4,783.83', change: '+0.25%' } },
      { label: 'Dow', symbol: 'US30', value: 37592.98, change: -0.31, display: { value: '37,592.98', change: '-0.31%' } },
      { label: '10Y Yield', symbol: 'USGG10YR:IND', value: 4.06, change: -1.1, display: { value: '4.06', change: '-1.10%' } },
    ])
  })

  it('skips specs whose category did not load', () => {
    expect(buildTicker({})).toEqual([])
  })

  it('shows dashes for missing values', () => {
    const [item] = buildTicker({ commodity: [quote({ symbol: 'CL1:COM', category: 'commodity', name: 'Crude Oil' })] })
    expect(item).toEqual({ label: 'WTI', symbol: 'CL1:COM', value: null, change: null, display: { value: '—', change: '—' } })
  })
})
