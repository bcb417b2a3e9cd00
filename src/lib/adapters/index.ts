/**
 * Endpoint adapters - one per upstream resource. Stateless, never cached here.
 */

export type { AdapterContext } from './context'
export type {
  EconomyGroup,
  MarketCategory,
  DateRange,
  IndicatorRecord,
  HistoricalPoint,
  ForecastHorizon,
  ForecastPoint,
  MarketQuote,
  OHLCBar,
  NewsItem,
  CalendarEvent,
} from './types'
export { ECONOMY_GROUPS, MARKET_CATEGORIES, isEconomyGroup, isMarketCategory } from './types'

export { fetchCountrySnapshot } from './snapshot'
export { fetchHistorical } from './historical'
export { fetchForecasts } from './forecast'
export { fetchMarkets } from './markets'
export { fetchMarketHistorical } from './market-historical'
export { fetchNews } from './news'
export { fetchCalendar } from './calendar'
