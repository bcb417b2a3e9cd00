import { TENewsRowSchema } from '@/lib/api-clients/types'
import type { AdapterContext } from './context'
import { encodeSegment, parseNumeric, parseRows, parseText, parseTimestamp } from './parse'
import type { NewsItem } from './types'

/** Latest news for the country, newest first. Undated items go last. */
export async function fetchNews(ctx: AdapterContext, limit: number): Promise<NewsItem[]> {
  const json = await ctx.transport.execute(`/news/country/${encodeSegment(ctx.country)}`, { limit })
  const rows = parseRows(TENewsRowSchema, json, 'news')

  const items: NewsItem[] = rows.map((row) => ({
    id: row.id != null ? String(row.id) : null,
    headline: row.title,
    description: parseText(row.description),
    timestamp: parseTimestamp(row.date),
    category: parseText(row.category),
    importance: parseNumeric(row.importance),
    url: parseText(row.url),
  }))

  return items.sort((a, b) => {
    if (a.timestamp === b.timestamp) return 0
    if (a.timestamp === null) return 1
    if (b.timestamp === null) return -1
    return a.timestamp < b.timestamp ? 1 : -1
  })
}
