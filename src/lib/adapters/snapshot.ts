import { TESnapshotRowSchema } from '@/lib/api-clients/types'
import type { AdapterContext } from './context'
import { encodeSegment, parseNumeric, parseRows, parseText, parseTimestamp } from './parse'
import { isEconomyGroup, type IndicatorRecord } from './types'

/**
 * Latest value of every indicator for the country (~280 rows).
 * Rows outside the ten economy groups are dropped.
 */
export async function fetchCountrySnapshot(ctx: AdapterContext): Promise<IndicatorRecord[]> {
  const json = await ctx.transport.execute(`/country/${encodeSegment(ctx.country)}`)
  const rows = parseRows(TESnapshotRowSchema, json, 'country snapshot')

  const records: IndicatorRecord[] = []
  for (const row of rows) {
    const group = parseText(row.CategoryGroup)
    if (!group || !isEconomyGroup(group)) continue

    const latestValue = parseNumeric(row.LatestValue)
    const previousValue = parseNumeric(row.PreviousValue)
    const change = latestValue !== null && previousValue !== null ? latestValue - previousValue : null
    const pctChange = change !== null && previousValue !== null && previousValue !== 0 ? (change / previousValue) * 100 : null

    records.push({
      category: group,
      name: row.Category,
      title: parseText(row.Title) ?? row.Category,
      latestValue,
      unit: parseText(row.Unit),
      referencePeriod: parseTimestamp(row.LatestValueDate),
      previousValue,
      previousPeriod: parseTimestamp(row.PreviousValueDate),
      change,
      pctChange,
      frequency: parseText(row.Frequency),
      source: parseText(row.Source),
    })
  }
  return records
}
