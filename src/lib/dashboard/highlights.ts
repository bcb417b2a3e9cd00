import { z } from 'zod'
import { ECONOMY_GROUPS, type EconomyGroup, type IndicatorRecord } from '@/lib/adapters'
import highlightsJson from './highlights.json'

const GroupHighlightsSchema = z.object({
  stats: z.array(z.string()),
  charts: z.array(z.string()),
})

const HighlightsSchema = z.record(z.enum(ECONOMY_GROUPS), GroupHighlightsSchema)

export type GroupHighlights = z.infer<typeof GroupHighlightsSchema>

// Key indicators per economy group: stat cards and default charts
const HIGHLIGHTS = HighlightsSchema.parse(highlightsJson)

export function getGroupHighlights(group: EconomyGroup): GroupHighlights {
  return HIGHLIGHTS[group] ?? { stats: [], charts: [] }
}

/**
 * Pick the stat-card records for a group in configured order. Indicators
 * missing from the snapshot are left out.
 */
export function selectHighlightRecords(group: EconomyGroup, records: IndicatorRecord[]): IndicatorRecord[] {
  const byName = new Map(records.map((r) => [r.name.toLowerCase(), r]))
  const picked: IndicatorRecord[] = []
  for (const name of getGroupHighlights(group).stats) {
    const record = byName.get(name.toLowerCase())
    if (record) picked.push(record)
  }
  return picked
}
