import { ECONOMY_GROUPS, type IndicatorRecord } from '@/lib/adapters'
import { getGroupHighlights, selectHighlightRecords } from '../highlights'

function record(name: string): IndicatorRecord {
  return {
    category: 'GDP',
    name,
    title: name,
    latestValue: 1,
    unit: null,
    referencePeriod: null,
    previousValue: null,
    previousPeriod: null,
    change: null,
    pctChange: null,
    frequency: null,
    source: null,
  }
}

describe('highlights', () => {
  it('configures every economy group', () => {
    for (const group of ECONOMY_GROUPS) {
      expect(getGroupHighlights(group).stats.length).toBeGreaterThan(0)
      expect(getGroupHighlights(group).charts.length).toBeGreaterThan(0)
    }
  })

  it('selects stat records in configured order, ignoring case', () => {
    const picked = selectHighlightRecords('GDP', [record('Other'), record('GDP growth rate'), record('GDP')])
    expect(picked.map((r) => r.name)).toEqual(['GDP', 'GDP growth rate'])
  })

  it('lists the default charts', () => {
    expect(getGroupHighlights('GDP').charts[0]).toBe('GDP Growth Rate')
  })
})
