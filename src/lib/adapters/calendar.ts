import { TECalendarRowSchema } from '@/lib/api-clients/types'
import type { AdapterContext } from './context'
import { encodeSegment, parseNumeric, parseRows, parseText, parseTimestamp } from './parse'
import type { CalendarEvent } from './types'

/**
 * Upcoming and recent economic releases. Actual/consensus/previous stay as the
 * upstream display strings ("3.2%", "250K").
 */
export async function fetchCalendar(ctx: AdapterContext): Promise<CalendarEvent[]> {
  const json = await ctx.transport.execute(`/calendar/country/${encodeSegment(ctx.country)}`)
  const rows = parseRows(TECalendarRowSchema, json, 'calendar')

  const events: CalendarEvent[] = rows.map((row) => ({
    id: row.CalendarId != null ? String(row.CalendarId) : null,
    timestamp: parseTimestamp(row.Date),
    event: row.Event,
    category: parseText(row.Category),
    reference: parseText(row.Reference),
    actual: parseText(row.Actual),
    consensus: parseText(row.Forecast),
    teForecast: parseText(row.TEForecast),
    previous: parseText(row.Previous),
    importance: parseNumeric(row.Importance),
    unit: parseText(row.Unit),
  }))

  return events.sort((a, b) => (a.timestamp ?? '').localeCompare(b.timestamp ?? ''))
}
