import { z } from 'zod'
import { isValid, parse, parseISO } from 'date-fns'
import { PROVIDER } from '@/lib/api-clients/trading-economics'
import { DecodeError } from '@/lib/utils/errors'
import type { DateRange } from './types'

/**
 * Validate an upstream array payload row by row. Any mismatch fails the whole
 * payload with DecodeError.
 */
export function parseRows<S extends z.ZodTypeAny>(schema: S, json: unknown, label: string): Array<z.infer<S>> {
  const parsed = z.array(schema).safeParse(json)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown'
    throw new DecodeError(`Invalid ${label} response (${where})`, PROVIDER)
  }
  return parsed.data
}

/**
 * Numbers, numeric strings, percentage strings ("0.25%") and thousands
 * separators become numbers. Anything else becomes null.
 */
export function parseNumeric(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value !== 'string') return null
  const cleaned = value.replace(/[%,\s]/g, '')
  if (cleaned === '' || cleaned === '.') return null
  const n = Number(cleaned)
  return Number.isFinite(n) ? n : null
}

export function parseText(value: string | null | undefined): string | null {
  if (value == null) return null
  const trimmed = value.trim()
  return trimmed === '' ? null : trimmed
}

const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i

/**
 * ISO-like upstream timestamps ("2024-01-31T00:00:00") are UTC without a zone
 * designator. Returns a full ISO string or null.
 */
export function parseTimestamp(value: string | null | undefined): string | null {
  const text = parseText(value)
  if (!text) return null
  const date = parseISO(HAS_ZONE.test(text) ? text : `${text}Z`)
  return isValid(date) ? date.toISOString() : null
}

const DAY_FIRST_FORMATS = ['dd/MM/yyyy HH:mm:ss', 'dd/MM/yyyy']

/** Day-first market history dates ("15/01/2024"), read as UTC midnight. */
export function parseDayFirstDate(value: string | null | undefined): string | null {
  const text = parseText(value)
  if (!text) return null
  for (const fmt of DAY_FIRST_FORMATS) {
    const local = parse(text, fmt, new Date(0))
    if (isValid(local)) {
      return new Date(
        Date.UTC(local.getFullYear(), local.getMonth(), local.getDate(), local.getHours(), local.getMinutes(), local.getSeconds())
      ).toISOString()
    }
  }
  return parseTimestamp(text)
}

/** Upstream path segment; symbols keep their ':' exchange separator. */
export function encodeSegment(value: string, keepColon = false): string {
  const encoded = encodeURIComponent(value.trim())
  return keepColon ? encoded.replace(/%3A/gi, ':') : encoded
}

export function inRange(timestamp: string, range: DateRange): boolean {
  const day = timestamp.slice(0, 10)
  if (range.start && day < range.start) return false
  if (range.end && day > range.end) return false
  return true
}

export function byTimestampAsc<T extends { timestamp: string }>(a: T, b: T): number {
  return a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0
}
