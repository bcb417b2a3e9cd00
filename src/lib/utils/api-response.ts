import { NextResponse } from 'next/server'
import { z } from 'zod'
import { ECONOMY_GROUPS, MARKET_CATEGORIES, type DateRange, type EconomyGroup, type MarketCategory } from '@/lib/adapters'
import {
  APIError,
  AuthError,
  ConfigurationError,
  DecodeError,
  RateLimitError,
  TransportError,
  ValidationError,
  getErrorMessage,
} from '@/lib/utils/errors'

export const AUTH_NOTICE = 'Upstream rejected the API credentials - check API key'

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')

const DateRangeQuerySchema = z
  .object({
    start: IsoDate.optional(),
    end: IsoDate.optional(),
  })
  .refine((r) => !r.start || !r.end || r.start <= r.end, { message: 'start must not be after end', path: ['start'] })

/**
 * Read `start` / `end` query parameters.
 */
export function parseDateRange(url: URL): DateRange {
  const parsed = DateRangeQuerySchema.safeParse({
    start: url.searchParams.get('start') ?? undefined,
    end: url.searchParams.get('end') ?? undefined,
  })
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ValidationError(issue?.message ?? 'Invalid date range', issue?.path.join('.'))
  }
  return parsed.data
}

export function parsePositiveInt(url: URL, name: string, fallback: number, max?: number): number {
  const raw = url.searchParams.get(name)
  if (raw === null || raw === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < 1 || (max !== undefined && value > max)) {
    throw new ValidationError(`${name} must be an integer between 1 and ${max ?? 'infinity'}`, name)
  }
  return value
}

function decodeSegment(raw: string, field: string): string {
  try {
    return decodeURIComponent(raw)
  } catch (error) {
    if (error instanceof URIError) throw new ValidationError(`${field} is not a valid path segment`, field)
    throw error
  }
}

export function parseEconomyGroup(raw: string): EconomyGroup {
  const wanted = decodeSegment(raw, 'category').trim().toLowerCase()
  const group = ECONOMY_GROUPS.find((g) => g.toLowerCase() === wanted)
  if (!group) throw new ValidationError(`Unknown category "${raw}". Expected one of ${ECONOMY_GROUPS.join(', ')}`, 'category')
  return group
}

export function parseMarketCategory(raw: string): MarketCategory {
  const wanted = decodeSegment(raw, 'category').trim().toLowerCase()
  const normalized = wanted === 'commodities' ? 'commodity' : wanted
  const category = MARKET_CATEGORIES.find((c) => c === normalized)
  if (!category) throw new ValidationError(`Unknown market "${raw}". Expected one of ${MARKET_CATEGORIES.join(', ')}`, 'category')
  return category
}

export function parsePathText(raw: string, field: string): string {
  const value = decodeSegment(raw, field).trim()
  if (!value) throw new ValidationError(`${field} is required`, field)
  return value
}

/**
 * Map the error taxonomy onto HTTP responses for the UI.
 */
export function errorResponse(error: unknown, label: string): NextResponse {
  if (error instanceof ValidationError) {
    return NextResponse.json({ error: error.message, field: error.field }, { status: 400 })
  }
  if (error instanceof AuthError) {
    console.error(`[api] ${label}: upstream rejected credentials`)
    return NextResponse.json({ error: AUTH_NOTICE, code: 'auth' }, { status: 502 })
  }
  if (error instanceof RateLimitError) {
    const retryAfter = error.retryAfterSeconds
    return NextResponse.json(
      { error: 'Data temporarily unavailable (rate limited)', code: 'rate_limited', retryAfter },
      { status: 503, headers: retryAfter !== undefined ? { 'Retry-After': String(retryAfter) } : undefined }
    )
  }
  if (error instanceof TransportError) {
    return NextResponse.json({ error: 'Data temporarily unavailable', code: 'unavailable' }, { status: 503 })
  }
  if (error instanceof DecodeError || error instanceof APIError) {
    console.error(`[api] ${label}:`, error)
    return NextResponse.json({ error: `Upstream error: ${error.message}`, code: 'upstream' }, { status: 502 })
  }
  if (error instanceof ConfigurationError) {
    console.error(`[api] ${label}: configuration error:`, error.message)
    return NextResponse.json({ error: error.message, code: 'configuration' }, { status: 500 })
  }
  console.error(`[api] ${label}:`, error)
  return NextResponse.json({ error: `Failed to load ${label}: ${getErrorMessage(error)}` }, { status: 500 })
}
