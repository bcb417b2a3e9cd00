import { NextResponse } from 'next/server'
import { z } from 'zod'
import { REFRESH_INTERVALS, isRefreshInterval } from '@/lib/config'
import { getAppContext } from '@/lib/context'
import { AUTH_NOTICE, errorResponse } from '@/lib/utils/api-response'
import { ValidationError } from '@/lib/utils/errors'

export const runtime = 'nodejs'

const IntervalBodySchema = z.object({
  interval: z.number().refine(isRefreshInterval, { message: `interval must be one of ${REFRESH_INTERVALS.join(', ')}` }),
})

export async function GET() {
  try {
    const { scheduler, cache } = getAppContext()
    return NextResponse.json({ scheduler: scheduler.state(), cache: cache.stats() })
  } catch (error) {
    return errorResponse(error, 'refresh state')
  }
}

/** Change the polling interval; 0 turns polling off. */
export async function PUT(request: Request) {
  try {
    let body: unknown
    try {
      body = await request.json()
    } catch {
      throw new ValidationError('Request body must be JSON')
    }
    const parsed = IntervalBodySchema.safeParse(body)
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid interval', 'interval')
    }
    const { scheduler } = getAppContext()
    scheduler.setInterval(parsed.data.interval)
    return NextResponse.json({ scheduler: scheduler.state() })
  } catch (error) {
    return errorResponse(error, 'refresh interval')
  }
}

/** Refresh market data now. `?scope=all` also expires every cached dataset. */
export async function POST(request: Request) {
  try {
    const scope = new URL(request.url).searchParams.get('scope') ?? 'markets'
    if (scope !== 'markets' && scope !== 'all') throw new ValidationError('scope must be "markets" or "all"', 'scope')

    const { scheduler, dashboard } = getAppContext()
    const invalidated = scope === 'all' ? dashboard.invalidateAll() : 0
    const event = await scheduler.refreshNow()
    if (event.ok) return NextResponse.json({ event, invalidated })
    const error = event.errorName === 'AuthError' ? AUTH_NOTICE : `Refresh failed: ${event.error ?? 'unknown error'}`
    return NextResponse.json({ error, event, invalidated }, { status: 502 })
  } catch (error) {
    return errorResponse(error, 'refresh')
  }
}
