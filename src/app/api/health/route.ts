import { NextResponse } from 'next/server'
import { getAppContext, type AppContext } from '@/lib/context'
import { getErrorMessage } from '@/lib/utils/errors'

export const runtime = 'nodejs'

export async function GET() {
  let context: AppContext
  try {
    context = getAppContext()
  } catch (error) {
    return NextResponse.json(
      { status: 'unhealthy', timestamp: new Date().toISOString(), error: getErrorMessage(error), uptime: process.uptime() },
      { status: 503 }
    )
  }

  const scheduler = context.scheduler.state()
  const services = {
    credentials: context.credentials.isLoaded(),
    lastRefreshOk: scheduler.lastRefresh?.ok ?? null,
    lastRefreshError: scheduler.lastRefresh?.error ?? null,
  }
  const status = services.lastRefreshOk === false ? 'degraded' : 'healthy'

  return NextResponse.json(
    {
      status,
      timestamp: new Date().toISOString(),
      services,
      cache: context.cache.stats(),
      scheduler,
      uptime: process.uptime(),
    },
    { status: 200 }
  )
}
