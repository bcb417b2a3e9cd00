import { NextResponse } from 'next/server'
import { getAppContext } from '@/lib/context'
import { errorResponse, parsePositiveInt } from '@/lib/utils/api-response'

export const runtime = 'nodejs'

const MAX_NEWS = 100

export async function GET(request: Request) {
  try {
    const context = getAppContext()
    const limit = parsePositiveInt(new URL(request.url), 'limit', context.config.newsLimit, MAX_NEWS)
    return NextResponse.json(await context.dashboard.getNews(limit))
  } catch (error) {
    return errorResponse(error, 'news')
  }
}
