import { NextResponse } from 'next/server'
import { getAppContext } from '@/lib/context'
import { errorResponse } from '@/lib/utils/api-response'

export const runtime = 'nodejs'

export async function GET() {
  try {
    return NextResponse.json(await getAppContext().dashboard.getTicker())
  } catch (error) {
    return errorResponse(error, 'ticker')
  }
}
