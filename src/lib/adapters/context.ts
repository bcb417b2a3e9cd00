import type { Transport } from '@/lib/api-clients/trading-economics'

/** Everything an adapter needs: the transport and the country it reports on. */
export interface AdapterContext {
  transport: Transport
  country: string
}
