import { CONFIG } from '@/lib/config'

export interface Page<T> {
  items: T[]
  page: number
  pageSize: number
  total: number
  totalPages: number
}

/**
 * 1-based page slice. Out-of-range pages clamp to the nearest valid page.
 */
export function paginate<T>(items: T[], page: number = 1, pageSize: number = CONFIG.tables.pageSize): Page<T> {
  const size = Math.max(1, Math.floor(pageSize))
  const totalPages = Math.max(1, Math.ceil(items.length / size))
  const current = Math.min(Math.max(1, Math.floor(page)), totalPages)
  const start = (current - 1) * size
  return {
    items: items.slice(start, start + size),
    page: current,
    pageSize: size,
    total: items.length,
    totalPages,
  }
}
