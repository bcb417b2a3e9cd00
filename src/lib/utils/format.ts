const UNAVAILABLE = '—'

/**
 * Format a price or level with thousands separators ("4,500.00")
 */
export function formatNumber(value: number | null, decimals: number = 2): string {
  if (value === null) return UNAVAILABLE
  return new Intl.NumberFormat('en-US', { minimumFractionDigits: decimals, maximumFractionDigits: decimals }).format(value)
}

/**
 * Format percentage with explicit sign ("+0.25%", "-1.10%")
 */
export function formatPercentage(value: number | null, decimals: number = 2): string {
  if (value === null) return UNAVAILABLE
  const sign = value > 0 ? '+' : value < 0 ? '-' : ''
  return `${sign}${Math.abs(value).toFixed(decimals)}%`
}
