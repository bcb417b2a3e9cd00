import { formatNumber, formatPercentage } from '../format'

describe('formatNumber', () => {
  it('adds thousands separators and fixed decimals', () => {
    expect(formatNumber(4500)).toBe('4,500.00')
    expect(formatNumber(4.0612, 3)).toBe('4.061')
  })

  it('shows a dash for missing values', () => {
    expect(formatNumber(null)).toBe('—')
  })
})

describe('formatPercentage', () => {
  it('prefixes the sign', () => {
    expect(formatPercentage(0.254)).toBe('+0.25%')
    expect(formatPercentage(-1.1)).toBe('-1.10%')
    expect(formatPercentage(0)).toBe('0.00%')
  })

  it('shows a dash for missing values', () => {
    expect(formatPercentage(null)).toBe('—')
  })
})
