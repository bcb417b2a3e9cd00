import { CONFIG, isRefreshInterval, readEnvConfig } from '../config'
import { ConfigurationError } from '../utils/errors'

describe('readEnvConfig', () => {
  it('falls back to defaults', () => {
    const config = readEnvConfig({})
    expect(config.baseUrl).toBe('https://api.tradingeconomics.com')
    expect(config.country).toBe('united states')
    expect(config.timeoutMs).toBe(10_000)
    expect(config.refreshInterval).toBe(300)
    expect(config.newsLimit).toBe(CONFIG.news.limit)
  })

  it('applies overrides', () => {
    const config = readEnvConfig({
      TE_BASE_URL: 'http://localhost:4010',
      TE_TIMEOUT_MS: '2500',
      TE_REFRESH_INTERVAL: '60',
    })
    expect(config.baseUrl).toBe('http://localhost:4010')
    expect(config.timeoutMs).toBe(2500)
    expect(config.refreshInterval).toBe(60)
  })

  it('accepts 0 to turn polling off', () => {
    expect(readEnvConfig({ TE_REFRESH_INTERVAL: '0' }).refreshInterval).toBe(0)
  })

  it('rejects intervals outside the allowed set', () => {
    expect(() => readEnvConfig({ TE_REFRESH_INTERVAL: '120' })).toThrow(ConfigurationError)
    expect(() => readEnvConfig({ TE_REFRESH_INTERVAL: '120' })).toThrow(/TE_REFRESH_INTERVAL must be one of 0, 60, 300, 900/)
  })

  it('rejects malformed values', () => {
    expect(() => readEnvConfig({ TE_BASE_URL: 'not a url' })).toThrow(ConfigurationError)
    expect(() => readEnvConfig({ TE_TIMEOUT_MS: '-5' })).toThrow(ConfigurationError)
  })
})

describe('isRefreshInterval', () => {
  it('recognises the four states', () => {
    expect([0, 60, 300, 900].every(isRefreshInterval)).toBe(true)
    expect(isRefreshInterval(30)).toBe(false)
  })
})
