import { describe, it, expect } from 'vitest'
import { loadTimingSettings, DEFAULT_SETTINGS, InvalidSettingsError } from '../settings'

describe('loadTimingSettings', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadTimingSettings({})).toEqual(DEFAULT_SETTINGS)
    expect(DEFAULT_SETTINGS).toEqual({ maxIntervals: 10, logRequests: false })
  })

  it('treats blank values as unset', () => {
    expect(loadTimingSettings({ SCOPEWATCH_MAX_INTERVALS: '  ', SCOPEWATCH_LOG_REQUESTS: '' })).toEqual(DEFAULT_SETTINGS)
  })

  it('parses every variable', () => {
    expect(loadTimingSettings({
      SCOPEWATCH_MAX_INTERVALS: '25',
      SCOPEWATCH_LOG_REQUESTS: '1',
    })).toEqual({ maxIntervals: 25, logRequests: true })
    expect(loadTimingSettings({ SCOPEWATCH_LOG_REQUESTS: 'true' }).logRequests).toBe(true)
  })

  it('accepts 0 and false as off', () => {
    expect(loadTimingSettings({ SCOPEWATCH_LOG_REQUESTS: '0' }).logRequests).toBe(false)
    expect(loadTimingSettings({ SCOPEWATCH_LOG_REQUESTS: 'false' }).logRequests).toBe(false)
  })

  it('ignores variables it does not know', () => {
    expect(loadTimingSettings({ SCOPEWATCH_STRICT: 'true' })).toEqual(DEFAULT_SETTINGS)
  })

  it.each(['0', '-3', '2.5', 'ten'])('rejects SCOPEWATCH_MAX_INTERVALS=%s', (value) => {
    expect(() => loadTimingSettings({ SCOPEWATCH_MAX_INTERVALS: value })).toThrow(InvalidSettingsError)
  })

  it('names the offending variables', () => {
    try {
      loadTimingSettings({ SCOPEWATCH_LOG_REQUESTS: 'yes' })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidSettingsError)
      if (err instanceof InvalidSettingsError) {
        expect(Object.keys(err.fields)).toEqual(['SCOPEWATCH_LOG_REQUESTS'])
        expect(err.message).toMatch(/^Invalid timing configuration: SCOPEWATCH_LOG_REQUESTS\./)
      }
    }
  })
})
