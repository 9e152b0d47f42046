/**
 * Timing settings from environment variables — fail-fast on load.
 *
 *   SCOPEWATCH_MAX_INTERVALS  intervals kept per root timer (default 10)
 *   SCOPEWATCH_LOG_REQUESTS   one JSON log line per timed request (default false)
 *
 * Booleans accept true/false/1/0.
 */

import { z } from 'zod'

export type EnvSource = Record<string, string | undefined>

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

export const timingEnvSchema = z.object({
  SCOPEWATCH_MAX_INTERVALS: z.coerce.number().int().positive(),
  SCOPEWATCH_LOG_REQUESTS: booleanFlag,
})

export interface TimingSettings {
  maxIntervals: number
  logRequests: boolean
}

export const DEFAULT_SETTINGS: TimingSettings = {
  maxIntervals: 10,
  logRequests: false,
}

/** Thrown when an environment variable fails validation. */
export class InvalidSettingsError extends Error {
  constructor(public readonly fields: Record<string, string[] | undefined>) {
    super(
      `Invalid timing configuration: ${Object.keys(fields).join(', ')}. ` +
      `Check the SCOPEWATCH_* variables in .env or your deployment configuration.`,
    )
    this.name = 'InvalidSettingsError'
  }
}

function optional(source: EnvSource, key: string, fallback: string): string {
  const value = source[key]
  return value === undefined || value.trim() === '' ? fallback : value.trim()
}

/** Read and validate timing settings. Unset or blank variables take their defaults. */
export function loadTimingSettings(source: EnvSource = process.env): TimingSettings {
  const result = timingEnvSchema.safeParse({
    SCOPEWATCH_MAX_INTERVALS: optional(source, 'SCOPEWATCH_MAX_INTERVALS', String(DEFAULT_SETTINGS.maxIntervals)),
    SCOPEWATCH_LOG_REQUESTS: optional(source, 'SCOPEWATCH_LOG_REQUESTS', String(DEFAULT_SETTINGS.logRequests)),
  })
  if (!result.success) {
    throw new InvalidSettingsError(result.error.flatten().fieldErrors)
  }
  return {
    maxIntervals: result.data.SCOPEWATCH_MAX_INTERVALS,
    logRequests: result.data.SCOPEWATCH_LOG_REQUESTS,
  }
}
