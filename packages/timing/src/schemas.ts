import { z } from 'zod'
import { InvalidCapacityError, InvalidTimerNameError } from './errors'

export const capacitySchema = z.number().int().positive()

// "." joins names into qualified names, so it cannot appear inside one.
export const timerNameSchema = z.string().min(1).regex(/^[^.]+$/)

/** Validate a capacity, throwing InvalidCapacityError on failure. */
export function parseCapacity(value: unknown): number {
  const result = capacitySchema.safeParse(value)
  if (!result.success) throw new InvalidCapacityError(value)
  return result.data
}

/** Validate a ScopeTimer name, throwing InvalidTimerNameError on failure. */
export function parseTimerName(value: unknown): string {
  const result = timerNameSchema.safeParse(value)
  if (!result.success) throw new InvalidTimerNameError(value)
  return result.data
}
