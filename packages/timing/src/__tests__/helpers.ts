import type { Clock } from '../clock'

/** Clock whose reading only changes when a test sets it. */
export interface ManualClock {
  read: Clock
  set(seconds: number): void
}

export function manualClock(start = 0): ManualClock {
  let now = start
  return {
    read: () => now,
    set(seconds: number) {
      now = seconds
    },
  }
}

/** Clock that returns the given readings in order, then fails. */
export function scriptedClock(readings: number[]): Clock {
  let index = 0
  return () => {
    const value = readings[index]
    if (value === undefined) {
      throw new Error(`scripted clock exhausted after ${readings.length} readings`)
    }
    index++
    return value
  }
}
