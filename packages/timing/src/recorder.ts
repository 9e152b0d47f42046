import { monotonicClock, type Clock } from './clock'
import { IntervalHistory, type IntervalStatistics } from './interval-history'

/** Explicit variant tag, used as the type name in renderings and snapshots. */
export type RecorderKind = 'Ticker' | 'ScopeTimer'

/** Default number of intervals kept by a recorder. */
export const DEFAULT_CAPACITY = 10

export interface RecorderOptions {
  /** Maximum number of intervals kept. Defaults to DEFAULT_CAPACITY. */
  capacity?: number
  /** Monotonic time source in seconds. Defaults to performance.now(). */
  clock?: Clock
}

/**
 * Shared base of Ticker and ScopeTimer: owns one IntervalHistory and a clock,
 * and exposes the history's statistics.
 *
 * Not safe for concurrent use: a recorder belongs to one caller at a time.
 */
export abstract class IntervalRecorder implements IntervalStatistics {
  abstract readonly kind: RecorderKind
  readonly history: IntervalHistory
  protected readonly clock: Clock

  protected constructor(options: RecorderOptions = {}) {
    this.history = new IntervalHistory(options.capacity ?? DEFAULT_CAPACITY)
    this.clock = options.clock ?? monotonicClock
  }

  get capacity(): number {
    return this.history.capacity
  }

  /** Recorded intervals in seconds, oldest first. */
  get intervals(): number[] {
    return this.history.toArray()
  }

  min(): number {
    return this.history.min()
  }

  max(): number {
    return this.history.max()
  }

  mean(): number {
    return this.history.mean()
  }

  frequency(): number {
    return this.history.frequency()
  }

  abstract render(): string

  toString(): string {
    return this.render()
  }
}
