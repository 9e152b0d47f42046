/**
 * Bounded history of elapsed-time samples (seconds).
 *
 * Ring buffer over a Float64Array: O(1) append, O(1) indexed access,
 * O(N) statistics. When full, the oldest sample is evicted first.
 */

import { parseCapacity } from './schemas'

// ─── Statistics Contract ─────────────────────────────────────────────────────

/** Derived statistics shared by every interval recorder. */
export interface IntervalStatistics {
  /** Shortest recorded interval in seconds, 0 when empty. */
  min(): number
  /** Longest recorded interval in seconds, 0 when empty. */
  max(): number
  /** Mean recorded interval in seconds, 0 when empty. */
  mean(): number
  /** Mean event rate in Hertz, 0 when the mean is not positive. */
  frequency(): number
}

// ─── IntervalHistory ─────────────────────────────────────────────────────────

export class IntervalHistory implements IntervalStatistics, Iterable<number> {
  readonly capacity: number
  private readonly samples: Float64Array
  private head = 0
  private _size = 0

  constructor(capacity: number) {
    this.capacity = parseCapacity(capacity)
    this.samples = new Float64Array(this.capacity)
  }

  /** Append a sample. Evicts the oldest one if at capacity. */
  append(value: number): void {
    this.samples[this.head] = value
    this.head = (this.head + 1) % this.capacity
    if (this._size < this.capacity) this._size++
  }

  /** Number of samples currently stored. */
  get size(): number {
    return this._size
  }

  get full(): boolean {
    return this._size === this.capacity
  }

  get empty(): boolean {
    return this._size === 0
  }

  /** Sample at index (0 = oldest). */
  at(index: number): number | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this._size) return undefined
    return this.samples[this.slot(index)]
  }

  /** Most recent sample. */
  latest(): number | undefined {
    return this.at(this._size - 1)
  }

  *[Symbol.iterator](): Iterator<number> {
    for (let i = 0; i < this._size; i++) {
      yield this.samples[this.slot(i)] ?? 0
    }
  }

  /** Samples from oldest to newest. */
  toArray(): number[] {
    return Array.from(this)
  }

  clear(): void {
    this.head = 0
    this._size = 0
    this.samples.fill(0)
  }

  // ── Statistics ──

  min(): number {
    if (this._size === 0) return 0
    let result = Infinity
    for (const value of this) {
      if (value < result) result = value
    }
    return result
  }

  max(): number {
    if (this._size === 0) return 0
    let result = -Infinity
    for (const value of this) {
      if (value > result) result = value
    }
    return result
  }

  mean(): number {
    if (this._size === 0) return 0
    let sum = 0
    for (const value of this) sum += value
    return sum / this._size
  }

  frequency(): number {
    const mean = this.mean()
    return mean > 0 ? 1 / mean : 0
  }

  private slot(index: number): number {
    return (this.head - this._size + index + this.capacity) % this.capacity
  }
}
