/**
 * Measures the interval between repeatedly occurring events.
 *
 *   const ticker = new Ticker({ capacity: 5 })
 *   for (const frame of frames) {
 *     ticker.mark()
 *     draw(frame)
 *   }
 *   ticker.render()
 *   // <Ticker intervals=[0.0167, 0.0171, ...] min=0.0162 mean=0.0168 max=0.0171>
 */

import { IntervalRecorder, type RecorderOptions } from './recorder'
import { renderRecorder } from './render'

export type TickerOptions = RecorderOptions

export class Ticker extends IntervalRecorder {
  readonly kind = 'Ticker' as const
  private lastMark: number | null = null

  constructor(options: TickerOptions = {}) {
    super(options)
  }

  /**
   * Register an event. The first mark only sets the baseline; each later one
   * records the time elapsed since the previous mark.
   */
  mark(): void {
    const now = this.clock()
    if (this.lastMark !== null) {
      this.history.append(now - this.lastMark)
    }
    this.lastMark = now
  }

  /** Alias of mark(). */
  tick(): void {
    this.mark()
  }

  /** Whether a baseline mark exists. */
  get started(): boolean {
    return this.lastMark !== null
  }

  /** Drop all intervals and the baseline. */
  reset(): void {
    this.history.clear()
    this.lastMark = null
  }

  render(): string {
    return renderRecorder(this)
  }
}
