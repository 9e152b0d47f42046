import { describe, it, expect } from 'vitest'
import fc from 'fast-check'
import { Ticker } from '../ticker'
import { DEFAULT_CAPACITY } from '../recorder'
import { InvalidCapacityError } from '../errors'
import { scriptedClock } from './helpers'

describe('Ticker', () => {
  it('first mark only sets the baseline', () => {
    const ticker = new Ticker({ clock: scriptedClock([10]) })
    expect(ticker.started).toBe(false)
    ticker.mark()
    expect(ticker.started).toBe(true)
    expect(ticker.intervals).toEqual([])
  })

  it('records the time between successive marks', () => {
    const ticker = new Ticker({ clock: scriptedClock([10, 10.5, 11.5, 11.75]) })
    ticker.mark()
    ticker.mark()
    ticker.mark()
    ticker.tick()
    expect(ticker.intervals).toEqual([0.5, 1, 0.25])
    expect(ticker.min()).toBe(0.25)
    expect(ticker.max()).toBe(1)
    expect(ticker.mean()).toBeCloseTo(0.5833, 4)
  })

  it('frequency is the inverse of the mean interval', () => {
    const ticker = new Ticker({ clock: scriptedClock([0, 0.25, 0.5]) })
    ticker.mark()
    ticker.mark()
    ticker.mark()
    expect(ticker.frequency()).toBe(4)
  })

  it('keeps only the most recent intervals', () => {
    const ticker = new Ticker({ capacity: 2, clock: scriptedClock([0, 1, 3, 6]) })
    for (let i = 0; i < 4; i++) ticker.mark()
    expect(ticker.intervals).toEqual([2, 3])
  })

  it('defaults to DEFAULT_CAPACITY intervals', () => {
    expect(new Ticker().capacity).toBe(DEFAULT_CAPACITY)
  })

  it('reset drops intervals and the baseline', () => {
    const ticker = new Ticker({ clock: scriptedClock([0, 1, 5, 7]) })
    ticker.mark()
    ticker.mark()
    ticker.reset()
    expect(ticker.started).toBe(false)
    expect(ticker.intervals).toEqual([])
    ticker.mark()
    ticker.mark()
    expect(ticker.intervals).toEqual([2])
  })

  it('rejects a non-positive capacity', () => {
    expect(() => new Ticker({ capacity: 0 })).toThrow(InvalidCapacityError)
  })

  it('measures non-negative intervals with the default clock', () => {
    const ticker = new Ticker()
    ticker.mark()
    ticker.mark()
    expect(ticker.intervals).toHaveLength(1)
    expect(ticker.intervals[0]).toBeGreaterThanOrEqual(0)
  })

  it('K marks record min(K - 1, capacity) intervals', () => {
    fc.assert(fc.property(
      fc.integer({ min: 1, max: 40 }),
      fc.integer({ min: 1, max: 15 }),
      (marks, capacity) => {
        let now = 0
        const ticker = new Ticker({ capacity, clock: () => now++ })
        for (let i = 0; i < marks; i++) ticker.mark()
        expect(ticker.history.size).toBe(Math.min(marks - 1, capacity))
      },
    ))
  })
})
