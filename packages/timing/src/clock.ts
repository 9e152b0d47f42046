/**
 * Monotonic time sources.
 *
 * Every recorder reads time through a Clock so tests can script readings.
 * Values are seconds; only differences between readings are meaningful.
 */

/** Returns the current monotonic time in seconds. */
export type Clock = () => number

/** Default clock backed by performance.now(). */
export const monotonicClock: Clock = () => performance.now() / 1000
