// ─── Construction Errors ─────────────────────────────────────────────────────

/** Thrown when a history capacity is not a positive integer. */
export class InvalidCapacityError extends RangeError {
  constructor(public readonly capacity: unknown) {
    super(`Interval capacity must be a positive integer, got ${String(capacity)}`)
    this.name = 'InvalidCapacityError'
  }
}

/** Thrown when a ScopeTimer name is empty or contains ".". */
export class InvalidTimerNameError extends TypeError {
  constructor(public readonly timerName: unknown) {
    super(`ScopeTimer name must be a non-empty string without ".", got ${JSON.stringify(timerName)}`)
    this.name = 'InvalidTimerNameError'
  }
}

// ─── Usage Errors ────────────────────────────────────────────────────────────

/** Bracket state a strict ScopeTimer was in when misused. */
export type BracketState = 'active' | 'idle'

/**
 * Raised only by strict ScopeTimers: entering an open bracket or exiting
 * one that was never entered.
 */
export class TimerStateError extends Error {
  constructor(
    public readonly qualifiedName: string,
    public readonly state: BracketState,
  ) {
    super(
      state === 'active'
        ? `ScopeTimer ${qualifiedName} entered while its bracket is already open`
        : `ScopeTimer ${qualifiedName} exited without a matching enter`,
    )
    this.name = 'TimerStateError'
  }
}
