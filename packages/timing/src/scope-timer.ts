/**
 * Tree of named timing scopes.
 *
 * Each ScopeTimer records one interval per enter/exit bracket and lazily
 * creates named children, so the same node can be reused across loop
 * iterations to accumulate samples:
 *
 *   const root = new ScopeTimer('root')
 *   root.measure(() => {
 *     for (const job of jobs) {
 *       root.child('task1', 5).measure((task) => {
 *         task.child('load').measure(() => load(job))
 *         task.child('solve').measure(() => solve(job))
 *       })
 *     }
 *   })
 *   console.log(root.render())
 *
 * A node is not safe for overlapping use. Async callers that share a node
 * between concurrent operations should measure themselves and call record().
 */

import { TimerStateError } from './errors'
import { IntervalRecorder, type RecorderOptions } from './recorder'
import { renderScopeTimer } from './render'
import { parseCapacity, parseTimerName } from './schemas'

export interface ScopeTimerOptions extends RecorderOptions {
  /**
   * Throw TimerStateError on enter-while-active and exit-while-idle instead
   * of tolerating them. Inherited by children.
   */
  strict?: boolean
}

export class ScopeTimer extends IntervalRecorder {
  readonly kind = 'ScopeTimer' as const
  readonly name: string
  readonly strict: boolean
  private readonly _children = new Map<string, ScopeTimer>()
  // Non-owning: the tree is owned root → children through _children only.
  private _parent: ScopeTimer | null = null
  private activeStart: number | null = null

  constructor(name: string, options: ScopeTimerOptions = {}) {
    super(options)
    this.name = parseTimerName(name)
    this.strict = options.strict ?? false
  }

  get parent(): ScopeTimer | null {
    return this._parent
  }

  /** Children by name, in creation order. */
  get children(): ReadonlyMap<string, ScopeTimer> {
    return this._children
  }

  /** Whether a bracket is currently open. */
  get active(): boolean {
    return this.activeStart !== null
  }

  // ── Tree ──

  /**
   * Return the child called `name`, creating it on first request.
   *
   * A new child keeps `capacity` intervals, or as many as this node when
   * omitted. The capacity of an existing child is never changed.
   */
  child(name: string, capacity?: number): ScopeTimer {
    const existing = this._children.get(name)
    if (existing !== undefined) return existing

    const created = new ScopeTimer(name, {
      capacity: capacity === undefined ? this.capacity : parseCapacity(capacity),
      clock: this.clock,
      strict: this.strict,
    })
    created._parent = this
    this._children.set(created.name, created)
    return created
  }

  /** Look up a child without creating it. */
  getChild(name: string): ScopeTimer | undefined {
    return this._children.get(name)
  }

  /** Parents from the immediate one up to the root. */
  *ancestors(): Generator<ScopeTimer, void, undefined> {
    let current = this._parent
    while (current !== null) {
      yield current
      current = current._parent
    }
  }

  /** This node followed by its whole subtree, depth first. */
  *walk(): Generator<ScopeTimer, void, undefined> {
    yield this
    for (const child of this._children.values()) {
      yield* child.walk()
    }
  }

  /** Number of ancestors; 0 for the root. */
  get depth(): number {
    let depth = 0
    let current = this._parent
    while (current !== null) {
      depth++
      current = current._parent
    }
    return depth
  }

  /** Dot-joined names from the root to this node, e.g. `root.task1.load`. */
  get qualifiedName(): string {
    const names = [this.name]
    for (const ancestor of this.ancestors()) names.push(ancestor.name)
    return names.reverse().join('.')
  }

  // ── Measurement ──

  /** Open a bracket. Returns this node for fluent nesting. */
  enter(): this {
    if (this.strict && this.activeStart !== null) {
      throw new TimerStateError(this.qualifiedName, 'active')
    }
    this.activeStart = this.clock()
    return this
  }

  /**
   * Close the bracket and record its duration in seconds. Closing a bracket
   * that is not open records nothing and returns 0.
   */
  exit(): number {
    if (this.activeStart === null) {
      if (this.strict) throw new TimerStateError(this.qualifiedName, 'idle')
      return 0
    }
    const elapsed = this.clock() - this.activeStart
    this.history.append(elapsed)
    this.activeStart = null
    return elapsed
  }

  /**
   * Run `fn` inside a bracket. The interval is recorded exactly once whether
   * `fn` returns or throws.
   */
  measure<T>(fn: (timer: this) => T): T {
    this.enter()
    try {
      return fn(this)
    } finally {
      this.exit()
    }
  }

  /** Record an interval measured elsewhere. */
  record(seconds: number): void {
    this.history.append(seconds)
  }

  /** Clear intervals and open brackets in the whole subtree. The tree shape is kept. */
  reset(): void {
    for (const node of this.walk()) {
      node.history.clear()
      node.activeStart = null
    }
  }

  render(): string {
    return renderScopeTimer(this)
  }
}
