/**
 * Request timing middleware.
 *
 * Records each request's duration under a child of a root ScopeTimer keyed by
 * the matched route pattern (`GET /items/:id`), so the tree stays bounded by
 * the app's routes however many distinct URLs arrive. Requests no route
 * handled share one `METHOD (unmatched)` child. Optionally emits one JSON line per request with
 * timestamp, method, path, status and duration in ms.
 *
 * Overlapping requests share the same child node, so durations are measured
 * here and handed to record() rather than bracketed with enter()/exit().
 */

import type { Context, MiddlewareHandler } from 'hono'
import { loadTimingSettings, type TimingSettings } from '@scopewatch/config'
import { ScopeTimer, monotonicClock, writeLogLine, type Clock, type LineWriter } from '@scopewatch/timing'

export interface RequestTimerOptions {
  /** Timer tree to record into. Built from `settings` when omitted. */
  root?: ScopeTimer
  /** Defaults to loadTimingSettings(process.env). */
  settings?: TimingSettings
  /**
   * Child name for a request, called after the handler ran. `matched` is
   * false when no route handled the request. Defaults to defaultRequestKey.
   */
  key?: (c: Context, matched: boolean) => string
  clock?: Clock
  write?: LineWriter
}

export const UNMATCHED_ROUTE = '(unmatched)'

/** `METHOD routePattern`, or `METHOD (unmatched)` when no route handled the request. */
export function defaultRequestKey(c: Context, matched: boolean): string {
  return `${c.req.method} ${matched ? c.req.routePath : UNMATCHED_ROUTE}`
}

/** Timer names may not contain "." since it separates qualified names. */
export function toTimerName(key: string): string {
  return key.replaceAll('.', '_')
}

/** Root timer for HTTP requests, sized from settings. */
export function createRequestRoot(settings: TimingSettings, clock: Clock = monotonicClock): ScopeTimer {
  return new ScopeTimer('http', { capacity: settings.maxIntervals, clock })
}

export function requestTimer(options: RequestTimerOptions = {}): MiddlewareHandler {
  const settings = options.settings ?? loadTimingSettings()
  const clock = options.clock ?? monotonicClock
  const root = options.root ?? createRequestRoot(settings, clock)
  const key = options.key ?? defaultRequestKey

  return async (c, next) => {
    const start = clock()
    // Hono advances routeIndex as it dispatches; it stays on this middleware
    // when no later handler ran.
    const ownIndex = c.req.routeIndex
    try {
      await next()
    } finally {
      const elapsed = clock() - start
      const matched = c.req.routeIndex !== ownIndex
      root.child(toTimerName(key(c, matched))).record(elapsed)

      if (settings.logRequests) {
        writeLogLine({
          ts: new Date().toISOString(),
          level: 'info',
          method: c.req.method,
          path: c.req.path,
          status: c.res.status,
          ms: Number((elapsed * 1000).toFixed(1)),
        }, options.write)
      }
    }
  }
}
