/**
 * JSON-friendly snapshots of recorders, for export and HTTP responses.
 */

import type { IntervalRecorder, RecorderKind } from './recorder'
import type { ScopeTimer } from './scope-timer'
import type { Ticker } from './ticker'

// ─── Types ───────────────────────────────────────────────────────────────────

export interface RecorderSnapshot {
  kind: RecorderKind
  capacity: number
  /** Recorded intervals in seconds, oldest first. */
  intervals: number[]
  count: number
  min: number
  mean: number
  max: number
  frequency: number
}

export interface ScopeTimerSnapshot extends RecorderSnapshot {
  kind: 'ScopeTimer'
  name: string
  qualifiedName: string
  depth: number
  children: ScopeTimerSnapshot[]
}

export interface TickerSnapshot extends RecorderSnapshot {
  kind: 'Ticker'
}

// ─── Capture ─────────────────────────────────────────────────────────────────

function snapshotRecorder(recorder: IntervalRecorder): Omit<RecorderSnapshot, 'kind'> {
  return {
    capacity: recorder.capacity,
    intervals: recorder.intervals,
    count: recorder.history.size,
    min: recorder.min(),
    mean: recorder.mean(),
    max: recorder.max(),
    frequency: recorder.frequency(),
  }
}

export function snapshotTicker(ticker: Ticker): TickerSnapshot {
  return { kind: 'Ticker', ...snapshotRecorder(ticker) }
}

/** Capture a ScopeTimer and its subtree. Children keep creation order. */
export function snapshotTimer(timer: ScopeTimer): ScopeTimerSnapshot {
  return {
    kind: 'ScopeTimer',
    name: timer.name,
    qualifiedName: timer.qualifiedName,
    depth: timer.depth,
    ...snapshotRecorder(timer),
    children: Array.from(timer.children.values(), snapshotTimer),
  }
}

/** Export a snapshot as an indented JSON string. */
export function exportJSON(recorder: ScopeTimer | Ticker): string {
  const snapshot = recorder.kind === 'ScopeTimer' ? snapshotTimer(recorder) : snapshotTicker(recorder)
  return JSON.stringify(snapshot, null, 2)
}
