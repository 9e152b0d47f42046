/**
 * Structured timing logs.
 *
 * Emits one JSON line per ScopeTimer node that holds samples, e.g.
 *   {"ts":"...","level":"info","timer":"root.task1","count":3,"min":0.01,...}
 *
 * Lines go to stdout unless a writer is supplied, so any log aggregator that
 * reads JSON from stdout can pick them up.
 */

import type { ScopeTimer } from './scope-timer'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** Receives one complete line, newline included. */
export type LineWriter = (line: string) => void

export interface TimingLogEntry {
  ts: string
  level: LogLevel
  timer: string
  count: number
  min: number
  mean: number
  max: number
  frequency: number
}

export interface LogTimingsOptions {
  level?: LogLevel
  write?: LineWriter
  /** Timestamp source, for deterministic output. */
  now?: () => Date
}

export const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(line)
}

/** Write a JSON object as one line. */
export function writeLogLine(entry: object, write: LineWriter = stdoutWriter): void {
  write(JSON.stringify(entry) + '\n')
}

/** Build log entries for every node of the subtree that has samples. */
export function timingLogEntries(
  root: ScopeTimer,
  level: LogLevel = 'info',
  now: () => Date = () => new Date(),
): TimingLogEntry[] {
  const entries: TimingLogEntry[] = []
  for (const node of root.walk()) {
    if (node.history.empty) continue
    entries.push({
      ts: now().toISOString(),
      level,
      timer: node.qualifiedName,
      count: node.history.size,
      min: node.min(),
      mean: node.mean(),
      max: node.max(),
      frequency: node.frequency(),
    })
  }
  return entries
}

/** Log the subtree. Returns the number of lines written. */
export function logTimings(root: ScopeTimer, options: LogTimingsOptions = {}): number {
  const entries = timingLogEntries(root, options.level, options.now)
  for (const entry of entries) {
    writeLogLine(entry, options.write)
  }
  return entries.length
}
