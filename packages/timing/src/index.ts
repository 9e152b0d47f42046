// Hierarchical timing: bounded interval histories, tickers and scope timers

export { monotonicClock, type Clock } from './clock'

export {
  InvalidCapacityError,
  InvalidTimerNameError,
  TimerStateError,
  type BracketState,
} from './errors'

export {
  capacitySchema,
  timerNameSchema,
  parseCapacity,
  parseTimerName,
} from './schemas'

export { IntervalHistory, type IntervalStatistics } from './interval-history'

export {
  DEFAULT_CAPACITY,
  IntervalRecorder,
  type RecorderKind,
  type RecorderOptions,
} from './recorder'

export { Ticker, type TickerOptions } from './ticker'

export { ScopeTimer, type ScopeTimerOptions } from './scope-timer'

export {
  MAX_RENDERED_INTERVALS,
  formatSeconds,
  statisticsFields,
  renderRecorder,
  renderScopeTimer,
} from './render'

export {
  snapshotTicker,
  snapshotTimer,
  exportJSON,
  type RecorderSnapshot,
  type ScopeTimerSnapshot,
  type TickerSnapshot,
} from './snapshot'

export {
  stdoutWriter,
  writeLogLine,
  timingLogEntries,
  logTimings,
  type LogLevel,
  type LineWriter,
  type LogTimingsOptions,
  type TimingLogEntry,
} from './log'
