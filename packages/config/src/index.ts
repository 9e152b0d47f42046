// Shared configuration: timing settings read from the environment.

export {
  loadTimingSettings,
  timingEnvSchema,
  DEFAULT_SETTINGS,
  InvalidSettingsError,
  type TimingSettings,
  type EnvSource,
} from './settings'
