// Ranging engine configuration: settings schema, environment overrides, feature flags.

export {
  readEnvFlag,
  resolveFlag,
  resolveFlags,
  DEFAULT_FLAGS,
  RANGING_FLAG_KEYS,
  FLAG_ENV_PREFIX,
  type RangingFlags,
  type RangingFlagKey,
} from './flags.js'

export {
  rangingSettingsSchema,
  readEnvSettings,
  resolveSettings,
  ConfigError,
  DEFAULT_SETTINGS,
  DISPLAY_UNITS,
  type RangingSettings,
  type DisplayUnit,
} from './settings.js'
