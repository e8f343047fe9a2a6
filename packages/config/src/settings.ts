import { z } from 'zod'
import { FLAG_ENV_PREFIX, resolveFlags } from './flags.js'

export const DISPLAY_UNITS = ['meters', 'yards', 'feet'] as const

export const rangingSettingsSchema = z.object({
  /** Kalman process noise variance (m²). */
  processNoise: z.number().positive(),
  /** Default Kalman measurement noise variance (m²). */
  measurementNoise: z.number().positive(),
  /** distance = depthScaleFactor / inverseDepth. Replaced by calibration. */
  depthScaleFactor: z.number().positive(),
  enableDepthFusion: z.boolean(),
  enableTemporalSmoothing: z.boolean(),
  /** Estimates with confidence above this count as a locked target. */
  lockThreshold: z.number().min(0).max(1),
  historySize: z.number().int().min(2).max(1000),
  /** Relative change across the history window treated as "steady". */
  trendBand: z.number().min(0).max(1),
  displayUnit: z.enum(DISPLAY_UNITS),
})

export type RangingSettings = z.infer<typeof rangingSettingsSchema>
export type DisplayUnit = RangingSettings['displayUnit']

export const DEFAULT_SETTINGS: RangingSettings = {
  processNoise: 0.5,
  measurementNoise: 2.0,
  depthScaleFactor: 1.0,
  enableDepthFusion: true,
  enableTemporalSmoothing: true,
  lockThreshold: 0.5,
  historySize: 10,
  trendBand: 0.02,
  displayUnit: 'yards',
}

/** Thrown when resolved settings fail validation. */
export class ConfigError extends Error {
  constructor(public readonly fields: Partial<Record<string, string[]>>) {
    super(
      `Invalid ranging settings: ${Object.keys(fields).join(', ')}. ` +
      `Check RANGEFINDER_* environment variables and explicit overrides.`,
    )
    this.name = 'ConfigError'
  }
}

function optionalNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const val = env[`${FLAG_ENV_PREFIX}${key}`]
  return val === undefined || val === '' ? undefined : Number(val)
}

/**
 * Collect the settings present in the environment.
 * Values are not validated here; `resolveSettings` does that.
 */
export function readEnvSettings(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const flags = resolveFlags(env)
  const fromEnv: Record<string, unknown> = {
    enableDepthFusion: flags.ENABLE_DEPTH_FUSION,
    enableTemporalSmoothing: flags.ENABLE_TEMPORAL_SMOOTHING,
  }

  const numeric: Array<[keyof RangingSettings, string]> = [
    ['processNoise', 'PROCESS_NOISE'],
    ['measurementNoise', 'MEASUREMENT_NOISE'],
    ['depthScaleFactor', 'DEPTH_SCALE_FACTOR'],
    ['lockThreshold', 'LOCK_THRESHOLD'],
    ['historySize', 'HISTORY_SIZE'],
    ['trendBand', 'TREND_BAND'],
  ]
  for (const [field, key] of numeric) {
    const val = optionalNumber(env, key)
    if (val !== undefined) fromEnv[field] = val
  }

  const unit = env[`${FLAG_ENV_PREFIX}DISPLAY_UNIT`]
  if (unit) fromEnv['displayUnit'] = unit

  return fromEnv
}

/** Resolve settings: explicit overrides > environment > defaults. Throws ConfigError. */
export function resolveSettings(
  overrides: Partial<RangingSettings> = {},
  env: NodeJS.ProcessEnv = process.env,
): RangingSettings {
  const candidate = { ...DEFAULT_SETTINGS, ...readEnvSettings(env), ...overrides }
  const result = rangingSettingsSchema.safeParse(candidate)
  if (!result.success) {
    throw new ConfigError(result.error.flatten().fieldErrors)
  }
  return result.data
}
