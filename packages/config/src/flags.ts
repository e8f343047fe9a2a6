/** Feature flags for the optional ranging stages. */
export interface RangingFlags {
  ENABLE_DEPTH_FUSION: boolean
  ENABLE_TEMPORAL_SMOOTHING: boolean
}

export type RangingFlagKey = keyof RangingFlags

/** All flag keys for iteration. */
export const RANGING_FLAG_KEYS: RangingFlagKey[] = [
  'ENABLE_DEPTH_FUSION',
  'ENABLE_TEMPORAL_SMOOTHING',
]

/** Both stages on by default. */
export const DEFAULT_FLAGS: RangingFlags = {
  ENABLE_DEPTH_FUSION: true,
  ENABLE_TEMPORAL_SMOOTHING: true,
}

export const FLAG_ENV_PREFIX = 'RANGEFINDER_'

/** Read a boolean env var: `true`/`1` and `false`/`0`; anything else is unset. */
export function readEnvFlag(key: string, env: NodeJS.ProcessEnv = process.env): boolean | undefined {
  const val = env[key]
  if (val === 'true' || val === '1') return true
  if (val === 'false' || val === '0') return false
  return undefined
}

/** Resolve a single flag: env override > default. */
export function resolveFlag(key: RangingFlagKey, env: NodeJS.ProcessEnv = process.env): boolean {
  return readEnvFlag(`${FLAG_ENV_PREFIX}${key}`, env) ?? DEFAULT_FLAGS[key]
}

/** Resolve every flag against the given environment. */
export function resolveFlags(env: NodeJS.ProcessEnv = process.env): RangingFlags {
  const flags: RangingFlags = { ...DEFAULT_FLAGS }
  for (const key of RANGING_FLAG_KEYS) {
    flags[key] = resolveFlag(key, env)
  }
  return flags
}
