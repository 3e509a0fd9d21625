import Conf, { type Schema } from 'conf'

import { type GenerationId, GENERATION_IDS, isGenerationId } from './frame2ttl-generations'
import {
  CALIBRATION_SETTLE_TIME,
  FIRMWARE_REPLY_WAIT,
  HANDSHAKE_TIMEOUT,
  RECONNECT_DELAY,
  STREAM_POLL_INTERVAL,
  STREAM_SETTLE_TIME,
  ValidationError,
} from './frame2ttl-protocol'

/**
 * Host-side driver settings.
 * Device state (thresholds, detect mode, margin) is never stored here.
 */
export type DriverSettings = {
  /**
   * Port opened when connect() is called without one
   */
  defaultPort: string
  /**
   * Driver generation used by Frame2TTL.fromConfig()
   */
  generation: GenerationId
  /**
   * How long to wait for the handshake byte (0 = forever)
   */
  handshakeTimeoutMs: number
  /**
   * Pause after 'F' before deciding the firmware is too old to answer
   */
  firmwareReplyWaitMs: number
  /**
   * Pause between closing and reopening the link at the high-speed baud
   */
  reconnectDelayMs: number
  /**
   * Time the device needs to measure before replying to 'L' / 'D'
   */
  calibrationSettleMs: number
  /**
   * Bound on the calibration reply read after settling (0 = forever)
   */
  calibrationReadTimeoutMs: number
  /**
   * Stream monitor polling period
   */
  streamPollIntervalMs: number
  /**
   * Pause after disabling streaming before flushing leftover bytes
   */
  streamSettleMs: number
  /**
   * Number of samples in the stream monitor's display window
   */
  displayBufferSize: number
  /**
   * Cap on samples retained by the stream monitor per acquisition
   */
  maxAcquiredSamples: number
}

export const DEFAULT_DRIVER_SETTINGS: Readonly<DriverSettings> = {
  defaultPort: '',
  generation: 'v4',
  handshakeTimeoutMs: HANDSHAKE_TIMEOUT,
  firmwareReplyWaitMs: FIRMWARE_REPLY_WAIT,
  reconnectDelayMs: RECONNECT_DELAY,
  calibrationSettleMs: CALIBRATION_SETTLE_TIME,
  calibrationReadTimeoutMs: 0,
  streamPollIntervalMs: STREAM_POLL_INTERVAL,
  streamSettleMs: STREAM_SETTLE_TIME,
  displayBufferSize: 2000,
  maxAcquiredSamples: 1000000,
}

const driverSettingsSchema: Schema<DriverSettings> = {
  defaultPort: {
    type: 'string',
  },
  generation: {
    type: 'string',
    enum: [...GENERATION_IDS],
  },
  handshakeTimeoutMs: {
    type: 'integer',
    minimum: 0,
  },
  firmwareReplyWaitMs: {
    type: 'integer',
    minimum: 0,
  },
  reconnectDelayMs: {
    type: 'integer',
    minimum: 0,
  },
  calibrationSettleMs: {
    type: 'integer',
    minimum: 0,
  },
  calibrationReadTimeoutMs: {
    type: 'integer',
    minimum: 0,
  },
  streamPollIntervalMs: {
    type: 'integer',
    minimum: 1,
  },
  streamSettleMs: {
    type: 'integer',
    minimum: 0,
  },
  displayBufferSize: {
    type: 'integer',
    minimum: 1,
  },
  maxAcquiredSamples: {
    type: 'integer',
    minimum: 0,
  },
}

export type ConfigStore = Conf<DriverSettings>

/**
 *
 */
export interface ConfigStoreOptions {
  /**
   * Directory holding the config file; defaults to the OS config dir for 'frame2ttl'
   */
  cwd?: string
  /**
   *
   */
  configName?: string
}

let storeInstance: ConfigStore | null = null

/**
 * Create a settings store backed by a JSON file.
 * @param options
 */
export function createConfigStore(options: ConfigStoreOptions = {}): ConfigStore {
  return new Conf<DriverSettings>({
    projectName: 'frame2ttl',
    configName: options.configName ?? 'config',
    cwd: options.cwd,
    schema: driverSettingsSchema,
    defaults: DEFAULT_DRIVER_SETTINGS,
  })
}

/**
 * Shared store in the user's config directory (lazy initialization).
 */
export function getConfigStore(): ConfigStore {
  if (!storeInstance) {
    storeInstance = createConfigStore()
  }
  return storeInstance
}

type NumericSetting = Exclude<keyof DriverSettings, 'defaultPort' | 'generation'>

const MIN_SETTING: Record<NumericSetting, number> = {
  handshakeTimeoutMs: 0,
  firmwareReplyWaitMs: 0,
  reconnectDelayMs: 0,
  calibrationSettleMs: 0,
  calibrationReadTimeoutMs: 0,
  streamPollIntervalMs: 1,
  streamSettleMs: 0,
  displayBufferSize: 1,
  maxAcquiredSamples: 0,
}

const NUMERIC_SETTINGS: readonly NumericSetting[] = [
  'handshakeTimeoutMs',
  'firmwareReplyWaitMs',
  'reconnectDelayMs',
  'calibrationSettleMs',
  'calibrationReadTimeoutMs',
  'streamPollIntervalMs',
  'streamSettleMs',
  'displayBufferSize',
  'maxAcquiredSamples',
]

/**
 * Merge `overrides` onto the defaults and validate the result.
 * @param overrides
 * @throws ValidationError for a non-integer or out-of-range numeric setting, or an unknown generation
 */
export function resolveDriverSettings(overrides: Partial<DriverSettings> = {}): DriverSettings {
  const settings: DriverSettings = { ...DEFAULT_DRIVER_SETTINGS, ...overrides }

  if (!isGenerationId(settings.generation)) {
    throw new ValidationError(`Unknown generation '${settings.generation}', expected one of ${GENERATION_IDS.join(', ')}`)
  }

  for (const key of NUMERIC_SETTINGS) {
    const value = settings[key]
    const minimum = MIN_SETTING[key]
    if (!Number.isInteger(value) || value < minimum) {
      throw new ValidationError(`Setting ${key} must be an integer >= ${minimum}, got ${value}`)
    }
  }

  return settings
}

/**
 * Settings overrides taken from FRAME2TTL_PORT and FRAME2TTL_GENERATION.
 * @param env
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<DriverSettings> {
  const overrides: Partial<DriverSettings> = {}

  if (env.FRAME2TTL_PORT) {
    overrides.defaultPort = env.FRAME2TTL_PORT
  }

  const generation = env.FRAME2TTL_GENERATION
  if (generation) {
    if (!isGenerationId(generation)) {
      throw new ValidationError(`FRAME2TTL_GENERATION must be one of ${GENERATION_IDS.join(', ')}, got '${generation}'`)
    }
    overrides.generation = generation
  }

  return overrides
}

/**
 * Stored settings, then environment overrides, then explicit overrides.
 * @param store
 * @param overrides
 * @param env
 */
export function loadDriverSettings(
  store: ConfigStore = getConfigStore(),
  overrides: Partial<DriverSettings> = {},
  env: NodeJS.ProcessEnv = process.env
): DriverSettings {
  return resolveDriverSettings({ ...store.store, ...settingsFromEnv(env), ...overrides })
}

/**
 * Persist host settings after validating them together with what is already stored.
 * @param store
 * @param changes
 */
export function saveDriverSettings(store: ConfigStore, changes: Partial<DriverSettings>): DriverSettings {
  const next = resolveDriverSettings({ ...store.store, ...changes })
  store.set(next)
  return next
}
