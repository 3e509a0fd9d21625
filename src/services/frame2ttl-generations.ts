/**
 * Frame2TTL driver generations.
 *
 * Each descriptor captures what differs between hardware/firmware lines:
 * link speed, version negotiation, threshold wire format, default thresholds
 * and which optional commands exist. The session consults the descriptor
 * instead of branching on generation names.
 */

import type { ScalarType } from './frame2ttl-codec'
import { HIGH_SPEED_BAUD_RATE } from './frame2ttl-protocol'

export type GenerationId = 'v2' | 'v3' | 'v4'

export const GENERATION_IDS: readonly GenerationId[] = ['v2', 'v3', 'v4']

/**
 *
 */
export interface ThresholdPair {
  /**
   *
   */
  light: number
  /**
   *
   */
  dark: number
}

/**
 * How thresholds travel on the wire for a given firmware.
 * - 'paired': one 'T' command carrying (light, dark)
 * - 'independent': 'T' carries light, 'K' carries dark
 */
export type ThresholdWriteStyle = 'paired' | 'independent'

/**
 *
 */
export interface FirmwarePolicy {
  /** Lowest firmware the driver accepts */
  minimum: number
  /** Firmware the driver was written against; older-but-supported firmware logs a warning */
  current: number
  /** Firmware newer than this is rejected; null accepts anything newer */
  maximum: number | null
}

/**
 *
 */
export interface Frame2TTLGeneration {
  /**
   *
   */
  id: GenerationId
  /**
   *
   */
  description: string
  /** Baud rate used for the handshake */
  baudRate: number
  /** Firmware negotiation; null when the generation predates the 'F' command */
  firmware: FirmwarePolicy | null
  /** Hardware versions accepted; null accepts any */
  supportedHardware: readonly number[] | null
  /** Whether `hardwareVersion` requires reopening the link at HIGH_SPEED_BAUD_RATE */
  needsHighSpeedLink(hardwareVersion: number): boolean
  /** Whether connect() transmits the initial defaults or only records them */
  sendsDefaultsOnConnect: boolean
  thresholdType(firmwareVersion: number): ScalarType
  thresholdWriteStyle(firmwareVersion: number): ThresholdWriteStyle
  /** Whether 'M' (detect mode) and 'G' (activation margin) exist */
  supportsDetectMode(firmwareVersion: number): boolean
  derivativeDefaults(hardwareVersion: number): ThresholdPair
  amplitudeDefaults: ThresholdPair
  defaultActivationMargin: number
}

/**
 * Derivative-mode defaults per hardware revision. Units are bits/ms of luminance change.
 * @param hardwareVersion
 */
function derivativeDefaultsFor(hardwareVersion: number): ThresholdPair {
  if (hardwareVersion <= 2) {
    return { light: 100, dark: -150 }
  }
  return { light: 75, dark: -75 }
}

const AMPLITUDE_DEFAULTS: ThresholdPair = { light: 20000, dark: 30000 }

const DEFAULT_ACTIVATION_MARGIN = 1000

/**
 * Legacy Frame2TTL v2 boards at 115200 baud.
 */
export const GENERATION_V2: Frame2TTLGeneration = {
  id: 'v2',
  description: 'Frame2TTL v2 (legacy, hardware v2 only)',
  baudRate: 115200,
  firmware: null,
  supportedHardware: [2],
  needsHighSpeedLink: () => false,
  sendsDefaultsOnConnect: false,
  thresholdType: () => 'int16',
  thresholdWriteStyle: () => 'paired',
  supportsDetectMode: () => false,
  derivativeDefaults: derivativeDefaultsFor,
  amplitudeDefaults: AMPLITUDE_DEFAULTS,
  defaultActivationMargin: DEFAULT_ACTIVATION_MARGIN,
}

/**
 * Firmware v2+ driver that moves hardware v3 boards onto the high-speed link.
 */
export const GENERATION_V3: Frame2TTLGeneration = {
  id: 'v3',
  description: 'Frame2TTL v2/v3 hardware, firmware 2+',
  baudRate: 12000000,
  firmware: { minimum: 2, current: 2, maximum: null },
  supportedHardware: null,
  needsHighSpeedLink: (hardwareVersion) => hardwareVersion === 3,
  sendsDefaultsOnConnect: true,
  thresholdType: () => 'int16',
  thresholdWriteStyle: () => 'paired',
  supportsDetectMode: () => false,
  derivativeDefaults: derivativeDefaultsFor,
  amplitudeDefaults: AMPLITUDE_DEFAULTS,
  defaultActivationMargin: DEFAULT_ACTIVATION_MARGIN,
}

/**
 * Firmware 3-4 driver. Firmware 4 adds amplitude detection, independent int32 thresholds and the activation margin.
 */
export const GENERATION_V4: Frame2TTLGeneration = {
  id: 'v4',
  description: 'Frame2TTL firmware 3-4 with selectable detect mode',
  baudRate: 12000000,
  firmware: { minimum: 3, current: 4, maximum: 4 },
  supportedHardware: null,
  needsHighSpeedLink: (hardwareVersion) => hardwareVersion > 2,
  sendsDefaultsOnConnect: true,
  thresholdType: (firmwareVersion) => (firmwareVersion > 3 ? 'int32' : 'int16'),
  thresholdWriteStyle: (firmwareVersion) => (firmwareVersion > 3 ? 'independent' : 'paired'),
  supportsDetectMode: (firmwareVersion) => firmwareVersion > 3,
  derivativeDefaults: derivativeDefaultsFor,
  amplitudeDefaults: AMPLITUDE_DEFAULTS,
  defaultActivationMargin: DEFAULT_ACTIVATION_MARGIN,
}

const GENERATIONS: Record<GenerationId, Frame2TTLGeneration> = {
  v2: GENERATION_V2,
  v3: GENERATION_V3,
  v4: GENERATION_V4,
}

/**
 *
 * @param id
 */
export function getGeneration(id: GenerationId): Frame2TTLGeneration {
  return GENERATIONS[id]
}

/**
 *
 * @param value
 */
export function isGenerationId(value: string): value is GenerationId {
  return GENERATION_IDS.some((id) => id === value)
}

/**
 * Baud rate the link should run at once the hardware version is known.
 * @param generation
 * @param hardwareVersion
 */
export function operatingBaudRate(generation: Frame2TTLGeneration, hardwareVersion: number): number {
  return generation.needsHighSpeedLink(hardwareVersion) ? HIGH_SPEED_BAUD_RATE : generation.baudRate
}
