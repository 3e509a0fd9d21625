/**
 * Frame2TTL Serial Protocol
 *
 * Command set, wire constants and error types shared by the session, the
 * transport and the stream monitor.
 *
 * WIRE FORMAT:
 * - Every command starts with a single ASCII opcode byte
 * - Optional payload of fixed-width little-endian scalars follows in the same write
 * - Replies are fixed-width scalars with no framing
 */

// ============================================================================
// Opcodes
// ============================================================================

export const OP_HANDSHAKE = 'C' // Reply: uint8, always HANDSHAKE_REPLY
export const OP_FIRMWARE_VERSION = 'F' // Reply: uint8 (firmware v1 stays silent)
export const OP_HARDWARE_VERSION = '#' // Reply: uint8
export const OP_SET_LIGHT_THRESHOLD = 'T' // Payload: (light, dark) int16 pair, or light int32 on firmware 4
export const OP_SET_DARK_THRESHOLD = 'K' // Payload: dark int32 (firmware 4)
export const OP_SET_DETECT_MODE = 'M' // Payload: uint8 mode
export const OP_SET_ACTIVATION_MARGIN = 'G' // Payload: uint32 margin
export const OP_CALIBRATE_LIGHT = 'L' // Reply: threshold after settling
export const OP_CALIBRATE_DARK = 'D' // Reply: threshold after settling
export const OP_READ_SAMPLES = 'V' // Payload: uint32 count. Reply: count x uint16
export const OP_STREAM = 'S' // Payload: uint8 flag. Device pushes uint16 samples while enabled

export type Opcode =
  | typeof OP_HANDSHAKE
  | typeof OP_FIRMWARE_VERSION
  | typeof OP_HARDWARE_VERSION
  | typeof OP_SET_LIGHT_THRESHOLD
  | typeof OP_SET_DARK_THRESHOLD
  | typeof OP_SET_DETECT_MODE
  | typeof OP_SET_ACTIVATION_MARGIN
  | typeof OP_CALIBRATE_LIGHT
  | typeof OP_CALIBRATE_DARK
  | typeof OP_READ_SAMPLES
  | typeof OP_STREAM

// ============================================================================
// Wire Constants
// ============================================================================

/** Identification byte returned for OP_HANDSHAKE */
export const HANDSHAKE_REPLY = 218

/** Baud rate that hardware v3 boards run at after the initial handshake */
export const HIGH_SPEED_BAUD_RATE = 480000000

/** Full scale of the 16-bit luminance ADC */
export const SAMPLE_MAX = 65535

/** Bytes per streamed or read sample */
export const SAMPLE_BYTES = 2

export const UINT32_MAX = 0xffffffff

// ============================================================================
// Timing Defaults (milliseconds)
// ============================================================================

export const HANDSHAKE_TIMEOUT = 1000
export const FIRMWARE_REPLY_WAIT = 250 // Firmware v1 never answers 'F'; check the buffer after this
export const RECONNECT_DELAY = 250 // Pause between closing and reopening at the high-speed baud
export const CALIBRATION_SETTLE_TIME = 3000 // Device measures for ~2.5s before replying
export const STREAM_POLL_INTERVAL = 50
export const STREAM_SETTLE_TIME = 100

// ============================================================================
// Detect Mode
// ============================================================================

/**
 * How the firmware turns luminance into sync-patch transitions.
 */
export enum DetectMode {
  /** Absolute luminance thresholds */
  AMPLITUDE = 0,
  /** 1ms sliding-window average of sample-wise luminance change */
  DERIVATIVE = 1,
}

/**
 *
 * @param value
 */
export function isDetectMode(value: number): value is DetectMode {
  return value === DetectMode.AMPLITUDE || value === DetectMode.DERIVATIVE
}

// ============================================================================
// Custom Errors
// ============================================================================

/**
 * Base class for every error raised by the driver.
 */
export class Frame2TTLError extends Error {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'Frame2TTLError'
  }
}

/**
 * The device answered with bytes the protocol does not allow, or not at all.
 */
export class ProtocolError extends Frame2TTLError {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'ProtocolError'
  }
}

/**
 *
 */
export class HandshakeError extends ProtocolError {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'HandshakeError'
  }
}

/**
 *
 */
export class TransportTimeoutError extends ProtocolError {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'TransportTimeoutError'
  }
}

/**
 * Firmware or hardware revision this driver generation cannot talk to.
 */
export class VersionError extends Frame2TTLError {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'VersionError'
  }
}

/**
 * Argument rejected before anything was written to the device.
 */
export class ValidationError extends Frame2TTLError {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Operation not available in the current detect mode, generation or streaming state.
 */
export class ModeError extends Frame2TTLError {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'ModeError'
  }
}

/**
 *
 */
export class SerialIOError extends Frame2TTLError {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'SerialIOError'
  }
}
