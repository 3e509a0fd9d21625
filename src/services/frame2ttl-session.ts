// * Frame2TTL Session (TypeScript)
// * Host-side control of one Frame2TTL device: handshake, version negotiation, threshold state, sample reads.
// * ARCHITECTURE:
// * - One class serves every driver generation; differences live in the Frame2TTLGeneration descriptor
// * - Every command is a single write followed (optionally) by an awaited fixed-size read
// * - Setters validate, then transmit, then commit local state; nothing invalid reaches the device
// * - Link lifecycle and unexpected-close handling mirror the serial controller pattern

import EventEmitter from 'events'
import { v4 as uuidv4 } from 'uuid'

import {
  type ConfigStore,
  type DriverSettings,
  getConfigStore,
  loadDriverSettings,
  resolveDriverSettings,
} from './config-store'
import { scalarRange, type ScalarType } from './frame2ttl-codec'
import {
  type Frame2TTLGeneration,
  type GenerationId,
  getGeneration,
  operatingBaudRate,
  type ThresholdPair,
} from './frame2ttl-generations'
import {
  DetectMode,
  HANDSHAKE_REPLY,
  HandshakeError,
  isDetectMode,
  ModeError,
  OP_CALIBRATE_DARK,
  OP_CALIBRATE_LIGHT,
  OP_FIRMWARE_VERSION,
  OP_HANDSHAKE,
  OP_HARDWARE_VERSION,
  OP_READ_SAMPLES,
  OP_SET_ACTIVATION_MARGIN,
  OP_SET_DARK_THRESHOLD,
  OP_SET_DETECT_MODE,
  OP_SET_LIGHT_THRESHOLD,
  OP_STREAM,
  SAMPLE_MAX,
  SerialIOError,
  TransportTimeoutError,
  UINT32_MAX,
  ValidationError,
  VersionError,
} from './frame2ttl-protocol'
import { ScalarTransport } from './frame2ttl-transport'
import { createLogger } from './logger'
import { type ByteLink, makeSerialUri, SerialLink } from './link/serial'

const logger = createLogger('Frame2TTL')

// ============================================================================
// Type Definitions
// ============================================================================

/**
 *
 */
export enum SessionState {
  DISCONNECTED = 'disconnected',
  CONNECTING = 'connecting',
  READY = 'ready',
  STREAMING = 'streaming',
}

export type ThresholdKind = 'light' | 'dark'

/**
 *
 */
export interface Frame2TTLOptions {
  /**
   * Driver generation; defaults to `settings.generation`
   */
  generation?: GenerationId | Frame2TTLGeneration
  /**
   *
   */
  settings?: Partial<DriverSettings>
}

/**
 * Snapshot of a session, as reported by getStatus().
 */
export interface Frame2TTLStatus {
  /** Assigned on each successful connect */
  sessionId: string | null
  /**
   *
   */
  generation: GenerationId
  /**
   *
   */
  state: SessionState
  /**
   *
   */
  port: string | null
  /** Current link speed; differs from the generation's base rate after a high-speed reopen */
  baudRate: number | null
  /** Null for generations that cannot report it */
  firmwareVersion: number | null
  /**
   *
   */
  hardwareVersion: number | null
  /**
   *
   */
  detectMode: DetectMode
  /**
   *
   */
  lightThreshold: number
  /**
   *
   */
  darkThreshold: number
  /** Null unless the connected firmware supports it */
  activationMargin: number | null
}

/**
 *
 * @param error
 */
function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// ============================================================================
// Frame2TTL Class
// ============================================================================

// * Session with one Frame2TTL device.
// * EVENT EMISSION: 'state-change' (SessionState), 'error' (link errors, only when a listener is attached).
// ! Not safe for overlapping calls: await each operation before issuing the next.
/**
 *
 */
export class Frame2TTL extends EventEmitter {
  readonly generation: Frame2TTLGeneration
  readonly settings: DriverSettings

  private link: ByteLink | null = null
  private transport: ScalarTransport | null = null
  private state: SessionState = SessionState.DISCONNECTED
  private sessionId: string | null = null

  // Connection parameters for reconnection
  private lastPort: string | null = null
  private baudRate: number | null = null

  // Device state
  private firmwareVersion: number | null = null
  private hardwareVersion: number | null = null
  private detectMode: DetectMode = DetectMode.DERIVATIVE
  private lightThreshold = 0
  private darkThreshold = 0
  private activationMargin: number

  /**
   * Build a session from the persisted host settings.
   * @param store
   * @param overrides
   */
  static fromConfig(store: ConfigStore = getConfigStore(), overrides: Partial<DriverSettings> = {}): Frame2TTL {
    const settings = loadDriverSettings(store, overrides)
    return new Frame2TTL({ generation: settings.generation, settings })
  }

  /**
   *
   * @param options
   */
  constructor(options: Frame2TTLOptions = {}) {
    super()
    this.settings = resolveDriverSettings(options.settings)
    const generation = options.generation ?? this.settings.generation
    this.generation = typeof generation === 'string' ? getGeneration(generation) : generation
    this.activationMargin = this.generation.defaultActivationMargin
  }

  // ========================================================================
  // Factory Methods (for test injection)
  // ========================================================================

  /**
   *
   * @param port
   * @param baudRate
   */
  protected createSerialLink(port: string, baudRate: number): ByteLink {
    return new SerialLink(makeSerialUri(port, baudRate))
  }

  /**
   *
   * @param ms
   */
  protected delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
  }

  // ========================================================================
  // Connection Management
  // ========================================================================

  // * Open the port, verify identity and versions, renegotiate link speed if needed, apply default thresholds.
  /**
   *
   * @param port - Defaults to `settings.defaultPort`
   */
  async connect(port: string = this.settings.defaultPort): Promise<void> {
    if (this.state !== SessionState.DISCONNECTED) {
      throw new SerialIOError(`Already connected (state: ${this.state})`)
    }
    if (!port) {
      throw new ValidationError('No port given and no defaultPort configured')
    }

    this.lastPort = port
    this.setState(SessionState.CONNECTING)
    logger.info(`Connecting to ${port} with the ${this.generation.id} driver`)

    try {
      await this.openLink(port, this.generation.baudRate)
      await this.handshake(port)
      await this.negotiateFirmware()
      await this.negotiateHardware(port)
      await this.applyInitialSettings()

      this.sessionId = uuidv4()
      this.setState(SessionState.READY)
      logger.info(
        `${this.tag()} Connected: firmware ${this.firmwareVersion ?? 'n/a'}, hardware ${this.hardwareVersion}, ` +
          `thresholds ${this.lightThreshold}/${this.darkThreshold}`
      )
    } catch (error) {
      logger.error(`Connect to ${port} failed: ${describeError(error)}`)
      await this.releaseLink()
      this.resetDeviceState()
      this.setState(SessionState.DISCONNECTED)
      throw error
    }
  }

  // * Stop streaming if it was left on, then release the port. Safe to call when already disconnected.
  /**
   *
   */
  async disconnect(): Promise<void> {
    if (this.state === SessionState.DISCONNECTED) {
      return
    }

    logger.info(`${this.tag()} Disconnecting...`)

    if (this.state === SessionState.STREAMING && this.transport) {
      try {
        await this.transport.write(OP_STREAM, { type: 'uint8', values: 0 })
      } catch (error) {
        logger.warn(`${this.tag()} Could not disable streaming before disconnect: ${describeError(error)}`)
      }
    }

    await this.releaseLink()
    this.resetDeviceState()
    this.setState(SessionState.DISCONNECTED)
    logger.info('Disconnected')
  }

  // * Reconnect using the last port.
  /**
   *
   */
  async reconnect(): Promise<void> {
    if (!this.lastPort) {
      throw new SerialIOError('Cannot reconnect: no previous connection')
    }

    if (this.state !== SessionState.DISCONNECTED) {
      await this.disconnect()
    }

    await this.connect(this.lastPort)
  }

  // ========================================================================
  // Thresholds
  // ========================================================================

  /**
   * Set the dark -> light detection threshold.
   * @param value
   */
  async setLightThreshold(value: number): Promise<void> {
    this.requireTransport()
    this.validateThreshold('light', value)
    await this.sendThreshold('light', value)
  }

  /**
   * Set the light -> dark detection threshold.
   * @param value
   */
  async setDarkThreshold(value: number): Promise<void> {
    this.requireTransport()
    this.validateThreshold('dark', value)
    await this.sendThreshold('dark', value)
  }

  /**
   * Set both thresholds, validated as a pair. Independent writes are ordered so the
   * stored pair satisfies the mode's constraints after each one.
   * @param light
   * @param dark
   */
  async setThresholds(light: number, dark: number): Promise<void> {
    this.requireTransport()
    this.validateThresholdValue('light', light)
    this.validateThresholdValue('dark', dark)
    this.validateOrdering(light, dark)
    await this.sendThresholdsOrRelease({ light, dark })
  }

  // ========================================================================
  // Detect Mode / Activation Margin
  // ========================================================================

  // * Switch between amplitude (0) and derivative (1) detection. A real change resets both thresholds to that mode's defaults.
  /**
   *
   * @param mode
   */
  async setDetectMode(mode: number): Promise<void> {
    const transport = this.requireTransport()

    if (!Number.isInteger(mode) || !isDetectMode(mode)) {
      throw new ValidationError(`Detect mode must be 0 (amplitude) or 1 (derivative), got ${mode}`)
    }
    this.requireDetectModeSupport('Detect mode selection')

    const previous = this.detectMode
    await transport.write(OP_SET_DETECT_MODE, { type: 'uint8', values: mode })
    this.detectMode = mode

    if (mode !== previous) {
      logger.info(`${this.tag()} Detect mode ${DetectMode[previous]} -> ${DetectMode[mode]}, applying defaults`)
      await this.sendThresholdsOrRelease(this.defaultThresholds())
    }
  }

  // * Set the amplitude-mode margin that thresholds must keep from the sensor's full-scale bounds.
  /**
   *
   * @param margin
   */
  async setActivationMargin(margin: number): Promise<void> {
    const transport = this.requireTransport()
    this.requireDetectModeSupport('Activation margin')

    const maximum = this.maxActivationMargin()
    if (!Number.isInteger(margin) || margin < 0 || margin > maximum) {
      throw new ValidationError(`Activation margin must be an integer in [0, ${maximum}], got ${margin}`)
    }

    if (this.detectMode === DetectMode.AMPLITUDE) {
      const high = SAMPLE_MAX - margin
      for (const [kind, value] of [
        ['light', this.lightThreshold],
        ['dark', this.darkThreshold],
      ] as const) {
        if (value < margin || value > high) {
          throw new ValidationError(
            `Activation margin ${margin} would leave the ${kind} threshold (${value}) outside [${margin}, ${high}]`
          )
        }
      }
    }

    await transport.write(OP_SET_ACTIVATION_MARGIN, { type: 'uint32', values: margin })
    this.activationMargin = margin
  }

  // ========================================================================
  // Auto-Calibration
  // ========================================================================

  /**
   * Let the device measure and pick the dark -> light threshold. Run with the sync patch BLACK.
   */
  async calibrateLightThresholdAuto(): Promise<number> {
    return this.calibrate('light')
  }

  /**
   * Let the device measure and pick the light -> dark threshold. Run with the sync patch WHITE.
   */
  async calibrateDarkThresholdAuto(): Promise<number> {
    return this.calibrate('dark')
  }

  // ========================================================================
  // Samples / Streaming
  // ========================================================================

  /**
   * Read `count` consecutive raw luminance samples (0-65535).
   * @param count
   */
  async readSamples(count = 1): Promise<number[]> {
    const transport = this.requireTransport()

    if (!Number.isInteger(count) || count <= 0 || count > UINT32_MAX) {
      throw new ValidationError(`Sample count must be a positive integer, got ${count}`)
    }
    this.requireNotStreaming('Sample reads')

    await transport.write(OP_READ_SAMPLES, { type: 'uint32', values: count })
    return transport.read(count, 'uint16')
  }

  /**
   * Start or stop the device pushing samples. While on, drain them with readAvailableSamples().
   * Turning it off waits `streamSettleMs` and drops whatever was still in flight, so the next
   * reply is read from a clean buffer.
   * @param enabled
   */
  async setStreaming(enabled: boolean): Promise<void> {
    const transport = this.requireTransport()
    await transport.write(OP_STREAM, { type: 'uint8', values: enabled ? 1 : 0 })

    if (!enabled) {
      await this.delay(this.settings.streamSettleMs)
      const dropped = transport.discard()
      if (dropped > 0) {
        logger.debug(`${this.tag()} Discarded ${dropped} streamed bytes after stopping the stream`)
      }
    }

    this.setState(enabled ? SessionState.STREAMING : SessionState.READY)
  }

  /**
   * Decode every whole sample already received, without waiting for more.
   */
  readAvailableSamples(): number[] {
    return this.requireTransport().readAvailable('uint16')
  }

  /**
   *
   */
  bytesAvailable(): number {
    return this.requireTransport().bytesAvailable()
  }

  /**
   * Drop buffered input; returns the number of bytes dropped.
   */
  discardInput(): number {
    return this.requireTransport().discard()
  }

  // ========================================================================
  // Status
  // ========================================================================

  /**
   *
   */
  getStatus(): Frame2TTLStatus {
    return {
      sessionId: this.sessionId,
      generation: this.generation.id,
      state: this.state,
      port: this.state === SessionState.DISCONNECTED ? null : this.lastPort,
      baudRate: this.baudRate,
      firmwareVersion: this.firmwareVersion,
      hardwareVersion: this.hardwareVersion,
      detectMode: this.detectMode,
      lightThreshold: this.lightThreshold,
      darkThreshold: this.darkThreshold,
      activationMargin: this.hasDetectModeSupport() ? this.activationMargin : null,
    }
  }

  /**
   *
   */
  isConnected(): boolean {
    return (
      this.link !== null &&
      this.link.isOpen &&
      (this.state === SessionState.READY || this.state === SessionState.STREAMING)
    )
  }

  /**
   *
   */
  getState(): SessionState {
    return this.state
  }

  /**
   *
   */
  getSessionId(): string | null {
    return this.sessionId
  }

  /**
   *
   */
  getFirmwareVersion(): number | null {
    return this.firmwareVersion
  }

  /**
   *
   */
  getHardwareVersion(): number | null {
    return this.hardwareVersion
  }

  /**
   *
   */
  getDetectMode(): DetectMode {
    return this.detectMode
  }

  /**
   *
   */
  getLightThreshold(): number {
    return this.lightThreshold
  }

  /**
   *
   */
  getDarkThreshold(): number {
    return this.darkThreshold
  }

  /**
   *
   */
  getActivationMargin(): number {
    return this.activationMargin
  }

  // ========================================================================
  // Internal Helpers: Handshake
  // ========================================================================

  /**
   *
   * @param port
   */
  private async handshake(port: string): Promise<void> {
    const transport = this.currentTransport()
    await transport.write(OP_HANDSHAKE)

    let reply: number
    try {
      reply = await this.readScalar('uint8', this.settings.handshakeTimeoutMs)
    } catch (error) {
      if (error instanceof TransportTimeoutError) {
        throw new HandshakeError(`Frame2TTL not detected on ${port}: no handshake reply`)
      }
      throw error
    }

    if (reply !== HANDSHAKE_REPLY) {
      throw new HandshakeError(
        `Frame2TTL not detected on ${port}: expected handshake byte ${HANDSHAKE_REPLY}, got ${reply}`
      )
    }
  }

  /**
   *
   */
  private async negotiateFirmware(): Promise<void> {
    const policy = this.generation.firmware
    if (!policy) {
      return
    }

    const transport = this.currentTransport()
    await transport.write(OP_FIRMWARE_VERSION)
    // Firmware v1 never answers 'F'
    await this.delay(this.settings.firmwareReplyWaitMs)
    if (transport.bytesAvailable() === 0) {
      throw new VersionError(`Old Frame2TTL firmware detected. Update to firmware v${policy.minimum} or newer.`)
    }

    const firmware = await this.readScalar('uint8')
    this.firmwareVersion = firmware

    if (firmware < policy.minimum) {
      throw new VersionError(
        `Old Frame2TTL firmware detected, v${firmware}. Update to firmware v${policy.current}` +
          (policy.current > policy.minimum ? '.' : ' or newer.')
      )
    }
    if (policy.maximum !== null && firmware > policy.maximum) {
      throw new VersionError(
        `Future Frame2TTL firmware detected, v${firmware}. This driver expects v${policy.current}: ` +
          `update the host software or downgrade firmware to v${policy.current}.`
      )
    }
    if (firmware < policy.current) {
      logger.warn(
        `Old Frame2TTL firmware detected, v${firmware}. Please update to firmware v${policy.current} at your earliest convenience.`
      )
    }
  }

  /**
   *
   * @param port
   */
  private async negotiateHardware(port: string): Promise<void> {
    await this.currentTransport().write(OP_HARDWARE_VERSION)
    const hardware = await this.readScalar('uint8')
    this.hardwareVersion = hardware

    const supported = this.generation.supportedHardware
    if (supported && !supported.includes(hardware)) {
      throw new VersionError(
        `The ${this.generation.id} driver requires hardware version ${supported.join(' or ')}, got ${hardware}`
      )
    }

    const baudRate = operatingBaudRate(this.generation, hardware)
    if (baudRate !== this.baudRate) {
      logger.info(`Hardware v${hardware}: reopening ${port} at ${baudRate} baud`)
      await this.releaseLink()
      await this.delay(this.settings.reconnectDelayMs)
      await this.openLink(port, baudRate)
    }
  }

  /**
   *
   */
  private async applyInitialSettings(): Promise<void> {
    this.detectMode = DetectMode.DERIVATIVE
    this.activationMargin = this.generation.defaultActivationMargin
    const defaults = this.defaultThresholds()

    if (this.generation.sendsDefaultsOnConnect) {
      await this.sendThresholds(defaults)
    } else {
      this.lightThreshold = defaults.light
      this.darkThreshold = defaults.dark
    }

    if (this.hasDetectModeSupport()) {
      await this.currentTransport().write(OP_SET_ACTIVATION_MARGIN, { type: 'uint32', values: this.activationMargin })
    }
  }

  // ========================================================================
  // Internal Helpers: Thresholds
  // ========================================================================

  /**
   *
   */
  private get firmwareLevel(): number {
    return this.firmwareVersion ?? 0
  }

  /**
   *
   */
  private get thresholdType(): ScalarType {
    return this.generation.thresholdType(this.firmwareLevel)
  }

  /**
   *
   */
  private hasDetectModeSupport(): boolean {
    return this.generation.supportsDetectMode(this.firmwareLevel)
  }

  /**
   *
   * @param operation
   */
  private requireDetectModeSupport(operation: string): void {
    if (!this.hasDetectModeSupport()) {
      throw new ModeError(
        `${operation} is not available with the ${this.generation.id} driver on firmware ${this.firmwareVersion ?? 'n/a'}`
      )
    }
  }

  /**
   * Largest margin that keeps the amplitude defaults inside the allowed range.
   */
  private maxActivationMargin(): number {
    const { light, dark } = this.generation.amplitudeDefaults
    return Math.min(light, SAMPLE_MAX - dark)
  }

  /**
   *
   */
  private defaultThresholds(): ThresholdPair {
    if (this.detectMode === DetectMode.AMPLITUDE) {
      return this.generation.amplitudeDefaults
    }
    return this.generation.derivativeDefaults(this.hardwareVersion ?? 0)
  }

  /**
   *
   * @param kind
   * @param value
   */
  private validateThreshold(kind: ThresholdKind, value: number): void {
    this.validateThresholdValue(kind, value)
    if (kind === 'light') {
      this.validateOrdering(value, this.darkThreshold)
    } else {
      this.validateOrdering(this.lightThreshold, value)
    }
  }

  /**
   *
   * @param kind
   * @param value
   */
  private validateThresholdValue(kind: ThresholdKind, value: number): void {
    if (!Number.isInteger(value)) {
      throw new ValidationError(`The ${kind} threshold must be an integer, got ${value}`)
    }

    if (this.detectMode === DetectMode.AMPLITUDE) {
      const low = this.activationMargin
      const high = SAMPLE_MAX - this.activationMargin
      if (value < low || value > high) {
        throw new ValidationError(`In amplitude mode, thresholds must be in range [${low}, ${high}], got ${value}`)
      }
      return
    }

    if (kind === 'light' && value <= 0) {
      throw new ValidationError(`In derivative mode, the light threshold must be > 0, got ${value}`)
    }
    if (kind === 'dark' && value >= 0) {
      throw new ValidationError(`In derivative mode, the dark threshold must be < 0, got ${value}`)
    }

    const type = this.thresholdType
    const { min, max } = scalarRange(type)
    if (value < min || value > max) {
      throw new ValidationError(`The ${kind} threshold must fit the device's ${type} range [${min}, ${max}], got ${value}`)
    }
  }

  /**
   *
   * @param light
   * @param dark
   */
  private validateOrdering(light: number, dark: number): void {
    if (this.detectMode === DetectMode.AMPLITUDE && light >= dark) {
      throw new ValidationError(
        `In amplitude mode, the light threshold (${light}) must be below the dark threshold (${dark})`
      )
    }
  }

  /**
   *
   * @param kind
   * @param value
   */
  private async sendThreshold(kind: ThresholdKind, value: number): Promise<void> {
    const transport = this.currentTransport()
    const type = this.thresholdType

    if (this.generation.thresholdWriteStyle(this.firmwareLevel) === 'paired') {
      const light = kind === 'light' ? value : this.lightThreshold
      const dark = kind === 'dark' ? value : this.darkThreshold
      await transport.write(OP_SET_LIGHT_THRESHOLD, { type, values: [light, dark] })
    } else {
      const opcode = kind === 'light' ? OP_SET_LIGHT_THRESHOLD : OP_SET_DARK_THRESHOLD
      await transport.write(opcode, { type, values: value })
    }

    if (kind === 'light') {
      this.lightThreshold = value
    } else {
      this.darkThreshold = value
    }
  }

  /**
   *
   * @param pair
   */
  private async sendThresholds(pair: ThresholdPair): Promise<void> {
    if (this.generation.thresholdWriteStyle(this.firmwareLevel) === 'paired') {
      await this.currentTransport().write(OP_SET_LIGHT_THRESHOLD, {
        type: this.thresholdType,
        values: [pair.light, pair.dark],
      })
      this.lightThreshold = pair.light
      this.darkThreshold = pair.dark
      return
    }

    // In amplitude mode, writing dark first keeps light < dark whenever the new dark clears the old light;
    // otherwise the new light is below the old dark and light goes first
    const darkFirst = this.detectMode === DetectMode.AMPLITUDE && this.lightThreshold < pair.dark
    if (darkFirst) {
      await this.sendThreshold('dark', pair.dark)
      await this.sendThreshold('light', pair.light)
    } else {
      await this.sendThreshold('light', pair.light)
      await this.sendThreshold('dark', pair.dark)
    }
  }

  /**
   * Public multi-write updates: a failure part way leaves the device's thresholds unknown,
   * so the link is released and local state reset.
   * @param pair
   */
  private async sendThresholdsOrRelease(pair: ThresholdPair): Promise<void> {
    try {
      await this.sendThresholds(pair)
    } catch (error) {
      logger.error(`${this.tag()} Threshold update failed part way, releasing the link: ${describeError(error)}`)
      await this.releaseLink()
      this.resetDeviceState()
      this.setState(SessionState.DISCONNECTED)
      throw error
    }
  }

  /**
   *
   * @param kind
   */
  private async calibrate(kind: ThresholdKind): Promise<number> {
    const transport = this.requireTransport()

    if (this.detectMode === DetectMode.AMPLITUDE) {
      throw new ModeError(
        'Automatic threshold detection is only available in derivative mode. ' +
          'In amplitude mode, set thresholds manually, guided by streamed samples.'
      )
    }
    this.requireNotStreaming('Automatic threshold detection')

    logger.info(`${this.tag()} Auto-calibrating ${kind} threshold...`)
    await transport.write(kind === 'light' ? OP_CALIBRATE_LIGHT : OP_CALIBRATE_DARK)
    // The device measures for ~2.5s before it replies
    await this.delay(this.settings.calibrationSettleMs)
    const value = await this.readScalar(this.thresholdType, this.settings.calibrationReadTimeoutMs)

    if (kind === 'light') {
      this.lightThreshold = value
    } else {
      this.darkThreshold = value
    }
    logger.info(`${this.tag()} Auto-calibrated ${kind} threshold: ${value}`)
    return value
  }

  // ========================================================================
  // Internal Helpers: Link / Transport
  // ========================================================================

  /**
   *
   * @param port
   * @param baudRate
   */
  private async openLink(port: string, baudRate: number): Promise<void> {
    const link = this.createSerialLink(port, baudRate)
    const transport = new ScalarTransport(link)

    link.on('data', (data: Buffer) => transport.receive(data))
    link.on('error', (error: Error) => this.handleLinkError(link, error))
    link.on('close', () => this.handleLinkClose(link))

    try {
      await link.open()
    } catch (error) {
      link.removeAllListeners()
      throw new SerialIOError(`Failed to open port ${port}: ${describeError(error)}`)
    }

    this.link = link
    this.transport = transport
    this.baudRate = baudRate
  }

  /**
   *
   */
  private async releaseLink(): Promise<void> {
    const link = this.link
    const transport = this.transport
    this.link = null
    this.transport = null
    this.baudRate = null

    transport?.abort(new SerialIOError('Link closed'))
    if (!link) {
      return
    }

    link.removeAllListeners()
    try {
      await link.close()
    } catch (error) {
      logger.error(`Error closing port: ${describeError(error)}`)
    }
  }

  /**
   *
   * @param link
   * @param error
   */
  private handleLinkError(link: ByteLink, error: Error): void {
    if (this.link !== link) {
      return
    }
    logger.error(`${this.tag()} Serial error: ${error.message}`)
    if (this.listenerCount('error') > 0) {
      this.emit('error', error)
    }
    this.cleanupAfterUnexpectedDisconnect(error)
    link.close().catch((closeError: unknown) => {
      logger.error(`Error closing port after serial error: ${describeError(closeError)}`)
    })
  }

  /**
   *
   * @param link
   */
  private handleLinkClose(link: ByteLink): void {
    if (this.link !== link) {
      return
    }
    logger.warn(`${this.tag()} Serial port closed unexpectedly`)
    this.cleanupAfterUnexpectedDisconnect(new SerialIOError('Serial port closed unexpectedly'))
  }

  /**
   *
   * @param error
   */
  private cleanupAfterUnexpectedDisconnect(error: Error): void {
    const link = this.link
    const transport = this.transport
    this.link = null
    this.transport = null
    this.baudRate = null

    link?.removeAllListeners()
    transport?.abort(error)
    this.resetDeviceState()
    this.setState(SessionState.DISCONNECTED)
  }

  /**
   * Transport for public operations; requires a completed connect().
   */
  private requireTransport(): ScalarTransport {
    if (this.state !== SessionState.READY && this.state !== SessionState.STREAMING) {
      throw new SerialIOError(`Operation requires a connected session, current: ${this.state}`)
    }
    return this.currentTransport()
  }

  /**
   *
   */
  private currentTransport(): ScalarTransport {
    if (!this.transport) {
      throw new SerialIOError('Not connected')
    }
    return this.transport
  }

  /**
   *
   * @param operation
   */
  private requireNotStreaming(operation: string): void {
    if (this.state === SessionState.STREAMING) {
      throw new ModeError(`${operation} not available while streaming; call setStreaming(false) first`)
    }
  }

  /**
   *
   * @param type
   * @param timeoutMs
   */
  private async readScalar(type: ScalarType, timeoutMs = 0): Promise<number> {
    const [value] = await this.currentTransport().read(1, type, timeoutMs)
    return value
  }

  /**
   *
   */
  private resetDeviceState(): void {
    this.sessionId = null
    this.firmwareVersion = null
    this.hardwareVersion = null
    this.detectMode = DetectMode.DERIVATIVE
    this.lightThreshold = 0
    this.darkThreshold = 0
    this.activationMargin = this.generation.defaultActivationMargin
  }

  /**
   *
   * @param state
   */
  private setState(state: SessionState): void {
    if (this.state === state) {
      return
    }
    this.state = state
    this.emit('state-change', state)
  }

  /**
   *
   */
  private tag(): string {
    return `[${this.lastPort ?? '-'}][${this.sessionId ?? 'pending'}]`
  }
}
