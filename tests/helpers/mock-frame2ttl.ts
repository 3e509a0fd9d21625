/**
 * In-process Frame2TTL stand-in for session and stream tests.
 *
 * MockFrame2TTLLink answers each opcode the way the firmware does, and
 * TestFrame2TTL swaps it in for the serial port and skips real delays.
 */

import EventEmitter from 'events'

import { type Frame2TTLOptions, Frame2TTL } from '../../src/services/frame2ttl-session'
import type { ByteLink } from '../../src/services/link/serial'

// ============================================================================
// Device Profile
// ============================================================================

/**
 *
 */
export interface DeviceProfile {
  /** null: never answers 'F' */
  firmware: number | null
  hardware: number
  handshakeReply: number
  lightCalibration: number
  darkCalibration: number
  /** Opcodes the device ignores */
  silent: Set<string>
  /** Opcodes whose write fails on the link */
  rejectWrites: Set<string>
  sampleAt: (index: number) => number
}

/**
 *
 * @param overrides
 */
export function deviceProfile(overrides: Partial<DeviceProfile> = {}): DeviceProfile {
  return {
    firmware: 4,
    hardware: 3,
    handshakeReply: 218,
    lightCalibration: 42,
    darkCalibration: -37,
    silent: new Set(),
    rejectWrites: new Set(),
    sampleAt: (index) => 1000 + index,
    ...overrides,
  }
}

// ============================================================================
// Mock Serial Link
// ============================================================================

/**
 *
 */
export class MockFrame2TTLLink extends EventEmitter implements ByteLink {
  isOpen = false
  readonly writes: Buffer[] = []
  closeCount = 0

  /**
   *
   * @param device
   * @param port
   * @param baudRate
   */
  constructor(
    private readonly device: DeviceProfile,
    readonly port: string,
    readonly baudRate: number
  ) {
    super()
  }

  /**
   *
   */
  async open(): Promise<void> {
    this.isOpen = true
  }

  /**
   *
   */
  async close(): Promise<void> {
    this.isOpen = false
    this.closeCount++
    this.removeAllListeners()
  }

  /**
   *
   * @param data
   */
  async write(data: Buffer): Promise<void> {
    if (!this.isOpen) {
      throw new Error('Port not open')
    }
    if (this.device.rejectWrites.has(String.fromCharCode(data[0]))) {
      throw new Error('Write failed')
    }
    this.writes.push(Buffer.from(data))

    const reply = this.replyTo(data)
    if (reply) {
      queueMicrotask(() => this.emit('data', reply))
    }
  }

  // Test helper: opcodes written so far, in order
  /**
   *
   */
  opcodes(): string[] {
    return this.writes.map((data) => String.fromCharCode(data[0]))
  }

  // Test helper: simulate incoming data
  /**
   *
   * @param data
   */
  simulateData(data: Buffer): void {
    this.emit('data', data)
  }

  // Test helper: simulate error
  /**
   *
   * @param error
   */
  simulateError(error: Error): void {
    this.emit('error', error)
  }

  // Test helper: simulate close
  /**
   *
   */
  simulateClose(): void {
    this.isOpen = false
    this.emit('close')
  }

  /**
   *
   * @param data
   */
  private replyTo(data: Buffer): Buffer | null {
    const opcode = String.fromCharCode(data[0])
    if (this.device.silent.has(opcode)) {
      return null
    }

    switch (opcode) {
      case 'C':
        return Buffer.from([this.device.handshakeReply])
      case 'F':
        return this.device.firmware === null ? null : Buffer.from([this.device.firmware])
      case '#':
        return Buffer.from([this.device.hardware])
      case 'L':
        return this.encodeThreshold(this.device.lightCalibration)
      case 'D':
        return this.encodeThreshold(this.device.darkCalibration)
      case 'V': {
        const count = data.readUInt32LE(1)
        const reply = Buffer.alloc(count * 2)
        for (let i = 0; i < count; i++) {
          reply.writeUInt16LE(this.device.sampleAt(i), i * 2)
        }
        return reply
      }
      default:
        return null
    }
  }

  /**
   *
   * @param value
   */
  private encodeThreshold(value: number): Buffer {
    if ((this.device.firmware ?? 0) > 3) {
      const reply = Buffer.alloc(4)
      reply.writeInt32LE(value)
      return reply
    }
    const reply = Buffer.alloc(2)
    reply.writeInt16LE(value)
    return reply
  }
}

// ============================================================================
// Session Under Test
// ============================================================================

/**
 *
 */
export class TestFrame2TTL extends Frame2TTL {
  readonly links: MockFrame2TTLLink[] = []
  readonly delays: number[] = []

  /**
   *
   * @param device
   * @param options
   */
  constructor(
    readonly device: DeviceProfile,
    options: Frame2TTLOptions = {}
  ) {
    super(options)
  }

  /**
   *
   */
  currentLink(): MockFrame2TTLLink {
    const link = this.links[this.links.length - 1]
    if (!link) {
      throw new Error('No link created yet')
    }
    return link
  }

  /**
   *
   * @param port
   * @param baudRate
   */
  protected createSerialLink(port: string, baudRate: number): ByteLink {
    const link = new MockFrame2TTLLink(this.device, port, baudRate)
    this.links.push(link)
    return link
  }

  /**
   *
   * @param ms
   */
  protected delay(ms: number): Promise<void> {
    this.delays.push(ms)
    return Promise.resolve()
  }
}

/**
 * Bytes of a command as the device receives them.
 * @param opcode
 * @param payload
 */
export function bytes(opcode: string, ...payload: number[]): Buffer {
  return Buffer.from([opcode.charCodeAt(0), ...payload])
}
