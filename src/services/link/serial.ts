// * Serial link: thin event-emitting wrapper around the serialport package.
// * Exposes the ByteLink surface the transport consumes; tests provide an in-process link with the same shape.

import EventEmitter from 'events'
import { SerialPort } from 'serialport'

import { createLogger } from '../logger'
import { SerialIOError } from '../frame2ttl-protocol'

const logger = createLogger('SerialLink')

/**
 * Byte-stream connection consumed by ScalarTransport.
 */
export interface ByteLink {
  /**
   *
   */
  readonly isOpen: boolean
  open(): Promise<void>
  close(): Promise<void>
  write(data: Buffer): Promise<void>
  on(event: 'data', listener: (data: Buffer) => void): this
  on(event: 'error', listener: (error: Error) => void): this
  on(event: 'close', listener: () => void): this
  removeAllListeners(): this
}

/**
 *
 */
export interface SerialPortSummary {
  /**
   *
   */
  path: string
  /**
   *
   */
  manufacturer: string | null
  /**
   *
   */
  serialNumber: string | null
  /**
   *
   */
  vendorId: string | null
  /**
   *
   */
  productId: string | null
  /**
   * Teensy-based boards enumerate with PJRC's vendor id or as a CDC ACM modem
   */
  isLikelyFrame2TTL: boolean
}

const PJRC_VENDOR_ID = '16c0'

/**
 * Build the `serial:` URI a SerialLink is opened from.
 * @param path
 * @param baudRate
 */
export function makeSerialUri(path: string, baudRate: number): URL {
  return new URL(`serial:${path}?baudrate=${baudRate}`)
}

/**
 * Enumerate serial ports and flag the ones that look like a Frame2TTL.
 */
export async function listSerialPorts(): Promise<SerialPortSummary[]> {
  const ports = await SerialPort.list()
  logger.debug(`Found ${ports.length} serial ports`)
  return ports.map((port) => ({
    path: port.path,
    manufacturer: port.manufacturer ?? null,
    serialNumber: port.serialNumber ?? null,
    vendorId: port.vendorId ?? null,
    productId: port.productId ?? null,
    isLikelyFrame2TTL:
      port.vendorId?.toLowerCase() === PJRC_VENDOR_ID ||
      port.path.includes('ttyACM') ||
      port.path.includes('usbmodem'),
  }))
}

/**
 *
 */
export class SerialLink extends EventEmitter implements ByteLink {
  readonly path: string
  readonly baudRate: number
  private port: SerialPort | null = null

  /**
   *
   * @param uri - `serial:<path>?baudrate=<n>`
   */
  constructor(uri: URL) {
    super()
    if (uri.protocol !== 'serial:') {
      throw new SerialIOError(`Unsupported link URI protocol: ${uri.protocol}`)
    }

    this.path = decodeURIComponent(uri.pathname)
    this.baudRate = Number(uri.searchParams.get('baudrate'))
    if (!this.path) {
      throw new SerialIOError(`Serial URI has no port path: ${uri.href}`)
    }
    if (!Number.isInteger(this.baudRate) || this.baudRate <= 0) {
      throw new SerialIOError(`Serial URI has an invalid baudrate: ${uri.href}`)
    }
  }

  /**
   *
   */
  get isOpen(): boolean {
    return this.port?.isOpen ?? false
  }

  /**
   *
   */
  async open(): Promise<void> {
    if (this.isOpen) {
      return
    }

    const port = new SerialPort({ path: this.path, baudRate: this.baudRate, autoOpen: false })
    port.on('data', (data: Buffer) => this.emit('data', data))
    port.on('error', (error: Error) => this.emit('error', error))
    port.on('close', () => this.emit('close'))

    await new Promise<void>((resolve, reject) => {
      port.open((error) => (error ? reject(error) : resolve()))
    })

    this.port = port
    logger.debug(`Opened ${this.path} at ${this.baudRate} baud`)
  }

  /**
   *
   */
  async close(): Promise<void> {
    const port = this.port
    this.port = null
    if (!port) {
      return
    }

    // Intentional close: do not surface it as an unexpected 'close' event
    port.removeAllListeners()
    if (!port.isOpen) {
      return
    }

    await new Promise<void>((resolve, reject) => {
      port.close((error) => (error ? reject(error) : resolve()))
    })
    logger.debug(`Closed ${this.path}`)
  }

  /**
   *
   * @param data
   */
  async write(data: Buffer): Promise<void> {
    const port = this.port
    if (!port || !port.isOpen) {
      throw new SerialIOError(`Port ${this.path} is not open`)
    }

    await new Promise<void>((resolve, reject) => {
      port.write(data, (error) => (error ? reject(error) : resolve()))
    })
    await new Promise<void>((resolve, reject) => {
      port.drain((error) => (error ? reject(error) : resolve()))
    })
  }
}
