/**
 * Typed transport over a byte link.
 *
 * Buffers everything the link delivers and serves fixed-size typed reads out
 * of that buffer. Reads wait for as long as it takes unless given a timeout;
 * only one read may be outstanding at a time.
 */

import { decodeScalars, encodeCommand, type ScalarChunk, scalarSize, type ScalarType } from './frame2ttl-codec'
import { SerialIOError, TransportTimeoutError } from './frame2ttl-protocol'
import type { ByteLink } from './link/serial'

interface PendingRead {
  byteCount: number
  resolve: (data: Buffer) => void
  reject: (error: Error) => void
  timer: NodeJS.Timeout | null
}

/**
 *
 */
export class ScalarTransport {
  private buffer: Buffer = Buffer.alloc(0)
  private pending: PendingRead | null = null

  /**
   *
   * @param link - Must already be open; the transport does not own its lifecycle
   */
  constructor(private readonly link: ByteLink) {}

  /**
   * Append bytes delivered by the link. Wired to the link's 'data' event by the session.
   * @param data
   */
  receive(data: Buffer): void {
    this.buffer = this.buffer.length === 0 ? Buffer.from(data) : Buffer.concat([this.buffer, data])
    this.settlePending()
  }

  /**
   * Send one opcode with its payload as a single write.
   * @param opcode
   * @param payload
   */
  async write(opcode: string, ...payload: ScalarChunk[]): Promise<void> {
    if (!this.link.isOpen) {
      throw new SerialIOError('Link is not open')
    }
    await this.link.write(encodeCommand(opcode, ...payload))
  }

  /**
   * Read `count` values of `type`.
   * @param count
   * @param type
   * @param timeoutMs - 0 or omitted waits indefinitely
   * @throws TransportTimeoutError when the timeout elapses first
   */
  async read(count: number, type: ScalarType, timeoutMs = 0): Promise<number[]> {
    const data = await this.readBytes(count * scalarSize(type), timeoutMs)
    return decodeScalars(data, type)
  }

  /**
   * Bytes received and not yet consumed.
   */
  bytesAvailable(): number {
    return this.buffer.length
  }

  /**
   * Consume as many whole values as are buffered, without waiting.
   * @param type
   */
  readAvailable(type: ScalarType): number[] {
    if (this.pending) {
      throw new SerialIOError('A read is already pending on this transport')
    }
    const width = scalarSize(type)
    const usable = this.buffer.length - (this.buffer.length % width)
    if (usable === 0) {
      return []
    }
    return decodeScalars(this.take(usable), type)
  }

  /**
   * Drop everything buffered. Returns the number of bytes discarded.
   */
  discard(): number {
    const dropped = this.buffer.length
    this.buffer = Buffer.alloc(0)
    return dropped
  }

  /**
   * Reject an outstanding read, e.g. because the link went away.
   * @param error
   */
  abort(error: Error): void {
    const pending = this.pending
    if (!pending) {
      return
    }
    this.pending = null
    if (pending.timer) {
      clearTimeout(pending.timer)
    }
    pending.reject(error)
  }

  /**
   *
   * @param byteCount
   * @param timeoutMs
   */
  private readBytes(byteCount: number, timeoutMs: number): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new SerialIOError('A read is already pending on this transport'))
    }

    if (this.buffer.length >= byteCount) {
      return Promise.resolve(this.take(byteCount))
    }

    return new Promise<Buffer>((resolve, reject) => {
      const pending: PendingRead = { byteCount, resolve, reject, timer: null }
      if (timeoutMs > 0) {
        pending.timer = setTimeout(() => {
          if (this.pending === pending) {
            this.pending = null
            reject(
              new TransportTimeoutError(
                `Timed out after ${timeoutMs}ms waiting for ${byteCount} bytes (${this.buffer.length} available)`
              )
            )
          }
        }, timeoutMs)
      }
      this.pending = pending
    })
  }

  /**
   *
   */
  private settlePending(): void {
    const pending = this.pending
    if (!pending || this.buffer.length < pending.byteCount) {
      return
    }
    this.pending = null
    if (pending.timer) {
      clearTimeout(pending.timer)
    }
    pending.resolve(this.take(pending.byteCount))
  }

  /**
   *
   * @param byteCount
   */
  private take(byteCount: number): Buffer {
    const head = this.buffer.subarray(0, byteCount)
    this.buffer = this.buffer.subarray(byteCount)
    return head
  }
}
