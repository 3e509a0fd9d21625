import { SerialPort } from 'serialport'
import { beforeEach, describe, expect, it, vi } from 'vitest'

import { SerialIOError } from '../src/services/frame2ttl-protocol'
import { listSerialPorts, makeSerialUri, SerialLink } from '../src/services/link/serial'

// ============================================================================
// serialport stand-in
// ============================================================================

interface FakePortOptions {
  path: string
  baudRate: number
  autoOpen?: boolean
}

interface FakePortHandle {
  readonly options: FakePortOptions
  isOpen: boolean
  readonly writes: Buffer[]
  emit(event: string | symbol, ...args: unknown[]): boolean
}

interface FakeSerialState {
  ports: FakePortHandle[]
  openError: Error | null
}

const fake = vi.hoisted((): FakeSerialState => ({ ports: [], openError: null }))

vi.mock('serialport', async () => {
  const { EventEmitter } = await import('events')

  class FakeSerialPort extends EventEmitter implements FakePortHandle {
    static list = vi.fn()
    isOpen = false
    readonly writes: Buffer[] = []

    constructor(readonly options: FakePortOptions) {
      super()
      fake.ports.push(this)
    }

    open(callback: (error: Error | null) => void): void {
      const error = fake.openError
      this.isOpen = error === null
      queueMicrotask(() => callback(error))
    }

    close(callback: (error: Error | null) => void): void {
      this.isOpen = false
      this.emit('close')
      queueMicrotask(() => callback(null))
    }

    write(data: Buffer, callback: (error: Error | null) => void): boolean {
      this.writes.push(Buffer.from(data))
      queueMicrotask(() => callback(null))
      return true
    }

    drain(callback: (error: Error | null) => void): void {
      queueMicrotask(() => callback(null))
    }
  }

  return { SerialPort: FakeSerialPort }
})

type PortInfo = Awaited<ReturnType<typeof SerialPort.list>>[number]

/**
 *
 * @param path
 * @param fields
 */
function portInfo(path: string, fields: Partial<PortInfo> = {}): PortInfo {
  return {
    path,
    manufacturer: undefined,
    serialNumber: undefined,
    pnpId: undefined,
    locationId: undefined,
    productId: undefined,
    vendorId: undefined,
    ...fields,
  }
}

/**
 *
 */
function lastPort(): FakePortHandle {
  const port = fake.ports[fake.ports.length - 1]
  if (!port) {
    throw new Error('No port created yet')
  }
  return port
}

// ============================================================================
// SerialLink
// ============================================================================

describe('SerialLink', () => {
  beforeEach(() => {
    fake.ports.length = 0
    fake.openError = null
  })

  describe('URI parsing', () => {
    it('should take the path and baud rate from a Unix device URI', () => {
      const link = new SerialLink(makeSerialUri('/dev/ttyACM0', 12000000))

      expect(link.path).toBe('/dev/ttyACM0')
      expect(link.baudRate).toBe(12000000)
    })

    it('should accept a Windows COM port', () => {
      const link = new SerialLink(new URL('serial:COM3?baudrate=115200'))

      expect(link.path).toBe('COM3')
      expect(link.baudRate).toBe(115200)
    })

    it.each([
      ['a missing baudrate', 'serial:/dev/ttyACM0'],
      ['a non-numeric baudrate', 'serial:/dev/ttyACM0?baudrate=abc'],
      ['a zero baudrate', 'serial:/dev/ttyACM0?baudrate=0'],
      ['an empty path', 'serial:?baudrate=9600'],
      ['another protocol', 'tcp://localhost:5000?baudrate=9600'],
    ])('should reject %s', (_label, uri) => {
      expect(() => new SerialLink(new URL(uri))).toThrow(SerialIOError)
    })
  })

  it('should open the port on demand with the parsed settings', async () => {
    const link = new SerialLink(makeSerialUri('/dev/ttyACM0', 12000000))

    expect(link.isOpen).toBe(false)
    await link.open()

    expect(lastPort().options).toEqual({ path: '/dev/ttyACM0', baudRate: 12000000, autoOpen: false })
    expect(link.isOpen).toBe(true)
  })

  it('should reject when the port cannot be opened', async () => {
    fake.openError = new Error('Access denied')
    const link = new SerialLink(makeSerialUri('/dev/ttyACM0', 9600))

    await expect(link.open()).rejects.toThrow('Access denied')
    expect(link.isOpen).toBe(false)
  })

  it('should forward incoming data', async () => {
    const link = new SerialLink(makeSerialUri('/dev/ttyACM0', 9600))
    const received: Buffer[] = []
    link.on('data', (data: Buffer) => received.push(data))
    await link.open()

    lastPort().emit('data', Buffer.from([0xda]))

    expect(received).toEqual([Buffer.from([0xda])])
  })

  it('should emit close when the port goes away on its own', async () => {
    const link = new SerialLink(makeSerialUri('/dev/ttyACM0', 9600))
    const onClose = vi.fn()
    link.on('close', onClose)
    await link.open()

    lastPort().isOpen = false
    lastPort().emit('close')

    expect(onClose).toHaveBeenCalledTimes(1)
    expect(link.isOpen).toBe(false)
  })

  it('should not emit close when closed deliberately', async () => {
    const link = new SerialLink(makeSerialUri('/dev/ttyACM0', 9600))
    const onClose = vi.fn()
    link.on('close', onClose)
    await link.open()

    await link.close()

    expect(onClose).not.toHaveBeenCalled()
    expect(link.isOpen).toBe(false)
    expect(lastPort().isOpen).toBe(false)
  })

  it('should write and drain through the port', async () => {
    const link = new SerialLink(makeSerialUri('/dev/ttyACM0', 9600))
    await link.open()

    await link.write(Buffer.from([0x43]))

    expect(lastPort().writes).toEqual([Buffer.from([0x43])])
  })

  it('should refuse writes while closed', async () => {
    const link = new SerialLink(makeSerialUri('/dev/ttyACM0', 9600))

    await expect(link.write(Buffer.from([0x43]))).rejects.toThrow(SerialIOError)
  })
})

// ============================================================================
// Port listing
// ============================================================================

describe('listSerialPorts', () => {
  beforeEach(() => {
    vi.mocked(SerialPort.list).mockReset()
  })

  it('should flag boards by PJRC vendor id, ttyACM and usbmodem paths', async () => {
    vi.mocked(SerialPort.list).mockResolvedValue([
      portInfo('COM4', { vendorId: '16C0', productId: '0483', manufacturer: 'Teensyduino' }),
      portInfo('/dev/ttyACM0'),
      portInfo('/dev/cu.usbmodem14101'),
      portInfo('/dev/ttyUSB0', { vendorId: '0403', serialNumber: 'FT1234' }),
    ])

    const ports = await listSerialPorts()

    expect(ports.map((port) => [port.path, port.isLikelyFrame2TTL])).toEqual([
      ['COM4', true],
      ['/dev/ttyACM0', true],
      ['/dev/cu.usbmodem14101', true],
      ['/dev/ttyUSB0', false],
    ])
    expect(ports[0]).toEqual({
      path: 'COM4',
      manufacturer: 'Teensyduino',
      serialNumber: null,
      vendorId: '16C0',
      productId: '0483',
      isLikelyFrame2TTL: true,
    })
    expect(ports[3].serialNumber).toBe('FT1234')
  })

  it('should return an empty list when no ports exist', async () => {
    vi.mocked(SerialPort.list).mockResolvedValue([])

    await expect(listSerialPorts()).resolves.toEqual([])
  })
})
