/**
 * Fixed-width scalar codec for the Frame2TTL wire format.
 *
 * All multi-byte values are little-endian, matching the microcontroller.
 */

export type ScalarType = 'uint8' | 'int16' | 'uint16' | 'int32' | 'uint32'

interface ScalarSpec {
  bytes: number
  min: number
  max: number
  write: (buffer: Buffer, value: number, offset: number) => number
  read: (buffer: Buffer, offset: number) => number
}

const SCALAR_SPECS: Record<ScalarType, ScalarSpec> = {
  uint8: {
    bytes: 1,
    min: 0,
    max: 0xff,
    write: (buffer, value, offset) => buffer.writeUInt8(value, offset),
    read: (buffer, offset) => buffer.readUInt8(offset),
  },
  int16: {
    bytes: 2,
    min: -0x8000,
    max: 0x7fff,
    write: (buffer, value, offset) => buffer.writeInt16LE(value, offset),
    read: (buffer, offset) => buffer.readInt16LE(offset),
  },
  uint16: {
    bytes: 2,
    min: 0,
    max: 0xffff,
    write: (buffer, value, offset) => buffer.writeUInt16LE(value, offset),
    read: (buffer, offset) => buffer.readUInt16LE(offset),
  },
  int32: {
    bytes: 4,
    min: -0x80000000,
    max: 0x7fffffff,
    write: (buffer, value, offset) => buffer.writeInt32LE(value, offset),
    read: (buffer, offset) => buffer.readInt32LE(offset),
  },
  uint32: {
    bytes: 4,
    min: 0,
    max: 0xffffffff,
    write: (buffer, value, offset) => buffer.writeUInt32LE(value, offset),
    read: (buffer, offset) => buffer.readUInt32LE(offset),
  },
}

/**
 * One typed run of values inside a command.
 */
export interface ScalarChunk {
  type: ScalarType
  values: number | readonly number[]
}

/**
 * Width of a single value of the given type, in bytes.
 * @param type
 */
export function scalarSize(type: ScalarType): number {
  return SCALAR_SPECS[type].bytes
}

/**
 * Whether `value` is an integer representable in `type`.
 * @param value
 * @param type
 */
export function fitsScalar(value: number, type: ScalarType): boolean {
  const spec = SCALAR_SPECS[type]
  return Number.isInteger(value) && value >= spec.min && value <= spec.max
}

/**
 * Inclusive bounds of `type`.
 * @param type
 */
export function scalarRange(type: ScalarType): { min: number; max: number } {
  const { min, max } = SCALAR_SPECS[type]
  return { min, max }
}

/**
 * Encode values into a little-endian buffer.
 * @param values
 * @param type
 * @throws RangeError if a value is not an integer within the type's range
 */
export function encodeScalars(values: number | readonly number[], type: ScalarType): Buffer {
  const list = typeof values === 'number' ? [values] : values
  const spec = SCALAR_SPECS[type]
  const buffer = Buffer.alloc(list.length * spec.bytes)

  list.forEach((value, index) => {
    if (!fitsScalar(value, type)) {
      throw new RangeError(`Value ${value} does not fit ${type} [${spec.min}, ${spec.max}]`)
    }
    spec.write(buffer, value, index * spec.bytes)
  })

  return buffer
}

/**
 * Decode a buffer holding a whole number of values.
 * @param buffer
 * @param type
 * @throws RangeError if the length is not a multiple of the type's width
 */
export function decodeScalars(buffer: Buffer, type: ScalarType): number[] {
  const spec = SCALAR_SPECS[type]
  if (buffer.length % spec.bytes !== 0) {
    throw new RangeError(`Cannot decode ${buffer.length} bytes as ${type} (width ${spec.bytes})`)
  }

  const values: number[] = []
  for (let offset = 0; offset < buffer.length; offset += spec.bytes) {
    values.push(spec.read(buffer, offset))
  }
  return values
}

/**
 * Build a single write: the opcode byte followed by each payload chunk in order.
 * @param opcode - Single ASCII character
 * @param payload
 */
export function encodeCommand(opcode: string, ...payload: ScalarChunk[]): Buffer {
  if (opcode.length !== 1 || opcode.charCodeAt(0) > 0x7f) {
    throw new RangeError(`Opcode must be a single ASCII character, got '${opcode}'`)
  }

  const parts = [Buffer.from(opcode, 'ascii'), ...payload.map((chunk) => encodeScalars(chunk.values, chunk.type))]
  return Buffer.concat(parts)
}
