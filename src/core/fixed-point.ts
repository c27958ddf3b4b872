// 48-bit fixed-point (16.32) conversion
//
// Wire layout, big-endian: fractional part (u32) then integer part (i16, two's complement).
// The represented value is ((integer << 32) | fractional) / 2^32.

export const FIXED1632_SIZE = 6

const TWO_POW_32 = 4294967296

export const FIXED1632_MIN = -32768
export const FIXED1632_MAX = 32768 - 1 / TWO_POW_32

/**
 * Read a 16.32 value at `offset`
 */
export function readFixed1632(view: DataView, offset: number): number {
  if (offset < 0 || offset + FIXED1632_SIZE > view.byteLength) {
    throw new RangeError(
      `Fixed-point value needs ${FIXED1632_SIZE} bytes at offset ${offset}, buffer has ${view.byteLength}`
    )
  }

  const fractional = BigInt(view.getUint32(offset))
  const integer = BigInt(view.getInt16(offset + 4))
  const fixed = (integer << 32n) | fractional

  return Number(fixed) / TWO_POW_32
}

export function decodeFixed1632(bytes: Uint8Array, offset = 0): number {
  return readFixed1632(new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength), offset)
}

/**
 * Scale a value to its 48-bit two's complement integer, rounding half away from zero.
 * Values outside the representable range are rejected rather than wrapped.
 */
export function toFixed1632(value: number): bigint {
  if (!Number.isFinite(value) || value < FIXED1632_MIN || value > FIXED1632_MAX) {
    throw new RangeError(
      `Value ${value} is outside the 16.32 fixed-point range [${FIXED1632_MIN}, ${FIXED1632_MAX}]`
    )
  }

  const scaled = value * TWO_POW_32
  return BigInt(scaled < 0 ? -Math.round(-scaled) : Math.round(scaled))
}

/**
 * Write a 16.32 value at `offset`
 */
export function writeFixed1632(view: DataView, offset: number, value: number): void {
  const fixed = toFixed1632(value)
  view.setUint32(offset, Number(BigInt.asUintN(32, fixed)))
  view.setInt16(offset + 4, Number(BigInt.asIntN(16, fixed >> 32n)))
}

export function encodeFixed1632(value: number): Uint8Array {
  const bytes = new Uint8Array(FIXED1632_SIZE)
  writeFixed1632(new DataView(bytes.buffer), 0, value)
  return bytes
}
