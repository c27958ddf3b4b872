// Field encoding and decoding for telemetry records (all big-endian)
import { readFixed1632, writeFixed1632, FIXED1632_SIZE } from './fixed-point'

export type WireType = 'uint8' | 'uint16' | 'uint32' | 'float32' | 'fixed1632'

/**
 * Get the size of a single wire type in bytes
 */
export function getTypeSize(type: WireType): number {
  switch (type) {
    case 'uint8':
      return 1
    case 'uint16':
      return 2
    case 'uint32':
    case 'float32':
      return 4
    case 'fixed1632':
      return FIXED1632_SIZE
  }
}

/**
 * Decode a single value from a DataView
 */
export function decodeSingleValue(view: DataView, offset: number, type: WireType): number {
  switch (type) {
    case 'uint8':
      return view.getUint8(offset)
    case 'uint16':
      return view.getUint16(offset)
    case 'uint32':
      return view.getUint32(offset)
    case 'float32':
      return view.getFloat32(offset)
    case 'fixed1632':
      return readFixed1632(view, offset)
  }
}

/**
 * Decode `count` consecutive values of one type
 */
export function decodeValues(view: DataView, offset: number, type: WireType, count: number): number[] {
  const size = getTypeSize(type)
  const values: number[] = []
  for (let i = 0; i < count; i++) {
    values.push(decodeSingleValue(view, offset + i * size, type))
  }
  return values
}

/**
 * Encode a single value to a DataView
 * @returns Bytes written
 */
export function encodeSingleValue(view: DataView, offset: number, type: WireType, value: number): number {
  switch (type) {
    case 'uint8':
      view.setUint8(offset, value)
      return 1
    case 'uint16':
      view.setUint16(offset, value)
      return 2
    case 'uint32':
      view.setUint32(offset, value)
      return 4
    case 'float32':
      view.setFloat32(offset, value)
      return 4
    case 'fixed1632':
      writeFixed1632(view, offset, value)
      return FIXED1632_SIZE
  }
}

/**
 * Encode consecutive values of one type
 * @returns Bytes written
 */
export function encodeValues(view: DataView, offset: number, type: WireType, values: readonly number[]): number {
  let written = 0
  for (const value of values) {
    written += encodeSingleValue(view, offset + written, type, value)
  }
  return written
}

/**
 * DataView over exactly the bytes of `data`
 */
export function viewOf(data: Uint8Array): DataView {
  return new DataView(data.buffer, data.byteOffset, data.byteLength)
}
