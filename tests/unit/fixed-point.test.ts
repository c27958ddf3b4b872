import {
  FIXED1632_MAX,
  FIXED1632_MIN,
  FIXED1632_SIZE,
  decodeFixed1632,
  encodeFixed1632,
  readFixed1632,
  toFixed1632,
} from '../../src/core/fixed-point'

describe('16.32 fixed-point', () => {
  describe('decoding', () => {
    it('should decode fractional part first, then the integer part', () => {
      const bytes = new Uint8Array([0x64, 0xa6, 0x8a, 0xa8, 0x00, 0x1f])
      expect(Math.abs(decodeFixed1632(bytes) - 31.393166223541)).toBeLessThan(1e-12)
    })

    it('should treat the integer part as two\'s complement', () => {
      expect(decodeFixed1632(new Uint8Array([0x00, 0x00, 0x00, 0x00, 0xff, 0xff]))).toBe(-1)
      expect(decodeFixed1632(new Uint8Array([0x80, 0x00, 0x00, 0x00, 0xff, 0xff]))).toBe(-0.5)
      expect(decodeFixed1632(new Uint8Array([0x00, 0x00, 0x00, 0x00, 0x80, 0x00]))).toBe(-32768)
    })

    it('should decode at an offset', () => {
      const bytes = new Uint8Array([0xaa, 0xbb, 0x80, 0x00, 0x00, 0x00, 0x00, 0x02])
      expect(decodeFixed1632(bytes, 2)).toBe(2.5)
    })

    it('should reject a buffer shorter than six bytes', () => {
      const view = new DataView(new ArrayBuffer(5))
      expect(() => readFixed1632(view, 0)).toThrow(RangeError)
      expect(() => decodeFixed1632(new Uint8Array(8), 3)).toThrow(RangeError)
    })
  })

  describe('encoding', () => {
    it('should produce six bytes', () => {
      expect(encodeFixed1632(1).length).toBe(FIXED1632_SIZE)
    })

    it('should encode known values bit-exactly', () => {
      expect(Array.from(encodeFixed1632(31.393166223541))).toEqual([0x64, 0xa6, 0x8a, 0xa8, 0x00, 0x1f])
      expect(Array.from(encodeFixed1632(121.229738174938))).toEqual([0x3a, 0xd0, 0x1e, 0xfc, 0x00, 0x79])
      expect(Array.from(encodeFixed1632(-0.021542994305))).toEqual([0xfa, 0x7c, 0x28, 0x88, 0xff, 0xff])
      expect(Array.from(encodeFixed1632(-1))).toEqual([0x00, 0x00, 0x00, 0x00, 0xff, 0xff])
      expect(Array.from(encodeFixed1632(0.5))).toEqual([0x80, 0x00, 0x00, 0x00, 0x00, 0x00])
    })

    it('should round half away from zero', () => {
      const halfStep = 1 / 2 ** 33
      expect(toFixed1632(halfStep)).toBe(1n)
      expect(toFixed1632(-halfStep)).toBe(-1n)
      expect(toFixed1632(halfStep / 2)).toBe(0n)
    })

    it('should accept both ends of the range', () => {
      expect(Array.from(encodeFixed1632(FIXED1632_MIN))).toEqual([0x00, 0x00, 0x00, 0x00, 0x80, 0x00])
      expect(Array.from(encodeFixed1632(FIXED1632_MAX))).toEqual([0xff, 0xff, 0xff, 0xff, 0x7f, 0xff])
    })

    it('should reject values that cannot be represented', () => {
      expect(() => encodeFixed1632(32768)).toThrow(RangeError)
      expect(() => encodeFixed1632(-32768.5)).toThrow(RangeError)
      expect(() => encodeFixed1632(Number.NaN)).toThrow(RangeError)
      expect(() => encodeFixed1632(Number.POSITIVE_INFINITY)).toThrow(RangeError)
    })
  })

  describe('round trip', () => {
    const values = [0.0, 1.0, -1.0, 0.1, 0.2, 0.3, 31.393166223541, 121.229738174938, -0.021542994305]

    it.each(values)('should recover %p within one part in 1e9', (value) => {
      expect(Math.abs(decodeFixed1632(encodeFixed1632(value)) - value)).toBeLessThan(1e-9)
    })
  })
})
