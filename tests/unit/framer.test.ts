import { DEFAULT_MAX_FRAME_LENGTH, FramerMode, StreamFramer } from '../../src/core/framer'
import { createFrame } from '../../src/core/frame'
import { FramingError } from '../../src/core/types'

const WAKEUP = new Uint8Array([0xfa, 0xff, 0x3e, 0x00, 0xc3])
const NOISE = new Uint8Array([0x00, 0x13, 0x37, 0xab, 0x55])

function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0)
  const result = new Uint8Array(total)
  let offset = 0
  for (const part of parts) {
    result.set(part, offset)
    offset += part.length
  }
  return result
}

describe('StreamFramer', () => {
  describe('construction', () => {
    it('should default the frame ceiling', () => {
      expect(new StreamFramer().maxFrameLength).toBe(DEFAULT_MAX_FRAME_LENGTH)
      expect(DEFAULT_MAX_FRAME_LENGTH).toBe(1000)
    })

    it('should reject a ceiling below the minimum frame or not an integer', () => {
      expect(() => new StreamFramer({ maxFrameLength: 4 })).toThrow(RangeError)
      expect(() => new StreamFramer({ maxFrameLength: 5.5 })).toThrow(RangeError)
      expect(() => new StreamFramer({ maxFrameLength: 5 })).not.toThrow()
    })

    it('should start out seeking a preamble', () => {
      expect(new StreamFramer().state).toEqual({
        mode: FramerMode.SeekingPreamble,
        bufferedBytes: 0,
        expectedLength: 0,
      })
    })
  })

  describe('step', () => {
    it('should discard bytes until a preamble arrives', () => {
      const framer = new StreamFramer()
      for (const byte of NOISE) {
        expect(framer.step(byte)).toBeUndefined()
      }
      expect(framer.state.mode).toBe(FramerMode.SeekingPreamble)
      expect(framer.stats.discardedBytes).toBe(5)
    })

    it('should learn the expected length once four bytes are buffered', () => {
      const framer = new StreamFramer()
      framer.step(0xfa)
      expect(framer.state).toEqual({ mode: FramerMode.AccumulatingFrame, bufferedBytes: 1, expectedLength: 0 })

      framer.step(0x01)
      framer.step(0x36)
      expect(framer.state.expectedLength).toBe(0)

      framer.step(0x02)
      expect(framer.state).toEqual({ mode: FramerMode.AccumulatingFrame, bufferedBytes: 4, expectedLength: 7 })
    })

    it('should wait for both extended length bytes', () => {
      const framer = new StreamFramer()
      for (const byte of [0xfa, 0x01, 0x36, 0xff, 0x01]) {
        framer.step(byte)
      }
      expect(framer.state.expectedLength).toBe(0)

      framer.step(0x2c)
      expect(framer.state.expectedLength).toBe(307)
    })

    it('should return the frame on its last byte and go back to seeking', () => {
      const framer = new StreamFramer()
      const results = Array.from(WAKEUP, (byte) => framer.step(byte))

      expect(results.slice(0, 4)).toEqual([undefined, undefined, undefined, undefined])
      expect(Array.from(results[4] ?? [])).toEqual(Array.from(WAKEUP))
      expect(framer.state.mode).toBe(FramerMode.SeekingPreamble)
      expect(framer.stats.frames).toBe(1)
    })

    it('should not look for a preamble inside a frame', () => {
      const frame = createFrame(0x01, 0x36, new Uint8Array([0xfa, 0xfa, 0x00]))
      const frames = new StreamFramer().push(frame)

      expect(frames).toHaveLength(1)
      expect(Array.from(frames[0])).toEqual(Array.from(frame))
    })
  })

  describe('push', () => {
    it('should find two frames around noise with no intervention', () => {
      const first = createFrame(0x01, 0x36, new Uint8Array([0x10, 0x20, 0x02, 0x0b, 0x0a]))
      const second = createFrame(0x01, 0x42, new Uint8Array([0x04]))
      const framer = new StreamFramer()

      const frames = framer.push(concat(first, NOISE, second))

      expect(frames.map((frame) => Array.from(frame))).toEqual([Array.from(first), Array.from(second)])
      expect(framer.stats).toEqual({ frames: 2, discardedBytes: 5, framingErrors: 0 })
    })

    it('should assemble a frame split across chunks', () => {
      const frame = createFrame(0x01, 0x36, new Uint8Array(40))
      const framer = new StreamFramer()

      expect(framer.push(frame.subarray(0, 3))).toEqual([])
      expect(framer.push(frame.subarray(3, 20))).toEqual([])
      const frames = framer.push(frame.subarray(20))

      expect(frames).toHaveLength(1)
      expect(Array.from(frames[0])).toEqual(Array.from(frame))
    })

    it('should accept an extended length frame under the ceiling', () => {
      const frame = createFrame(0x01, 0x36, new Uint8Array(300))
      const frames = new StreamFramer().push(frame)

      expect(frames).toHaveLength(1)
      expect(frames[0].length).toBe(307)
    })

    it('should return frames that do not change with later input', () => {
      const framer = new StreamFramer()
      const [frame] = framer.push(WAKEUP)
      framer.push(new Uint8Array([0xfa, 0x01, 0x02, 0x03]))

      expect(Array.from(frame)).toEqual(Array.from(WAKEUP))
    })
  })

  describe('framing errors', () => {
    it('should abort a frame whose length exceeds the ceiling', () => {
      const errors: FramingError[] = []
      const framer = new StreamFramer({ maxFrameLength: 10, onFramingError: (error) => errors.push(error) })

      const frames = framer.push(createFrame(0x01, 0x36, new Uint8Array(20)))

      expect(frames).toEqual([])
      expect(errors).toEqual([{ reason: 'length-out-of-bounds', bufferedBytes: 4, expectedLength: 25 }])
      // 4 buffered header bytes, then 20 payload bytes and the checksum while seeking
      expect(framer.stats).toEqual({ frames: 0, discardedBytes: 25, framingErrors: 1 })
    })

    it('should abort an extended length frame over the ceiling', () => {
      const errors: FramingError[] = []
      const framer = new StreamFramer({ maxFrameLength: 100, onFramingError: (error) => errors.push(error) })

      framer.push(createFrame(0x01, 0x36, new Uint8Array(300)))

      expect(errors).toEqual([{ reason: 'length-out-of-bounds', bufferedBytes: 6, expectedLength: 307 }])
      expect(framer.stats).toEqual({ frames: 0, discardedBytes: 307, framingErrors: 1 })
    })

    it('should resynchronise on the next frame after an abort', () => {
      const framer = new StreamFramer({ maxFrameLength: 10 })
      const frames = framer.push(concat(createFrame(0x01, 0x36, new Uint8Array(20)), WAKEUP))

      expect(frames.map((frame) => Array.from(frame))).toEqual([Array.from(WAKEUP)])
    })

    it('should count every byte of a stream that never yields a frame', () => {
      const stream = new Uint8Array([0x13, ...createFrame(0x01, 0x36, new Uint8Array(20)), 0x37])
      const framer = new StreamFramer({ maxFrameLength: 10 })

      framer.push(stream)

      expect(framer.stats.discardedBytes).toBe(stream.length)
    })

    it('should work without an error callback', () => {
      const framer = new StreamFramer({ maxFrameLength: 10 })
      expect(() => framer.push(createFrame(0x01, 0x36, new Uint8Array(20)))).not.toThrow()
      expect(framer.stats.framingErrors).toBe(1)
    })
  })

  describe('reset', () => {
    it('should drop a partial frame', () => {
      const framer = new StreamFramer()
      framer.push(new Uint8Array([0xfa, 0x01, 0x36, 0x02, 0x10]))
      expect(framer.state.bufferedBytes).toBe(5)

      framer.reset()
      expect(framer.state).toEqual({ mode: FramerMode.SeekingPreamble, bufferedBytes: 0, expectedLength: 0 })
      expect(framer.push(WAKEUP)).toHaveLength(1)
    })
  })
})
