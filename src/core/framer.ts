// Byte-stream framer - finds frame boundaries in an unstructured byte stream
import { FramingError, FramingErrorReason } from './types'
import { FRAME_HEADER_SIZE, FRAME_PREAMBLE, MIN_FRAME_LENGTH, getRawLength } from './frame'
import { StreamBuffer } from './stream-buffer'

export const DEFAULT_MAX_FRAME_LENGTH = 1000

export enum FramerMode {
  SeekingPreamble = 'seeking-preamble',
  AccumulatingFrame = 'accumulating-frame',
}

export interface FramerOptions {
  /** Largest total frame accepted, preamble to checksum */
  maxFrameLength?: number
  /** Called each time the framer gives up on a frame and resynchronises */
  onFramingError?: (error: FramingError) => void
}

export interface FramerState {
  mode: FramerMode
  bufferedBytes: number
  /** 0 while unknown */
  expectedLength: number
}

export interface FramerStats {
  frames: number
  /** Bytes skipped while seeking plus bytes of aborted frames */
  discardedBytes: number
  framingErrors: number
}

/**
 * State machine that consumes one byte at a time and returns each frame as soon as its
 * last byte arrives. Frames are complete but unverified; checksum and envelope checks
 * happen downstream.
 *
 * ```ts
 * const framer = new StreamFramer({ maxFrameLength: 512 })
 * for (const byte of chunk) {
 *   const frame = framer.step(byte)
 *   if (frame) handle(frame)
 * }
 * ```
 */
export class StreamFramer {
  readonly maxFrameLength: number

  private mode = FramerMode.SeekingPreamble
  private expectedLength = 0
  private readonly buffer: StreamBuffer
  private readonly onFramingError?: (error: FramingError) => void
  private counters: FramerStats = { frames: 0, discardedBytes: 0, framingErrors: 0 }

  constructor(options: FramerOptions = {}) {
    const maxFrameLength = options.maxFrameLength ?? DEFAULT_MAX_FRAME_LENGTH
    if (!Number.isInteger(maxFrameLength) || maxFrameLength < MIN_FRAME_LENGTH) {
      throw new RangeError(
        `maxFrameLength must be an integer of at least ${MIN_FRAME_LENGTH}, got ${maxFrameLength}`
      )
    }

    this.maxFrameLength = maxFrameLength
    this.onFramingError = options.onFramingError
    this.buffer = new StreamBuffer(Math.min(maxFrameLength + 1, 256))
  }

  /**
   * Advance the state machine by one byte
   * @returns The completed frame when this byte finishes one, otherwise undefined
   */
  step(byte: number): Uint8Array | undefined {
    const value = byte & 0xff

    if (this.mode === FramerMode.SeekingPreamble) {
      if (value === FRAME_PREAMBLE) {
        this.buffer.reset()
        this.buffer.push(value)
        this.mode = FramerMode.AccumulatingFrame
        this.expectedLength = 0
      } else {
        this.counters.discardedBytes++
      }
      return undefined
    }

    this.buffer.push(value)

    if (this.expectedLength === 0 && this.buffer.length >= FRAME_HEADER_SIZE) {
      // Stays undefined for an extended header until both length bytes are in
      const rawLength = getRawLength(this.buffer.getContents())
      if (rawLength !== undefined) {
        if (rawLength < MIN_FRAME_LENGTH || rawLength > this.maxFrameLength) {
          this.abort('length-out-of-bounds', rawLength)
          return undefined
        }
        this.expectedLength = rawLength
      }
    }

    if (this.expectedLength > 0 && this.buffer.length >= this.expectedLength) {
      const frame = this.buffer.snapshot()
      this.counters.frames++
      this.resync()
      return frame
    }

    if (this.buffer.length > this.maxFrameLength) {
      this.abort('overflow')
    }

    return undefined
  }

  /**
   * Feed a chunk of bytes
   * @returns Frames completed by this chunk, in stream order
   */
  push(data: Uint8Array): Uint8Array[] {
    const frames: Uint8Array[] = []
    for (let i = 0; i < data.length; i++) {
      const frame = this.step(data[i])
      if (frame) {
        frames.push(frame)
      }
    }
    return frames
  }

  /**
   * Drop any partial frame and seek the next preamble
   */
  reset(): void {
    this.resync()
  }

  get state(): FramerState {
    return {
      mode: this.mode,
      bufferedBytes: this.mode === FramerMode.AccumulatingFrame ? this.buffer.length : 0,
      expectedLength: this.expectedLength,
    }
  }

  get stats(): FramerStats {
    return { ...this.counters }
  }

  private abort(reason: FramingErrorReason, expectedLength?: number): void {
    const error: FramingError = { reason, bufferedBytes: this.buffer.length }
    if (expectedLength !== undefined) {
      error.expectedLength = expectedLength
    }
    this.counters.framingErrors++
    this.counters.discardedBytes += this.buffer.length
    this.resync()
    this.onFramingError?.(error)
  }

  private resync(): void {
    this.mode = FramerMode.SeekingPreamble
    this.expectedLength = 0
    this.buffer.reset()
  }
}
