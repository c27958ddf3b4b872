// Accumulation buffer for a frame being assembled byte by byte
const DEFAULT_BUFFER_SIZE = 256

/**
 * Growable byte buffer owned by a single framer.
 * Storage is reused across frames; completed frames leave it as copies.
 */
export class StreamBuffer {
  private buffer: Uint8Array
  private bufferEnd = 0

  constructor(initialSize: number = DEFAULT_BUFFER_SIZE) {
    this.buffer = new Uint8Array(Math.max(1, initialSize))
  }

  /**
   * Append one byte, growing if necessary
   */
  push(byte: number): void {
    if (this.bufferEnd === this.buffer.length) {
      const newBuffer = new Uint8Array(this.buffer.length * 2)
      newBuffer.set(this.buffer)
      this.buffer = newBuffer
    }
    this.buffer[this.bufferEnd++] = byte
  }

  /**
   * Get current buffer contents as a view. The view is invalidated by the next push or reset.
   */
  getContents(): Uint8Array {
    return this.buffer.subarray(0, this.bufferEnd)
  }

  /**
   * Copy of the current contents, independent of the buffer
   */
  snapshot(): Uint8Array {
    return this.buffer.slice(0, this.bufferEnd)
  }

  /**
   * Clear the buffer
   */
  reset(): void {
    this.bufferEnd = 0
  }

  /**
   * Get current buffer length
   */
  get length(): number {
    return this.bufferEnd
  }
}
