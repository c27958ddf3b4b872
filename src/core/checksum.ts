// Frame checksum: an 8-bit modular sum over everything after the preamble

/**
 * Checksum calculator for frames. A valid frame sums to zero (mod 256) over
 * bytes 1..n-1, the preamble at byte 0 is excluded.
 */
export class FrameChecksum {
  /**
   * Sum of `data[start..end)` modulo 256
   */
  static sum(data: Uint8Array, start = 0, end: number = data.length): number {
    let sum = 0
    for (let i = start; i < end; i++) {
      sum = (sum + data[i]) & 0xff
    }
    return sum
  }

  /**
   * Calculate the checksum byte for the given header and payload bytes
   * @param data Frame bytes from the bus id up to, not including, the checksum slot
   * @returns The byte that brings the total to zero modulo 256
   */
  static calculate(data: Uint8Array): number {
    return (0x100 - this.sum(data)) & 0xff
  }

  /**
   * Write the checksum into the last byte of a complete frame buffer
   */
  static insert(frame: Uint8Array): void {
    if (frame.length < 2) {
      throw new RangeError(`Frame of ${frame.length} bytes has no room for a checksum`)
    }
    frame[frame.length - 1] = this.calculate(frame.subarray(1, frame.length - 1))
  }

  /**
   * Validate a received frame
   * @returns true if bytes 1..n-1 sum to zero modulo 256
   */
  static verify(frame: Uint8Array): boolean {
    if (frame.length < 2) {
      return false
    }
    return this.sum(frame, 1) === 0
  }
}
