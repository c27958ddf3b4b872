// Frame envelope - header, length field and checksum around a payload
import { EnvelopeResult, OutboundMessage } from './types';
import { FrameChecksum } from './checksum';

/**
 * Protocol constants
 */
export const FRAME_PREAMBLE = 0xfa;
export const MASTER_BUS_ID = 0xff;
export const LENGTH_EXTENDER = 0xff;

export const OFFSET_TO_PREAMBLE = 0;
export const OFFSET_TO_BUS_ID = 1;
export const OFFSET_TO_MESSAGE_ID = 2;
export const OFFSET_TO_LENGTH = 3;
export const OFFSET_TO_EXTENDED_LENGTH = 4;
export const OFFSET_TO_PAYLOAD = 4;
export const OFFSET_TO_PAYLOAD_EXTENDED = 6;

/**
 * Frame sizes
 */
export const FRAME_HEADER_SIZE = 4; // preamble(1) + bus(1) + msgid(1) + len(1)
export const FRAME_EXTENDED_HEADER_SIZE = 6; // ... + extended len(2)
export const FRAME_CHECKSUM_SIZE = 1;
export const MIN_FRAME_LENGTH = FRAME_HEADER_SIZE + FRAME_CHECKSUM_SIZE;
export const MAX_PAYLOAD_LENGTH = 0xffff;

/**
 * Whether the header uses the three-byte length form. Needs at least four bytes.
 */
export function hasExtendedLength(frame: Uint8Array): boolean {
  return frame.length > OFFSET_TO_LENGTH && frame[OFFSET_TO_LENGTH] === LENGTH_EXTENDER;
}

/**
 * Payload length declared by a frame header
 * @returns undefined while the buffer is too short to resolve the length
 */
export function getPayloadLength(frame: Uint8Array): number | undefined {
  if (frame.length < FRAME_HEADER_SIZE) {
    return undefined;
  }

  const length = frame[OFFSET_TO_LENGTH];
  if (length !== LENGTH_EXTENDER) {
    return length;
  }

  if (frame.length < FRAME_EXTENDED_HEADER_SIZE) {
    return undefined;
  }
  return (frame[OFFSET_TO_EXTENDED_LENGTH] << 8) | frame[OFFSET_TO_EXTENDED_LENGTH + 1];
}

/**
 * Total frame length, preamble to checksum, declared by a frame header
 * @returns undefined while the buffer is too short to resolve the length
 */
export function getRawLength(frame: Uint8Array): number | undefined {
  const payloadLength = getPayloadLength(frame);
  if (payloadLength === undefined) {
    return undefined;
  }
  const headerSize = hasExtendedLength(frame) ? FRAME_EXTENDED_HEADER_SIZE : FRAME_HEADER_SIZE;
  return headerSize + payloadLength + FRAME_CHECKSUM_SIZE;
}

/**
 * Decode the envelope of a complete frame
 * @param frame Bytes starting at the preamble; trailing bytes past the frame are ignored
 * @returns The envelope, with the payload as a view into `frame`, or the reason it is invalid
 */
export function decodeEnvelope(frame: Uint8Array): EnvelopeResult {
  if (frame.length < MIN_FRAME_LENGTH) {
    return { ok: false, error: 'too-short' };
  }

  if (frame[OFFSET_TO_PREAMBLE] !== FRAME_PREAMBLE) {
    return { ok: false, error: 'bad-preamble' };
  }

  const extendedLength = hasExtendedLength(frame);
  if (extendedLength && frame.length < FRAME_EXTENDED_HEADER_SIZE + FRAME_CHECKSUM_SIZE) {
    return { ok: false, error: 'too-short' };
  }

  const payloadLength = getPayloadLength(frame);
  const rawLength = getRawLength(frame);
  if (payloadLength === undefined || rawLength === undefined) {
    return { ok: false, error: 'too-short' };
  }

  if (frame.length < rawLength) {
    return { ok: false, error: 'truncated' };
  }

  const payloadOffset = extendedLength ? OFFSET_TO_PAYLOAD_EXTENDED : OFFSET_TO_PAYLOAD;

  return {
    ok: true,
    envelope: {
      busId: frame[OFFSET_TO_BUS_ID],
      messageId: frame[OFFSET_TO_MESSAGE_ID],
      payload: frame.subarray(payloadOffset, payloadOffset + payloadLength),
      rawLength,
      extendedLength,
    },
  };
}

function assertByte(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new RangeError(`${name} must be a single byte, got ${value}`);
  }
}

/**
 * Create a frame skeleton with header fields set and a zeroed payload and checksum.
 * Fill the payload through `getPayloadView`, then call `FrameChecksum.insert`.
 * @param busId Bus ID
 * @param messageId Message ID
 * @param payloadLength Payload length; 255 and above use the extended length form
 * @returns Buffer of exactly the raw frame length
 */
export function encodeEnvelope(busId: number, messageId: number, payloadLength: number): Uint8Array {
  assertByte('Bus ID', busId);
  assertByte('Message ID', messageId);
  if (!Number.isInteger(payloadLength) || payloadLength < 0 || payloadLength > MAX_PAYLOAD_LENGTH) {
    throw new RangeError(`Payload length must be between 0 and ${MAX_PAYLOAD_LENGTH}, got ${payloadLength}`);
  }

  const extended = payloadLength >= LENGTH_EXTENDER;
  const headerSize = extended ? FRAME_EXTENDED_HEADER_SIZE : FRAME_HEADER_SIZE;
  const buffer = new ArrayBuffer(headerSize + payloadLength + FRAME_CHECKSUM_SIZE);
  const view = new DataView(buffer);

  let offset = 0;

  // Header
  view.setUint8(offset++, FRAME_PREAMBLE);
  view.setUint8(offset++, busId);
  view.setUint8(offset++, messageId);

  if (extended) {
    view.setUint8(offset++, LENGTH_EXTENDER);
    view.setUint16(offset, payloadLength); // big endian
    offset += 2;
  } else {
    view.setUint8(offset++, payloadLength);
  }

  return new Uint8Array(buffer);
}

/**
 * Writable view of the payload region of a frame created by `encodeEnvelope`
 */
export function getPayloadView(frame: Uint8Array): Uint8Array {
  const payloadLength = getPayloadLength(frame);
  if (payloadLength === undefined) {
    throw new RangeError(`Frame header is incomplete (${frame.length} bytes)`);
  }
  const payloadOffset = hasExtendedLength(frame) ? OFFSET_TO_PAYLOAD_EXTENDED : OFFSET_TO_PAYLOAD;
  return frame.subarray(payloadOffset, payloadOffset + payloadLength);
}

/**
 * Create a complete frame from message data
 * @returns Frame bytes with checksum inserted
 */
export function createFrame(busId: number, messageId: number, payload: Uint8Array = new Uint8Array(0)): Uint8Array {
  const frame = encodeEnvelope(busId, messageId, payload.length);
  getPayloadView(frame).set(payload);
  FrameChecksum.insert(frame);
  return frame;
}

/**
 * Build the bytes to transmit for an internal message.
 * The bus ID is always the master device's, whatever the message carries, and the
 * checksum is computed afresh.
 * @param message Message fields, or an already framed internal message
 */
export function buildWireMessage(message: OutboundMessage | Uint8Array): Uint8Array {
  if (message instanceof Uint8Array) {
    const decoded = decodeEnvelope(message);
    if (!decoded.ok) {
      throw new Error(`Cannot rebuild frame for transmission: ${decoded.error}`);
    }
    return createFrame(MASTER_BUS_ID, decoded.envelope.messageId, decoded.envelope.payload);
  }

  return createFrame(MASTER_BUS_ID, message.messageId, message.payload);
}
