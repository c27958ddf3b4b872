// Shared type definitions for the sensor wire protocol

/**
 * Outer structure of a decoded frame. `payload` is a view into the frame it was decoded from.
 */
export interface FrameEnvelope {
  busId: number
  messageId: number
  payload: Uint8Array
  rawLength: number
  extendedLength: boolean
}

export type EnvelopeError = 'too-short' | 'bad-preamble' | 'truncated'

export type EnvelopeResult =
  | { ok: true; envelope: FrameEnvelope }
  | { ok: false; error: EnvelopeError }

/**
 * A message to be sent to the device. `busId` is carried for internal bookkeeping only,
 * outbound frames are always addressed from the master device.
 */
export interface OutboundMessage {
  messageId: number
  payload?: Uint8Array
  busId?: number
}

export interface EulerAngles {
  roll: number
  pitch: number
  yaw: number
}

export interface LatLon {
  latitude: number
  longitude: number
}

export interface Vector3 {
  x: number
  y: number
  z: number
}

export interface Quaternion {
  w: number
  x: number
  y: number
  z: number
}

export interface UtcTime {
  nanoseconds: number
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  flags: number
}

/**
 * Sparse aggregate of the telemetry groups carried by one data message.
 * A group is present only when the message carried a well-formed record for it.
 */
export interface SensorSample {
  packetCounter?: number
  /** Ticks of 100 µs */
  sampleTimeFine?: number
  /** Degrees */
  eulerAngles?: EulerAngles
  statusWord?: number
  /** Degrees */
  latLon?: LatLon
  /** Metres above the ellipsoid */
  altitudeEllipsoid?: number
  /** m/s */
  velocity?: Vector3
  utcTime?: UtcTime
  quaternion?: Quaternion
  /** Pa */
  barometricPressure?: number
  /** m/s² */
  acceleration?: Vector3
  /** rad/s */
  rateOfTurn?: Vector3
  /** Arbitrary units, normalised to the local field */
  magneticField?: Vector3
  /** °C */
  temperature?: number
}

export type SampleField = keyof SensorSample

export interface PayloadWalkResult {
  sample: SensorSample
  /** A trailing record declared more bytes than the payload had left */
  truncated: boolean
  /** Records consumed without setting a field (unknown tag or unexpected size) */
  skipped: number
}

export type TelemetryError = EnvelopeError | 'not-telemetry'

export type TelemetryParseResult =
  | ({ ok: true } & PayloadWalkResult)
  | { ok: false; error: TelemetryError }

/**
 * Identity of a received message id: one registered with the registry, or the raw byte.
 * `id` is a `MessageId` for the built-in catalogue and any byte for registered extras.
 */
export type MessageIdentity =
  | { known: true; id: number; name: string }
  | { known: false; raw: number }

interface ParsedMessageBase {
  timestamp: number
  busId: number
  messageId: MessageIdentity
  /** Complete frame, preamble to checksum */
  raw: Uint8Array
}

export interface ParsedTelemetry extends ParsedMessageBase {
  kind: 'telemetry'
  sample: SensorSample
  truncated: boolean
  skipped: number
}

export interface ParsedOpaqueMessage extends ParsedMessageBase {
  kind: 'message'
  payload: Uint8Array
}

export type ParsedMessage = ParsedTelemetry | ParsedOpaqueMessage

export type FramingErrorReason = 'length-out-of-bounds' | 'overflow'

export interface FramingError {
  reason: FramingErrorReason
  bufferedBytes: number
  /** Total frame length computed from the header, when it got that far */
  expectedLength?: number
}

export type CodecDiagnostic =
  | ({ kind: 'framing' } & FramingError)
  | { kind: 'checksum'; frame: Uint8Array }
  | { kind: 'envelope'; error: EnvelopeError; frame: Uint8Array }

/**
 * Minimal logging surface, `console` satisfies it
 */
export interface Logger {
  debug(message: string, ...meta: unknown[]): void
  warn(message: string, ...meta: unknown[]): void
}

/**
 * Definition of a catalogued message
 */
export interface MessageDefinition {
  /** Single byte, usually a `MessageId` */
  id: number
  name: string
  description?: string
}

/**
 * Interface for stream parsing functionality
 */
export interface IStreamParser {
  parseBytes(data: Uint8Array): ParsedMessage[]
  decodeFrame(frame: Uint8Array): ParsedMessage | undefined
  resetBuffer(): void
}

/**
 * Interface for message serialization functionality
 */
export interface IMessageSerializer {
  buildOutbound(messageId: number, payload?: Uint8Array): Uint8Array
  serializeMessage(message: OutboundMessage): Uint8Array
}

/**
 * Interface for message registry functionality
 */
export interface IMessageRegistry {
  getMessageDefinition(id: number): MessageDefinition | undefined
  getMessageDefinitionByName(name: string): MessageDefinition | undefined
  identify(raw: number): MessageIdentity
  supportsMessage(messageId: number): boolean
  supportsMessageName(messageName: string): boolean
  getSupportedMessageIds(): number[]
  getSupportedMessageNames(): string[]
}
