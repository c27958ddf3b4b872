// Telemetry payload - walks tagged records into a sensor sample, and back
import {
  EulerAngles,
  PayloadWalkResult,
  Quaternion,
  SampleField,
  SensorSample,
  TelemetryParseResult,
  UtcTime,
  Vector3,
} from './types'
import { DATA_TAGS, DataTagDefinition, SAMPLE_FIELDS, getTagField } from './data-tags'
import { decodeEnvelope } from './frame'
import { viewOf } from './codec'
import { MessageId } from './message-id'

/**
 * Record header: tag (u16) + size (u8)
 */
export const RECORD_HEADER_SIZE = 3

function assignField<K extends SampleField>(
  sample: SensorSample,
  field: K,
  view: DataView,
  offset: number
): void {
  const def: DataTagDefinition<K> = DATA_TAGS[field]
  sample[field] = def.decode(view, offset)
}

/**
 * Decode the tagged records of a telemetry payload.
 *
 * Records are read front to back. A known tag whose size matches its definition sets
 * the field; any other record is skipped by its declared size. Decoding stops at the
 * first record that claims more bytes than remain, keeping whatever was read before it.
 */
export function decodeTelemetryPayload(payload: Uint8Array): PayloadWalkResult {
  const sample: SensorSample = {}
  const view = viewOf(payload)
  let offset = 0
  let skipped = 0
  let truncated = false

  while (payload.length - offset >= RECORD_HEADER_SIZE) {
    const tag = view.getUint16(offset)
    const size = view.getUint8(offset + 2)
    offset += RECORD_HEADER_SIZE

    if (payload.length - offset < size) {
      truncated = true
      break
    }

    const field = getTagField(tag)
    if (field !== undefined && DATA_TAGS[field].size === size) {
      assignField(sample, field, view, offset)
    } else {
      skipped++
    }
    offset += size
  }

  // Fewer than a header's worth of trailing bytes
  if (!truncated && offset < payload.length) {
    truncated = true
  }

  return { sample, truncated, skipped }
}

/**
 * Decode a complete telemetry frame
 * @returns The sample, or why the frame is not a telemetry message
 */
export function parseTelemetry(frame: Uint8Array): TelemetryParseResult {
  const decoded = decodeEnvelope(frame)
  if (!decoded.ok) {
    return { ok: false, error: decoded.error }
  }

  if (decoded.envelope.messageId !== MessageId.TelemetryData) {
    return { ok: false, error: 'not-telemetry' }
  }

  return { ok: true, ...decodeTelemetryPayload(decoded.envelope.payload) }
}

function encodeRecord<K extends SampleField>(
  view: DataView,
  offset: number,
  field: K,
  sample: SensorSample
): number {
  const value = sample[field]
  if (value === undefined || value === null) {
    return 0
  }

  const def: DataTagDefinition<K> = DATA_TAGS[field]
  view.setUint16(offset, def.tag)
  view.setUint8(offset + 2, def.size)
  def.encode(view, offset + RECORD_HEADER_SIZE, value)

  return RECORD_HEADER_SIZE + def.size
}

/**
 * Encode every present group of a sample as tagged records, in catalogue order
 */
export function encodeTelemetryPayload(sample: SensorSample): Uint8Array {
  let totalSize = 0
  for (const field of SAMPLE_FIELDS) {
    if (sample[field] !== undefined) {
      totalSize += RECORD_HEADER_SIZE + DATA_TAGS[field].size
    }
  }

  const payload = new Uint8Array(totalSize)
  const view = viewOf(payload)
  let offset = 0

  for (const field of SAMPLE_FIELDS) {
    offset += encodeRecord(view, offset, field, sample)
  }

  return payload
}

/**
 * Read a single group out of a telemetry frame
 */
export function parseField<K extends SampleField>(frame: Uint8Array, field: K): SensorSample[K] | undefined {
  const result = parseTelemetry(frame)
  return result.ok ? result.sample[field] : undefined
}

export function parseEulerAngles(frame: Uint8Array): EulerAngles | undefined {
  return parseField(frame, 'eulerAngles')
}

export function parseQuaternion(frame: Uint8Array): Quaternion | undefined {
  return parseField(frame, 'quaternion')
}

export function parseUtcTime(frame: Uint8Array): UtcTime | undefined {
  return parseField(frame, 'utcTime')
}

export function parseBarometricPressure(frame: Uint8Array): number | undefined {
  return parseField(frame, 'barometricPressure')
}

export function parseAcceleration(frame: Uint8Array): Vector3 | undefined {
  return parseField(frame, 'acceleration')
}

export function parseRateOfTurn(frame: Uint8Array): Vector3 | undefined {
  return parseField(frame, 'rateOfTurn')
}

export function parseMagneticField(frame: Uint8Array): Vector3 | undefined {
  return parseField(frame, 'magneticField')
}

export function parseTemperature(frame: Uint8Array): number | undefined {
  return parseField(frame, 'temperature')
}

/**
 * Fine sample time in milliseconds (the counter ticks at 10 kHz)
 */
export function sampleTimeMs(sample: SensorSample): number | undefined {
  return sample.sampleTimeFine === undefined ? undefined : sample.sampleTimeFine / 10
}

/**
 * Serial number carried by a DeviceId message
 */
export function parseDeviceId(frame: Uint8Array): number | undefined {
  const decoded = decodeEnvelope(frame)
  if (!decoded.ok || decoded.envelope.messageId !== MessageId.DeviceId) {
    return undefined
  }
  const { payload } = decoded.envelope
  if (payload.length < 4) {
    return undefined
  }
  return viewOf(payload).getUint32(0)
}

/**
 * `major.minor.patch` carried by a FirmwareRevision message
 */
export function parseFirmwareRevision(frame: Uint8Array): string | undefined {
  const decoded = decodeEnvelope(frame)
  if (!decoded.ok || decoded.envelope.messageId !== MessageId.FirmwareRevision) {
    return undefined
  }
  const { payload } = decoded.envelope
  if (payload.length < 3) {
    return undefined
  }
  return `${payload[0]}.${payload[1]}.${payload[2]}`
}
