// Catalogue of telemetry record tags and how each one maps onto a sample field
import { SensorSample, SampleField, UtcTime, Vector3 } from './types'
import { decodeSingleValue, decodeValues, encodeSingleValue, encodeValues } from './codec'

export enum DataTag {
  Temperature = 0x0810,
  UtcTime = 0x1010,
  PacketCounter = 0x1020,
  SampleTimeFine = 0x1060,
  Quaternion = 0x2010,
  EulerAngles = 0x2030,
  BarometricPressure = 0x3010,
  Acceleration = 0x4020,
  AltitudeEllipsoid = 0x5022,
  LatLon = 0x5042,
  RateOfTurn = 0x8020,
  MagneticField = 0xc020,
  VelocityXYZ = 0xd012,
  StatusWord = 0xe020,
}

/**
 * How one tag is carried on the wire. A record is decoded only when its declared
 * size equals `size`.
 */
export interface DataTagDefinition<K extends SampleField> {
  tag: DataTag
  name: string
  field: K
  size: number
  decode(view: DataView, offset: number): NonNullable<SensorSample[K]>
  encode(view: DataView, offset: number, value: NonNullable<SensorSample[K]>): void
}

type DataTagTable = { [K in SampleField]: DataTagDefinition<K> }

function decodeUtcTime(view: DataView, offset: number): UtcTime {
  return {
    nanoseconds: decodeSingleValue(view, offset, 'uint32'),
    year: decodeSingleValue(view, offset + 4, 'uint16'),
    month: view.getUint8(offset + 6),
    day: view.getUint8(offset + 7),
    hour: view.getUint8(offset + 8),
    minute: view.getUint8(offset + 9),
    second: view.getUint8(offset + 10),
    flags: view.getUint8(offset + 11),
  }
}

function encodeUtcTime(view: DataView, offset: number, time: UtcTime): void {
  encodeSingleValue(view, offset, 'uint32', time.nanoseconds)
  encodeSingleValue(view, offset + 4, 'uint16', time.year)
  encodeValues(view, offset + 6, 'uint8', [
    time.month,
    time.day,
    time.hour,
    time.minute,
    time.second,
    time.flags,
  ])
}

const float32Vector = {
  size: 12,
  decode: (view: DataView, offset: number): Vector3 => {
    const [x, y, z] = decodeValues(view, offset, 'float32', 3)
    return { x, y, z }
  },
  encode: (view: DataView, offset: number, v: Vector3): void => {
    encodeValues(view, offset, 'float32', [v.x, v.y, v.z])
  },
}

export const DATA_TAGS: DataTagTable = {
  packetCounter: {
    tag: DataTag.PacketCounter,
    name: 'PacketCounter',
    field: 'packetCounter',
    size: 2,
    decode: (view, offset) => decodeSingleValue(view, offset, 'uint16'),
    encode: (view, offset, value) => {
      encodeSingleValue(view, offset, 'uint16', value)
    },
  },
  sampleTimeFine: {
    tag: DataTag.SampleTimeFine,
    name: 'SampleTimeFine',
    field: 'sampleTimeFine',
    size: 4,
    decode: (view, offset) => decodeSingleValue(view, offset, 'uint32'),
    encode: (view, offset, value) => {
      encodeSingleValue(view, offset, 'uint32', value)
    },
  },
  eulerAngles: {
    tag: DataTag.EulerAngles,
    name: 'EulerAngles',
    field: 'eulerAngles',
    size: 12,
    decode: (view, offset) => {
      const [roll, pitch, yaw] = decodeValues(view, offset, 'float32', 3)
      return { roll, pitch, yaw }
    },
    encode: (view, offset, angles) => {
      encodeValues(view, offset, 'float32', [angles.roll, angles.pitch, angles.yaw])
    },
  },
  statusWord: {
    tag: DataTag.StatusWord,
    name: 'StatusWord',
    field: 'statusWord',
    size: 4,
    decode: (view, offset) => decodeSingleValue(view, offset, 'uint32'),
    encode: (view, offset, value) => {
      encodeSingleValue(view, offset, 'uint32', value)
    },
  },
  latLon: {
    tag: DataTag.LatLon,
    name: 'LatLon',
    field: 'latLon',
    size: 12,
    decode: (view, offset) => {
      const [latitude, longitude] = decodeValues(view, offset, 'fixed1632', 2)
      return { latitude, longitude }
    },
    encode: (view, offset, position) => {
      encodeValues(view, offset, 'fixed1632', [position.latitude, position.longitude])
    },
  },
  altitudeEllipsoid: {
    tag: DataTag.AltitudeEllipsoid,
    name: 'AltitudeEllipsoid',
    field: 'altitudeEllipsoid',
    size: 6,
    decode: (view, offset) => decodeSingleValue(view, offset, 'fixed1632'),
    encode: (view, offset, value) => {
      encodeSingleValue(view, offset, 'fixed1632', value)
    },
  },
  velocity: {
    tag: DataTag.VelocityXYZ,
    name: 'VelocityXYZ',
    field: 'velocity',
    size: 18,
    decode: (view, offset) => {
      const [x, y, z] = decodeValues(view, offset, 'fixed1632', 3)
      return { x, y, z }
    },
    encode: (view, offset, v) => {
      encodeValues(view, offset, 'fixed1632', [v.x, v.y, v.z])
    },
  },
  utcTime: {
    tag: DataTag.UtcTime,
    name: 'UtcTime',
    field: 'utcTime',
    size: 12,
    decode: decodeUtcTime,
    encode: encodeUtcTime,
  },
  quaternion: {
    tag: DataTag.Quaternion,
    name: 'Quaternion',
    field: 'quaternion',
    size: 16,
    decode: (view, offset) => {
      const [w, x, y, z] = decodeValues(view, offset, 'float32', 4)
      return { w, x, y, z }
    },
    encode: (view, offset, q) => {
      encodeValues(view, offset, 'float32', [q.w, q.x, q.y, q.z])
    },
  },
  barometricPressure: {
    tag: DataTag.BarometricPressure,
    name: 'BarometricPressure',
    field: 'barometricPressure',
    size: 4,
    decode: (view, offset) => decodeSingleValue(view, offset, 'uint32'),
    encode: (view, offset, value) => {
      encodeSingleValue(view, offset, 'uint32', value)
    },
  },
  acceleration: {
    tag: DataTag.Acceleration,
    name: 'Acceleration',
    field: 'acceleration',
    ...float32Vector,
  },
  rateOfTurn: {
    tag: DataTag.RateOfTurn,
    name: 'RateOfTurn',
    field: 'rateOfTurn',
    ...float32Vector,
  },
  magneticField: {
    tag: DataTag.MagneticField,
    name: 'MagneticField',
    field: 'magneticField',
    ...float32Vector,
  },
  temperature: {
    tag: DataTag.Temperature,
    name: 'Temperature',
    field: 'temperature',
    size: 4,
    decode: (view, offset) => decodeSingleValue(view, offset, 'float32'),
    encode: (view, offset, value) => {
      encodeSingleValue(view, offset, 'float32', value)
    },
  },
}

/**
 * Sample fields in presentation and encoding order
 */
export const SAMPLE_FIELDS: readonly SampleField[] = [
  'packetCounter',
  'sampleTimeFine',
  'eulerAngles',
  'statusWord',
  'latLon',
  'altitudeEllipsoid',
  'velocity',
  'utcTime',
  'quaternion',
  'barometricPressure',
  'acceleration',
  'rateOfTurn',
  'magneticField',
  'temperature',
]

const fieldsByTag: Map<number, SampleField> = new Map(
  SAMPLE_FIELDS.map((field): [number, SampleField] => [DATA_TAGS[field].tag, field])
)

/**
 * Sample field carried by a tag, or undefined for tags outside the catalogue
 */
export function getTagField(tag: number): SampleField | undefined {
  return fieldsByTag.get(tag)
}

export function getTagName(tag: number): string {
  const field = fieldsByTag.get(tag)
  return field ? DATA_TAGS[field].name : 'Unknown'
}
