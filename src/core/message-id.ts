// Catalogue of message ids understood by the device
import type { MessageDefinition } from './types'

export enum MessageId {
  ReqDeviceId = 0x00,
  DeviceId = 0x01,
  GotoMeasurement = 0x10,
  GotoMeasurementAck = 0x11,
  ReqFirmwareRevision = 0x12,
  FirmwareRevision = 0x13,
  GotoConfig = 0x30,
  GotoConfigAck = 0x31,
  TelemetryData = 0x36,
  Wakeup = 0x3e,
  WakeupAck = 0x3f,
  Reset = 0x40,
  ResetAck = 0x41,
  Error = 0x42,
  ToggleIoPins = 0xbe,
  ToggleIoPinsAck = 0xbf,
  /** Same id both requests and sets the output configuration */
  OutputConfigRequest = 0xc0,
  OutputConfig = 0xc1,
  GotoBootLoader = 0xf0,
  GotoBootLoaderAck = 0xf1,
  FirmwareUpdate = 0xf2,
}

export const MESSAGE_DEFINITIONS: readonly MessageDefinition[] = [
  { id: MessageId.ReqDeviceId, name: 'ReqDeviceId', description: 'Request the device serial number' },
  { id: MessageId.DeviceId, name: 'DeviceId', description: 'Device serial number (u32)' },
  { id: MessageId.GotoMeasurement, name: 'GotoMeasurement' },
  { id: MessageId.GotoMeasurementAck, name: 'GotoMeasurementAck' },
  { id: MessageId.ReqFirmwareRevision, name: 'ReqFirmwareRevision' },
  { id: MessageId.FirmwareRevision, name: 'FirmwareRevision', description: 'major, minor, patch (u8 each)' },
  { id: MessageId.GotoConfig, name: 'GotoConfig' },
  { id: MessageId.GotoConfigAck, name: 'GotoConfigAck' },
  { id: MessageId.TelemetryData, name: 'TelemetryData', description: 'Tagged sensor records' },
  { id: MessageId.Wakeup, name: 'Wakeup' },
  { id: MessageId.WakeupAck, name: 'WakeupAck' },
  { id: MessageId.Reset, name: 'Reset' },
  { id: MessageId.ResetAck, name: 'ResetAck' },
  { id: MessageId.Error, name: 'Error', description: 'Error code (u8)' },
  { id: MessageId.ToggleIoPins, name: 'ToggleIoPins' },
  { id: MessageId.ToggleIoPinsAck, name: 'ToggleIoPinsAck' },
  { id: MessageId.OutputConfigRequest, name: 'OutputConfigRequest' },
  { id: MessageId.OutputConfig, name: 'OutputConfig' },
  { id: MessageId.GotoBootLoader, name: 'GotoBootLoader' },
  { id: MessageId.GotoBootLoaderAck, name: 'GotoBootLoaderAck' },
  { id: MessageId.FirmwareUpdate, name: 'FirmwareUpdate' },
]
