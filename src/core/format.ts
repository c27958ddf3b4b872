// Text rendering of sensor samples and received messages
import Handlebars from 'handlebars'
import { SampleField, SensorSample } from './types'
import { SAMPLE_FIELDS } from './data-tags'
import { decodeEnvelope } from './frame'
import { MessageId } from './message-id'
import { decodeTelemetryPayload, parseDeviceId, parseFirmwareRevision } from './payload'

export const STATUS_FLAGS: ReadonlyArray<{ bit: number; name: string }> = [
  { bit: 0, name: 'SelfTest' },
  { bit: 1, name: 'FilterValid' },
  { bit: 2, name: 'GNSSFix' },
]

const SAMPLE_TEMPLATES: Record<SampleField, string> = {
  packetCounter: 'PC={{value}}',
  sampleTimeFine: 'STF={{value}}',
  eulerAngles: 'Euler(R={{fixed roll 2}}°, P={{fixed pitch 2}}°, Y={{fixed yaw 2}}°)',
  statusWord: 'Status={{statusWord value}}',
  latLon: 'LatLon({{fixed latitude 8}}, {{fixed longitude 8}})',
  altitudeEllipsoid: 'Alt={{fixed value 3}}m',
  velocity: 'Vel({{fixed x 4}}, {{fixed y 4}}, {{fixed z 4}})m/s',
  utcTime:
    'UTC={{pad year 4}}-{{pad month 2}}-{{pad day 2}} ' +
    '{{pad hour 2}}:{{pad minute 2}}:{{pad second 2}}.{{pad nanoseconds 9}}',
  quaternion: 'Quat({{fixed w 6}}, {{fixed x 6}}, {{fixed y 6}}, {{fixed z 6}})',
  barometricPressure: 'Baro={{fixed (div value 100) 2}}hPa',
  acceleration: 'Acc({{fixed x 6}}, {{fixed y 6}}, {{fixed z 6}})m/s²',
  rateOfTurn: 'RoT({{fixed x 6}}, {{fixed y 6}}, {{fixed z 6}})rad/s',
  magneticField: 'Mag({{fixed x 6}}, {{fixed y 6}}, {{fixed z 6}})a.u.',
  temperature: 'Temp={{fixed value 6}}°C',
}

type MessageTemplate = 'deviceId' | 'firmwareRevision' | 'telemetry' | 'error' | 'unhandled'

const MESSAGE_TEMPLATES: Record<MessageTemplate, string> = {
  deviceId: 'DeviceId: 0x{{hex value 8}}',
  firmwareRevision: 'FirmwareRevision: {{value}}',
  telemetry: 'Telemetry: {{value}}',
  error: 'Error: 0x{{hex value 2}}',
  unhandled: 'Unhandled message: MessageId = 0x{{hex value 2}}',
}

function isMessageTemplate(name: string): name is MessageTemplate {
  return name in MESSAGE_TEMPLATES
}

/**
 * `0x` + eight hex digits, followed by the names of the flags that are set
 */
export function formatStatusWord(statusWord: number): string {
  let text = `0x${(statusWord >>> 0).toString(16).toUpperCase().padStart(8, '0')}`
  for (const flag of STATUS_FLAGS) {
    if (statusWord & (1 << flag.bit)) {
      text += ` [${flag.name}]`
    }
  }
  return text
}

export class SampleFormatter {
  private readonly handlebars = Handlebars.create()
  private sampleTemplates: Map<SampleField, HandlebarsTemplateDelegate> = new Map()
  private messageTemplates: Map<MessageTemplate, HandlebarsTemplateDelegate> = new Map()

  constructor() {
    this.registerHelpers()
    this.initializeTemplates()
  }

  private initializeTemplates(): void {
    for (const field of SAMPLE_FIELDS) {
      this.sampleTemplates.set(field, this.compile(SAMPLE_TEMPLATES[field]))
    }

    for (const [name, source] of Object.entries(MESSAGE_TEMPLATES)) {
      if (isMessageTemplate(name)) {
        this.messageTemplates.set(name, this.compile(source))
      }
    }
  }

  private compile(source: string): HandlebarsTemplateDelegate {
    // Output is plain text, never HTML
    return this.handlebars.compile(source, { noEscape: true })
  }

  private registerHelpers(): void {
    this.handlebars.registerHelper('fixed', (value: number, digits: number) => {
      return value.toFixed(digits)
    })

    this.handlebars.registerHelper('pad', (value: number, width: number) => {
      return String(value).padStart(width, '0')
    })

    this.handlebars.registerHelper('hex', (value: number, width: number) => {
      return (value >>> 0).toString(16).toUpperCase().padStart(width, '0')
    })

    this.handlebars.registerHelper('div', (value: number, divisor: number) => {
      return value / divisor
    })

    this.handlebars.registerHelper('statusWord', (value: number) => {
      return formatStatusWord(value)
    })
  }

  private render(template: HandlebarsTemplateDelegate | undefined, context: object): string {
    if (!template) {
      throw new Error('Template not found')
    }
    return template(context)
  }

  /**
   * Render the present groups of a sample, comma separated, in catalogue order
   */
  formatSample(sample: SensorSample): string {
    const parts: string[] = []

    for (const field of SAMPLE_FIELDS) {
      const value = sample[field]
      if (value === undefined) {
        continue
      }
      const context = typeof value === 'number' ? { value } : value
      parts.push(this.render(this.sampleTemplates.get(field), context))
    }

    return parts.join(', ')
  }

  /**
   * One-line description of a received frame
   * @returns undefined when the frame has no valid envelope
   */
  describeMessage(frame: Uint8Array): string | undefined {
    const decoded = decodeEnvelope(frame)
    if (!decoded.ok) {
      return undefined
    }

    const { messageId, payload } = decoded.envelope

    switch (messageId) {
      case MessageId.DeviceId: {
        const deviceId = parseDeviceId(frame)
        return deviceId === undefined
          ? 'DeviceId'
          : this.render(this.messageTemplates.get('deviceId'), { value: deviceId })
      }

      case MessageId.FirmwareRevision: {
        const revision = parseFirmwareRevision(frame)
        return revision === undefined
          ? 'FirmwareRevision'
          : this.render(this.messageTemplates.get('firmwareRevision'), { value: revision })
      }

      case MessageId.TelemetryData: {
        const { sample } = decodeTelemetryPayload(payload)
        return this.render(this.messageTemplates.get('telemetry'), { value: this.formatSample(sample) })
      }

      case MessageId.Error:
        return payload.length === 0
          ? 'Error'
          : this.render(this.messageTemplates.get('error'), { value: payload[0] })

      case MessageId.Wakeup:
        return 'Wakeup'

      case MessageId.GotoConfigAck:
        return 'GotoConfigAck'

      case MessageId.GotoMeasurementAck:
        return 'GotoMeasurementAck'

      case MessageId.GotoBootLoaderAck:
        return 'BootLoaderAck'

      case MessageId.FirmwareUpdate:
        return 'FirmwareUpdate'

      case MessageId.ResetAck:
        return 'ResetAck'

      default:
        return this.render(this.messageTemplates.get('unhandled'), { value: messageId })
    }
  }
}

const defaultFormatter = new SampleFormatter()

export function formatSample(sample: SensorSample): string {
  return defaultFormatter.formatSample(sample)
}

export function describeMessage(frame: Uint8Array): string | undefined {
  return defaultFormatter.describeMessage(frame)
}
