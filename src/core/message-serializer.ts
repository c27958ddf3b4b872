// Message serializer - encodes host commands to wire frames
import { IMessageRegistry, IMessageSerializer, OutboundMessage } from './types'
import { MessageId } from './message-id'
import { defaultRegistry } from './message-registry'
import { buildWireMessage } from './frame'

/**
 * Serializes outbound messages to bytes.
 * Every frame it produces is addressed from the master device with a fresh checksum.
 */
export class MessageSerializer implements IMessageSerializer {
  constructor(private readonly registry: IMessageRegistry = defaultRegistry) {}

  /**
   * Frame a message for transmission
   * @param messageId A `MessageId` or any raw id byte
   */
  buildOutbound(messageId: number, payload?: Uint8Array): Uint8Array {
    return buildWireMessage({ messageId, payload })
  }

  /**
   * Frame an internal message for transmission. Its `busId` is not used.
   */
  serializeMessage(message: OutboundMessage): Uint8Array {
    return buildWireMessage(message)
  }

  /**
   * Frame a catalogued message looked up by name
   */
  serializeByName(messageName: string, payload?: Uint8Array): Uint8Array {
    const messageDef = this.registry.getMessageDefinitionByName(messageName)

    if (!messageDef) {
      throw new Error(`Unknown message type: ${messageName}`)
    }

    return this.buildOutbound(messageDef.id, payload)
  }

  requestDeviceId(): Uint8Array {
    return this.buildOutbound(MessageId.ReqDeviceId)
  }

  gotoConfig(): Uint8Array {
    return this.buildOutbound(MessageId.GotoConfig)
  }

  gotoMeasurement(): Uint8Array {
    return this.buildOutbound(MessageId.GotoMeasurement)
  }

  requestFirmwareRevision(): Uint8Array {
    return this.buildOutbound(MessageId.ReqFirmwareRevision)
  }

  /**
   * Answer to the device's Wakeup, keeps it from entering measurement mode
   */
  wakeupAck(): Uint8Array {
    return this.buildOutbound(MessageId.WakeupAck)
  }

  reset(): Uint8Array {
    return this.buildOutbound(MessageId.Reset)
  }
}
