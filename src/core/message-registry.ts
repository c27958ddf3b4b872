// Message registry - stores and retrieves message definitions
import { MessageDefinition, MessageIdentity, IMessageRegistry } from './types'
import { MESSAGE_DEFINITIONS } from './message-id'

/**
 * Registry for message definitions.
 * Provides O(1) lookup by both ID and name.
 */
export class MessageRegistry implements IMessageRegistry {
  private definitionsById: Map<number, MessageDefinition> = new Map()
  private definitionsByName: Map<string, MessageDefinition> = new Map()

  constructor(definitions: readonly MessageDefinition[] = MESSAGE_DEFINITIONS) {
    for (const def of definitions) {
      this.register(def)
    }
  }

  /**
   * Register a message definition
   */
  register(def: MessageDefinition): void {
    if (!Number.isInteger(def.id) || def.id < 0 || def.id > 0xff) {
      throw new RangeError(`Message ID must be a single byte, got ${def.id}`)
    }
    this.definitionsById.set(def.id, def)
    this.definitionsByName.set(def.name, def)
  }

  /**
   * Get message definition by ID
   */
  getMessageDefinition(id: number): MessageDefinition | undefined {
    return this.definitionsById.get(id)
  }

  /**
   * Get message definition by name
   */
  getMessageDefinitionByName(name: string): MessageDefinition | undefined {
    return this.definitionsByName.get(name)
  }

  /**
   * Resolve a raw id byte to a catalogued identity, or an unrecognized one
   */
  identify(raw: number): MessageIdentity {
    const def = this.definitionsById.get(raw)
    if (!def) {
      return { known: false, raw }
    }
    return { known: true, id: def.id, name: def.name }
  }

  /**
   * Check if a message ID is supported
   */
  supportsMessage(messageId: number): boolean {
    return this.definitionsById.has(messageId)
  }

  /**
   * Check if a message name is supported
   */
  supportsMessageName(messageName: string): boolean {
    return this.definitionsByName.has(messageName)
  }

  /**
   * Get all supported message IDs
   */
  getSupportedMessageIds(): number[] {
    return Array.from(this.definitionsById.keys()).sort((a, b) => a - b)
  }

  /**
   * Get all supported message names
   */
  getSupportedMessageNames(): string[] {
    return Array.from(this.definitionsByName.keys())
  }
}

export const defaultRegistry = new MessageRegistry()

/**
 * Display name of a message id, e.g. `TelemetryData` or `0x7A`
 */
export function describeMessageId(identity: MessageIdentity): string {
  if (identity.known) {
    return identity.name
  }
  return `0x${identity.raw.toString(16).toUpperCase().padStart(2, '0')}`
}
