// Stream parser - turns a raw byte stream into decoded messages
import { EventEmitter } from 'events';
import {
  CodecDiagnostic,
  IMessageRegistry,
  IStreamParser,
  Logger,
  ParsedMessage,
  ParsedTelemetry,
} from './types';
import { FrameChecksum } from './checksum';
import { decodeEnvelope } from './frame';
import { FramerStats, StreamFramer } from './framer';
import { MessageId } from './message-id';
import { defaultRegistry, describeMessageId } from './message-registry';
import { decodeTelemetryPayload } from './payload';

export interface StreamParserOptions {
  /** Largest total frame accepted, see `StreamFramer` */
  maxFrameLength?: number;
  /** Defaults to a logger that discards everything */
  logger?: Logger;
  registry?: IMessageRegistry;
}

const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
};

/**
 * Drives a framer over pushed chunks and decodes every completed frame.
 *
 * Emits:
 * - `message` with every `ParsedMessage`
 * - `telemetry` with each `ParsedTelemetry`, after its `message` event
 * - `diagnostic` with a `CodecDiagnostic` for each dropped frame or framing error
 *
 * Stream problems never throw. One instance per byte stream.
 *
 * Listeners run synchronously inside `parseBytes` and `decodeFrame`. Listeners must not
 * throw: an exception propagates to the caller and the rest of the chunk is dropped.
 * The framer is already back to seeking a preamble, so the next chunk parses normally.
 */
export class StreamParser extends EventEmitter implements IStreamParser {
  private readonly framer: StreamFramer;
  private readonly logger: Logger;
  private readonly registry: IMessageRegistry;

  constructor(options: StreamParserOptions = {}) {
    super();
    this.logger = options.logger ?? silentLogger;
    this.registry = options.registry ?? defaultRegistry;
    this.framer = new StreamFramer({
      maxFrameLength: options.maxFrameLength,
      onFramingError: (error) => this.report({ kind: 'framing', ...error }),
    });
  }

  /**
   * Parse incoming bytes and return any complete messages
   */
  parseBytes(data: Uint8Array): ParsedMessage[] {
    const results: ParsedMessage[] = [];

    if (!data || data.length === 0) {
      return results;
    }

    for (let i = 0; i < data.length; i++) {
      const frame = this.framer.step(data[i]);
      if (!frame) {
        continue;
      }
      const message = this.decodeFrame(frame);
      if (message) {
        results.push(message);
      }
    }

    return results;
  }

  /**
   * Decode one complete frame. The checksum is verified before anything else is read.
   * @returns The message, or undefined when the frame was dropped (a diagnostic is emitted)
   */
  decodeFrame(frame: Uint8Array): ParsedMessage | undefined {
    if (!FrameChecksum.verify(frame)) {
      this.report({ kind: 'checksum', frame });
      return undefined;
    }

    const decoded = decodeEnvelope(frame);
    if (!decoded.ok) {
      this.report({ kind: 'envelope', error: decoded.error, frame });
      return undefined;
    }

    const { busId, messageId, payload } = decoded.envelope;
    const base = {
      timestamp: Date.now(),
      busId,
      messageId: this.registry.identify(messageId),
      raw: frame,
    };

    let message: ParsedMessage;
    if (messageId === MessageId.TelemetryData) {
      const telemetry: ParsedTelemetry = {
        kind: 'telemetry',
        ...base,
        ...decodeTelemetryPayload(payload),
      };
      message = telemetry;
    } else {
      message = { kind: 'message', ...base, payload };
    }

    this.logger.debug(
      `Frame ${describeMessageId(message.messageId)} from bus 0x${busId.toString(16)}, ${frame.length} bytes`
    );

    this.emit('message', message);
    if (message.kind === 'telemetry') {
      if (message.truncated) {
        this.logger.warn(`Telemetry payload truncated after ${Object.keys(message.sample).length} groups`);
      }
      this.emit('telemetry', message);
    }

    return message;
  }

  /**
   * Drop any partially assembled frame
   */
  resetBuffer(): void {
    this.framer.reset();
  }

  get stats(): FramerStats {
    return this.framer.stats;
  }

  private report(diagnostic: CodecDiagnostic): void {
    switch (diagnostic.kind) {
      case 'framing':
        this.logger.warn(`Framing error (${diagnostic.reason}), ${diagnostic.bufferedBytes} bytes discarded`);
        break;
      case 'checksum':
        this.logger.warn(`Checksum mismatch, ${diagnostic.frame.length} byte frame dropped`);
        break;
      case 'envelope':
        this.logger.warn(`Invalid envelope (${diagnostic.error}), ${diagnostic.frame.length} byte frame dropped`);
        break;
    }
    this.emit('diagnostic', diagnostic);
  }
}
