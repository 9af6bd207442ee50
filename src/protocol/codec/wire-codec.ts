import { DecodeError } from "../../errors";
import type { UdpEncryption } from "../crypto/udp-encryption";
import type { MessageRegistry } from "./message-registry";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Configuration for WireCodec
 */
export interface WireCodecConfig<TOut extends { type: string }, TIn extends { type: string }> {
  /** Registry for messages this side writes */
  outbound: MessageRegistry<TOut>;

  /** Registry for messages this side reads */
  inbound: MessageRegistry<TIn>;

  /** Largest accepted frame or datagram in UTF-8 bytes, terminator excluded (default: 65536) */
  maxMessageSize?: number;
}

/**
 * Turns typed messages into transport bytes and back.
 *
 * - TCP: one JSON object per line, terminated by a single `\n`.
 * - UDP: one JSON object per datagram, no terminator, optionally sealed with
 *   {@link UdpEncryption}.
 *
 * Decode failures throw {@link DecodeError}; callers skip the message and keep
 * the connection open.
 *
 * @template TOut Union of messages this side sends
 * @template TIn Union of messages this side receives
 */
export class WireCodec<TOut extends { type: string }, TIn extends { type: string }> {
  private readonly outbound: MessageRegistry<TOut>;
  private readonly inbound: MessageRegistry<TIn>;
  readonly maxMessageSize: number;

  constructor(config: WireCodecConfig<TOut, TIn>) {
    this.outbound = config.outbound;
    this.inbound = config.inbound;
    this.maxMessageSize = config.maxMessageSize ?? 65536;
  }

  /**
   * Serialize a message to its JSON text, no terminator.
   */
  toJson(message: TOut): string {
    return JSON.stringify(this.outbound.encode(message));
  }

  /**
   * Parse one JSON frame into a typed inbound message.
   */
  fromJson(text: string): TIn {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new DecodeError("malformed", `Frame is not valid JSON (${text.length} chars)`);
    }
    return this.inbound.decode(parsed);
  }

  encodeLine(message: TOut): Uint8Array {
    return encoder.encode(this.toJson(message) + "\n");
  }

  /**
   * Decode one frame split off by `LineFramer`. The limit applies to its UTF-8 size.
   */
  decodeLine(line: string): TIn {
    const size = Buffer.byteLength(line, "utf8");
    if (size > this.maxMessageSize) {
      throw new DecodeError("oversized", `Frame exceeds max size: ${size} > ${this.maxMessageSize} bytes`);
    }
    return this.fromJson(line);
  }

  encodeDatagram(message: TOut, encryption?: UdpEncryption): Uint8Array {
    const json = this.toJson(message);
    return encryption ? encryption.seal(json) : encoder.encode(json);
  }

  decodeDatagram(data: Uint8Array, encryption?: UdpEncryption): TIn {
    if (data.byteLength === 0) {
      throw new DecodeError("malformed", "Empty datagram");
    }
    if (data.byteLength > this.maxMessageSize) {
      throw new DecodeError(
        "oversized",
        `Datagram exceeds max size: ${data.byteLength} > ${this.maxMessageSize} bytes`
      );
    }

    let text: string;
    if (encryption) {
      text = encryption.open(data);
    } else {
      try {
        text = decoder.decode(data);
      } catch {
        throw new DecodeError("malformed", "Datagram is not valid UTF-8");
      }
    }
    return this.fromJson(text);
  }
}
