import { DecodeError } from "../../errors";
import { isWireObject, type WireObject } from "./fields";

/**
 * Converts one message type between its typed form and its wire object.
 * The `type` discriminator is written and checked by the registry, not the schema.
 */
export interface MessageSchema<T> {
  toWire(message: T): WireObject;
  fromWire(obj: WireObject): T;
}

function hasType<T extends { type: string }, K extends T["type"]>(
  message: T,
  type: K
): message is Extract<T, { type: K }> {
  return message.type === type;
}

/**
 * Registry mapping message tags to their schemas.
 *
 * One registry is built per direction (client commands, server events) and
 * shared by every channel, so messages are decoded once at the codec boundary
 * into a tagged union that handlers can switch over exhaustively.
 *
 * @example
 * ```ts
 * const registry = new MessageRegistry<ClientCommand>("command");
 *
 * registry.register("JOIN_GAME", {
 *   toWire: (m) => ({ room_id: m.roomId }),
 *   fromWire: (o) => ({ type: "JOIN_GAME", roomId: readString(o, "room_id") }),
 * });
 *
 * const wire = registry.encode({ type: "JOIN_GAME", roomId: "room_1" });
 * // { type: "JOIN_GAME", room_id: "room_1" }
 * const back = registry.decode(wire);
 * ```
 */
export class MessageRegistry<T extends { type: string }> {
  private schemas = new Map<string, MessageSchema<T>>();

  /**
   * @param kind Used in error messages only ("command", "event")
   */
  constructor(private readonly kind: string) {}

  /**
   * Register the schema for one tag. Call once per tag at startup.
   */
  register<K extends T["type"]>(type: K, schema: MessageSchema<Extract<T, { type: K }>>): void {
    if (this.schemas.has(type)) {
      throw new Error(`${this.kind} type ${type} is already registered`);
    }
    this.schemas.set(type, {
      toWire: (message) => {
        if (!hasType(message, type)) {
          throw new Error(`Schema for ${type} cannot encode ${message.type}`);
        }
        return schema.toWire(message);
      },
      fromWire: (obj) => schema.fromWire(obj),
    });
  }

  /**
   * Encode a typed message into a wire object, discriminator first.
   */
  encode(message: T): WireObject {
    const schema = this.schemas.get(message.type);
    if (!schema) {
      throw new Error(`No schema registered for ${this.kind} type ${message.type}`);
    }
    return { type: message.type, ...schema.toWire(message) };
  }

  /**
   * Decode a parsed JSON value into a typed message.
   * @throws DecodeError on a non-object, a missing/unknown tag, or a bad field
   */
  decode(value: unknown): T {
    if (!isWireObject(value)) {
      throw new DecodeError("malformed", `Expected a JSON object ${this.kind}`);
    }

    const tag = value["type"] ?? value["command"];
    if (typeof tag !== "string") {
      throw new DecodeError("missing-field", `Missing ${this.kind} discriminator "type"`);
    }

    const schema = this.schemas.get(tag);
    if (!schema) {
      throw new DecodeError("unknown-type", `Unknown ${this.kind} type ${tag}`, tag);
    }

    try {
      return schema.fromWire(value);
    } catch (error) {
      if (error instanceof DecodeError) {
        throw new DecodeError(error.reason, `${tag}: ${error.message}`, tag);
      }
      throw error;
    }
  }

  has(type: string): boolean {
    return this.schemas.has(type);
  }

  types(): string[] {
    return Array.from(this.schemas.keys());
  }
}
