/**
 * @module protocol
 *
 * Wire protocol for the relay: typed command/event unions, per-tag schemas,
 * newline framing for TCP, and datagram encoding (optionally encrypted) for UDP.
 *
 * @example
 * ```typescript
 * import { createClientCodec } from "./protocol";
 *
 * const codec = createClientCodec();
 * const bytes = codec.encodeLine({ type: "JOIN_GAME", roomId: "room_1" });
 * // '{"type":"JOIN_GAME","room_id":"room_1"}\n'
 *
 * const event = codec.decodeLine('{"type":"GAME_HOSTED","room_id":"room_1"}');
 * if (event.type === "GAME_HOSTED") event.roomId; // typed
 * ```
 */

import type { ClientCommand } from "./messages/commands";
import type { ServerEvent } from "./messages/events";
import { createCommandRegistry, createEventRegistry } from "./codec/schemas";
import { WireCodec } from "./codec/wire-codec";

export * from "./messages/types";
export * from "./messages/commands";
export * from "./messages/events";
export * from "./codec/fields";
export * from "./codec/message-registry";
export * from "./codec/schemas";
export * from "./codec/line-framer";
export * from "./codec/wire-codec";
export * from "./crypto/udp-encryption";

/** Codec for the client side: writes commands, reads events. */
export type ClientCodec = WireCodec<ClientCommand, ServerEvent>;

/** Codec for the relay side (used by in-process stand-ins): writes events, reads commands. */
export type RelayCodec = WireCodec<ServerEvent, ClientCommand>;

export function createClientCodec(maxMessageSize?: number): ClientCodec {
  return new WireCodec({
    outbound: createCommandRegistry(),
    inbound: createEventRegistry(),
    maxMessageSize,
  });
}

export function createRelayCodec(maxMessageSize?: number): RelayCodec {
  return new WireCodec({
    outbound: createEventRegistry(),
    inbound: createCommandRegistry(),
    maxMessageSize,
  });
}
