/**
 * @module net
 *
 * Socket plumbing for the relay connection: transport adapters over Node's
 * net, tls and dgram modules, and the two channels built on them.
 *
 * - {@link ReliableChannel}: TCP (optionally TLS), newline-framed JSON.
 * - {@link DatagramChannel}: UDP, one JSON message per datagram, optionally encrypted.
 *
 * Channels decode at the boundary and hand typed messages to a sink; a frame
 * that fails to decode is logged and skipped, never fatal.
 *
 * @example
 * ```typescript
 * import { NodeTransportFactory, ReliableChannel } from "./net";
 * import { createClientCodec } from "./protocol";
 *
 * const transport = await new NodeTransportFactory().openStream({
 *   host: "127.0.0.1",
 *   port: 7777,
 *   tls: false,
 *   allowSelfSigned: false,
 *   connectTimeout: 10_000,
 *   closeTimeout: 1_000,
 * });
 *
 * const channel = new ReliableChannel({
 *   name: "control",
 *   transport,
 *   codec: createClientCodec(),
 *   sink: {
 *     onMessage: (event) => console.log(event.type),
 *     onProtocolError: (error) => console.warn(error.message),
 *     onLost: (error) => console.error(error.message),
 *   },
 * });
 * channel.send({ type: "LIST_GAMES" });
 * ```
 */

export * from "./types";
export * from "./channels";
export * from "./node-factory";
export * from "./adapters/base";
export * from "./adapters/tcp";
export * from "./adapters/udp";
export * from "./adapters/memory";
