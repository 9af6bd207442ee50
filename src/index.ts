/**
 * Relay Netcode
 *
 * Client-side networking core for session-based online racing:
 * - Wire protocol and codecs for the relay's JSON-line and datagram formats
 * - Reliable (TCP/TLS) and datagram (UDP, optionally encrypted) channels
 * - Session lifecycle with heartbeats and reconnect backoff
 * - Room browsing, hosting and rosters
 * - Remote vehicle state reconciliation
 * - A dispatch queue that keeps all of it on the game's own tick
 */

export * from "./errors";
export * from "./config/config";

// Core utilities
export * from "./core";

// Wire protocol
export * from "./protocol";

// Sockets and channels
export * from "./net";

export * from "./latency/latency-monitor";
export * from "./session/session-manager";
export * from "./rooms/room-registry";
export * from "./sync/state-synchronizer";
export * from "./client/network-context";
