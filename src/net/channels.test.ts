import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { ConnectionError, DecodeError } from "../errors";
import { createClientCodec, createRelayCodec } from "../protocol";
import { UdpEncryption } from "../protocol/crypto/udp-encryption";
import type { ClientCommand } from "../protocol/messages/commands";
import type { ServerEvent } from "../protocol/messages/events";
import { MemoryTransport } from "./adapters/memory";
import { DatagramChannel, ReliableChannel, type ChannelSink } from "./channels";

function createSink() {
	const messages: ServerEvent[] = [];
	const protocolErrors: DecodeError[] = [];
	const losses: ConnectionError[] = [];
	const sink: ChannelSink<ServerEvent> = {
		onMessage: (message) => messages.push(message),
		onProtocolError: (error) => protocolErrors.push(error),
		onLost: (error) => losses.push(error),
	};
	return { sink, messages, protocolErrors, losses };
}

const relay = createRelayCodec();

describe("ReliableChannel", () => {
	let transport: MemoryTransport;
	let harness: ReturnType<typeof createSink>;
	let channel: ReliableChannel<ClientCommand, ServerEvent>;

	beforeEach(() => {
		vi.spyOn(console, "warn").mockImplementation(() => {});
		transport = new MemoryTransport("stream");
		harness = createSink();
		channel = new ReliableChannel({ name: "tcp", transport, codec: createClientCodec(), sink: harness.sink });
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	test("writes newline-terminated commands", () => {
		expect(channel.send({ type: "JOIN_GAME", roomId: "room_1" })).toBe(true);

		expect(new TextDecoder().decode(transport.sent[0])).toBe('{"type":"JOIN_GAME","room_id":"room_1"}\n');
	});

	test("reassembles frames split across reads", () => {
		transport.deliver('{"type":"GAME_HOSTED",');
		expect(harness.messages).toEqual([]);

		transport.deliver('"room_id":"room_1"}\n{"type":"HEARTBEAT_ACK"}\n{"type":');

		expect(harness.messages).toEqual([{ type: "GAME_HOSTED", roomId: "room_1" }, { type: "HEARTBEAT_ACK" }]);
	});

	test("drops a malformed frame and keeps reading", () => {
		transport.deliver('not json\n{"type":"HEARTBEAT_ACK"}\n');

		expect(harness.protocolErrors.map((error) => error.reason)).toEqual(["malformed"]);
		expect(harness.messages).toEqual([{ type: "HEARTBEAT_ACK" }]);
		expect(harness.losses).toEqual([]);
	});

	test("drops unknown tags and missing fields", () => {
		transport.deliver('{"type":"FROM_THE_FUTURE"}\n{"type":"GAME_HOSTED"}\n');

		expect(harness.protocolErrors.map((error) => [error.reason, error.tag])).toEqual([
			["unknown-type", "FROM_THE_FUTURE"],
			["missing-field", "GAME_HOSTED"],
		]);
		expect(console.warn).toHaveBeenCalledWith(
			"[ReliableChannel:tcp] Dropped FROM_THE_FUTURE message (unknown-type): Unknown event type FROM_THE_FUTURE"
		);
	});

	test("reports remote close once", () => {
		transport.drop();
		transport.drop(new Error("again"));

		expect(harness.losses).toHaveLength(1);
		expect(harness.losses[0].message).toBe("tcp channel closed by relay");
		expect(channel.open).toBe(false);
		expect(channel.send({ type: "HEARTBEAT" })).toBe(false);
	});

	test("wraps the transport error as the loss cause", () => {
		transport.drop(new Error("ECONNRESET"));

		expect(harness.losses[0].message).toBe("tcp channel lost: ECONNRESET");
	});

	test("does not report loss after a local close", async () => {
		await channel.close();

		expect(transport.isClosed).toBe(true);
		expect(harness.losses).toEqual([]);
	});

	test("decodes bytes and a close that reached the transport before it was built", () => {
		const early = new MemoryTransport("stream");
		early.deliver('{"type":"REGISTERED","client_id":"client_1"}\n');
		early.drop();

		const sink = createSink();
		new ReliableChannel({ name: "tcp", transport: early, codec: createClientCodec(), sink: sink.sink });

		expect(sink.messages).toEqual([{ type: "REGISTERED", clientId: "client_1" }]);
		expect(sink.losses.map((error) => error.message)).toEqual(["tcp channel closed by relay"]);
	});
});

describe("DatagramChannel", () => {
	beforeEach(() => {
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	test("sends one unterminated JSON object per datagram", () => {
		const transport = new MemoryTransport("datagram");
		const channel = new DatagramChannel({ name: "udp", transport, codec: createClientCodec(), sink: createSink().sink });

		channel.send({ type: "HEARTBEAT" });

		expect(new TextDecoder().decode(transport.sent[0])).toBe('{"type":"HEARTBEAT"}');
	});

	test("decodes each datagram on its own", () => {
		const transport = new MemoryTransport("datagram");
		const harness = createSink();
		new DatagramChannel({ name: "udp", transport, codec: createClientCodec(), sink: harness.sink });

		transport.deliver(relay.encodeDatagram({ type: "PING_RESPONSE", timestamp: 12 }));
		transport.deliver("{broken");

		expect(harness.messages).toEqual([{ type: "PING_RESPONSE", timestamp: 12 }]);
		expect(harness.protocolErrors.map((error) => error.reason)).toEqual(["malformed"]);
	});

	test("encrypts both directions once the key is set", () => {
		const transport = new MemoryTransport("datagram");
		const harness = createSink();
		const channel = new DatagramChannel({
			name: "udp",
			transport,
			codec: createClientCodec(),
			sink: harness.sink,
			requireEncryption: true,
		});
		const key = new UdpEncryption("client_1", "test-secret");

		expect(channel.send({ type: "HEARTBEAT" })).toBe(false);
		transport.deliver(relay.encodeDatagram({ type: "HEARTBEAT_ACK" }, key));
		expect(harness.protocolErrors.map((error) => error.reason)).toEqual(["decrypt-failed"]);

		channel.setEncryption(key);
		expect(channel.send({ type: "HEARTBEAT" })).toBe(true);
		expect(relay.decodeDatagram(transport.sent[0], key)).toEqual({ type: "HEARTBEAT" });

		transport.deliver(relay.encodeDatagram({ type: "HEARTBEAT_ACK" }, key));
		expect(harness.messages).toEqual([{ type: "HEARTBEAT_ACK" }]);
	});

	test("drops a datagram sealed with another session's key", () => {
		const transport = new MemoryTransport("datagram");
		const harness = createSink();
		const channel = new DatagramChannel({ name: "udp", transport, codec: createClientCodec(), sink: harness.sink });
		channel.setEncryption(new UdpEncryption("client_1", "test-secret"));

		transport.deliver(relay.encodeDatagram({ type: "HEARTBEAT_ACK" }, new UdpEncryption("client_2", "test-secret")));

		expect(harness.messages).toEqual([]);
		expect(harness.protocolErrors).toHaveLength(1);
		// A wrong key almost always fails the padding check; rarely it yields garbage that fails JSON parsing
		expect(["decrypt-failed", "malformed"]).toContain(harness.protocolErrors[0].reason);
	});
});
