import { ConnectionError } from "../../errors";
import { createRelayCodec, type RelayCodec } from "../../protocol";
import { LineFramer } from "../../protocol/codec/line-framer";
import type { UdpEncryption } from "../../protocol/crypto/udp-encryption";
import type { ClientCommand } from "../../protocol/messages/commands";
import type { ServerEvent } from "../../protocol/messages/events";
import type { DatagramTransportOptions, StreamTransportOptions, TransportAdapter, TransportFactory } from "../types";
import { BaseTransport } from "./base";

/**
 * In-process transport. Whatever the client sends is recorded; whatever the
 * test delivers arrives through the registered handlers, synchronously, or
 * is held until the first handler is registered.
 */
export class MemoryTransport extends BaseTransport {
	readonly sent: Uint8Array[] = [];
	private closed = false;
	private sendListener: ((data: Uint8Array) => void) | null = null;

	constructor(readonly kind: "stream" | "datagram") {
		super();
	}

	get isClosed(): boolean {
		return this.closed;
	}

	send(data: Uint8Array): boolean {
		if (this.closed) {
			return false;
		}
		const copy = new Uint8Array(data);
		this.sent.push(copy);
		this.sendListener?.(copy);
		return true;
	}

	close(): Promise<void> {
		this.finish(undefined);
		return Promise.resolve();
	}

	/**
	 * Simulate inbound bytes from the relay.
	 */
	deliver(data: Uint8Array | string): void {
		if (this.closed) return;
		this.emitMessage(typeof data === "string" ? new TextEncoder().encode(data) : data);
	}

	/**
	 * Simulate the relay side ending the connection, with an error or as an orderly EOF.
	 */
	drop(reason?: Error): void {
		if (reason) {
			this.emitError(reason);
		}
		this.finish(reason);
	}

	/** @internal */
	setSendListener(listener: ((data: Uint8Array) => void) | null): void {
		this.sendListener = listener;
	}

	private finish(reason?: Error): void {
		if (this.closed) return;
		this.closed = true;
		this.emitClose(reason);
	}
}

/**
 * Scripted reply to a command sent over the stream: the events to push back.
 */
export type RelayResponder = (command: ClientCommand, factory: MemoryTransportFactory) => ServerEvent[] | void;

/**
 * Transport factory that plays the relay in-process.
 *
 * Every byte crosses the real wire codec in both directions, so tests see the
 * same framing and field mapping a socket would carry. A responder can answer
 * commands automatically, e.g. REGISTER with REGISTERED.
 *
 * @example
 * ```ts
 * const relay = new MemoryTransportFactory();
 * relay.respond((command) =>
 *   command.type === "REGISTER" ? [{ type: "REGISTERED", clientId: "client_1" }] : undefined
 * );
 * const session = new SessionManager({ config, dispatch, transports: relay });
 * ```
 */
export class MemoryTransportFactory implements TransportFactory {
	readonly codec: RelayCodec = createRelayCodec();
	readonly streams: MemoryTransport[] = [];
	readonly datagrams: MemoryTransport[] = [];
	readonly streamOptions: StreamTransportOptions[] = [];
	readonly datagramOptions: DatagramTransportOptions[] = [];

	/** Reject this many upcoming openStream calls */
	failStreamOpens = 0;
	/** Reject this many upcoming openDatagram calls */
	failDatagramOpens = 0;

	private responder: RelayResponder | null = null;
	private greeter: ((factory: MemoryTransportFactory) => ServerEvent[]) | null = null;

	/**
	 * Answer stream commands automatically. Replies are delivered on the next microtask.
	 */
	respond(responder: RelayResponder | null): void {
		this.responder = responder;
	}

	/**
	 * Write these events on every new stream as soon as it is accepted,
	 * before the client has registered any handler.
	 */
	greet(greeter: ((factory: MemoryTransportFactory) => ServerEvent[]) | null): void {
		this.greeter = greeter;
	}

	openStream(options: StreamTransportOptions): Promise<TransportAdapter> {
		this.streamOptions.push(options);
		if (this.failStreamOpens > 0) {
			this.failStreamOpens--;
			return Promise.reject(new ConnectionError(`Failed to connect to ${options.host}:${options.port}`));
		}

		const transport = new MemoryTransport("stream");
		const framer = new LineFramer();
		transport.setSendListener((data) => {
			for (const line of framer.push(data)) {
				const command = this.codec.decodeLine(line);
				const replies = this.responder?.(command, this);
				if (replies && replies.length > 0) {
					queueMicrotask(() => {
						for (const event of replies) this.sendEvent(event, transport);
					});
				}
			}
		});
		this.streams.push(transport);
		for (const event of this.greeter?.(this) ?? []) {
			this.sendEvent(event, transport);
		}
		return Promise.resolve(transport);
	}

	openDatagram(options: DatagramTransportOptions): Promise<TransportAdapter> {
		this.datagramOptions.push(options);
		if (this.failDatagramOpens > 0) {
			this.failDatagramOpens--;
			return Promise.reject(new ConnectionError(`Failed to bind UDP socket to port ${options.localPort ?? 0}`));
		}

		const transport = new MemoryTransport("datagram");
		this.datagrams.push(transport);
		return Promise.resolve(transport);
	}

	/**
	 * Most recently opened stream.
	 * @throws Error when none was opened
	 */
	get stream(): MemoryTransport {
		const stream = this.streams[this.streams.length - 1];
		if (!stream) throw new Error("No stream transport was opened");
		return stream;
	}

	/**
	 * Most recently opened datagram socket.
	 * @throws Error when none was opened
	 */
	get datagram(): MemoryTransport {
		const datagram = this.datagrams[this.datagrams.length - 1];
		if (!datagram) throw new Error("No datagram transport was opened");
		return datagram;
	}

	/**
	 * Push an event to the client over a stream (the latest by default).
	 */
	sendEvent(event: ServerEvent, transport: MemoryTransport = this.stream): void {
		transport.deliver(this.codec.encodeLine(event));
	}

	/**
	 * Push an event to the client as one datagram.
	 */
	sendDatagram(event: ServerEvent, encryption?: UdpEncryption): void {
		this.datagram.deliver(this.codec.encodeDatagram(event, encryption));
	}

	/**
	 * Commands the client wrote to a stream (the latest by default), decoded.
	 */
	commands(transport: MemoryTransport = this.stream): ClientCommand[] {
		const framer = new LineFramer();
		const commands: ClientCommand[] = [];
		for (const chunk of transport.sent) {
			for (const line of framer.push(chunk)) {
				commands.push(this.codec.decodeLine(line));
			}
		}
		return commands;
	}

	/**
	 * Command tags the client wrote to a stream, in order.
	 */
	commandTypes(transport: MemoryTransport = this.stream): string[] {
		return this.commands(transport).map((command) => command.type);
	}

	/**
	 * Datagrams the client sent on the latest datagram socket, decoded.
	 */
	datagramCommands(encryption?: UdpEncryption): ClientCommand[] {
		return this.datagram.sent.map((packet) => this.codec.decodeDatagram(packet, encryption));
	}
}
