import { ConnectionError, DecodeError, toError } from "../errors";
import { LineFramer } from "../protocol/codec/line-framer";
import type { WireCodec } from "../protocol/codec/wire-codec";
import type { UdpEncryption } from "../protocol/crypto/udp-encryption";
import type { TransportAdapter } from "./types";

/**
 * Receives what a channel produces. Called from socket callbacks, so
 * implementations only enqueue work.
 */
export interface ChannelSink<TIn> {
	onMessage(message: TIn): void;
	onProtocolError(error: DecodeError): void;
	onLost(error: ConnectionError): void;
}

export interface ChannelOptions<TOut extends { type: string }, TIn extends { type: string }> {
	/** Used in log lines, e.g. "tcp" */
	name: string;
	transport: TransportAdapter;
	codec: WireCodec<TOut, TIn>;
	sink: ChannelSink<TIn>;
	debug?: boolean;
}

/**
 * Shared lifecycle for both channels: loss is reported once, and not at all
 * after a local close().
 */
abstract class Channel<TOut extends { type: string }, TIn extends { type: string }> {
	protected readonly transport: TransportAdapter;
	protected readonly codec: WireCodec<TOut, TIn>;
	protected readonly sink: ChannelSink<TIn>;
	readonly name: string;
	private readonly debug: boolean;
	private closing = false;
	private lost = false;

	constructor(options: ChannelOptions<TOut, TIn>) {
		this.name = options.name;
		this.transport = options.transport;
		this.codec = options.codec;
		this.sink = options.sink;
		this.debug = options.debug ?? false;
	}

	/**
	 * Start listening on the transport. Subclasses call this last in their
	 * constructor: held bytes are replayed during registration.
	 */
	protected attach(): void {
		this.transport.onMessage((data) => this.receive(data));
		this.transport.onClose((reason) => this.handleClose(reason));
		this.transport.onError?.((error) => this.log(`Transport error: ${error.message}`));
	}

	/**
	 * Whether the channel can still send.
	 */
	get open(): boolean {
		return !this.closing && !this.lost;
	}

	/**
	 * Encode and write one message.
	 * @returns false when the channel is closed or the transport refused the write
	 */
	send(message: TOut): boolean {
		if (!this.open) {
			return false;
		}

		const bytes = this.encode(message);
		if (!bytes) {
			return false;
		}

		const written = this.transport.send(bytes);
		if (written) {
			this.log(`Sent ${message.type}`);
		}
		return written;
	}

	/**
	 * Close the transport. Any close that follows is not reported as loss.
	 */
	close(): Promise<void> {
		this.closing = true;
		this.onClosing();
		return this.transport.close();
	}

	protected abstract encode(message: TOut): Uint8Array | null;
	protected abstract receive(data: Uint8Array): void;
	protected onClosing(): void {}

	protected deliver(decode: () => TIn): void {
		let message: TIn;
		try {
			message = decode();
		} catch (error) {
			this.reportProtocolError(
				error instanceof DecodeError ? error : new DecodeError("malformed", toError(error).message)
			);
			return;
		}
		this.sink.onMessage(message);
	}

	protected reportProtocolError(error: DecodeError): void {
		const tag = error.tag ? ` ${error.tag}` : "";
		console.warn(`[${this.constructor.name}:${this.name}] Dropped${tag} message (${error.reason}): ${error.message}`);
		this.sink.onProtocolError(error);
	}

	protected log(message: string): void {
		if (this.debug) {
			console.log(`[${this.constructor.name}:${this.name}] ${message}`);
		}
	}

	private handleClose(reason?: Error): void {
		if (this.closing || this.lost) return;
		this.lost = true;

		const error = reason
			? new ConnectionError(`${this.name} channel lost`, reason)
			: new ConnectionError(`${this.name} channel closed by relay`);
		this.log(error.message);
		this.sink.onLost(error);
	}
}

/**
 * Control-plane channel: one JSON message per `\n`-terminated line over a stream.
 */
export class ReliableChannel<TOut extends { type: string }, TIn extends { type: string }> extends Channel<TOut, TIn> {
	private readonly framer: LineFramer;

	constructor(options: ChannelOptions<TOut, TIn>) {
		super(options);
		this.framer = new LineFramer(this.codec.maxMessageSize, (discarded) =>
			this.reportProtocolError(
				new DecodeError(
					"oversized",
					`Partial frame of ${discarded} bytes exceeded ${this.codec.maxMessageSize}, discarded`
				)
			)
		);
		this.attach();
	}

	protected encode(message: TOut): Uint8Array {
		return this.codec.encodeLine(message);
	}

	protected receive(data: Uint8Array): void {
		for (const line of this.framer.push(data)) {
			this.deliver(() => this.codec.decodeLine(line));
		}
	}

	protected override onClosing(): void {
		this.framer.reset();
	}
}

export interface DatagramChannelOptions<TOut extends { type: string }, TIn extends { type: string }>
	extends ChannelOptions<TOut, TIn> {
	/** Refuse to send or accept datagrams until an encryption key is set */
	requireEncryption?: boolean;
}

/**
 * State channel: one JSON message per datagram, optionally encrypted.
 */
export class DatagramChannel<TOut extends { type: string }, TIn extends { type: string }> extends Channel<TOut, TIn> {
	private encryption: UdpEncryption | null = null;
	private readonly requireEncryption: boolean;

	constructor(options: DatagramChannelOptions<TOut, TIn>) {
		super(options);
		this.requireEncryption = options.requireEncryption ?? false;
		this.attach();
	}

	/**
	 * Install the per-session key once the client id is known.
	 */
	setEncryption(encryption: UdpEncryption | null): void {
		this.encryption = encryption;
	}

	get encrypted(): boolean {
		return this.encryption !== null;
	}

	protected encode(message: TOut): Uint8Array | null {
		if (this.requireEncryption && !this.encryption) {
			this.log(`Refusing to send ${message.type} before the session key is set`);
			return null;
		}
		return this.codec.encodeDatagram(message, this.encryption ?? undefined);
	}

	protected receive(data: Uint8Array): void {
		if (this.requireEncryption && !this.encryption) {
			this.reportProtocolError(new DecodeError("decrypt-failed", "Datagram arrived before the session key was set"));
			return;
		}
		this.deliver(() => this.codec.decodeDatagram(data, this.encryption ?? undefined));
	}
}
