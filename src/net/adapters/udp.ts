import { createSocket, type Socket } from "node:dgram";
import { isIP } from "node:net";
import { ConnectionError } from "../../errors";
import type { DatagramTransportOptions } from "../types";
import { BaseTransport } from "./base";

/**
 * Datagram transport over `node:dgram`.
 *
 * Sends are fire-and-forget: a failed send is logged and reported to error
 * handlers but never retried. The socket is bound before it is returned, to
 * `localPort` when one is configured, so replies reach it from the first send.
 */
export class UdpTransport extends BaseTransport {
	private closed = false;
	private closeRequested = false;
	private closeReason: Error | undefined;

	constructor(
		private readonly socket: Socket,
		private readonly options: DatagramTransportOptions
	) {
		super();
		this.setupHandlers();
	}

	/**
	 * Local port the socket is bound to.
	 */
	get localPort(): number {
		return this.socket.address().port;
	}

	send(data: Uint8Array): boolean {
		if (this.closed || this.closeRequested) {
			return false;
		}

		this.socket.send(data, this.options.port, this.options.host, (error) => {
			if (error) {
				this.log(`Datagram send failed: ${error.message}`);
				this.emitError(error);
			}
		});
		return true;
	}

	close(): Promise<void> {
		if (this.closed) {
			return Promise.resolve();
		}

		return new Promise((resolve) => {
			this.socket.once("close", () => resolve());
			this.requestClose();
		});
	}

	private requestClose(): void {
		if (this.closeRequested) return;
		this.closeRequested = true;
		this.socket.close();
	}

	private setupHandlers(): void {
		this.socket.on("message", (msg: Buffer) => this.emitMessage(msg));

		// A socket-level error after bind leaves the channel unusable
		this.socket.on("error", (error: Error) => {
			this.closeReason = error;
			this.emitError(error);
			this.requestClose();
		});

		this.socket.on("close", () => {
			if (this.closed) return;
			this.closed = true;
			this.emitClose(this.closeReason);
		});
	}

	private log(message: string): void {
		if (this.options.debug) {
			console.log(`[UdpTransport] ${message}`);
		}
	}

	/**
	 * Static factory method to open and bind a datagram socket
	 * @throws ConnectionError when the bind fails (e.g. the fixed local port is taken)
	 */
	static open(options: DatagramTransportOptions): Promise<UdpTransport> {
		return new Promise((resolve, reject) => {
			const socket = createSocket(isIP(options.host) === 6 ? "udp6" : "udp4");

			const onBindError = (error: Error) => {
				socket.close();
				reject(new ConnectionError(`Failed to bind UDP socket to port ${options.localPort ?? 0}`, error));
			};

			socket.once("error", onBindError);
			socket.bind(options.localPort ?? 0, () => {
				socket.off("error", onBindError);
				resolve(new UdpTransport(socket, options));
			});
		});
	}
}
