import { connect as netConnect, isIP, type Socket } from "node:net";
import { connect as tlsConnect, type TLSSocket } from "node:tls";
import { ConnectionError } from "../../errors";
import type { StreamTransportOptions } from "../types";
import { BaseTransport } from "./base";

/** Verification codes that mean "self-signed", as reported by OpenSSL through Node. */
const SELF_SIGNED_CODES = new Set(["DEPTH_ZERO_SELF_SIGNED_CERT", "SELF_SIGNED_CERT_IN_CHAIN"]);

export interface CertificateDecision {
	accept: boolean;
	/** Set when the certificate is accepted only because of the development flag */
	warning?: string;
	/** Set when the certificate is rejected */
	reason?: string;
}

/**
 * Certificate policy for the relay's TLS endpoint.
 *
 * A verified chain is accepted. A self-signed certificate is accepted only
 * when `allowSelfSigned` is set, and then with a warning. Everything else,
 * hostname mismatch included, is rejected.
 *
 * @param authorizationError The socket's `authorizationError`, an OpenSSL code or an Error
 */
export function evaluateCertificate(
	authorizationError: string | Error | null | undefined,
	allowSelfSigned: boolean
): CertificateDecision {
	if (authorizationError === null || authorizationError === undefined || authorizationError === "") {
		return { accept: true };
	}

	const code =
		typeof authorizationError === "string"
			? authorizationError
			: "code" in authorizationError && typeof authorizationError.code === "string"
				? authorizationError.code
				: authorizationError.message;

	if (SELF_SIGNED_CODES.has(code)) {
		if (allowSelfSigned) {
			return {
				accept: true,
				warning: `Accepting self-signed relay certificate (${code}). Development mode only, never ship with allowSelfSigned enabled`,
			};
		}
		return { accept: false, reason: `Relay certificate is self-signed (${code})` };
	}

	return { accept: false, reason: `Relay certificate rejected (${code})` };
}

/**
 * Stream transport over `node:net`, or `node:tls` when encryption is on.
 *
 * Writes go straight to the socket with Nagle disabled, so control messages
 * are never held back. Remote EOF, a reset and a local close all end in a
 * single `onClose` call. Bytes the relay writes before `onMessage` is
 * registered are held for it.
 */
export class TcpTransport extends BaseTransport {
	private lastError: Error | undefined;
	private closed = false;
	private closing: Promise<void> | null = null;

	constructor(
		private readonly socket: Socket,
		private readonly options: Pick<StreamTransportOptions, "closeTimeout" | "debug">
	) {
		super();
		this.setupHandlers();
	}

	get isClosed(): boolean {
		return this.closed;
	}

	send(data: Uint8Array): boolean {
		if (this.closed || this.closing || !this.socket.writable) {
			return false;
		}

		this.socket.write(data);
		return true;
	}

	/**
	 * Half-close the socket and wait for it to close, destroying it if that
	 * takes longer than `closeTimeout`. A half-written frame is flushed first.
	 */
	close(): Promise<void> {
		if (this.closed) {
			return Promise.resolve();
		}

		if (!this.closing) {
			this.closing = new Promise<void>((resolve) => {
				const timer = setTimeout(() => {
					this.log(`Socket did not close within ${this.options.closeTimeout}ms, destroying`);
					this.socket.destroy();
				}, this.options.closeTimeout);

				this.socket.once("close", () => {
					clearTimeout(timer);
					resolve();
				});

				this.socket.end();
			});
		}

		return this.closing;
	}

	private setupHandlers(): void {
		this.socket.on("data", (chunk: Buffer) => this.emitMessage(chunk));

		this.socket.on("error", (error: Error) => {
			this.lastError = error;
			this.emitError(error);
		});

		this.socket.on("close", () => {
			if (this.closed) return;
			this.closed = true;
			this.emitClose(this.lastError);
		});
	}

	private log(message: string): void {
		if (this.options.debug) {
			console.log(`[TcpTransport] ${message}`);
		}
	}

	/**
	 * Static factory method to connect to the relay
	 * @throws ConnectionError when the connection, the handshake or the certificate check fails, or on timeout
	 */
	static connect(options: StreamTransportOptions): Promise<TcpTransport> {
		const endpoint = `${options.host}:${options.port}`;

		return new Promise((resolve, reject) => {
			let settled = false;

			let secure: TLSSocket | undefined;
			let socket: Socket;

			if (options.tls) {
				secure = tlsConnect({
					host: options.host,
					port: options.port,
					// SNI is only valid for host names
					servername: isIP(options.host) === 0 ? options.host : undefined,
					// Verification runs below so self-signed certificates can be let through in development
					rejectUnauthorized: false,
				});
				socket = secure;
			} else {
				socket = netConnect({ host: options.host, port: options.port });
			}

			const fail = (error: ConnectionError) => {
				if (settled) return;
				settled = true;
				clearTimeout(timer);
				socket.destroy();
				reject(error);
			};

			const succeed = () => {
				if (settled) return;
				settled = true;
				clearTimeout(timer);
				socket.off("error", onConnectError);
				socket.off("close", onEarlyClose);
				socket.setNoDelay(true);
				resolve(new TcpTransport(socket, options));
			};

			const onConnectError = (error: Error) => fail(new ConnectionError(`Failed to connect to ${endpoint}`, error));
			const onEarlyClose = () => fail(new ConnectionError(`Connection to ${endpoint} closed during connect`));

			const timer = setTimeout(
				() => fail(new ConnectionError(`Connect to ${endpoint} timed out after ${options.connectTimeout}ms`)),
				options.connectTimeout
			);

			socket.once("error", onConnectError);
			socket.once("close", onEarlyClose);

			if (options.tls) {
				socket.once("secureConnect", () => {
					const decision = evaluateCertificate(secure?.authorizationError, options.allowSelfSigned);

					if (!decision.accept) {
						fail(new ConnectionError(`TLS handshake with ${endpoint} rejected: ${decision.reason}`));
						return;
					}
					if (decision.warning) {
						console.warn(`[TcpTransport] WARNING: ${decision.warning}`);
					}
					succeed();
				});
			} else {
				socket.once("connect", succeed);
			}
		});
	}
}
