/**
 * Core transport types for the relay client
 */

/**
 * Generic transport adapter interface - one connected socket, stream or datagram.
 * Implement this to run the session over something other than Node sockets.
 */
export interface TransportAdapter {
	/**
	 * Send bytes through the transport.
	 * @returns false when the transport is already closed and nothing was written
	 */
	send(data: Uint8Array): boolean;

	/**
	 * Register a callback for incoming bytes (a stream chunk or one whole datagram).
	 * Bytes received before the first registration are delivered to it.
	 */
	onMessage(handler: (data: Uint8Array) => void): void;

	/**
	 * Register a callback for close. Fires at most once, with the error that
	 * ended the transport or undefined for an orderly close. A close that
	 * happened before the first registration is reported to it.
	 */
	onClose(handler: (reason?: Error) => void): void;

	/**
	 * Register a callback for transport errors (optional)
	 */
	onError?(handler: (error: Error) => void): void;

	/**
	 * Close the transport. Resolves once the underlying socket is released.
	 */
	close(): Promise<void>;
}

/**
 * Options for opening the reliable stream channel
 */
export interface StreamTransportOptions {
	host: string;
	port: number;

	/** Wrap the stream in TLS */
	tls: boolean;

	/** Accept a self-signed certificate (with a warning) */
	allowSelfSigned: boolean;

	/** Give up connecting after this many milliseconds */
	connectTimeout: number;

	/** close() waits this long for the socket before destroying it */
	closeTimeout: number;

	debug?: boolean;
}

/**
 * Options for opening the datagram channel
 */
export interface DatagramTransportOptions {
	host: string;
	port: number;

	/** Bind to a fixed local port instead of an ephemeral one */
	localPort?: number;

	debug?: boolean;
}

/**
 * Opens transports for the session manager. The Node factory uses real
 * sockets; tests substitute an in-memory one.
 */
export interface TransportFactory {
	openStream(options: StreamTransportOptions): Promise<TransportAdapter>;
	openDatagram(options: DatagramTransportOptions): Promise<TransportAdapter>;
}
