import { validateEndpoint, type ResolvedConfig } from "../config/config";
import { backoffDelay } from "../core/backoff/backoff";
import type { DispatchQueue } from "../core/dispatch/dispatch-queue";
import { EventSystem } from "../core/events/event-system";
import { RateLimiter } from "../core/rate-limit/rate-limiter";
import {
	ConfigError,
	ConnectionError,
	InvalidStateError,
	ReconnectExhaustedError,
	toError,
} from "../errors";
import { LatencyMonitor } from "../latency/latency-monitor";
import { DatagramChannel, ReliableChannel } from "../net/channels";
import type { TransportAdapter, TransportFactory } from "../net/types";
import { createClientCodec, type ClientCodec } from "../protocol";
import { UdpEncryption } from "../protocol/crypto/udp-encryption";
import type { ClientCommand } from "../protocol/messages/commands";
import type { RegisteredEvent, ServerEvent, ServerEventMap, ServerEventType } from "../protocol/messages/events";
import type { GameData } from "../protocol/messages/types";

export enum ConnectionState {
	Disconnected = "Disconnected",
	Connecting = "Connecting",
	Connected = "Connected",
	Failed = "Failed",
}

/**
 * Identity and state of one connection. Exists from REGISTERED until the
 * connection ends.
 */
export interface Session {
	clientId: string;
	roomId: string | undefined;
	isHost: boolean;
	connectionState: ConnectionState;
	/** Clock time of the last inbound message, in milliseconds */
	lastActivityTime: number;
}

export interface Credentials {
	/** Display name, announced with PLAYER_INFO after registration */
	name: string;
	password?: string;
}

export interface SessionStats {
	packetsSent: number;
	packetsReceived: number;
	/** Inbound frames dropped as malformed, unknown or undecryptable */
	droppedMessages: number;
	reconnectAttempts: number;
}

/**
 * Lifecycle events of the session
 */
export type SessionEvents = {
	stateChanged: { from: ConnectionState; to: ConnectionState };
	connected: { clientId: string };
	connectionFailed: { error: Error };
	connectionLost: { error: Error };
	disconnected: { reason: string };
	reconnecting: { attempt: number; maxAttempts: number; delay: number };
	reconnectFailed: { error: ReconnectExhaustedError };
	authFailed: { reason: string };
	kicked: { reason: string | undefined };
};

export interface SessionManagerOptions {
	config: ResolvedConfig;

	/** Every socket and timer callback goes through this queue */
	dispatch: DispatchQueue;

	transports: TransportFactory;

	/** Shared with whoever displays the latency estimate */
	latency?: LatencyMonitor;

	/** Waits out a backoff delay. Defaults to a timer that resumes on the next drain */
	sleep?: (ms: number) => Promise<void>;

	/** Clock in milliseconds (default: Date.now) */
	now?: () => number;
}

type Channels = {
	token: number;
	reliable: ReliableChannel<ClientCommand, ServerEvent> | null;
	datagram: DatagramChannel<ClientCommand, ServerEvent> | null;
};

type PendingConnect = {
	token: number;
	timer: ReturnType<typeof setTimeout>;
	/** REGISTERED that arrived before the datagram channel was open */
	greeting: RegisteredEvent | null;
	resolve: (clientId: string) => void;
	reject: (error: Error) => void;
};

type ReconnectRun = {
	cancelled: boolean;
	promise: Promise<string>;
	/** Ends the backoff wait early, clearing its timer */
	wake: (() => void) | null;
};

/**
 * Owns the connection to the relay: both channels, registration, liveness
 * and reconnection.
 *
 * Nothing here runs on a socket callback. Channel events, transport opens
 * and timers only enqueue closures on the {@link DispatchQueue}; the state
 * machine advances when the consumer drains it. `connect()` therefore
 * resolves during a later `tick()`, not by itself.
 *
 * ```
 * Disconnected -> Connecting -> Connected -> Disconnected | Failed
 * Failed -> Connecting            (reconnect() only)
 * ```
 *
 * @example
 * ```ts
 * const session = new SessionManager({ config, dispatch, transports: new NodeTransportFactory() });
 * session.onMessage("SERVER_MESSAGE", (event) => console.log(event.message));
 * const clientId = await session.connect({ name: "Player" });
 * ```
 */
export class SessionManager {
	private readonly config: ResolvedConfig;
	private readonly dispatch: DispatchQueue;
	private readonly transports: TransportFactory;
	private readonly codec: ClientCodec;
	private readonly latency: LatencyMonitor;
	private readonly sleep: ((ms: number) => Promise<void>) | undefined;
	private readonly now: () => number;
	private readonly limiter: RateLimiter;

	private readonly events: EventSystem<SessionEvents>;
	private readonly messages: EventSystem<ServerEventMap>;

	private currentState = ConnectionState.Disconnected;
	private session: Session | null = null;
	private credentials: Credentials | null = null;
	private channels: Channels | null = null;
	private pending: PendingConnect | null = null;
	private reconnectRun: ReconnectRun | null = null;
	private nextToken = 0;
	private lastInbound = 0;
	private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
	private pingTimer: ReturnType<typeof setInterval> | null = null;

	private readonly counters: SessionStats = {
		packetsSent: 0,
		packetsReceived: 0,
		droppedMessages: 0,
		reconnectAttempts: 0,
	};

	constructor(options: SessionManagerOptions) {
		this.config = options.config;
		this.dispatch = options.dispatch;
		this.transports = options.transports;
		this.codec = createClientCodec(this.config.maxMessageSize);
		this.latency = options.latency ?? new LatencyMonitor({ windowSize: this.config.latencyWindowSize });
		this.now = options.now ?? Date.now;
		this.sleep = options.sleep;
		this.limiter = new RateLimiter(this.config.maxDatagramsPerSecond, this.now);

		this.events = new EventSystem<SessionEvents>({ name: "SessionManager" });
		this.messages = new EventSystem<ServerEventMap>({ name: "SessionManager" });
	}

	get state(): ConnectionState {
		return this.currentState;
	}

	get isConnected(): boolean {
		return this.currentState === ConnectionState.Connected;
	}

	get clientId(): string | undefined {
		return this.session?.clientId;
	}

	get roomId(): string | undefined {
		return this.session?.roomId;
	}

	get isHost(): boolean {
		return this.session?.isHost ?? false;
	}

	/**
	 * Snapshot of the current session, null while not registered.
	 */
	get current(): Readonly<Session> | null {
		return this.session ? { ...this.session } : null;
	}

	get latencyMonitor(): LatencyMonitor {
		return this.latency;
	}

	stats(): SessionStats {
		return { ...this.counters };
	}

	/**
	 * Subscribe to a lifecycle event.
	 * @returns Unsubscribe function
	 */
	on<K extends keyof SessionEvents>(name: K, handler: (event: SessionEvents[K]) => void): () => void {
		return this.events.on(name, handler);
	}

	/**
	 * Subscribe to one server event tag. Handlers run on drain, while connected.
	 * @returns Unsubscribe function
	 */
	onMessage<K extends ServerEventType>(type: K, handler: (event: ServerEventMap[K]) => void): () => void {
		return this.messages.on(type, handler);
	}

	/**
	 * Open both channels and register with the relay.
	 *
	 * @returns The assigned client id, once REGISTERED has been drained
	 * @throws ConfigError synchronously on an invalid endpoint or empty name
	 * @throws InvalidStateError synchronously while a connect is already in flight
	 */
	connect(credentials: Credentials): Promise<string> {
		validateEndpoint(this.config);
		if (credentials.name.trim() === "") {
			throw new ConfigError("name", "must not be empty");
		}

		switch (this.currentState) {
			case ConnectionState.Connected:
				return Promise.resolve(this.session?.clientId ?? "");
			case ConnectionState.Connecting:
				throw new InvalidStateError("connect", "a connection attempt is in progress");
			case ConnectionState.Failed:
				return Promise.reject(new InvalidStateError("connect", "failed; call reconnect() or disconnect() first"));
			case ConnectionState.Disconnected:
				this.credentials = credentials;
				return this.beginAttempt(this.config.connectTimeout);
		}
	}

	/**
	 * Leave the relay. Sends DISCONNECT best-effort, closes both channels and
	 * clears the session. Calling it while disconnected does nothing.
	 */
	disconnect(reason: string = "Disconnected by client"): Promise<void> {
		this.cancelReconnect();

		if (this.currentState === ConnectionState.Disconnected && !this.pending && !this.channels) {
			return Promise.resolve();
		}

		if (this.pending) {
			const pending = this.pending;
			this.pending = null;
			clearTimeout(pending.timer);
			pending.reject(new ConnectionError("Connect cancelled by disconnect()"));
		}

		if (this.currentState === ConnectionState.Connected) {
			try {
				this.count(this.channels?.reliable?.send({ type: "DISCONNECT" }) ?? false);
			} catch (error) {
				this.log(`DISCONNECT not sent: ${toError(error).message}`);
			}
		}

		this.stopTimers();
		const closing = this.closeChannels();
		this.session = null;
		this.setState(ConnectionState.Disconnected);
		this.events.emit("disconnected", { reason });
		return closing;
	}

	/**
	 * Retry the connection from Failed with exponential backoff.
	 *
	 * Makes exactly `reconnect.maxAttempts` attempts, waiting
	 * `backoffDelay(n)` before attempt n. After the last failure the session
	 * stays Failed, `reconnectFailed` fires and the promise rejects with
	 * {@link ReconnectExhaustedError}. Calling it again while a run is in
	 * progress returns the same run.
	 */
	reconnect(): Promise<string> {
		if (this.reconnectRun) {
			return this.reconnectRun.promise;
		}
		if (this.currentState !== ConnectionState.Failed) {
			return Promise.reject(new InvalidStateError("reconnect", this.currentState.toLowerCase()));
		}
		if (!this.credentials) {
			return Promise.reject(new InvalidStateError("reconnect", "no previous credentials"));
		}

		const run: ReconnectRun = { cancelled: false, promise: Promise.resolve(""), wake: null };
		this.reconnectRun = run;
		run.promise = this.runReconnect(run);
		return run.promise;
	}

	/**
	 * Write a command on the reliable channel.
	 * @returns false when not connected or the write was refused
	 */
	sendReliable(command: ClientCommand): boolean {
		if (this.currentState !== ConnectionState.Connected || !this.channels?.reliable) {
			this.log(`Not connected, ${command.type} not sent`);
			return false;
		}
		return this.count(this.channels.reliable.send(command));
	}

	/**
	 * Write a command as one datagram, subject to `maxDatagramsPerSecond`.
	 * @returns false when not connected, rate limited, or refused
	 */
	sendUnreliable(command: ClientCommand): boolean {
		if (this.currentState !== ConnectionState.Connected || !this.channels?.datagram) {
			this.log(`Not connected, ${command.type} datagram not sent`);
			return false;
		}
		if (!this.limiter.tryAcquire()) {
			this.log(`Rate limit exceeded, dropping ${command.type} datagram`);
			return false;
		}
		return this.count(this.channels.datagram.send(command));
	}

	/**
	 * Send GAME_DATA for the current room, to everyone or to one player.
	 * @returns false when not in a room or the datagram was not sent
	 */
	sendGameData(data: GameData, targetId?: string): boolean {
		const session = this.session;
		if (!session || session.roomId === undefined) {
			this.log(`Not in a room, ${data.type} not sent`);
			return false;
		}

		return this.sendUnreliable({
			type: "GAME_DATA",
			clientId: session.clientId,
			roomId: session.roomId,
			...(targetId !== undefined ? { targetId } : {}),
			data,
		});
	}

	/**
	 * Record room membership. Called by the room registry.
	 */
	setRoom(roomId: string | undefined, isHost: boolean): void {
		if (!this.session) return;
		this.session.roomId = roomId;
		this.session.isHost = roomId !== undefined && isHost;
	}

	private count(sent: boolean): boolean {
		if (sent) this.counters.packetsSent++;
		return sent;
	}

	/* ---------- connection attempt ---------- */

	private beginAttempt(timeout: number): Promise<string> {
		const token = ++this.nextToken;
		this.setState(ConnectionState.Connecting);

		return new Promise<string>((resolve, reject) => {
			const timer = setTimeout(() => {
				this.dispatch.enqueue(() =>
					this.failAttempt(token, new ConnectionError(`No registration from relay within ${timeout}ms`))
				);
			}, timeout);

			this.pending = { token, timer, greeting: null, resolve, reject };
			this.channels = { token, reliable: null, datagram: null };

			const { host, tcpPort, tls, allowSelfSigned, connectTimeout, closeTimeout, debug } = this.config;
			this.log(`Connecting to ${host}:${tcpPort}${tls ? " (TLS)" : ""}`);

			void this.transports.openStream({ host, port: tcpPort, tls, allowSelfSigned, connectTimeout, closeTimeout, debug }).then(
				(transport) => this.dispatch.enqueue(() => this.onStreamOpened(token, transport)),
				(error: unknown) =>
					this.dispatch.enqueue(() =>
						this.failAttempt(token, new ConnectionError(`Could not reach relay at ${host}:${tcpPort}`, toError(error)))
					)
			);
		});
	}

	private onStreamOpened(token: number, transport: TransportAdapter): void {
		if (!this.pending || this.pending.token !== token || !this.channels) {
			this.closeQuietly(transport);
			return;
		}

		this.channels.reliable = new ReliableChannel<ClientCommand, ServerEvent>({
			name: "tcp",
			transport,
			codec: this.codec,
			debug: this.config.debug,
			sink: {
				onMessage: (event) => this.dispatch.enqueue(() => this.handleEvent(token, event)),
				onProtocolError: () => this.dispatch.enqueue(() => this.counters.droppedMessages++),
				onLost: (error) => this.dispatch.enqueue(() => this.handleLoss(token, error)),
			},
		});

		const { host, udpPort, udpLocalPort, debug } = this.config;
		void this.transports.openDatagram({ host, port: udpPort, localPort: udpLocalPort, debug }).then(
			(datagram) => this.dispatch.enqueue(() => this.onDatagramOpened(token, datagram)),
			(error: unknown) =>
				this.dispatch.enqueue(() =>
					this.failAttempt(token, new ConnectionError("Could not open the datagram channel", toError(error)))
				)
		);
	}

	private onDatagramOpened(token: number, transport: TransportAdapter): void {
		const credentials = this.credentials;
		const pending = this.pending;
		if (!pending || pending.token !== token || !this.channels?.reliable || !credentials) {
			this.closeQuietly(transport);
			return;
		}

		this.channels.datagram = new DatagramChannel<ClientCommand, ServerEvent>({
			name: "udp",
			transport,
			codec: this.codec,
			debug: this.config.debug,
			requireEncryption: this.config.udpEncryption,
			sink: {
				onMessage: (event) => this.dispatch.enqueue(() => this.handleEvent(token, event)),
				onProtocolError: () => this.dispatch.enqueue(() => this.counters.droppedMessages++),
				onLost: (error) => this.dispatch.enqueue(() => this.handleLoss(token, error)),
			},
		});

		this.lastInbound = this.now();
		this.count(
			this.channels.reliable.send({
				type: "REGISTER",
				name: credentials.name,
				...(credentials.password !== undefined ? { password: credentials.password } : {}),
				protocolVersion: this.config.protocolVersion,
			})
		);

		// Relays that greet on accept have already answered
		if (pending.greeting) {
			this.completeRegistration(token, pending.greeting);
		}
	}

	private completeRegistration(token: number, event: RegisteredEvent): void {
		const pending = this.pending;
		const channels = this.channels;
		if (!pending || pending.token !== token || !channels?.reliable || !this.credentials) {
			this.log("Ignoring unexpected REGISTERED");
			return;
		}
		if (!channels.datagram) {
			pending.greeting = event;
			return;
		}

		const expected = this.config.protocolVersion;
		if (event.protocolVersion !== undefined && event.protocolVersion !== expected) {
			this.failAttempt(
				token,
				new ConnectionError(`Protocol version mismatch: client speaks ${expected}, relay speaks ${event.protocolVersion}`)
			);
			return;
		}
		if (event.clientId === "") {
			this.failAttempt(token, new ConnectionError("Relay assigned an empty client id"));
			return;
		}

		this.pending = null;
		clearTimeout(pending.timer);

		if (this.config.udpEncryption) {
			channels.datagram?.setEncryption(new UdpEncryption(event.clientId, this.config.udpSharedSecret));
		}

		this.session = {
			clientId: event.clientId,
			roomId: undefined,
			isHost: false,
			connectionState: ConnectionState.Connected,
			lastActivityTime: this.now(),
		};
		this.lastInbound = this.now();
		this.limiter.reset();
		this.latency.reset();
		this.setState(ConnectionState.Connected);

		this.count(channels.reliable.send({ type: "PLAYER_INFO", name: this.credentials.name }));
		this.startTimers(token);

		this.log(`Registered as ${event.clientId}`);
		this.events.emit("connected", { clientId: event.clientId });
		pending.resolve(event.clientId);
	}

	private failAttempt(token: number, error: Error): void {
		const pending = this.pending;
		if (!pending || pending.token !== token) return;

		this.pending = null;
		clearTimeout(pending.timer);
		this.closeQuietlyAll();
		this.setState(ConnectionState.Failed);

		this.log(`Connect failed: ${error.message}`);
		this.events.emit("connectionFailed", { error });
		pending.reject(error);
	}

	/* ---------- steady state ---------- */

	private handleEvent(token: number, event: ServerEvent): void {
		if (!this.channels || this.channels.token !== token) return;

		this.counters.packetsReceived++;
		this.lastInbound = this.now();
		if (this.session) {
			this.session.lastActivityTime = this.lastInbound;
		}

		switch (event.type) {
			case "REGISTERED":
				this.completeRegistration(token, event);
				return;
			case "AUTH_FAILED":
				this.log(`Authentication failed: ${event.reason}`);
				this.events.emit("authFailed", { reason: event.reason });
				return;
			case "PING_RESPONSE":
				this.latency.recordPong(event.timestamp);
				break;
			case "KICKED":
				if (this.currentState === ConnectionState.Connected) {
					this.log(`Kicked by relay${event.reason ? `: ${event.reason}` : ""}`);
					this.messages.emit("KICKED", event);
					this.events.emit("kicked", { reason: event.reason });
					this.disconnect(`Kicked${event.reason ? `: ${event.reason}` : ""}`).catch((error: unknown) =>
						this.log(`Close after kick failed: ${toError(error).message}`)
					);
				}
				return;
		}

		if (this.currentState !== ConnectionState.Connected) {
			this.log(`Ignoring ${event.type} before registration`);
			return;
		}

		this.messages.emit(event.type, event);
	}

	/**
	 * A channel ended on its own. Fails a pending attempt, or moves a live
	 * session to Failed exactly once.
	 */
	private handleLoss(token: number, error: Error): void {
		if (!this.channels || this.channels.token !== token) return;

		if (this.pending?.token === token) {
			this.failAttempt(token, error);
			return;
		}
		if (this.currentState !== ConnectionState.Connected) return;

		this.stopTimers();
		this.closeQuietlyAll();
		this.session = null;
		this.setState(ConnectionState.Failed);

		this.log(`Connection lost: ${error.message}`);
		this.events.emit("connectionLost", { error });

		if (this.config.autoReconnect && this.state === ConnectionState.Failed) {
			this.reconnect().catch((reconnectError: unknown) =>
				this.log(`Automatic reconnect ended: ${toError(reconnectError).message}`)
			);
		}
	}

	private startTimers(token: number): void {
		this.stopTimers();

		this.heartbeatTimer = setInterval(() => {
			this.dispatch.enqueue(() => this.heartbeat(token));
		}, this.config.heartbeatInterval);

		this.pingTimer = setInterval(() => {
			this.dispatch.enqueue(() => {
				if (this.channels?.token === token && this.isConnected) {
					this.sendReliable(this.latency.createPing());
				}
			});
		}, this.config.pingInterval);
	}

	private heartbeat(token: number): void {
		if (this.channels?.token !== token || !this.isConnected) return;

		const silence = this.now() - this.lastInbound;
		if (silence >= this.config.heartbeatTimeout) {
			this.handleLoss(token, new ConnectionError(`No traffic from relay for ${silence}ms`));
			return;
		}

		this.sendReliable({ type: "HEARTBEAT" });
	}

	private stopTimers(): void {
		if (this.heartbeatTimer !== null) {
			clearInterval(this.heartbeatTimer);
			this.heartbeatTimer = null;
		}
		if (this.pingTimer !== null) {
			clearInterval(this.pingTimer);
			this.pingTimer = null;
		}
	}

	/* ---------- reconnect ---------- */

	private async runReconnect(run: ReconnectRun): Promise<string> {
		const { maxAttempts, attemptTimeout } = this.config.reconnect;
		let lastError: Error | undefined;

		try {
			for (let attempt = 1; attempt <= maxAttempts; attempt++) {
				const delay = backoffDelay(attempt, this.config.reconnect);
				this.log(`Reconnect attempt ${attempt}/${maxAttempts} in ${delay}ms`);
				this.events.emit("reconnecting", { attempt, maxAttempts, delay });

				await this.waitBackoff(run, delay);
				if (run.cancelled) {
					throw new ConnectionError("Reconnect cancelled");
				}

				this.counters.reconnectAttempts++;
				try {
					return await this.beginAttempt(attemptTimeout);
				} catch (error) {
					lastError = toError(error);
					if (run.cancelled) {
						throw lastError;
					}
				}
			}

			const exhausted = new ReconnectExhaustedError(maxAttempts, lastError);
			this.log(exhausted.message);
			this.events.emit("reconnectFailed", { error: exhausted });
			throw exhausted;
		} finally {
			if (this.reconnectRun === run) {
				this.reconnectRun = null;
			}
		}
	}

	/**
	 * Injected sleeps are awaited as they are. The default one resumes on the
	 * next drain and can be cut short by {@link cancelReconnect}.
	 */
	private waitBackoff(run: ReconnectRun, ms: number): Promise<void> {
		if (this.sleep) {
			return this.sleep(ms);
		}

		return new Promise<void>((resolve) => {
			const timer = setTimeout(() => {
				run.wake = null;
				this.dispatch.enqueue(() => resolve());
			}, ms);
			run.wake = () => {
				clearTimeout(timer);
				run.wake = null;
				resolve();
			};
		});
	}

	private cancelReconnect(): void {
		const run = this.reconnectRun;
		if (run) {
			run.cancelled = true;
			this.reconnectRun = null;
			run.wake?.();
		}
	}

	/* ---------- helpers ---------- */

	private closeChannels(): Promise<void> {
		const channels = this.channels;
		this.channels = null;
		if (!channels) return Promise.resolve();

		const closing = [channels.reliable, channels.datagram].map((channel) =>
			channel ? channel.close() : Promise.resolve()
		);

		return Promise.allSettled(closing).then((results) => {
			for (const result of results) {
				if (result.status === "rejected") {
					this.log(`Channel close failed: ${toError(result.reason).message}`);
				}
			}
		});
	}

	private closeQuietlyAll(): void {
		this.closeChannels().catch((error: unknown) => this.log(`Channel close failed: ${toError(error).message}`));
	}

	private closeQuietly(transport: TransportAdapter): void {
		transport.close().catch((error: unknown) => this.log(`Stale transport close failed: ${toError(error).message}`));
	}

	private setState(next: ConnectionState): void {
		const from = this.currentState;
		if (from === next) return;

		this.currentState = next;
		if (this.session) {
			this.session.connectionState = next;
		}
		this.log(`${from} -> ${next}`);
		this.events.emit("stateChanged", { from, to: next });
	}

	private log(message: string): void {
		if (this.config.debug) {
			console.log(`[SessionManager] ${message}`);
		}
	}
}
