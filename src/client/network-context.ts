import { resolveConfig, type RelayClientConfig, type ResolvedConfig } from "../config/config";
import { DispatchQueue } from "../core/dispatch/dispatch-queue";
import { createDriver, type DriverType, type LoopDriver } from "../core/loop/loop";
import { LatencyMonitor } from "../latency/latency-monitor";
import { NodeTransportFactory } from "../net/node-factory";
import type { TransportFactory } from "../net/types";
import type { ServerEventMap } from "../protocol/messages/events";
import type { InputPayload, StatePayload } from "../protocol/messages/types";
import { RoomRegistry } from "../rooms/room-registry";
import { SessionManager, type Credentials } from "../session/session-manager";
import { StateSynchronizer } from "../sync/state-synchronizer";

export interface NetworkContextOptions {
	/** Socket factory (default: real TCP/TLS and UDP sockets) */
	transports?: TransportFactory;

	/** Clock in milliseconds (default: Date.now) */
	now?: () => number;

	/** Waits out a reconnect backoff delay */
	sleep?: (ms: number) => Promise<void>;
}

/**
 * Everything one client needs to race online, built from one config and
 * owned in one place.
 *
 * The consumer calls {@link tick} once per frame (or lets {@link start} do
 * it): queued network work runs, then remote vehicles are blended.
 *
 * @example
 * ```ts
 * const net = new NetworkContext({ host: "relay.example.net", tls: true });
 * net.rooms.on("roomJoined", ({ roomId }) => console.log(`In ${roomId}`));
 * net.start();
 * await net.connect({ name: "Player" });
 * net.rooms.requestList();
 * ```
 */
export class NetworkContext {
	readonly config: ResolvedConfig;
	readonly dispatch: DispatchQueue;
	readonly latency: LatencyMonitor;
	readonly session: SessionManager;
	readonly rooms: RoomRegistry;
	readonly sync: StateSynchronizer;

	private driver: LoopDriver | null = null;
	private readonly unsubscribers: Array<() => void> = [];

	/**
	 * @throws ConfigError when the config is invalid
	 */
	constructor(config: RelayClientConfig, options: NetworkContextOptions = {}) {
		this.config = resolveConfig(config);
		const now = options.now ?? Date.now;

		this.dispatch = new DispatchQueue({ maxPerDrain: this.config.maxDispatchPerTick, debug: this.config.debug });
		this.latency = new LatencyMonitor({ windowSize: this.config.latencyWindowSize, now, debug: this.config.debug });
		this.session = new SessionManager({
			config: this.config,
			dispatch: this.dispatch,
			transports: options.transports ?? new NodeTransportFactory(),
			latency: this.latency,
			now,
			sleep: options.sleep,
		});
		this.rooms = new RoomRegistry(this.session, {
			roomListThrottle: this.config.roomListThrottle,
			now,
			debug: this.config.debug,
		});
		this.sync = new StateSynchronizer({
			localId: () => this.session.clientId,
			desyncThreshold: this.config.desyncThreshold,
			blendRate: this.config.blendRate,
			debug: this.config.debug,
		});

		this.unsubscribers.push(
			this.session.onMessage("GAME_DATA", (event) => this.handleGameData(event)),
			this.rooms.on("playerLeft", ({ playerId }) => this.sync.remove(playerId)),
			this.rooms.on("roomLeft", () => this.sync.clear()),
			this.rooms.on("roomClosed", () => this.sync.clear())
		);
	}

	get running(): boolean {
		return this.driver?.running ?? false;
	}

	/**
	 * Run queued network work, then blend remote vehicles.
	 * @param dt - Seconds since the previous tick
	 * @returns Number of queued actions run
	 */
	tick(dt: number): number {
		const processed = this.dispatch.drain();
		this.sync.step(dt);
		return processed;
	}

	/**
	 * Call {@link tick} continuously on a loop driver.
	 */
	start(type: DriverType = "timeout"): void {
		if (this.driver?.running) return;
		this.driver = createDriver(type, (dt) => this.tick(dt));
		this.driver.start();
	}

	stop(): void {
		this.driver?.stop();
		this.driver = null;
	}

	/**
	 * Connect to the relay. Resolves during a later tick.
	 */
	connect(credentials: Credentials): Promise<string> {
		return this.session.connect(credentials);
	}

	/**
	 * Send the local vehicle's state to the room.
	 * @returns false when not in a room or the datagram was not sent
	 */
	publishState(state: StatePayload, targetId?: string): boolean {
		return this.session.sendGameData({ type: "PLAYER_STATE", state }, targetId);
	}

	/**
	 * Send the local driver input to the room.
	 */
	publishInput(input: InputPayload, targetId?: string): boolean {
		return this.session.sendGameData({ type: "PLAYER_INPUT", input }, targetId);
	}

	/**
	 * Stop the loop, disconnect and detach everything. The context is unusable afterwards.
	 */
	async shutdown(): Promise<void> {
		this.stop();
		await this.session.disconnect("Shutting down");
		for (const unsubscribe of this.unsubscribers) unsubscribe();
		this.unsubscribers.length = 0;
		this.rooms.dispose();
		this.sync.clear();
		this.dispatch.clear();
	}

	private handleGameData(event: ServerEventMap["GAME_DATA"]): void {
		// Only current room members get a record; late datagrams from departed players are dropped
		if (!this.rooms.inRoom || event.from === this.session.clientId || !this.rooms.hasPlayer(event.from)) return;

		const { data } = event;
		switch (data.type) {
			case "PLAYER_STATE":
				this.sync.applyState({ playerId: event.from, ...data.state });
				break;
			case "PLAYER_INPUT":
				this.sync.applyInput({ playerId: event.from, ...data.input });
				break;
		}
	}
}
