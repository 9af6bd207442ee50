import { EventSystem } from "../core/events/event-system";
import type { ServerEventMap } from "../protocol/messages/events";
import { ROOM_CLOSED_MESSAGE, type RoomInfo, type Vec3 } from "../protocol/messages/types";
import type { SessionManager } from "../session/session-manager";

/**
 * Outcome of a room request. Anything other than "sent" means no command went out.
 */
export type RoomRequestResult =
	| "sent"
	| "throttled"
	| "not-connected"
	| "not-in-room"
	| "already-in-room"
	| "request-pending"
	| "not-host";

export type RoomLeaveReason = "left" | "connection-lost" | "disconnected";

export type RoomCloseReason = "host-left" | "host-disconnected";

/**
 * Events of the client-side room view
 */
export type RoomEvents = {
	roomListUpdated: { rooms: RoomInfo[] };
	roomJoined: { roomId: string; hostId: string; isHost: boolean };
	roomLeft: { roomId: string; reason: RoomLeaveReason };
	roomClosed: { roomId: string; reason: RoomCloseReason };
	joinFailed: { reason: string };
	playerJoined: { playerId: string };
	playerLeft: { playerId: string };
	rosterChanged: { players: string[] };
	gameStarted: { spawnPosition: Vec3; playerIds: string[] };
	relay: { from: string; message: string };
};

export interface RoomRegistryConfig {
	/** Minimum time between room list requests in milliseconds (default: 1000) */
	roomListThrottle?: number;

	/** Clock in milliseconds (default: Date.now) */
	now?: () => number;

	/** Enable debug logging */
	debug?: boolean;
}

type PendingRequest = { kind: "host"; roomName: string } | { kind: "join"; roomId: string };

/**
 * Client-side view of the relay's rooms: the browsable list and the roster
 * of the room this client is in.
 *
 * All handlers run from the session's drained events. The roster only ever
 * changes by insert or remove of single ids; roster responses are merged, so
 * a late response cannot drop a player whose join event arrived first.
 *
 * @example
 * ```ts
 * const rooms = new RoomRegistry(session, { roomListThrottle: 1000 });
 * rooms.on("roomJoined", ({ roomId, isHost }) => showLobby(roomId, isHost));
 * rooms.hostRoom("Alpha", 4);
 * ```
 */
export class RoomRegistry {
	private readonly session: SessionManager;
	private readonly events = new EventSystem<RoomEvents>({ name: "RoomRegistry" });
	private readonly throttle: number;
	private readonly now: () => number;
	private readonly debug: boolean;
	private readonly unsubscribers: Array<() => void> = [];

	private rooms = new Map<string, RoomInfo>();
	private members = new Set<string>();
	private currentRoomId: string | undefined;
	private currentHostId: string | undefined;
	private pending: PendingRequest | null = null;
	private lastListRequest: number | null = null;
	private started = false;

	constructor(session: SessionManager, config: RoomRegistryConfig = {}) {
		this.session = session;
		this.throttle = config.roomListThrottle ?? 1000;
		this.now = config.now ?? Date.now;
		this.debug = config.debug ?? false;

		this.unsubscribers.push(
			session.onMessage("GAME_LIST", (event) => this.handleGameList(event)),
			session.onMessage("GAME_HOSTED", (event) => this.handleGameHosted(event)),
			session.onMessage("JOINED_GAME", (event) => this.handleJoinedGame(event)),
			session.onMessage("JOIN_FAILED", (event) => this.handleJoinFailed(event)),
			session.onMessage("PLAYER_JOINED", (event) => this.addPlayer(event.clientId)),
			session.onMessage("PLAYER_DISCONNECTED", (event) => this.handlePlayerDisconnected(event)),
			session.onMessage("ROOM_PLAYERS", (event) => this.mergeRoster(event.players)),
			session.onMessage("GAME_STARTED", (event) => this.handleGameStarted(event)),
			session.onMessage("RELAY", (event) => this.handleRelay(event)),
			session.on("connectionLost", () => this.resetRoom("connection-lost")),
			session.on("disconnected", () => this.resetRoom("disconnected"))
		);
	}

	/* ---------- Queries ---------- */

	/**
	 * Rooms from the latest list response, one per roomId.
	 */
	get roomList(): RoomInfo[] {
		return Array.from(this.rooms.values());
	}

	get roomId(): string | undefined {
		return this.currentRoomId;
	}

	get hostId(): string | undefined {
		return this.currentHostId;
	}

	get inRoom(): boolean {
		return this.currentRoomId !== undefined;
	}

	get isHost(): boolean {
		return this.inRoom && this.currentHostId === this.session.clientId;
	}

	get gameStarted(): boolean {
		return this.started;
	}

	/**
	 * Player ids in the current room, the local client included.
	 */
	get roster(): string[] {
		return Array.from(this.members);
	}

	hasPlayer(playerId: string): boolean {
		return this.members.has(playerId);
	}

	get pendingRequest(): "host" | "join" | null {
		return this.pending?.kind ?? null;
	}

	/* ---------- Events ---------- */

	on<K extends keyof RoomEvents>(name: K, handler: (event: RoomEvents[K]) => void): () => void {
		return this.events.on(name, handler);
	}

	/* ---------- Requests ---------- */

	/**
	 * Ask the relay for the room list, at most once per throttle window.
	 */
	requestList(): RoomRequestResult {
		if (!this.session.isConnected) {
			return "not-connected";
		}

		const now = this.now();
		if (this.lastListRequest !== null && now - this.lastListRequest < this.throttle) {
			this.log(`Room list request skipped, too soon (${now - this.lastListRequest}ms < ${this.throttle}ms)`);
			return "throttled";
		}

		if (!this.session.sendReliable({ type: "LIST_GAMES" })) {
			return "not-connected";
		}
		this.lastListRequest = now;
		return "sent";
	}

	/**
	 * Create a room. The local client becomes host once GAME_HOSTED arrives.
	 * @throws RangeError on an empty name or fewer than 2 seats
	 */
	hostRoom(roomName: string, maxPlayers: number): RoomRequestResult {
		if (roomName.trim() === "") {
			throw new RangeError("Room name must not be empty");
		}
		if (!Number.isInteger(maxPlayers) || maxPlayers < 2) {
			throw new RangeError(`maxPlayers must be an integer of at least 2, got ${maxPlayers}`);
		}

		const blocked = this.checkCanRequest();
		if (blocked) return blocked;

		if (!this.session.sendReliable({ type: "HOST_GAME", roomName, maxPlayers })) {
			return "not-connected";
		}
		this.pending = { kind: "host", roomName };
		return "sent";
	}

	/**
	 * Join an existing room. Membership starts once JOINED_GAME arrives.
	 */
	joinRoom(roomId: string): RoomRequestResult {
		const blocked = this.checkCanRequest();
		if (blocked) return blocked;

		if (!this.session.sendReliable({ type: "JOIN_GAME", roomId })) {
			return "not-connected";
		}
		this.pending = { kind: "join", roomId };
		return "sent";
	}

	/**
	 * Leave the current room. A host first tells the room it is closing.
	 * Local room state is cleared whether or not the commands could be sent.
	 */
	leaveRoom(): RoomRequestResult {
		const roomId = this.currentRoomId;
		if (roomId === undefined) {
			return "not-in-room";
		}

		let result: RoomRequestResult = "sent";
		if (this.session.isConnected) {
			if (this.isHost) {
				this.session.sendReliable({ type: "RELAY_MESSAGE", roomId, message: ROOM_CLOSED_MESSAGE });
			}
			this.session.sendReliable({ type: "LEAVE_ROOM", roomId });
		} else {
			result = "not-connected";
		}

		this.clearRoom();
		this.events.emit("roomLeft", { roomId, reason: "left" });
		this.requestList();
		return result;
	}

	/**
	 * Ask for the full roster of the current room. The reply is merged in.
	 */
	requestRoster(): RoomRequestResult {
		if (this.currentRoomId === undefined) return "not-in-room";
		return this.session.sendReliable({ type: "GET_ROOM_PLAYERS", roomId: this.currentRoomId })
			? "sent"
			: "not-connected";
	}

	/**
	 * Start the race. Host only.
	 */
	startGame(): RoomRequestResult {
		if (this.currentRoomId === undefined) return "not-in-room";
		if (!this.isHost) return "not-host";
		return this.session.sendReliable({ type: "START_GAME", roomId: this.currentRoomId }) ? "sent" : "not-connected";
	}

	/**
	 * Relay a text message to the whole room, or to one client when targetId is given.
	 */
	sendRelay(message: string, targetId?: string): RoomRequestResult {
		if (targetId !== undefined) {
			return this.session.sendReliable({ type: "RELAY_MESSAGE", targetId, message }) ? "sent" : "not-connected";
		}
		if (this.currentRoomId === undefined) return "not-in-room";
		return this.session.sendReliable({ type: "RELAY_MESSAGE", roomId: this.currentRoomId, message })
			? "sent"
			: "not-connected";
	}

	/**
	 * Detach from the session.
	 */
	dispose(): void {
		for (const unsubscribe of this.unsubscribers) unsubscribe();
		this.unsubscribers.length = 0;
		this.events.clear();
	}

	/* ---------- Event handlers ---------- */

	private handleGameList(event: ServerEventMap["GAME_LIST"]): void {
		const rooms = new Map<string, RoomInfo>();
		for (const room of event.rooms) {
			rooms.set(room.roomId, room);
		}
		this.rooms = rooms;
		this.events.emit("roomListUpdated", { rooms: this.roomList });
	}

	private handleGameHosted(event: ServerEventMap["GAME_HOSTED"]): void {
		const clientId = this.session.clientId;
		if (this.pending?.kind !== "host" || clientId === undefined) {
			this.log(`Ignoring unexpected GAME_HOSTED for ${event.roomId}`);
			return;
		}

		this.pending = null;
		this.enterRoom(event.roomId, clientId, [clientId]);
	}

	private handleJoinedGame(event: ServerEventMap["JOINED_GAME"]): void {
		const clientId = this.session.clientId;
		if (this.pending?.kind !== "join" || clientId === undefined) {
			this.log(`Ignoring unexpected JOINED_GAME for ${event.roomId}`);
			return;
		}
		if (this.pending.roomId !== event.roomId) {
			this.log(`Asked to join ${this.pending.roomId}, relay placed us in ${event.roomId}`);
		}

		this.pending = null;
		this.started = event.gameStarted ?? false;
		this.enterRoom(event.roomId, event.hostId, [clientId, ...(event.players ?? [])]);

		// The join acknowledgement may not list everyone
		this.requestRoster();
	}

	private handleJoinFailed(event: ServerEventMap["JOIN_FAILED"]): void {
		if (this.pending?.kind === "join") {
			this.pending = null;
		}
		this.log(`Join failed: ${event.reason}`);
		this.events.emit("joinFailed", { reason: event.reason });
	}

	private handlePlayerDisconnected(event: ServerEventMap["PLAYER_DISCONNECTED"]): void {
		if (!this.inRoom) return;

		if (event.playerId === this.currentHostId && !this.isHost) {
			this.closeRoom("host-disconnected");
			return;
		}
		this.removePlayer(event.playerId);
	}

	private handleGameStarted(event: ServerEventMap["GAME_STARTED"]): void {
		if (!this.inRoom) {
			this.log("Ignoring GAME_STARTED outside a room");
			return;
		}
		this.started = true;
		this.events.emit("gameStarted", {
			spawnPosition: event.spawnPosition,
			playerIds: event.playerIds ?? this.roster,
		});
	}

	private handleRelay(event: ServerEventMap["RELAY"]): void {
		if (
			event.message === ROOM_CLOSED_MESSAGE &&
			this.inRoom &&
			!this.isHost &&
			event.from === this.currentHostId
		) {
			this.closeRoom("host-left");
			return;
		}
		this.events.emit("relay", { from: event.from, message: event.message });
	}

	/* ---------- Room state ---------- */

	private checkCanRequest(): RoomRequestResult | null {
		if (!this.session.isConnected) return "not-connected";
		if (this.inRoom) return "already-in-room";
		if (this.pending) return "request-pending";
		return null;
	}

	private enterRoom(roomId: string, hostId: string, players: string[]): void {
		this.currentRoomId = roomId;
		this.currentHostId = hostId;
		this.members = new Set(players);

		const isHost = this.isHost;
		this.session.setRoom(roomId, isHost);

		this.log(`Entered room ${roomId} as ${isHost ? "host" : "guest"}`);
		this.events.emit("roomJoined", { roomId, hostId, isHost });
		this.events.emit("rosterChanged", { players: this.roster });
	}

	private addPlayer(playerId: string): void {
		if (!this.inRoom || this.members.has(playerId)) return;

		this.members.add(playerId);
		this.events.emit("playerJoined", { playerId });
		this.events.emit("rosterChanged", { players: this.roster });
	}

	private removePlayer(playerId: string): void {
		if (!this.members.delete(playerId)) return;

		this.events.emit("playerLeft", { playerId });
		this.events.emit("rosterChanged", { players: this.roster });
	}

	private mergeRoster(players: string[]): void {
		if (!this.inRoom) return;

		let changed = false;
		for (const playerId of players) {
			if (!this.members.has(playerId)) {
				this.members.add(playerId);
				this.events.emit("playerJoined", { playerId });
				changed = true;
			}
		}
		if (changed) {
			this.events.emit("rosterChanged", { players: this.roster });
		}
	}

	private closeRoom(reason: RoomCloseReason): void {
		const roomId = this.currentRoomId;
		if (roomId === undefined) return;

		this.clearRoom();
		this.log(`Room ${roomId} closed (${reason})`);
		this.events.emit("roomClosed", { roomId, reason });
		this.requestList();
	}

	private resetRoom(reason: RoomLeaveReason): void {
		const roomId = this.currentRoomId;
		this.pending = null;
		this.lastListRequest = null;
		if (roomId === undefined) return;

		this.clearRoom();
		this.events.emit("roomLeft", { roomId, reason });
	}

	private clearRoom(): void {
		this.currentRoomId = undefined;
		this.currentHostId = undefined;
		this.members = new Set();
		this.started = false;
		this.session.setRoom(undefined, false);
	}

	private log(message: string): void {
		if (this.debug) {
			console.log(`[RoomRegistry] ${message}`);
		}
	}
}
