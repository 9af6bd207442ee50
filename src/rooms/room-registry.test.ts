import { afterEach, describe, expect, test } from "vitest";
import { resolveConfig } from "../config/config";
import { DispatchQueue } from "../core/dispatch/dispatch-queue";
import { MemoryTransportFactory } from "../net/adapters/memory";
import type { ServerEvent } from "../protocol/messages/events";
import { SessionManager } from "../session/session-manager";
import { RoomRegistry, type RoomEvents } from "./room-registry";

async function createHarness() {
	const config = resolveConfig({ host: "127.0.0.1", autoReconnect: false });
	const dispatch = new DispatchQueue();
	const relay = new MemoryTransportFactory();
	const clock = { t: 50_000 };
	const session = new SessionManager({ config, dispatch, transports: relay, now: () => clock.t });
	const rooms = new RoomRegistry(session, { roomListThrottle: 1000, now: () => clock.t });

	relay.respond((command) => {
		switch (command.type) {
			case "REGISTER":
				return [{ type: "REGISTERED", clientId: "client_1" }];
			case "HOST_GAME":
				return [{ type: "GAME_HOSTED", roomId: "room_1" }];
			case "JOIN_GAME":
				return [{ type: "JOINED_GAME", roomId: command.roomId, hostId: "client_9", players: ["client_9"] }];
		}
	});

	const pump = async (rounds = 20) => {
		for (let i = 0; i < rounds; i++) {
			await new Promise((resolve) => setImmediate(resolve));
			dispatch.drain();
		}
	};

	const push = (event: ServerEvent) => {
		relay.sendEvent(event);
		while (dispatch.drain() > 0) {
			// keep draining follow-up actions
		}
	};

	const record = <K extends keyof RoomEvents>(name: K) => {
		const seen: RoomEvents[K][] = [];
		rooms.on(name, (event) => seen.push(event));
		return seen;
	};

	const connecting = session.connect({ name: "Alice" });
	await pump();
	await connecting;

	return { dispatch, relay, clock, session, rooms, pump, push, record };
}

let active: Awaited<ReturnType<typeof createHarness>> | null = null;

async function setup() {
	active = await createHarness();
	return active;
}

afterEach(async () => {
	if (active) {
		active.rooms.dispose();
		await active.session.disconnect();
		active = null;
	}
});

describe("RoomRegistry room list", () => {
	test("sends LIST_GAMES and collapses duplicate room ids", async () => {
		const { rooms, relay, push, record } = await setup();
		const updates = record("roomListUpdated");

		expect(rooms.requestList()).toBe("sent");
		push({
			type: "GAME_LIST",
			rooms: [
				{ roomId: "room_1", name: "Alpha", hostId: "client_2", playerCount: 1, maxPlayers: 4 },
				{ roomId: "room_2", name: "Beta", hostId: "client_3", playerCount: 2, maxPlayers: 2 },
				{ roomId: "room_1", name: "Alpha", hostId: "client_2", playerCount: 2, maxPlayers: 4 },
			],
		});

		expect(relay.commandTypes().filter((type) => type === "LIST_GAMES")).toHaveLength(1);
		expect(rooms.roomList.map((room) => [room.roomId, room.playerCount])).toEqual([
			["room_1", 2],
			["room_2", 2],
		]);
		expect(updates).toHaveLength(1);
	});

	test("throttles requests inside the window", async () => {
		const { rooms, relay, clock } = await setup();

		expect(rooms.requestList()).toBe("sent");
		clock.t += 500;
		expect(rooms.requestList()).toBe("throttled");
		clock.t += 500;
		expect(rooms.requestList()).toBe("sent");

		expect(relay.commandTypes().filter((type) => type === "LIST_GAMES")).toHaveLength(2);
	});

	test("refuses when not connected", async () => {
		const { rooms, session } = await setup();
		await session.disconnect();

		expect(rooms.requestList()).toBe("not-connected");
		expect(rooms.hostRoom("Alpha", 4)).toBe("not-connected");
		expect(rooms.joinRoom("room_1")).toBe("not-connected");
	});
});

describe("RoomRegistry hosting", () => {
	test("hosting seeds the roster with the local client and marks it host", async () => {
		const { rooms, session, relay, pump, record } = await setup();
		const joined = record("roomJoined");

		expect(rooms.hostRoom("Alpha", 4)).toBe("sent");
		expect(rooms.pendingRequest).toBe("host");
		await pump();

		expect(relay.commands().find((command) => command.type === "HOST_GAME")).toEqual({
			type: "HOST_GAME",
			roomName: "Alpha",
			maxPlayers: 4,
		});
		expect(rooms.roomId).toBe("room_1");
		expect(rooms.isHost).toBe(true);
		expect(rooms.roster).toEqual(["client_1"]);
		expect(rooms.pendingRequest).toBeNull();
		expect(session.roomId).toBe("room_1");
		expect(session.isHost).toBe(true);
		expect(joined).toEqual([{ roomId: "room_1", hostId: "client_1", isHost: true }]);
	});

	test("rejects invalid room parameters", async () => {
		const { rooms } = await setup();

		expect(() => rooms.hostRoom("  ", 4)).toThrow("Room name must not be empty");
		expect(() => rooms.hostRoom("Alpha", 1)).toThrow("maxPlayers must be an integer of at least 2, got 1");
	});

	test("ignores GAME_HOSTED nobody asked for", async () => {
		const { rooms, push } = await setup();

		push({ type: "GAME_HOSTED", roomId: "room_7" });

		expect(rooms.inRoom).toBe(false);
	});

	test("refuses a second request while one is pending or while in a room", async () => {
		const { rooms, pump } = await setup();

		expect(rooms.hostRoom("Alpha", 4)).toBe("sent");
		expect(rooms.joinRoom("room_2")).toBe("request-pending");
		await pump();
		expect(rooms.hostRoom("Beta", 4)).toBe("already-in-room");
	});

	test("only the host can start the race", async () => {
		const { rooms, relay, pump, push, record } = await setup();
		const started = record("gameStarted");

		expect(rooms.startGame()).toBe("not-in-room");
		rooms.hostRoom("Alpha", 4);
		await pump();

		expect(rooms.startGame()).toBe("sent");
		push({ type: "GAME_STARTED", spawnPosition: { x: 1, y: 0, z: 2 } });

		expect(relay.commands().at(-1)).toEqual({ type: "START_GAME", roomId: "room_1" });
		expect(rooms.gameStarted).toBe(true);
		expect(started).toEqual([{ spawnPosition: { x: 1, y: 0, z: 2 }, playerIds: ["client_1"] }]);
	});
});

describe("RoomRegistry joining", () => {
	test("joining computes host status, seeds the roster and asks for the full roster", async () => {
		const { rooms, relay, pump, push } = await setup();

		expect(rooms.joinRoom("room_4")).toBe("sent");
		await pump();

		expect(rooms.roomId).toBe("room_4");
		expect(rooms.hostId).toBe("client_9");
		expect(rooms.isHost).toBe(false);
		expect(rooms.roster).toEqual(["client_1", "client_9"]);
		expect(relay.commands().at(-1)).toEqual({ type: "GET_ROOM_PLAYERS", roomId: "room_4" });

		push({ type: "ROOM_PLAYERS", players: ["client_9", "client_5"] });
		expect(rooms.roster).toEqual(["client_1", "client_9", "client_5"]);
	});

	test("a late roster response cannot drop a player who joined first", async () => {
		const { rooms, pump, push } = await setup();
		rooms.joinRoom("room_4");
		await pump();

		push({ type: "PLAYER_JOINED", clientId: "client_6" });
		push({ type: "ROOM_PLAYERS", players: ["client_9"] });

		expect(rooms.hasPlayer("client_6")).toBe(true);
		expect(rooms.roster).toEqual(["client_1", "client_9", "client_6"]);
	});

	test("JOIN_FAILED reports the reason and leaves room state alone", async () => {
		const { rooms, relay, push, record } = await setup();
		relay.respond((command) => (command.type === "JOIN_GAME" ? [] : undefined));
		const failures = record("joinFailed");

		rooms.joinRoom("room_4");
		push({ type: "JOIN_FAILED", reason: "Room is full" });

		expect(failures).toEqual([{ reason: "Room is full" }]);
		expect(rooms.inRoom).toBe(false);
		expect(rooms.pendingRequest).toBeNull();
	});

	test("roster changes are applied one id at a time", async () => {
		const { rooms, pump, push, record } = await setup();
		rooms.joinRoom("room_4");
		await pump();
		const left = record("playerLeft");

		push({ type: "PLAYER_JOINED", clientId: "client_6" });
		push({ type: "PLAYER_JOINED", clientId: "client_6" });
		push({ type: "PLAYER_DISCONNECTED", playerId: "client_6" });
		push({ type: "PLAYER_DISCONNECTED", playerId: "client_6" });

		expect(rooms.roster).toEqual(["client_1", "client_9"]);
		expect(left).toEqual([{ playerId: "client_6" }]);
	});
});

describe("RoomRegistry leaving", () => {
	test("a host announces the closure before leaving and refreshes the list", async () => {
		const { rooms, session, relay, clock, pump, record } = await setup();
		const left = record("roomLeft");
		rooms.hostRoom("Alpha", 4);
		await pump();
		clock.t += 5000;

		expect(rooms.leaveRoom()).toBe("sent");

		expect(relay.commands().slice(-3)).toEqual([
			{ type: "RELAY_MESSAGE", roomId: "room_1", message: "ROOM_CLOSED" },
			{ type: "LEAVE_ROOM", roomId: "room_1" },
			{ type: "LIST_GAMES" },
		]);
		expect(left).toEqual([{ roomId: "room_1", reason: "left" }]);
		expect(rooms.inRoom).toBe(false);
		expect(session.roomId).toBeUndefined();
	});

	test("a guest only sends LEAVE_ROOM", async () => {
		const { rooms, relay, pump } = await setup();
		rooms.joinRoom("room_4");
		await pump();

		rooms.leaveRoom();

		expect(relay.commandTypes().slice(-2)).toEqual(["LEAVE_ROOM", "LIST_GAMES"]);
		expect(rooms.leaveRoom()).toBe("not-in-room");
	});

	test("the host's ROOM_CLOSED relay closes the room for guests", async () => {
		const { rooms, pump, push, record } = await setup();
		const closed = record("roomClosed");
		const relayed = record("relay");
		rooms.joinRoom("room_4");
		await pump();

		push({ type: "RELAY", from: "client_5", message: "ROOM_CLOSED" });
		expect(rooms.inRoom).toBe(true);
		expect(relayed).toEqual([{ from: "client_5", message: "ROOM_CLOSED" }]);

		push({ type: "RELAY", from: "client_9", message: "ROOM_CLOSED" });
		expect(closed).toEqual([{ roomId: "room_4", reason: "host-left" }]);
		expect(rooms.inRoom).toBe(false);
	});

	test("the host disconnecting closes the room", async () => {
		const { rooms, pump, push, record } = await setup();
		const closed = record("roomClosed");
		rooms.joinRoom("room_4");
		await pump();

		push({ type: "PLAYER_DISCONNECTED", playerId: "client_9" });

		expect(closed).toEqual([{ roomId: "room_4", reason: "host-disconnected" }]);
	});

	test("losing the connection clears the room", async () => {
		const { rooms, relay, pump, record } = await setup();
		const left = record("roomLeft");
		rooms.hostRoom("Alpha", 4);
		await pump();

		relay.stream.drop(new Error("socket hang up"));
		await pump();

		expect(left).toEqual([{ roomId: "room_1", reason: "connection-lost" }]);
		expect(rooms.inRoom).toBe(false);
	});

	test("relay messages go to the room or to one player", async () => {
		const { rooms, relay, pump } = await setup();
		expect(rooms.sendRelay("hello")).toBe("not-in-room");
		rooms.joinRoom("room_4");
		await pump();

		rooms.sendRelay("hello");
		rooms.sendRelay("psst", "client_9");

		expect(relay.commands().slice(-2)).toEqual([
			{ type: "RELAY_MESSAGE", roomId: "room_4", message: "hello" },
			{ type: "RELAY_MESSAGE", targetId: "client_9", message: "psst" },
		]);
	});
});
