import { DecodeError } from "../../errors";
import type { ClientCommand } from "../messages/commands";
import type { ServerEvent } from "../messages/events";
import type { GameData, RoomInfo } from "../messages/types";
import {
  isWireObject,
  quatToWire,
  readInteger,
  readNumber,
  readObject,
  readOptionalBoolean,
  readOptionalNumber,
  readOptionalString,
  readOptionalStringArray,
  readArray,
  readQuat,
  readString,
  readStringArray,
  readVec3,
  vec3ToWire,
  type WireObject,
  type WireValue,
} from "./fields";
import { MessageRegistry } from "./message-registry";

/**
 * Drops undefined entries so optional fields are omitted on the wire.
 */
function compact(fields: { [key: string]: WireValue | undefined }): WireObject {
  const out: WireObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function gameDataToWire(data: GameData): WireObject {
  switch (data.type) {
    case "PLAYER_STATE":
      return {
        type: data.type,
        state: {
          position: vec3ToWire(data.state.position),
          rotation: quatToWire(data.state.rotation),
          velocity: vec3ToWire(data.state.velocity),
          angularVelocity: vec3ToWire(data.state.angularVelocity),
          timestamp: data.state.timestamp,
        },
      };
    case "PLAYER_INPUT":
      return {
        type: data.type,
        input: {
          steering: data.input.steering,
          throttle: data.input.throttle,
          brake: data.input.brake,
          timestamp: data.input.timestamp,
        },
      };
  }
}

function gameDataFromWire(obj: WireObject): GameData {
  const data = readObject(obj, "data");
  const kind = readString(data, "type");

  if (kind === "PLAYER_STATE") {
    const state = readObject(data, "state");
    return {
      type: kind,
      state: {
        position: readVec3(state, "position"),
        rotation: readQuat(state, "rotation"),
        velocity: readVec3(state, "velocity"),
        angularVelocity: readVec3(state, "angularVelocity"),
        timestamp: readNumber(state, "timestamp"),
      },
    };
  }

  if (kind === "PLAYER_INPUT") {
    const input = readObject(data, "input");
    return {
      type: kind,
      input: {
        steering: readNumber(input, "steering"),
        throttle: readNumber(input, "throttle"),
        brake: readNumber(input, "brake"),
        timestamp: readNumber(input, "timestamp"),
      },
    };
  }

  throw new DecodeError("unknown-type", `Unknown game data type ${kind}`, kind);
}

function roomToWire(room: RoomInfo): WireObject {
  return {
    room_id: room.roomId,
    name: room.name,
    host_id: room.hostId,
    player_count: room.playerCount,
    max_players: room.maxPlayers,
  };
}

function roomFromWire(value: WireValue): RoomInfo {
  if (!isWireObject(value)) {
    throw new DecodeError("invalid-field", `Field "rooms" must contain objects`);
  }
  return {
    roomId: readString(value, "room_id"),
    name: readString(value, "name"),
    hostId: readOptionalString(value, "host_id") ?? "",
    playerCount: readInteger(value, "player_count"),
    maxPlayers: readInteger(value, "max_players", 1),
  };
}

/**
 * Builds the registry of every client -> server command.
 */
export function createCommandRegistry(): MessageRegistry<ClientCommand> {
  const registry = new MessageRegistry<ClientCommand>("command");

  registry.register("REGISTER", {
    toWire: (m) => compact({ name: m.name, password: m.password, protocol_version: m.protocolVersion }),
    fromWire: (o) => {
      const password = readOptionalString(o, "password");
      return {
        type: "REGISTER",
        name: readString(o, "name"),
        ...(password !== undefined ? { password } : {}),
        protocolVersion: readInteger(o, "protocol_version"),
      };
    },
  });

  registry.register("HEARTBEAT", {
    toWire: () => ({}),
    fromWire: () => ({ type: "HEARTBEAT" }),
  });

  registry.register("PING", {
    toWire: (m) => ({ timestamp: m.timestamp }),
    fromWire: (o) => ({ type: "PING", timestamp: readNumber(o, "timestamp") }),
  });

  registry.register("PLAYER_INFO", {
    toWire: (m) => ({ name: m.name }),
    fromWire: (o) => ({ type: "PLAYER_INFO", name: readString(o, "name") }),
  });

  registry.register("HOST_GAME", {
    toWire: (m) => ({ room_name: m.roomName, max_players: m.maxPlayers }),
    fromWire: (o) => ({
      type: "HOST_GAME",
      roomName: readString(o, "room_name"),
      maxPlayers: readInteger(o, "max_players", 1),
    }),
  });

  registry.register("JOIN_GAME", {
    toWire: (m) => ({ room_id: m.roomId }),
    fromWire: (o) => ({ type: "JOIN_GAME", roomId: readString(o, "room_id") }),
  });

  registry.register("LIST_GAMES", {
    toWire: () => ({}),
    fromWire: () => ({ type: "LIST_GAMES" }),
  });

  registry.register("LEAVE_ROOM", {
    toWire: (m) => ({ room_id: m.roomId }),
    fromWire: (o) => ({ type: "LEAVE_ROOM", roomId: readString(o, "room_id") }),
  });

  registry.register("GET_ROOM_PLAYERS", {
    toWire: (m) => ({ room_id: m.roomId }),
    fromWire: (o) => ({ type: "GET_ROOM_PLAYERS", roomId: readString(o, "room_id") }),
  });

  registry.register("START_GAME", {
    toWire: (m) => ({ room_id: m.roomId }),
    fromWire: (o) => ({ type: "START_GAME", roomId: readString(o, "room_id") }),
  });

  registry.register("RELAY_MESSAGE", {
    toWire: (m) => {
      if ((m.roomId === undefined) === (m.targetId === undefined)) {
        throw new Error("RELAY_MESSAGE needs exactly one of roomId or targetId");
      }
      return compact({ room_id: m.roomId, target_id: m.targetId, message: m.message });
    },
    fromWire: (o) => {
      const roomId = readOptionalString(o, "room_id");
      const targetId = readOptionalString(o, "target_id");
      if (roomId === undefined && targetId === undefined) {
        throw new DecodeError("missing-field", `Missing required field "room_id" or "target_id"`);
      }
      return {
        type: "RELAY_MESSAGE",
        ...(roomId !== undefined ? { roomId } : {}),
        ...(targetId !== undefined ? { targetId } : {}),
        message: readString(o, "message"),
      };
    },
  });

  registry.register("GAME_DATA", {
    toWire: (m) =>
      compact({
        client_id: m.clientId,
        room_id: m.roomId,
        target_id: m.targetId,
        data: gameDataToWire(m.data),
      }),
    fromWire: (o) => {
      const targetId = readOptionalString(o, "target_id");
      return {
        type: "GAME_DATA",
        clientId: readString(o, "client_id"),
        roomId: readString(o, "room_id"),
        ...(targetId !== undefined ? { targetId } : {}),
        data: gameDataFromWire(o),
      };
    },
  });

  registry.register("DISCONNECT", {
    toWire: () => ({}),
    fromWire: () => ({ type: "DISCONNECT" }),
  });

  return registry;
}

/**
 * Builds the registry of every server -> client event.
 */
export function createEventRegistry(): MessageRegistry<ServerEvent> {
  const registry = new MessageRegistry<ServerEvent>("event");

  registry.register("REGISTERED", {
    toWire: (m) => compact({ client_id: m.clientId, protocol_version: m.protocolVersion }),
    fromWire: (o) => {
      const protocolVersion = readOptionalNumber(o, "protocol_version");
      return {
        type: "REGISTERED",
        clientId: readString(o, "client_id"),
        ...(protocolVersion !== undefined ? { protocolVersion } : {}),
      };
    },
  });

  registry.register("HEARTBEAT_ACK", {
    toWire: () => ({}),
    fromWire: () => ({ type: "HEARTBEAT_ACK" }),
  });

  registry.register("PING_RESPONSE", {
    toWire: (m) => ({ timestamp: m.timestamp }),
    fromWire: (o) => ({ type: "PING_RESPONSE", timestamp: readNumber(o, "timestamp") }),
  });

  registry.register("GAME_HOSTED", {
    toWire: (m) => ({ room_id: m.roomId }),
    fromWire: (o) => ({ type: "GAME_HOSTED", roomId: readString(o, "room_id") }),
  });

  registry.register("GAME_LIST", {
    toWire: (m) => ({ rooms: m.rooms.map(roomToWire) }),
    fromWire: (o) => ({ type: "GAME_LIST", rooms: readArray(o, "rooms").map(roomFromWire) }),
  });

  registry.register("JOINED_GAME", {
    toWire: (m) =>
      compact({
        room_id: m.roomId,
        host_id: m.hostId,
        players: m.players,
        game_started: m.gameStarted,
      }),
    fromWire: (o) => {
      const players = readOptionalStringArray(o, "players");
      const gameStarted = readOptionalBoolean(o, "game_started");
      return {
        type: "JOINED_GAME",
        roomId: readString(o, "room_id"),
        hostId: readString(o, "host_id"),
        ...(players !== undefined ? { players } : {}),
        ...(gameStarted !== undefined ? { gameStarted } : {}),
      };
    },
  });

  registry.register("JOIN_FAILED", {
    toWire: (m) => ({ reason: m.reason }),
    fromWire: (o) => ({ type: "JOIN_FAILED", reason: readOptionalString(o, "reason") ?? "unknown" }),
  });

  registry.register("AUTH_FAILED", {
    toWire: (m) => ({ reason: m.reason }),
    fromWire: (o) => ({ type: "AUTH_FAILED", reason: readOptionalString(o, "reason") ?? "unknown" }),
  });

  registry.register("PLAYER_JOINED", {
    toWire: (m) => ({ client_id: m.clientId }),
    fromWire: (o) => ({ type: "PLAYER_JOINED", clientId: readString(o, "client_id") }),
  });

  registry.register("PLAYER_DISCONNECTED", {
    toWire: (m) => ({ player_id: m.playerId }),
    fromWire: (o) => ({ type: "PLAYER_DISCONNECTED", playerId: readString(o, "player_id") }),
  });

  registry.register("ROOM_PLAYERS", {
    toWire: (m) => ({ players: m.players }),
    fromWire: (o) => ({ type: "ROOM_PLAYERS", players: readStringArray(o, "players") }),
  });

  registry.register("GAME_STARTED", {
    toWire: (m) => compact({ spawn_position: vec3ToWire(m.spawnPosition), player_ids: m.playerIds }),
    fromWire: (o) => {
      const playerIds = readOptionalStringArray(o, "player_ids");
      return {
        type: "GAME_STARTED",
        spawnPosition: readVec3(o, "spawn_position"),
        ...(playerIds !== undefined ? { playerIds } : {}),
      };
    },
  });

  registry.register("RELAY", {
    toWire: (m) => ({ from: m.from, message: m.message }),
    fromWire: (o) => ({ type: "RELAY", from: readString(o, "from"), message: readString(o, "message") }),
  });

  registry.register("KICKED", {
    toWire: (m) => compact({ reason: m.reason }),
    fromWire: (o) => {
      const reason = readOptionalString(o, "reason");
      return { type: "KICKED", ...(reason !== undefined ? { reason } : {}) };
    },
  });

  registry.register("SERVER_MESSAGE", {
    toWire: (m) => ({ message: m.message }),
    fromWire: (o) => ({ type: "SERVER_MESSAGE", message: readString(o, "message") }),
  });

  registry.register("RESET_POSITION", {
    toWire: (m) => ({ position: vec3ToWire(m.position) }),
    fromWire: (o) => ({ type: "RESET_POSITION", position: readVec3(o, "position") }),
  });

  registry.register("GAME_DATA", {
    toWire: (m) => ({ from: m.from, data: gameDataToWire(m.data) }),
    fromWire: (o) => ({ type: "GAME_DATA", from: readString(o, "from"), data: gameDataFromWire(o) }),
  });

  return registry;
}
