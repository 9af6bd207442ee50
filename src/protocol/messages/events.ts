import type { GameData, RoomInfo, Vec3 } from "./types";

/**
 * Events pushed by the relay. TCP unless noted.
 */

export interface RegisteredEvent {
  type: "REGISTERED";
  clientId: string;
  protocolVersion?: number;
}

export interface HeartbeatAckEvent {
  type: "HEARTBEAT_ACK";
}

export interface PingResponseEvent {
  type: "PING_RESPONSE";
  timestamp: number;
}

export interface GameHostedEvent {
  type: "GAME_HOSTED";
  roomId: string;
}

export interface GameListEvent {
  type: "GAME_LIST";
  rooms: RoomInfo[];
}

export interface JoinedGameEvent {
  type: "JOINED_GAME";
  roomId: string;
  hostId: string;
  players?: string[];
  gameStarted?: boolean;
}

export interface JoinFailedEvent {
  type: "JOIN_FAILED";
  reason: string;
}

export interface AuthFailedEvent {
  type: "AUTH_FAILED";
  reason: string;
}

export interface PlayerJoinedEvent {
  type: "PLAYER_JOINED";
  clientId: string;
}

export interface PlayerDisconnectedEvent {
  type: "PLAYER_DISCONNECTED";
  playerId: string;
}

export interface RoomPlayersEvent {
  type: "ROOM_PLAYERS";
  players: string[];
}

export interface GameStartedEvent {
  type: "GAME_STARTED";
  spawnPosition: Vec3;
  playerIds?: string[];
}

export interface RelayEvent {
  type: "RELAY";
  from: string;
  message: string;
}

export interface KickedEvent {
  type: "KICKED";
  reason?: string;
}

export interface ServerMessageEvent {
  type: "SERVER_MESSAGE";
  message: string;
}

export interface ResetPositionEvent {
  type: "RESET_POSITION";
  position: Vec3;
}

/** UDP only: game data forwarded by the relay from another client. */
export interface GameDataEvent {
  type: "GAME_DATA";
  from: string;
  data: GameData;
}

export type ServerEvent =
  | RegisteredEvent
  | HeartbeatAckEvent
  | PingResponseEvent
  | GameHostedEvent
  | GameListEvent
  | JoinedGameEvent
  | JoinFailedEvent
  | AuthFailedEvent
  | PlayerJoinedEvent
  | PlayerDisconnectedEvent
  | RoomPlayersEvent
  | GameStartedEvent
  | RelayEvent
  | KickedEvent
  | ServerMessageEvent
  | ResetPositionEvent
  | GameDataEvent;

export type ServerEventType = ServerEvent["type"];

/** Maps each event tag to its payload type, for typed per-tag observers. */
export type ServerEventMap = {
  [K in ServerEventType]: Extract<ServerEvent, { type: K }>;
};
