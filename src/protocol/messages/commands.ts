import type { GameData } from "./types";

/**
 * Commands sent by the client. TCP unless noted.
 */

export interface RegisterCommand {
  type: "REGISTER";
  name: string;
  password?: string;
  protocolVersion: number;
}

export interface HeartbeatCommand {
  type: "HEARTBEAT";
}

export interface PingCommand {
  type: "PING";
  /** Client wall clock in milliseconds, echoed back by PING_RESPONSE */
  timestamp: number;
}

export interface PlayerInfoCommand {
  type: "PLAYER_INFO";
  name: string;
}

export interface HostGameCommand {
  type: "HOST_GAME";
  roomName: string;
  maxPlayers: number;
}

export interface JoinGameCommand {
  type: "JOIN_GAME";
  roomId: string;
}

export interface ListGamesCommand {
  type: "LIST_GAMES";
}

export interface LeaveRoomCommand {
  type: "LEAVE_ROOM";
  roomId: string;
}

export interface GetRoomPlayersCommand {
  type: "GET_ROOM_PLAYERS";
  roomId: string;
}

export interface StartGameCommand {
  type: "START_GAME";
  roomId: string;
}

/**
 * Opaque text relayed to a whole room or to a single client.
 * Exactly one of roomId / targetId is set.
 */
export interface RelayMessageCommand {
  type: "RELAY_MESSAGE";
  roomId?: string;
  targetId?: string;
  message: string;
}

/** UDP only. */
export interface GameDataCommand {
  type: "GAME_DATA";
  clientId: string;
  roomId: string;
  targetId?: string;
  data: GameData;
}

export interface DisconnectCommand {
  type: "DISCONNECT";
}

export type ClientCommand =
  | RegisterCommand
  | HeartbeatCommand
  | PingCommand
  | PlayerInfoCommand
  | HostGameCommand
  | JoinGameCommand
  | ListGamesCommand
  | LeaveRoomCommand
  | GetRoomPlayersCommand
  | StartGameCommand
  | RelayMessageCommand
  | GameDataCommand
  | DisconnectCommand;

export type ClientCommandType = ClientCommand["type"];
