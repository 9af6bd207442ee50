/**
 * Value types shared by the wire protocol and the synchronizer.
 */

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export interface Quat {
  x: number;
  y: number;
  z: number;
  w: number;
}

/**
 * Full rigid-body state of one vehicle at a simulation timestamp (seconds).
 */
export interface PlayerState {
  playerId: string;
  position: Vec3;
  rotation: Quat;
  velocity: Vec3;
  angularVelocity: Vec3;
  timestamp: number;
}

/**
 * Driver input sample, used to predict remote vehicles between state updates.
 * steering is in [-1, 1], throttle and brake in [0, 1].
 */
export interface PlayerInput {
  playerId: string;
  steering: number;
  throttle: number;
  brake: number;
  timestamp: number;
}

/**
 * A discoverable room as advertised by the relay's room list.
 */
export interface RoomInfo {
  roomId: string;
  name: string;
  hostId: string;
  playerCount: number;
  maxPlayers: number;
}

/** State payload as carried inside GAME_DATA (the sender id travels outside it). */
export type StatePayload = Omit<PlayerState, "playerId">;

/** Input payload as carried inside GAME_DATA. */
export type InputPayload = Omit<PlayerInput, "playerId">;

export type GameData =
  | { type: "PLAYER_STATE"; state: StatePayload }
  | { type: "PLAYER_INPUT"; input: InputPayload };

export const PROTOCOL_VERSION = 1;

/** Relay message a host broadcasts to its room right before leaving it. */
export const ROOM_CLOSED_MESSAGE = "ROOM_CLOSED";
