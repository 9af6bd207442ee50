import { EventSystem } from "../core/events/event-system";
import { addScaledVec3, clamp, distanceVec3, lerpVec3, slerpQuat } from "../core/lerp/lerp";
import type { PlayerInput, PlayerState, Quat, Vec3 } from "../protocol/messages/types";

export type ApplyStateResult = "ignored-local" | "first-contact" | "stale" | "snapped" | "interpolating";

/**
 * Rigid-body transform of a remote vehicle.
 */
export interface Transform {
  position: Vec3;
  rotation: Quat;
  velocity: Vec3;
  angularVelocity: Vec3;
}

/**
 * Synchronization record of one remote player.
 * `current` is what the simulation shows, `target` the latest accepted state.
 */
export interface SyncRecord {
  playerId: string;
  current: Transform;
  target: Transform;
  /** Timestamp of the last applied state, in simulation seconds */
  lastTimestamp: number;
  /** Latest input sample, if any arrived */
  input: PlayerInput | undefined;
}

export type SyncEvents = {
  stateApplied: { playerId: string; result: ApplyStateResult };
  inputApplied: { input: PlayerInput };
};

export interface StateSynchronizerOptions {
  /** Id of the local player, whose echoed states are ignored */
  localId: () => string | undefined;
  /** Positional drift beyond which a remote vehicle snaps to its new state (default: 5) */
  desyncThreshold?: number;
  /** Blend speed toward the target, per second (default: 10) */
  blendRate?: number;
  debug?: boolean;
}

function transformOf(state: PlayerState): Transform {
  return {
    position: { ...state.position },
    rotation: { ...state.rotation },
    velocity: { ...state.velocity },
    angularVelocity: { ...state.angularVelocity },
  };
}

/**
 * @description
 * Reconciles inbound remote vehicle states, which arrive over UDP and may be
 * late, duplicated or out of order, into smoothly moving transforms.
 *
 * - First contact teleports.
 * - A state older than the last applied one is discarded.
 * - A state too far from the current target snaps; anything else becomes the
 *   new target and {@link step} blends toward it.
 *
 * Input samples for remote players skip the staleness check and only feed
 * {@link predict}.
 *
 * @example
 * ```typescript
 * const sync = new StateSynchronizer({ localId: () => session.clientId });
 * sync.applyState(remoteState);
 *
 * // every frame
 * sync.step(dt);
 * const car = sync.get(remoteState.playerId)?.current;
 * ```
 */
export class StateSynchronizer {
  private records = new Map<string, SyncRecord>();
  // inputs of players whose first state has not arrived yet
  private pendingInputs = new Map<string, PlayerInput>();
  private events = new EventSystem<SyncEvents>({ name: "StateSynchronizer" });
  private readonly localId: () => string | undefined;
  private readonly desyncThreshold: number;
  private readonly blendRate: number;
  private readonly debug: boolean;

  constructor(options: StateSynchronizerOptions) {
    this.localId = options.localId;
    this.desyncThreshold = options.desyncThreshold ?? 5;
    this.blendRate = options.blendRate ?? 10;
    this.debug = options.debug ?? false;
  }

  on<K extends keyof SyncEvents>(name: K, handler: (event: SyncEvents[K]) => void): () => void {
    return this.events.on(name, handler);
  }

  /**
   * Apply a remote vehicle state.
   */
  applyState(state: PlayerState): ApplyStateResult {
    const result = this.reconcile(state);
    if (result !== "ignored-local") {
      this.events.emit("stateApplied", { playerId: state.playerId, result });
    }
    return result;
  }

  private reconcile(state: PlayerState): ApplyStateResult {
    if (state.playerId === this.localId()) {
      return "ignored-local";
    }

    const record = this.records.get(state.playerId);
    if (!record) {
      this.records.set(state.playerId, {
        playerId: state.playerId,
        current: transformOf(state),
        target: transformOf(state),
        lastTimestamp: state.timestamp,
        input: this.pendingInputs.get(state.playerId),
      });
      this.pendingInputs.delete(state.playerId);
      return "first-contact";
    }

    if (state.timestamp < record.lastTimestamp) {
      this.log(`Discarded stale state for ${state.playerId} (${state.timestamp} < ${record.lastTimestamp})`);
      return "stale";
    }

    record.lastTimestamp = state.timestamp;
    const drift = distanceVec3(record.target.position, state.position);

    if (drift > this.desyncThreshold) {
      this.log(`Snapping ${state.playerId}, drift ${drift.toFixed(2)} exceeds ${this.desyncThreshold}`);
      record.current = transformOf(state);
      record.target = transformOf(state);
      return "snapped";
    }

    record.target = transformOf(state);
    return "interpolating";
  }

  /**
   * Store the latest input of a remote player, clamped to its valid ranges.
   * @returns false for the local player
   */
  applyInput(input: PlayerInput): boolean {
    if (input.playerId === this.localId()) {
      return false;
    }

    const clamped: PlayerInput = {
      playerId: input.playerId,
      steering: clamp(input.steering, -1, 1),
      throttle: clamp(input.throttle, 0, 1),
      brake: clamp(input.brake, 0, 1),
      timestamp: input.timestamp,
    };

    const record = this.records.get(input.playerId);
    if (record) {
      record.input = clamped;
    } else {
      this.pendingInputs.set(input.playerId, clamped);
    }

    this.events.emit("inputApplied", { input: clamped });
    return true;
  }

  /**
   * Latest input of a remote player.
   */
  inputOf(playerId: string): PlayerInput | undefined {
    return this.records.get(playerId)?.input ?? this.pendingInputs.get(playerId);
  }

  /**
   * Blend every record toward its target.
   * @param dt - Elapsed time in seconds
   */
  step(dt: number): void {
    if (dt <= 0) return;
    const t = Math.min(1, this.blendRate * dt);

    for (const record of this.records.values()) {
      const { current, target } = record;
      record.current = {
        position: lerpVec3(current.position, target.position, t),
        rotation: slerpQuat(current.rotation, target.rotation, t),
        velocity: lerpVec3(current.velocity, target.velocity, t),
        angularVelocity: lerpVec3(current.angularVelocity, target.angularVelocity, t),
      };
    }
  }

  /**
   * Extrapolate where a remote vehicle will be after `horizon` seconds,
   * moving at its current velocity.
   */
  predict(playerId: string, horizon: number): Vec3 | undefined {
    const record = this.records.get(playerId);
    if (!record) return undefined;
    return addScaledVec3(record.current.position, record.current.velocity, horizon);
  }

  get(playerId: string): Readonly<SyncRecord> | undefined {
    return this.records.get(playerId);
  }

  players(): string[] {
    return Array.from(this.records.keys());
  }

  remove(playerId: string): boolean {
    this.pendingInputs.delete(playerId);
    return this.records.delete(playerId);
  }

  clear(): void {
    this.records.clear();
    this.pendingInputs.clear();
  }

  private log(message: string) {
    if (this.debug) {
      console.log(`[StateSynchronizer] ${message}`);
    }
  }
}
