import { HARD_TELEPORT_DISTANCE, RECONCILE_EPSILON } from "../config/constants.js";
import { length, sub, type Vec3 } from "../math/vec3.js";
import { simulateTick } from "../physics/PlayerMovement.js";
import { neutralInput, type PlayerSimState, type PredictedFrame } from "../physics/types.js";
import type { WorldCollision } from "../physics/WorldCollision.js";
import type { PredictionBuffer } from "./PredictionBuffer.js";

export interface ReconcileResult {
  /** Raw positional error: server position minus predicted position. */
  correction: Vec3;
  replayedTicks: number;
  hardTeleport: boolean;
}

export interface ReconcileOutcome {
  /** Null when nothing changed: no history, noise floor, or a tick from the future. */
  result: ReconcileResult | null;
  /** The current state after reconciliation (the input state when result is null). */
  state: PlayerSimState;
}

export interface ReconcileThresholds {
  /** Errors shorter than this are ignored. */
  epsilon: number;
  /** Errors at least this long discard prediction outright. */
  hardTeleportDistance: number;
}

export const DEFAULT_THRESHOLDS: ReconcileThresholds = {
  epsilon: RECONCILE_EPSILON,
  hardTeleportDistance: HARD_TELEPORT_DISTANCE,
};

/**
 * Frame for `tick`, or a stand-in once it is missing: the newest frame still
 * in the ring at or after `tick`. Any such frame is accepted; no bound is
 * placed on how far it is from `tick`.
 */
export function findFrame(buffer: PredictionBuffer, tick: number): Readonly<PredictedFrame> | null {
  const exact = buffer.getByTick(tick);
  if (exact) return exact;

  const latest = buffer.latestTick;
  if (latest === null) return null;
  const oldest = Math.max(tick, latest - buffer.capacity + 1);
  for (let t = latest; t >= oldest; t--) {
    const frame = buffer.getByTick(t);
    if (frame) return frame;
  }
  return null;
}

/**
 * Merge an authoritative pose for `serverTick` into predicted history.
 *
 * Small errors are ignored, large ones snap to the server and drop older
 * history, and everything in between replays stored inputs from the server
 * state forward to `clientTick`, rewriting each replayed frame's state.
 */
export function reconcile(
  buffer: PredictionBuffer,
  world: WorldCollision,
  serverTick: number,
  serverState: PlayerSimState,
  clientTick: number,
  current: PlayerSimState,
  thresholds: ReconcileThresholds = DEFAULT_THRESHOLDS,
): ReconcileOutcome {
  if (serverTick > clientTick) return { result: null, state: current };

  const predicted = findFrame(buffer, serverTick);
  if (!predicted) return { result: null, state: current };

  const correction = sub(serverState.pos, predicted.state.pos);
  const error = length(correction);

  if (error < thresholds.epsilon) return { result: null, state: current };

  if (error >= thresholds.hardTeleportDistance) {
    buffer.truncateOlderThan(serverTick);
    return {
      result: { correction, replayedTicks: 0, hardTeleport: true },
      state: serverState,
    };
  }

  let state = serverState;
  let replayedTicks = 0;
  for (let t = serverTick + 1; t <= clientTick; t++) {
    const frame = buffer.getByTickMut(t);
    state = simulateTick(state, frame ? frame.input : neutralInput(), world);
    if (frame) frame.state = state;
    replayedTicks++;
  }

  return {
    result: { correction, replayedTicks, hardTeleport: false },
    state,
  };
}
