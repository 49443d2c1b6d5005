import { DEFAULT_FLYING_SPEED } from "../config/constants.js";
import { type Vec3, ZERO } from "../math/vec3.js";

/**
 * Movement intent sampled once per tick. Immutable once stored in a
 * predicted frame; replay feeds the stored copy back through the resolver.
 *
 * The ability and effect fields are stamped on by the predictor at sample
 * time so a replayed tick sees exactly what the live tick saw.
 */
export interface InputState {
  readonly forward: number;
  readonly strafe: number;
  readonly jump: boolean;
  readonly sprint: boolean;
  readonly sneak: boolean;
  /** Radians, absolute. */
  readonly yaw: number;
  /** Radians, absolute. */
  readonly pitch: number;
  readonly canFly: boolean;
  readonly flying: boolean;
  readonly flyingSpeed: number;
  readonly speedMultiplier: number;
  readonly jumpBoostAmplifier: number | null;
}

/** Kinematic snapshot of the local player. Velocity is per tick. */
export interface PlayerSimState {
  readonly pos: Vec3;
  readonly vel: Vec3;
  readonly onGround: boolean;
  readonly yaw: number;
  readonly pitch: number;
}

/**
 * One simulated tick. `state` may be overwritten by reconciliation replay;
 * `input` never is.
 */
export interface PredictedFrame {
  readonly tick: number;
  readonly input: InputState;
  state: PlayerSimState;
}

const NEUTRAL_INPUT: InputState = Object.freeze({
  forward: 0,
  strafe: 0,
  jump: false,
  sprint: false,
  sneak: false,
  yaw: 0,
  pitch: 0,
  canFly: false,
  flying: false,
  flyingSpeed: DEFAULT_FLYING_SPEED,
  speedMultiplier: 1,
  jumpBoostAmplifier: null,
});

/** No movement, default abilities. Used for ticks missing from history. */
export function neutralInput(): InputState {
  return NEUTRAL_INPUT;
}

/** Build an input from a partial sample, filling the rest with neutral values. */
export function makeInput(partial: Partial<InputState> = {}): InputState {
  return { ...NEUTRAL_INPUT, ...partial };
}

/** Zeroed state created at connection. */
export function initialSimState(): PlayerSimState {
  return { pos: ZERO, vel: ZERO, onGround: false, yaw: 0, pitch: 0 };
}
