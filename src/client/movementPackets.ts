import { POSITION_DELTA_SQ_EPS, POSITION_RESEND_TICKS, ROTATION_EPS_DEG } from "../config/constants.js";
import { distanceSq, type Vec3, ZERO } from "../math/vec3.js";
import type { PlayerSimState } from "../physics/types.js";

/** Outbound movement report, one per tick. Angles are wire degrees. */
export type MovementPacket =
  | { kind: "pos_look"; x: number; y: number; z: number; yaw: number; pitch: number; onGround: boolean }
  | { kind: "pos"; x: number; y: number; z: number; onGround: boolean }
  | { kind: "look"; yaw: number; pitch: number; onGround: boolean }
  | { kind: "ground"; onGround: boolean };

/** Entity action transitions (wire ids 0, 1, 3, 4). */
export type PlayerAction = "start_sneaking" | "stop_sneaking" | "start_sprinting" | "stop_sprinting";

export const PLAYER_ACTION_IDS: Readonly<Record<PlayerAction, number>> = {
  start_sneaking: 0,
  stop_sneaking: 1,
  start_sprinting: 3,
  stop_sprinting: 4,
};

export function wrapDegrees(deg: number): number {
  let d = deg;
  while (d <= -180) d += 360;
  while (d > 180) d -= 360;
  return d;
}

/**
 * Convert simulation radians to wire degrees. Simulation yaw 0 faces −Z;
 * wire yaw 0 faces +Z, and wire pitch is positive looking down.
 */
export function toWireAngles(yaw: number, pitch: number): { yaw: number; pitch: number } {
  let yawDeg = (Math.PI - yaw) * (180 / Math.PI);
  let pitchDeg = -pitch * (180 / Math.PI);
  yawDeg = Number.isFinite(yawDeg) ? wrapDegrees(yawDeg) : 0;
  if (!Number.isFinite(pitchDeg)) pitchDeg = 0;
  return { yaw: yawDeg, pitch: Math.min(90, Math.max(-90, pitchDeg)) };
}

/**
 * Picks the smallest movement packet that carries what changed since the
 * last one sent. Position is resent at least every POSITION_RESEND_TICKS.
 */
export class MovementPacketState {
  private initialized = false;
  private lastPos: Vec3 = ZERO;
  private lastYawDeg = 0;
  private lastPitchDeg = 0;
  private ticksSincePos = 0;
  private pendingAck: MovementPacket | null = null;

  get hasPendingAck(): boolean {
    return this.pendingAck !== null;
  }

  /**
   * Queue an acknowledgement of an authoritative pose for the next send and
   * take it as the new baseline.
   */
  acknowledge(pose: PlayerSimState): void {
    const { yaw, pitch } = toWireAngles(pose.yaw, pose.pitch);
    this.pendingAck = {
      kind: "pos_look",
      x: pose.pos.x,
      y: pose.pos.y,
      z: pose.pos.z,
      yaw,
      pitch,
      onGround: pose.onGround,
    };
    this.initialized = true;
    this.lastPos = pose.pos;
    this.lastYawDeg = yaw;
    this.lastPitchDeg = pitch;
    this.ticksSincePos = 0;
  }

  /** Take the queued acknowledgement, if any. */
  takeAck(): MovementPacket | null {
    const ack = this.pendingAck;
    this.pendingAck = null;
    return ack;
  }

  next(state: PlayerSimState): MovementPacket {
    const { pos, onGround } = state;
    const { yaw, pitch } = toWireAngles(state.yaw, state.pitch);

    const moved =
      !this.initialized ||
      distanceSq(pos, this.lastPos) > POSITION_DELTA_SQ_EPS ||
      this.ticksSincePos >= POSITION_RESEND_TICKS;
    const rotated =
      !this.initialized ||
      Math.abs(yaw - this.lastYawDeg) > ROTATION_EPS_DEG ||
      Math.abs(pitch - this.lastPitchDeg) > ROTATION_EPS_DEG;

    let packet: MovementPacket;
    if (moved && rotated) {
      packet = { kind: "pos_look", x: pos.x, y: pos.y, z: pos.z, yaw, pitch, onGround };
    } else if (moved) {
      packet = { kind: "pos", x: pos.x, y: pos.y, z: pos.z, onGround };
    } else if (rotated) {
      packet = { kind: "look", yaw, pitch, onGround };
    } else {
      packet = { kind: "ground", onGround };
    }

    if (moved) {
      this.lastPos = pos;
      this.ticksSincePos = 0;
    } else {
      this.ticksSincePos++;
    }
    this.lastYawDeg = yaw;
    this.lastPitchDeg = pitch;
    this.initialized = true;
    return packet;
  }

  reset(): void {
    this.initialized = false;
    this.lastPos = ZERO;
    this.lastYawDeg = 0;
    this.lastPitchDeg = 0;
    this.ticksSincePos = 0;
    this.pendingAck = null;
  }
}
