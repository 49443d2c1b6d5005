import {
  AIR_DRAG,
  AIR_FRICTION,
  BASE_MOVE_SPEED,
  FLY_HORIZONTAL_DAMPING,
  FLY_SPRINT_MULTIPLIER,
  FLY_VERTICAL_DAMPING,
  FLY_VERTICAL_MULTIPLIER,
  GRAVITY,
  GROUND_ACCEL_BASE,
  JUMP_BOOST_PER_LEVEL,
  JUMP_VELOCITY,
  MOVE_INPUT_DAMPING,
  SLIPPERINESS_DEFAULT,
  SNEAK_INPUT_SCALE,
  SPEED_IN_AIR,
  SPRINT_FORWARD_THRESHOLD,
  SPRINT_JUMP_BOOST,
  SPRINT_MULTIPLIER,
  STEP_HEIGHT,
  WATER_DRAG,
  WATER_GRAVITY,
  WATER_MOVE_SPEED,
  WATER_SURFACE_ASSIST,
  WATER_SWIM_UP,
} from "../config/constants.js";
import { type Vec3, vec3 } from "../math/vec3.js";
import {
  type AABB3D,
  clipXMotion,
  clipYMotion,
  clipZMotion,
  expandTowards,
  intersects,
  offset,
  playerAABB,
} from "./AABB3D.js";
import type { InputState, PlayerSimState } from "./types.js";
import type { WorldCollision } from "./WorldCollision.js";

export interface ResolveResult {
  pos: Vec3;
  /** Velocity with every blocked component zeroed. */
  vel: Vec3;
  onGround: boolean;
  /** The floor stopped downward motion, or the feet rest exactly on a box top. */
  supported: boolean;
  collidedHorizontally: boolean;
}

/** Feet within this of a box top count as resting on it. */
const REST_EPS = 1.0e-7;

interface Sweep {
  dx: number;
  dy: number;
  dz: number;
  box: AABB3D;
}

/** Clip a motion against every box, Y first, then X, then Z. */
function sweepYXZ(boxes: readonly AABB3D[], start: AABB3D, dx: number, dy: number, dz: number): Sweep {
  let box = start;
  for (const b of boxes) dy = clipYMotion(b, box, dy);
  box = offset(box, 0, dy, 0);
  for (const b of boxes) dx = clipXMotion(b, box, dx);
  box = offset(box, dx, 0, 0);
  for (const b of boxes) dz = clipZMotion(b, box, dz);
  box = offset(box, 0, 0, dz);
  return { dx, dy, dz, box };
}

function horizontalSq(s: { dx: number; dz: number }): number {
  return s.dx * s.dx + s.dz * s.dz;
}

/**
 * Try to walk up a ledge no taller than STEP_HEIGHT. Two candidates are
 * tried: lifting over the whole horizontal sweep, and lifting in place.
 * The one that travels farther wins, then settles back down.
 * Returns the total displacement and the settle amount as `dy`.
 */
function tryStepUp(
  world: WorldCollision,
  start: AABB3D,
  reqX: number,
  reqZ: number,
): { sweep: Sweep; lift: number } {
  const boxes = world.getCollidingBoxes(expandTowards(start, reqX, STEP_HEIGHT, reqZ));

  const wide = expandTowards(start, reqX, 0, reqZ);
  let liftA = STEP_HEIGHT;
  for (const b of boxes) liftA = clipYMotion(b, wide, liftA);
  let a = offset(start, 0, liftA, 0);
  let ax = reqX;
  for (const b of boxes) ax = clipXMotion(b, a, ax);
  a = offset(a, ax, 0, 0);
  let az = reqZ;
  for (const b of boxes) az = clipZMotion(b, a, az);
  a = offset(a, 0, 0, az);

  const inPlace = sweepYXZ(boxes, start, reqX, STEP_HEIGHT, reqZ);

  const useA = ax * ax + az * az > horizontalSq(inPlace);
  const lift = useA ? liftA : inPlace.dy;
  let box = useA ? a : inPlace.box;
  const dx = useA ? ax : inPlace.dx;
  const dz = useA ? az : inPlace.dz;

  let settle = -lift;
  for (const b of boxes) settle = clipYMotion(b, box, settle);
  box = offset(box, 0, settle, 0);

  return { sweep: { dx, dy: settle, dz, box }, lift };
}

/**
 * Move the player box by `vel` through the voxel world. Axes resolve in
 * Y → X → Z order against every collision box; a horizontally blocked move
 * retries as a step-up when the player was grounded or landed this move.
 * Each velocity component that didn't achieve its requested delta is zeroed.
 */
export function resolve(world: WorldCollision, pos: Vec3, vel: Vec3, wasOnGround: boolean): ResolveResult {
  const reqX = vel.x;
  const reqY = vel.y;
  const reqZ = vel.z;
  const start = playerAABB(pos);

  const boxes = world.getCollidingBoxes(expandTowards(start, reqX, reqY, reqZ));
  const flat = sweepYXZ(boxes, start, reqX, reqY, reqZ);

  let dx = flat.dx;
  let dy = flat.dy;
  let dz = flat.dz;
  let moveY = flat.dy;

  const canStep = wasOnGround || (reqY !== flat.dy && reqY < 0);
  if (canStep && (reqX !== flat.dx || reqZ !== flat.dz)) {
    const { sweep, lift } = tryStepUp(world, start, reqX, reqZ);
    if (horizontalSq(sweep) > horizontalSq(flat)) {
      dx = sweep.dx;
      dy = sweep.dy;
      dz = sweep.dz;
      moveY = lift + sweep.dy;
    }
  }

  const collidedHorizontally = reqX !== dx || reqZ !== dz;
  const collidedVertically = reqY !== dy;
  const newPos = vec3(pos.x + dx, pos.y + moveY, pos.z + dz);

  const landed = collidedVertically && reqY < 0;
  let onGround = landed;
  let supported = landed;
  if (!landed) {
    const feet = playerAABB(newPos);
    const probe: AABB3D = { ...feet, minY: newPos.y - 0.02, maxY: newPos.y - 0.001 };
    const below = world.getCollidingBoxes(probe).filter((b) => intersects(b, probe));
    onGround = below.length > 0;
    supported = below.some((b) => Math.abs(b.maxY - newPos.y) < REST_EPS);
  }

  return {
    pos: newPos,
    vel: vec3(reqX !== dx ? 0 : vel.x, collidedVertically ? 0 : vel.y, reqZ !== dz ? 0 : vel.z),
    onGround,
    supported,
    collidedHorizontally,
  };
}

/**
 * Add horizontal acceleration toward a wish vector (strafe, forward) given
 * relative to `yaw`. Forward is −Z at yaw 0, right is +X.
 */
export function moveFlying(vel: Vec3, strafe: number, forward: number, accel: number, yaw: number): Vec3 {
  const magSq = strafe * strafe + forward * forward;
  if (magSq < 1.0e-4) return vel;

  const k = accel / Math.max(Math.sqrt(magSq), 1);
  const s = strafe * k;
  const f = forward * k;
  const sin = Math.sin(yaw);
  const cos = Math.cos(yaw);
  return vec3(vel.x + cos * s - sin * f, vel.y, vel.z - sin * s - cos * f);
}

/** Sprinting takes the key, no sneak, and strong forward input. */
export function effectiveSprint(input: InputState): boolean {
  return input.sprint && !input.sneak && input.forward >= SPRINT_FORWARD_THRESHOLD;
}

export function jumpVelocity(input: InputState): number {
  const amp = input.jumpBoostAmplifier;
  return amp === null ? JUMP_VELOCITY : JUMP_VELOCITY + JUMP_BOOST_PER_LEVEL * (amp + 1);
}

function wishVector(input: InputState): { strafe: number; forward: number } {
  let strafe = input.strafe * MOVE_INPUT_DAMPING;
  let forward = input.forward * MOVE_INPUT_DAMPING;
  const lenSq = strafe * strafe + forward * forward;
  if (lenSq > 1) {
    const len = Math.sqrt(lenSq);
    strafe /= len;
    forward /= len;
  }
  if (input.sneak) {
    strafe *= SNEAK_INPUT_SCALE;
    forward *= SNEAK_INPUT_SCALE;
  }
  return { strafe, forward };
}

function simulateFlying(
  prev: PlayerSimState,
  input: InputState,
  world: WorldCollision,
  wish: { strafe: number; forward: number },
  sprinting: boolean,
): PlayerSimState {
  const lift = input.flyingSpeed * FLY_VERTICAL_MULTIPLIER;
  let vy = prev.vel.y;
  if (input.jump) vy += lift;
  if (input.sneak) vy -= lift;

  const accel = input.flyingSpeed * (sprinting ? FLY_SPRINT_MULTIPLIER : 1);
  const vel = moveFlying(vec3(prev.vel.x, vy, prev.vel.z), wish.strafe, wish.forward, accel, input.yaw);
  const r = resolve(world, prev.pos, vel, prev.onGround);

  return {
    pos: r.pos,
    vel: vec3(r.vel.x * FLY_HORIZONTAL_DAMPING, r.vel.y * FLY_VERTICAL_DAMPING, r.vel.z * FLY_HORIZONTAL_DAMPING),
    onGround: r.onGround,
    yaw: input.yaw,
    pitch: input.pitch,
  };
}

/**
 * Advance the local player one tick. Pure function of its inputs: the same
 * state, input and world always produce the same result.
 */
export function simulateTick(prev: PlayerSimState, input: InputState, world: WorldCollision): PlayerSimState {
  const yaw = input.yaw;
  const pitch = input.pitch;
  const sprinting = effectiveSprint(input);
  const wish = wishVector(input);

  if (input.canFly && input.flying) {
    return simulateFlying(prev, input, world, wish, sprinting);
  }

  const inWater = world.isInWater(prev.pos);
  let vel = prev.vel;
  let onGround = prev.onGround;

  if (input.jump) {
    if (inWater) {
      vel = vec3(vel.x, vel.y + WATER_SWIM_UP, vel.z);
    } else if (onGround) {
      let vx = vel.x;
      let vz = vel.z;
      if (sprinting) {
        vx -= Math.sin(yaw) * SPRINT_JUMP_BOOST;
        vz -= Math.cos(yaw) * SPRINT_JUMP_BOOST;
      }
      vel = vec3(vx, jumpVelocity(input), vz);
      onGround = false;
    }
  }

  let friction: number;
  let accel: number;
  const sprintScale = sprinting ? SPRINT_MULTIPLIER : 1;
  if (inWater) {
    friction = WATER_DRAG;
    accel = WATER_MOVE_SPEED;
  } else if (onGround) {
    friction = SLIPPERINESS_DEFAULT * AIR_FRICTION;
    const moveSpeed = BASE_MOVE_SPEED * input.speedMultiplier * sprintScale;
    accel = moveSpeed * (GROUND_ACCEL_BASE / (friction * friction * friction));
  } else {
    friction = AIR_FRICTION;
    accel = SPEED_IN_AIR * sprintScale;
  }

  vel = moveFlying(vel, wish.strafe, wish.forward, accel, yaw);

  if (onGround && input.sneak) {
    vel = world.clampSneakEdgeVelocity(prev.pos, vel);
  }

  const r = resolve(world, prev.pos, vel, prev.onGround);
  let { x: vx, y: vy, z: vz } = r.vel;

  if (inWater) {
    vx *= WATER_DRAG;
    vy = vy * WATER_DRAG + WATER_GRAVITY;
    vz *= WATER_DRAG;
    if (r.collidedHorizontally) {
      const rise = vy + 0.6 - (r.pos.y - prev.pos.y);
      if (world.isFreeOfSolidsAndLiquid(offset(playerAABB(r.pos), vx, rise, vz))) {
        vy = WATER_SURFACE_ASSIST;
      }
    }
  } else {
    vy = r.supported ? 0 : (vy + GRAVITY) * AIR_DRAG;
    vx *= friction;
    vz *= friction;
  }

  return { pos: r.pos, vel: vec3(vx, vy, vz), onGround: r.onGround, yaw, pitch };
}
