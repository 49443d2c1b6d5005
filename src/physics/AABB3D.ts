import { PLAYER_HALF_WIDTH, PLAYER_HEIGHT } from "../config/constants.js";
import type { Vec3 } from "../math/vec3.js";

/** Axis-aligned box in world space. Y is up. */
export interface AABB3D {
  readonly minX: number;
  readonly minY: number;
  readonly minZ: number;
  readonly maxX: number;
  readonly maxY: number;
  readonly maxZ: number;
}

export function aabb(
  minX: number,
  minY: number,
  minZ: number,
  maxX: number,
  maxY: number,
  maxZ: number,
): AABB3D {
  return { minX, minY, minZ, maxX, maxY, maxZ };
}

/** Player collision box for feet position `pos`. */
export function playerAABB(pos: Vec3): AABB3D {
  return {
    minX: pos.x - PLAYER_HALF_WIDTH,
    minY: pos.y,
    minZ: pos.z - PLAYER_HALF_WIDTH,
    maxX: pos.x + PLAYER_HALF_WIDTH,
    maxY: pos.y + PLAYER_HEIGHT,
    maxZ: pos.z + PLAYER_HALF_WIDTH,
  };
}

export function offset(box: AABB3D, dx: number, dy: number, dz: number): AABB3D {
  return {
    minX: box.minX + dx,
    minY: box.minY + dy,
    minZ: box.minZ + dz,
    maxX: box.maxX + dx,
    maxY: box.maxY + dy,
    maxZ: box.maxZ + dz,
  };
}

/** Stretch the box in the direction of a motion vector (broad-phase sweep). */
export function expandTowards(box: AABB3D, dx: number, dy: number, dz: number): AABB3D {
  return {
    minX: dx < 0 ? box.minX + dx : box.minX,
    minY: dy < 0 ? box.minY + dy : box.minY,
    minZ: dz < 0 ? box.minZ + dz : box.minZ,
    maxX: dx > 0 ? box.maxX + dx : box.maxX,
    maxY: dy > 0 ? box.maxY + dy : box.maxY,
    maxZ: dz > 0 ? box.maxZ + dz : box.maxZ,
  };
}

/** Strict overlap test: touching faces don't count. */
export function intersects(a: AABB3D, b: AABB3D): boolean {
  return (
    a.minX < b.maxX &&
    a.maxX > b.minX &&
    a.minY < b.maxY &&
    a.maxY > b.minY &&
    a.minZ < b.maxZ &&
    a.maxZ > b.minZ
  );
}

/**
 * Clip a Y motion of `moving` against `obstacle`. Returns the largest motion
 * (same sign, never larger in magnitude) that keeps the boxes apart, or the
 * motion unchanged if the boxes don't overlap on the other two axes.
 */
export function clipYMotion(obstacle: AABB3D, moving: AABB3D, dy: number): number {
  if (moving.maxX <= obstacle.minX || moving.minX >= obstacle.maxX) return dy;
  if (moving.maxZ <= obstacle.minZ || moving.minZ >= obstacle.maxZ) return dy;
  if (dy > 0 && moving.maxY <= obstacle.minY) {
    const room = obstacle.minY - moving.maxY;
    if (room < dy) return room;
  } else if (dy < 0 && moving.minY >= obstacle.maxY) {
    const room = obstacle.maxY - moving.minY;
    if (room > dy) return room;
  }
  return dy;
}

export function clipXMotion(obstacle: AABB3D, moving: AABB3D, dx: number): number {
  if (moving.maxY <= obstacle.minY || moving.minY >= obstacle.maxY) return dx;
  if (moving.maxZ <= obstacle.minZ || moving.minZ >= obstacle.maxZ) return dx;
  if (dx > 0 && moving.maxX <= obstacle.minX) {
    const room = obstacle.minX - moving.maxX;
    if (room < dx) return room;
  } else if (dx < 0 && moving.minX >= obstacle.maxX) {
    const room = obstacle.maxX - moving.minX;
    if (room > dx) return room;
  }
  return dx;
}

export function clipZMotion(obstacle: AABB3D, moving: AABB3D, dz: number): number {
  if (moving.maxX <= obstacle.minX || moving.minX >= obstacle.maxX) return dz;
  if (moving.maxY <= obstacle.minY || moving.minY >= obstacle.maxY) return dz;
  if (dz > 0 && moving.maxZ <= obstacle.minZ) {
    const room = obstacle.minZ - moving.maxZ;
    if (room < dz) return room;
  } else if (dz < 0 && moving.minZ >= obstacle.maxZ) {
    const room = obstacle.maxZ - moving.minZ;
    if (room > dz) return room;
  }
  return dz;
}
