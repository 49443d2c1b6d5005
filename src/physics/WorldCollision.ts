import { COLLISION_EPS, LIQUID_SAMPLE_OFFSETS, SNEAK_EDGE_STEP } from "../config/constants.js";
import { type Vec3, vec3 } from "../math/vec3.js";
import { blockId } from "../world/BlockState.js";
import { type BlockRegistry, getBlockRegistry } from "../world/BlockRegistry.js";
import type { BlockLookup } from "../world/types.js";
import { type AABB3D, intersects, offset, playerAABB } from "./AABB3D.js";
import { collectBlockBoxes } from "./blockShapes.js";

function stepTowardZero(v: number): number {
  return v > 0 ? Math.max(v - SNEAK_EDGE_STEP, 0) : Math.min(v + SNEAK_EDGE_STEP, 0);
}

/**
 * Voxel queries for player movement. Wraps a read-only block lookup; an
 * empty collision (no lookup) is open air everywhere, which determinism
 * tests use for an obstacle-free world.
 */
export class WorldCollision {
  private constructor(
    private readonly lookup: BlockLookup | null,
    private readonly registry: BlockRegistry,
  ) {}

  static empty(): WorldCollision {
    return new WorldCollision(null, getBlockRegistry());
  }

  static of(lookup: BlockLookup, registry: BlockRegistry = getBlockRegistry()): WorldCollision {
    return new WorldCollision(lookup, registry);
  }

  get isEmpty(): boolean {
    return this.lookup === null;
  }

  blockAt(x: number, y: number, z: number): number {
    return this.lookup ? this.lookup.blockAt(x, y, z) : 0;
  }

  /**
   * Collision boxes of every block intersecting `box`. Scans one row below
   * the box so shapes taller than a cell (fences, walls) are found.
   */
  getCollidingBoxes(box: AABB3D): AABB3D[] {
    const out: AABB3D[] = [];
    if (!this.lookup) return out;
    const lookup = this.lookup;

    const minX = Math.floor(box.minX);
    const maxX = Math.floor(box.maxX);
    const minY = Math.floor(box.minY) - 1;
    const maxY = Math.floor(box.maxY);
    const minZ = Math.floor(box.minZ);
    const maxZ = Math.floor(box.maxZ);

    const candidates: AABB3D[] = [];
    for (let x = minX; x <= maxX; x++) {
      for (let z = minZ; z <= maxZ; z++) {
        for (let y = minY; y <= maxY; y++) {
          candidates.length = 0;
          collectBlockBoxes(lookup, this.registry, x, y, z, candidates);
          for (const c of candidates) {
            if (intersects(c, box)) out.push(c);
          }
        }
      }
    }
    return out;
  }

  collides(box: AABB3D): boolean {
    return this.getCollidingBoxes(box).length > 0;
  }

  /** True if the player box at `pos` dropped one block would rest on something. */
  hasSupportOneBlockDown(pos: Vec3): boolean {
    return this.collides(offset(playerAABB(pos), 0, -1, 0));
  }

  /**
   * Shrink horizontal velocity toward zero until the feet keep support one
   * block down: X alone, then Z alone, then both together.
   */
  clampSneakEdgeVelocity(pos: Vec3, vel: Vec3): Vec3 {
    if (!this.lookup) return vel;

    let dx = vel.x;
    let dz = vel.z;

    while (Math.abs(dx) > COLLISION_EPS && !this.hasSupportOneBlockDown(vec3(pos.x + dx, pos.y, pos.z))) {
      dx = stepTowardZero(dx);
    }
    while (Math.abs(dz) > COLLISION_EPS && !this.hasSupportOneBlockDown(vec3(pos.x, pos.y, pos.z + dz))) {
      dz = stepTowardZero(dz);
    }
    while (
      Math.abs(dx) > COLLISION_EPS &&
      Math.abs(dz) > COLLISION_EPS &&
      !this.hasSupportOneBlockDown(vec3(pos.x + dx, pos.y, pos.z + dz))
    ) {
      dx = stepTowardZero(dx);
      dz = stepTowardZero(dz);
    }

    return vec3(dx, vel.y, dz);
  }

  /** Water at any of the feet, waist or head sample points. */
  isInWater(pos: Vec3): boolean {
    if (!this.lookup) return false;
    const x = Math.floor(pos.x);
    const z = Math.floor(pos.z);
    for (const dy of LIQUID_SAMPLE_OFFSETS) {
      if (this.registry.isWater(blockId(this.lookup.blockAt(x, Math.floor(pos.y + dy), z)))) {
        return true;
      }
    }
    return false;
  }

  /** No collision boxes and no liquid blocks anywhere inside `box`. */
  isFreeOfSolidsAndLiquid(box: AABB3D): boolean {
    if (!this.lookup) return true;
    if (this.collides(box)) return false;
    for (let x = Math.floor(box.minX); x <= Math.floor(box.maxX); x++) {
      for (let y = Math.floor(box.minY); y <= Math.floor(box.maxY); y++) {
        for (let z = Math.floor(box.minZ); z <= Math.floor(box.maxZ); z++) {
          if (this.registry.isLiquid(blockId(this.lookup.blockAt(x, y, z)))) return false;
        }
      }
    }
    return true;
  }
}
