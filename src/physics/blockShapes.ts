import { blockId, blockMeta } from "../world/BlockState.js";
import { BlockShape, type BlockRegistry, type LocalBox } from "../world/BlockRegistry.js";
import type { BlockLookup } from "../world/types.js";
import type { AABB3D } from "./AABB3D.js";

const FULL: LocalBox = [0, 0, 0, 1, 1, 1];

const FENCE_MIN = 0.375;
const FENCE_MAX = 0.625;
const FENCE_HEIGHT = 1.5;
const PANE_MIN = 0.4375;
const PANE_MAX = 0.5625;
const NETHER_BRICK_FENCE = 113;

/** Stair step half by facing (meta & 3): east, west, south, north. */
const STAIR_STEPS: readonly (readonly [number, number, number, number])[] = [
  [0.5, 0, 1, 1],
  [0, 0, 0.5, 1],
  [0, 0.5, 1, 1],
  [0, 0, 1, 0.5],
];

/** Open trapdoor panel by facing (meta & 3): north, south, west, east. */
const TRAPDOOR_OPEN: readonly LocalBox[] = [
  [0, 0, 0.8125, 1, 1, 1],
  [0, 0, 0, 1, 1, 0.1875],
  [0.8125, 0, 0, 1, 1, 1],
  [0, 0, 0, 0.1875, 1, 1],
];

/** Ladder plate by meta 2..5: north, south, west, east. */
const LADDERS: readonly LocalBox[] = [
  [0, 0, 0.875, 1, 1, 1],
  [0, 0, 0, 1, 1, 0.125],
  [0.875, 0, 0, 1, 1, 1],
  [0, 0, 0, 0.125, 1, 1],
];

function push(out: AABB3D[], x: number, y: number, z: number, b: LocalBox): void {
  out.push({
    minX: x + b[0],
    minY: y + b[1],
    minZ: z + b[2],
    maxX: x + b[3],
    maxY: y + b[4],
    maxZ: z + b[5],
  });
}

interface Connections {
  north: boolean;
  south: boolean;
  west: boolean;
  east: boolean;
}

function connections(
  world: BlockLookup,
  x: number,
  y: number,
  z: number,
  connectsTo: (neighborId: number) => boolean,
): Connections {
  return {
    north: connectsTo(blockId(world.blockAt(x, y, z - 1))),
    south: connectsTo(blockId(world.blockAt(x, y, z + 1))),
    west: connectsTo(blockId(world.blockAt(x - 1, y, z))),
    east: connectsTo(blockId(world.blockAt(x + 1, y, z))),
  };
}

function fenceBoxes(c: Connections, out: AABB3D[], x: number, y: number, z: number): void {
  if (c.north || c.south) {
    push(out, x, y, z, [FENCE_MIN, 0, c.north ? 0 : FENCE_MIN, FENCE_MAX, FENCE_HEIGHT, c.south ? 1 : FENCE_MAX]);
  }
  if (c.west || c.east || !(c.north || c.south)) {
    push(out, x, y, z, [c.west ? 0 : FENCE_MIN, 0, FENCE_MIN, c.east ? 1 : FENCE_MAX, FENCE_HEIGHT, FENCE_MAX]);
  }
}

function wallBox(c: Connections, out: AABB3D[], x: number, y: number, z: number): void {
  let minX = c.west ? 0 : 0.25;
  let maxX = c.east ? 1 : 0.75;
  let minZ = c.north ? 0 : 0.25;
  let maxZ = c.south ? 1 : 0.75;
  // Straight runs thin down to the wall section between posts.
  if (c.north && c.south && !c.west && !c.east) {
    minX = 0.3125;
    maxX = 0.6875;
  } else if (!c.north && !c.south && c.west && c.east) {
    minZ = 0.3125;
    maxZ = 0.6875;
  }
  push(out, x, y, z, [minX, 0, minZ, maxX, FENCE_HEIGHT, maxZ]);
}

function paneBoxes(c: Connections, out: AABB3D[], x: number, y: number, z: number): void {
  const any = c.north || c.south || c.west || c.east;
  if ((!c.west || !c.east) && any) {
    if (c.west) push(out, x, y, z, [0, 0, PANE_MIN, 0.5, 1, PANE_MAX]);
    else if (c.east) push(out, x, y, z, [0.5, 0, PANE_MIN, 1, 1, PANE_MAX]);
  } else {
    push(out, x, y, z, [0, 0, PANE_MIN, 1, 1, PANE_MAX]);
  }
  if ((!c.north || !c.south) && any) {
    if (c.north) push(out, x, y, z, [PANE_MIN, 0, 0, PANE_MAX, 1, 0.5]);
    else if (c.south) push(out, x, y, z, [PANE_MIN, 0, 0.5, PANE_MAX, 1, 1]);
  } else {
    push(out, x, y, z, [PANE_MIN, 0, 0, PANE_MAX, 1, 1]);
  }
}

/**
 * Append the world-space collision boxes of the block at (x, y, z) to `out`.
 * Shapes come from the registry; neighbour-dependent shapes (fences, walls,
 * panes) look at the four horizontal neighbours.
 */
export function collectBlockBoxes(
  world: BlockLookup,
  registry: BlockRegistry,
  x: number,
  y: number,
  z: number,
  out: AABB3D[],
): void {
  const state = world.blockAt(x, y, z);
  const id = blockId(state);
  const meta = blockMeta(state);

  switch (registry.shapeOf(id)) {
    case BlockShape.None:
      return;
    case BlockShape.Full:
      push(out, x, y, z, FULL);
      return;
    case BlockShape.Slab:
      push(out, x, y, z, (meta & 0x8) !== 0 ? [0, 0.5, 0, 1, 1, 1] : [0, 0, 0, 1, 0.5, 1]);
      return;
    case BlockShape.Stairs: {
      const upsideDown = (meta & 0x4) !== 0;
      push(out, x, y, z, upsideDown ? [0, 0.5, 0, 1, 1, 1] : [0, 0, 0, 1, 0.5, 1]);
      const [minX, minZ, maxX, maxZ] = STAIR_STEPS[meta & 0x3];
      push(out, x, y, z, upsideDown ? [minX, 0, minZ, maxX, 0.5, maxZ] : [minX, 0.5, minZ, maxX, 1, maxZ]);
      return;
    }
    case BlockShape.Fence: {
      const nether = id === NETHER_BRICK_FENCE;
      const c = connections(world, x, y, z, (n) => {
        const shape = registry.shapeOf(n);
        if (shape === BlockShape.Fence) return (n === NETHER_BRICK_FENCE) === nether;
        return shape === BlockShape.FenceGate || registry.isOpaqueFullCube(n);
      });
      fenceBoxes(c, out, x, y, z);
      return;
    }
    case BlockShape.FenceGate: {
      if ((meta & 0x4) !== 0) return;
      const alongX = (meta & 0x3) % 2 === 0;
      push(
        out,
        x,
        y,
        z,
        alongX
          ? [0, 0, FENCE_MIN, 1, FENCE_HEIGHT, FENCE_MAX]
          : [FENCE_MIN, 0, 0, FENCE_MAX, FENCE_HEIGHT, 1],
      );
      return;
    }
    case BlockShape.Wall: {
      const c = connections(world, x, y, z, (n) => {
        const shape = registry.shapeOf(n);
        return shape === BlockShape.Wall || shape === BlockShape.FenceGate || registry.isOpaqueFullCube(n);
      });
      wallBox(c, out, x, y, z);
      return;
    }
    case BlockShape.Pane: {
      const c = connections(
        world,
        x,
        y,
        z,
        (n) =>
          registry.shapeOf(n) === BlockShape.Pane ||
          registry.isPaneConnector(n) ||
          registry.isOpaqueFullCube(n),
      );
      paneBoxes(c, out, x, y, z);
      return;
    }
    case BlockShape.SnowLayer: {
      const height = (meta & 0x7) * 0.125;
      if (height > 0) push(out, x, y, z, [0, 0, 0, 1, height, 1]);
      return;
    }
    case BlockShape.Trapdoor: {
      if ((meta & 0x4) !== 0) {
        push(out, x, y, z, TRAPDOOR_OPEN[meta & 0x3]);
      } else {
        push(out, x, y, z, (meta & 0x8) !== 0 ? [0, 0.8125, 0, 1, 1, 1] : [0, 0, 0, 1, 0.1875, 1]);
      }
      return;
    }
    case BlockShape.Ladder: {
      // Facing metas are 2..5; anything else reads as facing north.
      push(out, x, y, z, LADDERS[meta >= 2 && meta <= 5 ? meta - 2 : 0]);
      return;
    }
    case BlockShape.Boxes:
      for (const b of registry.boxesOf(id)) push(out, x, y, z, b);
      return;
  }
}
