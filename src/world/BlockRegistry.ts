import { readFileSync } from "node:fs";
import { z } from "zod";

/** Collision shape families. Anything not listed in the table is a full cube. */
export enum BlockShape {
  Full = 0,
  None = 1,
  Slab = 2,
  Stairs = 3,
  Fence = 4,
  FenceGate = 5,
  Wall = 6,
  Pane = 7,
  SnowLayer = 8,
  Trapdoor = 9,
  Ladder = 10,
  Boxes = 11,
}

/** Local-space box inside a unit cell: [minX, minY, minZ, maxX, maxY, maxZ]. */
export type LocalBox = readonly [number, number, number, number, number, number];

const MAX_BLOCK_ID = 0xfff;

const Flag = {
  Water: 1,
  Lava: 2,
  PaneConnector: 4,
  Translucent: 8,
} as const;

const blockIdSchema = z.number().int().min(0).max(MAX_BLOCK_ID);
const idListSchema = z.array(blockIdSchema);
const unitSchema = z.number().min(0).max(1);
const localBoxSchema = z.tuple([unitSchema, unitSchema, unitSchema, unitSchema, unitSchema, unitSchema]);

export const blockShapeTableSchema = z.object({
  none: idListSchema,
  water: idListSchema,
  lava: idListSchema,
  slab: idListSchema,
  stairs: idListSchema,
  fence: idListSchema,
  fenceGate: idListSchema,
  wall: idListSchema,
  pane: idListSchema,
  paneConnectors: idListSchema,
  snowLayer: idListSchema,
  trapdoor: idListSchema,
  ladder: idListSchema,
  translucentFullCubes: idListSchema,
  boxes: z.record(z.string().regex(/^\d+$/), z.array(localBoxSchema).min(1)),
});

export type BlockShapeTable = z.infer<typeof blockShapeTableSchema>;

/**
 * Table-driven block properties for collision: shape family, liquid flags,
 * and which blocks fences and panes attach to.
 */
export class BlockRegistry {
  private readonly shapes = new Uint8Array(MAX_BLOCK_ID + 1);
  private readonly flags = new Uint8Array(MAX_BLOCK_ID + 1);
  private readonly fixedBoxes = new Map<number, readonly LocalBox[]>();

  constructor(table: BlockShapeTable) {
    const assign = (ids: readonly number[], shape: BlockShape) => {
      for (const id of ids) this.shapes[id] = shape;
    };
    assign(table.none, BlockShape.None);
    assign(table.slab, BlockShape.Slab);
    assign(table.stairs, BlockShape.Stairs);
    assign(table.fence, BlockShape.Fence);
    assign(table.fenceGate, BlockShape.FenceGate);
    assign(table.wall, BlockShape.Wall);
    assign(table.pane, BlockShape.Pane);
    assign(table.snowLayer, BlockShape.SnowLayer);
    assign(table.trapdoor, BlockShape.Trapdoor);
    assign(table.ladder, BlockShape.Ladder);
    for (const [key, boxes] of Object.entries(table.boxes)) {
      const id = Number(key);
      this.shapes[id] = BlockShape.Boxes;
      this.fixedBoxes.set(id, boxes);
    }

    const mark = (ids: readonly number[], flag: number) => {
      for (const id of ids) this.flags[id] |= flag;
    };
    mark(table.water, Flag.Water);
    mark(table.lava, Flag.Lava);
    mark(table.paneConnectors, Flag.PaneConnector);
    mark(table.translucentFullCubes, Flag.Translucent);
  }

  /** Parse and validate a raw table (e.g. the contents of blockShapes.json). */
  static fromJSON(raw: unknown): BlockRegistry {
    return new BlockRegistry(blockShapeTableSchema.parse(raw));
  }

  shapeOf(id: number): BlockShape {
    return this.shapes[id & MAX_BLOCK_ID];
  }

  /** Boxes for a {@link BlockShape.Boxes} block; empty for every other shape. */
  boxesOf(id: number): readonly LocalBox[] {
    return this.fixedBoxes.get(id) ?? [];
  }

  hasCollision(id: number): boolean {
    return this.shapeOf(id) !== BlockShape.None;
  }

  isWater(id: number): boolean {
    return this.hasFlag(id, Flag.Water);
  }

  isLiquid(id: number): boolean {
    return this.hasFlag(id, Flag.Water | Flag.Lava);
  }

  /** Solid, opaque full cube: what fences, walls and panes attach to. */
  isOpaqueFullCube(id: number): boolean {
    return this.shapeOf(id) === BlockShape.Full && !this.hasFlag(id, Flag.Translucent);
  }

  /** Glass and stained glass join panes even though they're translucent. */
  isPaneConnector(id: number): boolean {
    return this.hasFlag(id, Flag.PaneConnector);
  }

  private hasFlag(id: number, flag: number): boolean {
    return (this.flags[id & MAX_BLOCK_ID] & flag) !== 0;
  }
}

let defaultRegistry: BlockRegistry | null = null;

/** Registry built from the bundled blockShapes.json, loaded on first use. */
export function getBlockRegistry(): BlockRegistry {
  if (!defaultRegistry) {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("./blockShapes.json", import.meta.url), "utf8"),
    );
    defaultRegistry = BlockRegistry.fromJSON(raw);
  }
  return defaultRegistry;
}
