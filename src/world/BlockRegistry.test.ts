import { describe, expect, it } from "vitest";
import { BlockRegistry, BlockShape, getBlockRegistry } from "./BlockRegistry.js";

const EMPTY_TABLE = {
  none: [],
  water: [],
  lava: [],
  slab: [],
  stairs: [],
  fence: [],
  fenceGate: [],
  wall: [],
  pane: [],
  paneConnectors: [],
  snowLayer: [],
  trapdoor: [],
  ladder: [],
  translucentFullCubes: [],
  boxes: {},
};

describe("BlockRegistry", () => {
  it("treats unlisted ids as full cubes", () => {
    const registry = getBlockRegistry();
    expect(registry.shapeOf(1)).toBe(BlockShape.Full);
    expect(registry.isOpaqueFullCube(1)).toBe(true);
    expect(registry.hasCollision(1)).toBe(true);
  });

  it("loads shapes and flags from the bundled table", () => {
    const registry = getBlockRegistry();
    expect(registry.hasCollision(0)).toBe(false);
    expect(registry.shapeOf(44)).toBe(BlockShape.Slab);
    expect(registry.shapeOf(53)).toBe(BlockShape.Stairs);
    expect(registry.isWater(9)).toBe(true);
    expect(registry.isWater(11)).toBe(false);
    expect(registry.isLiquid(11)).toBe(true);
    expect(registry.isPaneConnector(20)).toBe(true);
    expect(registry.isOpaqueFullCube(20)).toBe(false);
  });

  it("exposes fixed boxes only for box-shaped ids", () => {
    const registry = getBlockRegistry();
    expect(registry.boxesOf(88)).toEqual([[0, 0, 0, 1, 0.875, 1]]);
    expect(registry.boxesOf(1)).toEqual([]);
  });

  it("accepts a minimal table", () => {
    const registry = BlockRegistry.fromJSON({ ...EMPTY_TABLE, slab: [7] });
    expect(registry.shapeOf(7)).toBe(BlockShape.Slab);
    expect(registry.shapeOf(44)).toBe(BlockShape.Full);
  });

  it("rejects malformed tables", () => {
    expect(() => BlockRegistry.fromJSON({ ...EMPTY_TABLE, slab: [-1] })).toThrow();
    expect(() => BlockRegistry.fromJSON({ ...EMPTY_TABLE, boxes: { "5": [[0, 0, 0, 2, 1, 1]] } })).toThrow();
    expect(() => BlockRegistry.fromJSON({ slab: [] })).toThrow();
  });
});
