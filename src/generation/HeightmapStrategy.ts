import { WORLD_HEIGHT } from "../config/constants.js";
import { AIR, makeBlockState, STONE } from "../world/BlockState.js";
import type { ChunkUpdate } from "../world/ChunkColumnStore.js";
import { GRASS } from "./FlatStrategy.js";
import { NoiseMap, type NoiseMapOptions } from "./NoiseMap.js";
import { buildColumn, type TerrainStrategy } from "./TerrainStrategy.js";

export const STILL_WATER = 9;

export interface HeightmapOptions {
  /** Lowest surface height (feet level on the lowest column). */
  minHeight: number;
  maxHeight: number;
  /** Columns whose surface is below this fill with still water up to it. */
  seaLevel: number;
  noise?: Partial<NoiseMapOptions>;
}

const DEFAULTS: HeightmapOptions = {
  minHeight: 56,
  maxHeight: 76,
  seaLevel: 62,
};

/**
 * Rolling seeded terrain for exercising steps, ledges and water: stone
 * capped with grass at a noise-driven height, still water in the hollows.
 */
export class HeightmapStrategy implements TerrainStrategy {
  private readonly heights: NoiseMap;
  private readonly opts: HeightmapOptions;

  constructor(seed: string, options?: Partial<HeightmapOptions>) {
    this.opts = { ...DEFAULTS, ...options };
    this.heights = new NoiseMap(seed, this.opts.noise);
  }

  /** Feet height of a player standing on column (x, z). */
  surfaceAt(x: number, z: number): number {
    const h = this.heights.range(x, z, this.opts.minHeight, this.opts.maxHeight);
    return Math.min(WORLD_HEIGHT - 1, Math.max(1, h));
  }

  generate(cx: number, cz: number): ChunkUpdate {
    const stone = makeBlockState(STONE);
    const grass = makeBlockState(GRASS);
    const water = makeBlockState(STILL_WATER);
    const top = Math.max(this.opts.maxHeight, this.opts.seaLevel);
    return buildColumn(cx, cz, top, (x, y, z) => {
      const surface = this.surfaceAt(x, z);
      if (y < surface - 1) return stone;
      if (y === surface - 1) return grass;
      return y < this.opts.seaLevel ? water : AIR;
    });
  }
}
