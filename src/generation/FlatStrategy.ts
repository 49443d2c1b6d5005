import { AIR, makeBlockState, STONE } from "../world/BlockState.js";
import type { ChunkUpdate } from "../world/ChunkColumnStore.js";
import { buildColumn, type TerrainStrategy } from "./TerrainStrategy.js";

export const GRASS = 2;

/**
 * Generates a completely flat world: stone with one grass layer on top, so
 * a player standing on it has feet at `surfaceY`.
 * Useful for isolating movement behavior from terrain.
 */
export class FlatStrategy implements TerrainStrategy {
  constructor(readonly surfaceY = 64) {}

  generate(cx: number, cz: number): ChunkUpdate {
    const top = this.surfaceY - 1;
    const stone = makeBlockState(STONE);
    const grass = makeBlockState(GRASS);
    return buildColumn(cx, cz, top, (_x, y) => {
      if (y < top) return stone;
      return y === top ? grass : AIR;
    });
  }
}
