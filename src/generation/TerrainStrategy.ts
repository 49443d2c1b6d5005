import { CHUNK_SIZE, SECTION_HEIGHT, SECTION_VOLUME, WORLD_HEIGHT } from "../config/constants.js";
import { AIR } from "../world/BlockState.js";
import type { ChunkColumnStore, ChunkSectionData, ChunkUpdate } from "../world/ChunkColumnStore.js";

/** Interface for terrain generation strategies. */
export interface TerrainStrategy {
  generate(cx: number, cz: number): ChunkUpdate;
}

/**
 * Build a full column update from a per-block function. Only sections up to
 * `topY` are sampled, and all-air sections are left out.
 */
export function buildColumn(
  cx: number,
  cz: number,
  topY: number,
  blockAt: (x: number, y: number, z: number) => number,
): ChunkUpdate {
  const sections: ChunkSectionData[] = [];
  const lastSection = Math.min(Math.floor(topY / SECTION_HEIGHT), WORLD_HEIGHT / SECTION_HEIGHT - 1);
  for (let sy = 0; sy <= lastSection; sy++) {
    const blocks = new Uint16Array(SECTION_VOLUME);
    let solid = false;
    for (let ly = 0; ly < SECTION_HEIGHT; ly++) {
      for (let lz = 0; lz < CHUNK_SIZE; lz++) {
        for (let lx = 0; lx < CHUNK_SIZE; lx++) {
          const state = blockAt(cx * CHUNK_SIZE + lx, sy * SECTION_HEIGHT + ly, cz * CHUNK_SIZE + lz);
          if (state === AIR) continue;
          blocks[ly * CHUNK_SIZE * CHUNK_SIZE + lz * CHUNK_SIZE + lx] = state;
          solid = true;
        }
      }
    }
    if (solid) sections.push({ y: sy, blocks });
  }
  return { x: cx, z: cz, full: true, sections };
}

/** Generate every column within `radius` chunks of (cx, cz) into the store. */
export function populate(
  store: ChunkColumnStore,
  strategy: TerrainStrategy,
  cx: number,
  cz: number,
  radius: number,
): void {
  for (let x = cx - radius; x <= cx + radius; x++) {
    for (let z = cz - radius; z <= cz + radius; z++) {
      store.updateChunk(strategy.generate(x, z));
    }
  }
}
