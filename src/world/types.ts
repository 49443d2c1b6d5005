import { CHUNK_SIZE } from "../config/constants.js";

/** Integer chunk column index. */
export interface ChunkPos {
	cx: number;
	cz: number;
}

/**
 * Read-only block lookup by integer coordinate, returning a 16-bit block
 * state. Implementations must tolerate concurrent readers and never fail;
 * coordinates outside loaded data read as a defined default.
 */
export interface BlockLookup {
	blockAt(x: number, y: number, z: number): number;
}

/** Convert block coordinates to the containing chunk column. */
export function blockToChunk(x: number, z: number): ChunkPos {
	return {
		cx: Math.floor(x / CHUNK_SIZE),
		cz: Math.floor(z / CHUNK_SIZE),
	};
}

/** Local block index within a chunk column (0..CHUNK_SIZE-1). */
export function blockToLocal(x: number, z: number): { lx: number; lz: number } {
	return {
		lx: ((x % CHUNK_SIZE) + CHUNK_SIZE) % CHUNK_SIZE,
		lz: ((z % CHUNK_SIZE) + CHUNK_SIZE) % CHUNK_SIZE,
	};
}

/** Map key for chunk coordinates. */
export function chunkKey(cx: number, cz: number): string {
	return `${cx},${cz}`;
}
