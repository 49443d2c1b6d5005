import {
	CHUNK_SIZE,
	SECTION_HEIGHT,
	SECTION_VOLUME,
	SECTIONS_PER_COLUMN,
	WORLD_HEIGHT,
} from "../config/constants.js";
import { AIR, makeBlockState, STONE } from "./BlockState.js";
import { type BlockLookup, blockToChunk, blockToLocal, chunkKey } from "./types.js";

/** One decoded 16×16×16 section, indexed y*256 + z*16 + x. */
export interface ChunkSectionData {
	/** Section index within the column (0 = bottom). */
	y: number;
	blocks: Uint16Array;
}

/** A decoded chunk update as delivered by the network layer. */
export interface ChunkUpdate {
	x: number;
	z: number;
	/** Full updates replace the column; partial updates overlay sections. */
	full: boolean;
	sections: readonly ChunkSectionData[];
}

interface ChunkColumn {
	sections: (Uint16Array | null)[];
	full: boolean;
}

function sectionIndex(lx: number, ly: number, lz: number): number {
	return ly * CHUNK_SIZE * CHUNK_SIZE + lz * CHUNK_SIZE + lx;
}

function emptyColumn(full: boolean): ChunkColumn {
	return { sections: new Array<Uint16Array | null>(SECTIONS_PER_COLUMN).fill(null), full };
}

/**
 * In-memory block storage for loaded chunk columns. Readers never mutate it,
 * so a single store can back the movement resolver and any other consumer.
 *
 * Below the world floor reads as stone and above build height as air; those
 * sentinels anchor step and ledge behavior at the world bounds.
 */
export class ChunkColumnStore implements BlockLookup {
	private readonly columns = new Map<string, ChunkColumn>();

	get columnCount(): number {
		return this.columns.size;
	}

	updateChunk(update: ChunkUpdate): void {
		const key = chunkKey(update.x, update.z);
		let column = this.columns.get(key);
		if (!column || update.full) {
			column = emptyColumn(update.full);
			this.columns.set(key, column);
		}
		for (const section of update.sections) {
			if (section.y < 0 || section.y >= SECTIONS_PER_COLUMN) continue;
			if (section.blocks.length !== SECTION_VOLUME) continue;
			column.sections[section.y] = section.blocks;
		}
	}

	unloadChunk(cx: number, cz: number): void {
		this.columns.delete(chunkKey(cx, cz));
	}

	clear(): void {
		this.columns.clear();
	}

	blockAt(x: number, y: number, z: number): number {
		if (y < 0) return makeBlockState(STONE);
		if (y >= WORLD_HEIGHT) return AIR;

		const { cx, cz } = blockToChunk(x, z);
		const column = this.columns.get(chunkKey(cx, cz));
		if (!column) return AIR;

		const section = column.sections[Math.floor(y / SECTION_HEIGHT)];
		if (!section) return AIR;

		const { lx, lz } = blockToLocal(x, z);
		return section[sectionIndex(lx, y % SECTION_HEIGHT, lz)] ?? AIR;
	}

	/**
	 * Write a single block, allocating the column and section on demand.
	 * Used by world generators and tests; live updates arrive via updateChunk.
	 */
	setBlock(x: number, y: number, z: number, state: number): void {
		if (y < 0 || y >= WORLD_HEIGHT) return;
		const { cx, cz } = blockToChunk(x, z);
		const key = chunkKey(cx, cz);
		let column = this.columns.get(key);
		if (!column) {
			column = emptyColumn(true);
			this.columns.set(key, column);
		}
		const sy = Math.floor(y / SECTION_HEIGHT);
		let section = column.sections[sy];
		if (!section) {
			section = new Uint16Array(SECTION_VOLUME);
			column.sections[sy] = section;
		}
		const { lx, lz } = blockToLocal(x, z);
		section[sectionIndex(lx, y % SECTION_HEIGHT, lz)] = state;
	}
}
