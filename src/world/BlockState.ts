/**
 * 16-bit block state: low 4 bits are the variant/meta, the rest the block id.
 */

export const AIR = 0;

/** Solid filler reported below the world floor. */
export const STONE = 1;

export function blockId(state: number): number {
  return (state & 0xffff) >>> 4;
}

export function blockMeta(state: number): number {
  return state & 0xf;
}

export function makeBlockState(id: number, meta = 0): number {
  return ((id << 4) | (meta & 0xf)) & 0xffff;
}
