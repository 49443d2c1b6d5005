import { PREDICTION_CAPACITY } from "../config/constants.js";
import type { PredictedFrame } from "../physics/types.js";

/**
 * Fixed-capacity ring of predicted frames, indexed by `tick mod capacity`.
 *
 * A slot only answers for the tick it currently holds, so once the ring
 * wraps, older ticks read as absent instead of returning a stale frame.
 * Ticks must be pushed in non-decreasing order by a single producer.
 */
export class PredictionBuffer {
  readonly capacity: number;
  private readonly frames: (PredictedFrame | null)[];
  private readonly valid: boolean[];
  private _latestTick: number | null = null;

  constructor(capacity: number = PREDICTION_CAPACITY) {
    this.capacity = Math.max(1, Math.floor(capacity));
    this.frames = new Array<PredictedFrame | null>(this.capacity).fill(null);
    this.valid = new Array<boolean>(this.capacity).fill(false);
  }

  /** Most recently pushed tick, or null if nothing has been pushed. */
  get latestTick(): number | null {
    return this._latestTick;
  }

  push(frame: PredictedFrame): void {
    const idx = this.indexOf(frame.tick);
    this.frames[idx] = frame;
    this.valid[idx] = true;
    if (this._latestTick === null || frame.tick > this._latestTick) {
      this._latestTick = frame.tick;
    }
  }

  getByTick(tick: number): Readonly<PredictedFrame> | null {
    return this.getByTickMut(tick);
  }

  /** Same lookup as getByTick, returning the stored frame for state rewrites. */
  getByTickMut(tick: number): PredictedFrame | null {
    const idx = this.indexOf(tick);
    const frame = this.frames[idx];
    if (!this.valid[idx] || !frame || frame.tick !== tick) return null;
    return frame;
  }

  /** Invalidate every slot holding a tick strictly older than `tickMin`. */
  truncateOlderThan(tickMin: number): void {
    for (let i = 0; i < this.capacity; i++) {
      const frame = this.frames[i];
      if (this.valid[i] && frame && frame.tick < tickMin) this.valid[i] = false;
    }
  }

  /** Drop all history (connect, respawn, disconnect). */
  clear(): void {
    this.frames.fill(null);
    this.valid.fill(false);
    this._latestTick = null;
  }

  private indexOf(tick: number): number {
    return tick % this.capacity;
  }
}
