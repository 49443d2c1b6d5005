import { SMOOTHING_DECAY, TICK_RATE } from "../config/constants.js";
import { length, scale, sub, type Vec3, ZERO } from "../math/vec3.js";
import type { ReconcileResult } from "./reconcile.js";

/**
 * Render-only displacement that hides soft corrections. Physics state snaps
 * at once; the rendered pose starts where it was and eases onto it.
 */
export class VisualOffset {
  private _offset: Vec3 = ZERO;

  get offset(): Vec3 {
    return this._offset;
  }

  get length(): number {
    return length(this._offset);
  }

  apply(result: ReconcileResult): void {
    if (result.hardTeleport) {
      this.clear();
      return;
    }
    this._offset = sub(this._offset, result.correction);
  }

  /** Exponential decay: (1 − decay)^(dt · 20) per frame. */
  decay(dtSeconds: number, decay: number = SMOOTHING_DECAY): void {
    const factor = (1 - decay) ** (dtSeconds * TICK_RATE);
    this._offset = scale(this._offset, factor);
  }

  clear(): void {
    this._offset = ZERO;
  }
}
