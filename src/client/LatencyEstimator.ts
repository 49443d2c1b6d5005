import { TICK_SECONDS } from "../config/constants.js";

/**
 * One-way latency in whole ticks, measured from the last movement packet
 * sent to the next authoritative pose received.
 */
export class LatencyEstimator {
  private lastSentMs: number | null = null;
  private _oneWayTicks = 0;

  get oneWayTicks(): number {
    return this._oneWayTicks;
  }

  onSent(nowMs: number): void {
    this.lastSentMs = nowMs;
  }

  onReceived(nowMs: number): void {
    if (this.lastSentMs === null) return;
    const rttSeconds = Math.max(0, nowMs - this.lastSentMs) / 1000;
    this._oneWayTicks = Math.round(rttSeconds / 2 / TICK_SECONDS);
  }

  /** Local tick the server has most likely simulated up to, given the last simulated tick. */
  tickEstimate(localTick: number): number {
    return Math.max(0, localTick - this._oneWayTicks);
  }

  reset(): void {
    this.lastSentMs = null;
    this._oneWayTicks = 0;
  }
}
