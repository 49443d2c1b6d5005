import { TICK_RATE } from "../config/constants.js";
import { simLogError } from "./simLog.js";

/** Maximum frame time cap to prevent spiral of death on lag spikes. */
const MAX_FRAME_TIME = 0.25;

export interface FixedTickCallbacks {
  /** One fixed simulation step. */
  tick(dt: number): void;
  /** Called once per frame after ticking, with the interpolation alpha. */
  frame?(alpha: number, frameTime: number): void;
}

/**
 * Fixed-timestep driver for the predictor.
 *
 * Accumulates wall time and runs tick() at TICK_RATE Hz; frame() receives an
 * alpha in [0, 1) for render interpolation and the elapsed frame time for
 * decaying the visual offset. start() polls on a Node timer; hosts with their
 * own frame clock call advance() directly instead.
 */
export class FixedTickLoop {
  private accumulator = 0;
  private lastTime: number | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly callbacks: FixedTickCallbacks;
  private readonly fixedDt: number;
  private readonly now: () => number;
  /** Ticks run since construction. */
  ticks = 0;

  constructor(callbacks: FixedTickCallbacks, tickRate = TICK_RATE, now: () => number = () => performance.now()) {
    this.callbacks = callbacks;
    this.fixedDt = 1 / tickRate;
    this.now = now;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(pollMs = 5): void {
    if (this.timer !== null) return;
    this.lastTime = null;
    this.timer = setInterval(() => {
      try {
        this.advance(this.now());
      } catch (err) {
        simLogError("tick error", err);
      }
    }, pollMs);
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Process one frame from an external time source. The first call only
   * sets the baseline. Returns the number of ticks run.
   */
  advance(nowMs: number): number {
    const now = nowMs / 1000;
    if (this.lastTime === null) {
      this.lastTime = now;
      return 0;
    }
    let frameTime = now - this.lastTime;
    this.lastTime = now;

    if (frameTime > MAX_FRAME_TIME) {
      frameTime = MAX_FRAME_TIME;
    }
    if (frameTime < 0) frameTime = 0;

    this.accumulator += frameTime;

    let ran = 0;
    while (this.accumulator >= this.fixedDt) {
      this.accumulator -= this.fixedDt;
      this.ticks++;
      ran++;
      this.callbacks.tick(this.fixedDt);
    }

    this.callbacks.frame?.(this.accumulator / this.fixedDt, frameTime);
    return ran;
  }
}
