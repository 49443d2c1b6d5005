import { describe, expect, it } from "vitest";
import { type PredictedFrame, initialSimState, makeInput } from "../physics/types.js";
import { PredictionBuffer } from "./PredictionBuffer.js";

function frame(tick: number): PredictedFrame {
  return { tick, input: makeInput(), state: initialSimState() };
}

describe("PredictionBuffer", () => {
  it("starts empty", () => {
    const buffer = new PredictionBuffer(8);
    expect(buffer.latestTick).toBeNull();
    expect(buffer.getByTick(0)).toBeNull();
  });

  it("drops ticks evicted by the ring", () => {
    const buffer = new PredictionBuffer(8);
    for (let tick = 0; tick < 20; tick++) buffer.push(frame(tick));

    expect(buffer.getByTick(0)).toBeNull();
    expect(buffer.getByTick(11)).toBeNull();
    expect(buffer.getByTick(12)?.tick).toBe(12);
    expect(buffer.getByTick(19)?.tick).toBe(19);
    expect(buffer.latestTick).toBe(19);
  });

  it("keeps the most recent capacity window", () => {
    const buffer = new PredictionBuffer(16);
    for (let tick = 0; tick <= 20; tick++) buffer.push(frame(tick));

    expect(buffer.getByTick(4)).toBeNull();
    expect(buffer.getByTick(5)?.tick).toBe(5);
    expect(buffer.getByTick(12)?.tick).toBe(12);
    expect(buffer.getByTick(19)?.tick).toBe(19);
  });

  it("never answers for ticks that were not pushed", () => {
    const buffer = new PredictionBuffer(8);
    buffer.push(frame(3));
    expect(buffer.getByTick(11)).toBeNull();
    expect(buffer.getByTick(4)).toBeNull();
  });

  it("lets replay rewrite a stored state", () => {
    const buffer = new PredictionBuffer(8);
    buffer.push(frame(2));
    const stored = buffer.getByTickMut(2);
    if (!stored) throw new Error("frame missing");
    stored.state = { ...stored.state, onGround: true };
    expect(buffer.getByTick(2)?.state.onGround).toBe(true);
  });

  it("invalidates ticks older than the cutoff", () => {
    const buffer = new PredictionBuffer(8);
    for (let tick = 0; tick < 8; tick++) buffer.push(frame(tick));
    buffer.truncateOlderThan(5);

    expect(buffer.getByTick(4)).toBeNull();
    expect(buffer.getByTick(5)?.tick).toBe(5);
    expect(buffer.getByTick(7)?.tick).toBe(7);
    expect(buffer.latestTick).toBe(7);
  });

  it("forgets everything on clear", () => {
    const buffer = new PredictionBuffer(8);
    buffer.push(frame(1));
    buffer.clear();
    expect(buffer.getByTick(1)).toBeNull();
    expect(buffer.latestTick).toBeNull();
  });
});
