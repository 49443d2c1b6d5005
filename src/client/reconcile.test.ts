import { describe, expect, it } from "vitest";
import { FlatStrategy } from "../generation/FlatStrategy.js";
import { populate } from "../generation/TerrainStrategy.js";
import { add, length, sub, vec3 } from "../math/vec3.js";
import { simulateTick } from "../physics/PlayerMovement.js";
import { type InputState, initialSimState, makeInput, type PlayerSimState } from "../physics/types.js";
import { WorldCollision } from "../physics/WorldCollision.js";
import { makeBlockState } from "../world/BlockState.js";
import { ChunkColumnStore } from "../world/ChunkColumnStore.js";
import { PredictionBuffer } from "./PredictionBuffer.js";
import { findFrame, reconcile } from "./reconcile.js";

const world = WorldCollision.empty();
const SLAB = 44;

function inputSequence(len: number): InputState[] {
  const inputs: InputState[] = [];
  for (let i = 0; i < len; i++) {
    inputs.push(
      makeInput({
        forward: i % 40 < 25 ? 1 : -0.5,
        strafe: i % 17 < 6 ? 1 : 0,
        jump: i % 23 === 0,
        sprint: i % 50 > 10,
        yaw: i * 0.03,
        pitch: Math.sin(i * 0.1) * 0.4,
      }),
    );
  }
  return inputs;
}

function record(inputs: readonly InputState[], capacity: number): { buffer: PredictionBuffer; state: PlayerSimState } {
  const buffer = new PredictionBuffer(capacity);
  let state = initialSimState();
  inputs.forEach((input, tick) => {
    state = simulateTick(state, input, world);
    buffer.push({ tick, input, state });
  });
  return { buffer, state };
}

function at(x: number): PlayerSimState {
  return { ...initialSimState(), pos: vec3(x, 0, 0) };
}

/** Frames 0..count-1 all resting at the origin. */
function restingBuffer(count: number, capacity = 32): PredictionBuffer {
  const buffer = new PredictionBuffer(capacity);
  for (let tick = 0; tick < count; tick++) {
    buffer.push({ tick, input: makeInput(), state: initialSimState() });
  }
  return buffer;
}

describe("reconcile", () => {
  it("replays to the same state as re-simulating from the corrected pose", () => {
    const inputs = inputSequence(200);
    const { buffer, state } = record(inputs, 256);
    const serverTick = 120;
    const predicted = buffer.getByTick(serverTick);
    if (!predicted) throw new Error("frame missing");
    const corrected: PlayerSimState = { ...predicted.state, pos: add(predicted.state.pos, vec3(0.05, 0, -0.02)) };

    const { result, state: after } = reconcile(buffer, world, serverTick, corrected, 199, state);

    let expected = corrected;
    for (let t = serverTick + 1; t <= 199; t++) {
      const input = inputs[t];
      if (!input) throw new Error("input missing");
      expected = simulateTick(expected, input, world);
    }
    expect(length(sub(expected.pos, after.pos))).toBeLessThan(1e-4);
    expect(result?.replayedTicks).toBe(79);
    expect(result?.hardTeleport).toBe(false);
    expect(result?.correction.x).toBeCloseTo(0.05, 9);
    expect(result?.correction.z).toBeCloseTo(-0.02, 9);
    expect(buffer.getByTick(199)?.state).toBe(after);
  });

  it("replays floor contact, steps, jumps and sneaking like a fresh simulation", () => {
    const store = new ChunkColumnStore();
    populate(store, new FlatStrategy(64), 0, 0, 1);
    for (let x = -1; x <= 1; x++) store.setBlock(x, 64, -3, makeBlockState(SLAB));
    const floor = WorldCollision.of(store);

    const inputs: InputState[] = [];
    for (let i = 0; i < 60; i++) {
      inputs.push(makeInput({ forward: 1, jump: i === 42 || i === 50, sneak: i >= 30 && i < 40 }));
    }
    const buffer = new PredictionBuffer(64);
    let state: PlayerSimState = { pos: vec3(0.5, 64, 0.5), vel: vec3(), onGround: true, yaw: 0, pitch: 0 };
    const states: PlayerSimState[] = [];
    inputs.forEach((input, tick) => {
      state = simulateTick(state, input, floor);
      states.push(state);
      buffer.push({ tick, input, state });
    });
    expect(states.some((s) => s.onGround && Math.abs(s.pos.y - 64.5) < 1e-6)).toBe(true);

    const serverTick = 8;
    const predicted = buffer.getByTick(serverTick);
    if (!predicted) throw new Error("frame missing");
    const corrected: PlayerSimState = { ...predicted.state, pos: add(predicted.state.pos, vec3(0.05, 0, 0)) };
    const { result, state: after } = reconcile(buffer, floor, serverTick, corrected, 59, state);

    let expected = corrected;
    for (let t = serverTick + 1; t <= 59; t++) {
      const input = inputs[t];
      if (!input) throw new Error("input missing");
      expected = simulateTick(expected, input, floor);
    }
    expect(result?.replayedTicks).toBe(51);
    expect(after).toEqual(expected);
    expect(buffer.getByTick(59)?.state).toBe(after);
  });

  it("ignores errors under the noise floor", () => {
    const buffer = restingBuffer(10);
    const current = initialSimState();
    const outcome = reconcile(buffer, world, 5, at(0.0005), 9, current);
    expect(outcome.result).toBeNull();
    expect(outcome.state).toBe(current);
  });

  it("hard teleports at exactly the teleport distance", () => {
    const buffer = restingBuffer(11);
    const server = at(3);
    const outcome = reconcile(buffer, world, 5, server, 10, initialSimState());

    expect(outcome.result).toEqual({ correction: vec3(3, 0, 0), replayedTicks: 0, hardTeleport: true });
    expect(outcome.state).toBe(server);
    expect(buffer.getByTick(0)).toBeNull();
    expect(buffer.getByTick(4)).toBeNull();
    expect(buffer.getByTick(5)?.tick).toBe(5);
    expect(buffer.getByTick(10)?.tick).toBe(10);
  });

  it("soft corrects just under the teleport distance", () => {
    const buffer = restingBuffer(11);
    const outcome = reconcile(buffer, world, 5, at(2.999), 10, initialSimState());

    expect(outcome.result?.hardTeleport).toBe(false);
    expect(outcome.result?.replayedTicks).toBe(5);
    expect(outcome.state.pos.x).toBe(2.999);
    expect(buffer.getByTick(10)?.state).toBe(outcome.state);
    expect(buffer.getByTick(4)?.tick).toBe(4);
  });

  it("adopts the server state without replay when the ticks match", () => {
    const buffer = restingBuffer(6);
    const server = at(0.5);
    const outcome = reconcile(buffer, world, 5, server, 5, initialSimState());
    expect(outcome.result?.replayedTicks).toBe(0);
    expect(outcome.state).toBe(server);
  });

  it("does nothing for a server tick ahead of the client", () => {
    const buffer = restingBuffer(6);
    const current = initialSimState();
    const outcome = reconcile(buffer, world, 7, at(1), 5, current);
    expect(outcome.result).toBeNull();
    expect(outcome.state).toBe(current);
  });

  it("does nothing without history", () => {
    const current = initialSimState();
    const outcome = reconcile(new PredictionBuffer(8), world, 0, at(1), 4, current);
    expect(outcome.result).toBeNull();
    expect(outcome.state).toBe(current);
  });

  it("compares against the newest stored frame and replays missing ticks with neutral input", () => {
    const buffer = new PredictionBuffer(16);
    for (const tick of [0, 1, 2, 3, 8, 9, 10]) {
      buffer.push({ tick, input: makeInput(), state: at(tick === 10 ? 1 : 0) });
    }
    const outcome = reconcile(buffer, world, 6, at(1.5), 10, at(0));

    expect(outcome.result?.correction).toEqual(vec3(0.5, 0, 0));
    expect(outcome.result?.replayedTicks).toBe(4);
    expect(buffer.getByTick(7)).toBeNull();
    expect(buffer.getByTick(8)?.state.pos.x).toBe(1.5);
  });
});

describe("findFrame", () => {
  it("stands in the newest surviving frame for an evicted tick", () => {
    const buffer = new PredictionBuffer(8);
    for (let tick = 0; tick < 20; tick++) {
      buffer.push({ tick, input: makeInput(), state: initialSimState() });
    }
    expect(findFrame(buffer, 5)?.tick).toBe(19);
    expect(findFrame(buffer, 12)?.tick).toBe(12);
  });

  it("skips gaps in the history", () => {
    const buffer = new PredictionBuffer(16);
    for (const tick of [0, 1, 8, 9]) {
      buffer.push({ tick, input: makeInput(), state: initialSimState() });
    }
    expect(findFrame(buffer, 4)?.tick).toBe(9);
  });

  it("returns null past the newest frame or without history", () => {
    const buffer = restingBuffer(4);
    expect(findFrame(buffer, 6)).toBeNull();
    expect(findFrame(new PredictionBuffer(8), 0)).toBeNull();
  });
});
