import { describe, expect, it } from "vitest";
import {
  AIR_FRICTION,
  CHUNK_SIZE,
  GROUND_ACCEL_BASE,
  SECTION_HEIGHT,
  SECTION_VOLUME,
  SECTIONS_PER_COLUMN,
  SLIPPERINESS_DEFAULT,
  TICK_RATE,
  TICK_SECONDS,
  WORLD_HEIGHT,
} from "./constants.js";

describe("constants", () => {
  it("has consistent world layout", () => {
    expect(SECTIONS_PER_COLUMN * SECTION_HEIGHT).toBe(WORLD_HEIGHT);
    expect(SECTION_VOLUME).toBe(CHUNK_SIZE * CHUNK_SIZE * SECTION_HEIGHT);
  });

  it("runs at 20 ticks per second", () => {
    expect(TICK_RATE).toBe(20);
    expect(TICK_SECONDS).toBeCloseTo(0.05, 12);
  });

  it("ground acceleration numerator is the cube of default ground friction", () => {
    const f4 = SLIPPERINESS_DEFAULT * AIR_FRICTION;
    expect(f4 * f4 * f4).toBeCloseTo(GROUND_ACCEL_BASE, 6);
  });
});
