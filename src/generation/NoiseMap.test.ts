import { describe, expect, it } from "vitest";
import { NoiseMap } from "./NoiseMap.js";

describe("NoiseMap", () => {
  it("returns deterministic output for the same seed", () => {
    const a = new NoiseMap("test-seed");
    const b = new NoiseMap("test-seed");
    expect(a.sample(10, 20)).toBe(b.sample(10, 20));
    expect(a.sample(-5, 100)).toBe(b.sample(-5, 100));
  });

  it("returns different output for different seeds", () => {
    const a = new NoiseMap("seed-a");
    const b = new NoiseMap("seed-b");
    expect(a.sample(10, 20)).not.toBe(b.sample(10, 20));
  });

  it("returns values in [0, 1] range", () => {
    const noise = new NoiseMap("range-test");
    for (let x = -50; x <= 50; x += 7) {
      for (let z = -50; z <= 50; z += 7) {
        const val = noise.sample(x, z);
        expect(val).toBeGreaterThanOrEqual(0);
        expect(val).toBeLessThanOrEqual(1);
      }
    }
  });

  it("maps samples onto an integer range", () => {
    const noise = new NoiseMap("int-range");
    for (let x = -40; x <= 40; x += 9) {
      const h = noise.range(x, 3, 56, 76);
      expect(Number.isInteger(h)).toBe(true);
      expect(h).toBeGreaterThanOrEqual(56);
      expect(h).toBeLessThanOrEqual(76);
      expect(h).toBe(56 + Math.round(noise.sample(x, 3) * 20));
    }
  });
});
