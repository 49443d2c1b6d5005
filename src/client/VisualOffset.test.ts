import { describe, expect, it } from "vitest";
import { vec3 } from "../math/vec3.js";
import { VisualOffset } from "./VisualOffset.js";

describe("VisualOffset", () => {
  it("starts at zero", () => {
    expect(new VisualOffset().offset).toEqual(vec3(0, 0, 0));
  });

  it("offsets by the negated soft correction", () => {
    const visual = new VisualOffset();
    visual.apply({ correction: vec3(0.5, 0, -0.25), replayedTicks: 3, hardTeleport: false });
    expect(visual.offset).toEqual(vec3(-0.5, 0, 0.25));
    visual.apply({ correction: vec3(0.5, 0, 0), replayedTicks: 3, hardTeleport: false });
    expect(visual.offset.x).toBe(-1);
  });

  it("clears on a hard teleport", () => {
    const visual = new VisualOffset();
    visual.apply({ correction: vec3(0.5, 0, 0), replayedTicks: 3, hardTeleport: false });
    visual.apply({ correction: vec3(10, 0, 0), replayedTicks: 0, hardTeleport: true });
    expect(visual.length).toBe(0);
  });

  it("decays by one step per tick of elapsed time", () => {
    const visual = new VisualOffset();
    visual.apply({ correction: vec3(-1, 0, 0), replayedTicks: 1, hardTeleport: false });
    visual.decay(0.05);
    expect(visual.offset.x).toBeCloseTo(0.85, 10);
    visual.decay(0.1);
    expect(visual.offset.x).toBeCloseTo(0.85 ** 3, 10);
  });

  it("holds still for zero elapsed time", () => {
    const visual = new VisualOffset();
    visual.apply({ correction: vec3(-1, 0, 0), replayedTicks: 1, hardTeleport: false });
    visual.decay(0);
    expect(visual.offset.x).toBe(1);
  });
});
