import { describe, expect, it } from "vitest";
import { vec3 } from "../math/vec3.js";
import type { PlayerSimState } from "../physics/types.js";
import { MovementPacketState, toWireAngles, wrapDegrees } from "./movementPackets.js";

function pose(x: number, yaw = Math.PI, pitch = 0, onGround = true): PlayerSimState {
  return { pos: vec3(x, 64, 0), vel: vec3(), onGround, yaw, pitch };
}

describe("wrapDegrees", () => {
  it("wraps into (-180, 180]", () => {
    expect(wrapDegrees(180)).toBe(180);
    expect(wrapDegrees(-180)).toBe(180);
    expect(wrapDegrees(190)).toBe(-170);
    expect(wrapDegrees(-540)).toBe(180);
    expect(wrapDegrees(45)).toBe(45);
  });
});

describe("toWireAngles", () => {
  it("faces +Z at wire yaw 0", () => {
    expect(toWireAngles(Math.PI, 0)).toEqual({ yaw: 0, pitch: -0 });
  });

  it("flips and clamps pitch", () => {
    expect(toWireAngles(Math.PI, -Math.PI / 4).pitch).toBeCloseTo(45, 10);
    expect(toWireAngles(Math.PI, -Math.PI).pitch).toBe(90);
  });

  it("zeroes non-finite angles", () => {
    expect(toWireAngles(Number.NaN, Number.POSITIVE_INFINITY)).toEqual({ yaw: 0, pitch: 0 });
  });
});

describe("MovementPacketState", () => {
  it("sends a full packet first", () => {
    const packets = new MovementPacketState();
    expect(packets.next(pose(0)).kind).toBe("pos_look");
  });

  it("sends only what changed", () => {
    const packets = new MovementPacketState();
    packets.next(pose(0));
    expect(packets.next(pose(0)).kind).toBe("ground");
    expect(packets.next(pose(0.01)).kind).toBe("ground");
    expect(packets.next(pose(0.1))).toEqual({ kind: "pos", x: 0.1, y: 64, z: 0, onGround: true });
    expect(packets.next(pose(0.1, Math.PI / 2)).kind).toBe("look");
    expect(packets.next(pose(0.5, 0)).kind).toBe("pos_look");
  });

  it("resends position after twenty idle ticks", () => {
    const packets = new MovementPacketState();
    packets.next(pose(0));
    const kinds: string[] = [];
    for (let i = 0; i < 21; i++) kinds.push(packets.next(pose(0)).kind);
    expect(kinds.slice(0, 20).every((k) => k === "ground")).toBe(true);
    expect(kinds[20]).toBe("pos");
  });

  it("hands out a queued acknowledgement once", () => {
    const packets = new MovementPacketState();
    packets.acknowledge(pose(3, Math.PI, 0, false));
    expect(packets.hasPendingAck).toBe(true);
    expect(packets.takeAck()).toEqual({
      kind: "pos_look",
      x: 3,
      y: 64,
      z: 0,
      yaw: 0,
      pitch: -0,
      onGround: false,
    });
    expect(packets.takeAck()).toBeNull();
    expect(packets.next(pose(3)).kind).toBe("ground");
  });
});
