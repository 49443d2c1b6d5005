import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { closeSimLog, initSimLog, simLog, simLogError } from "./simLog.js";

describe("simLog", () => {
  let dir: string | null = null;

  afterEach(() => {
    closeSimLog();
    vi.restoreAllMocks();
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("writes tagged lines to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    simLog("hello");
    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0]?.[0])).toMatch(/^\S+ \[voxelsim\] hello$/);
  });

  it("appends to the log file after init", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    dir = mkdtempSync(join(tmpdir(), "simlog-"));
    initSimLog(dir);
    simLog("first");
    simLogError("boom", "bad thing");

    const lines = readFileSync(join(dir, "sim.log"), "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/\[voxelsim\] first$/);
    expect(lines[1]).toMatch(/\[voxelsim\] boom: bad thing$/);
  });
});
