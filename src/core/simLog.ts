import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

let logPath: string | null = null;

/** Initialize file logging. Call once at startup with the data directory. */
export function initSimLog(dataDir: string): void {
  mkdirSync(dataDir, { recursive: true });
  logPath = join(dataDir, "sim.log");
}

/** Stop appending to the log file; stderr output continues. */
export function closeSimLog(): void {
  logPath = null;
}

function timestamp(): string {
  return new Date().toISOString();
}

function write(line: string): void {
  console.error(line);
  if (!logPath) return;
  try {
    appendFileSync(logPath, `${line}\n`);
  } catch (e) {
    // Fall back to stderr only; keep reporting the failure.
    console.error(`${timestamp()} [voxelsim] log file write failed: ${String(e)}`);
  }
}

/** Log an informational message to stderr and the log file. */
export function simLog(msg: string): void {
  write(`${timestamp()} [voxelsim] ${msg}`);
}

/** Log an error (with stack trace) to stderr and the log file. */
export function simLogError(label: string, err: unknown): void {
  const msg = err instanceof Error ? `${err.message}\n${err.stack}` : String(err);
  write(`${timestamp()} [voxelsim] ${label}: ${msg}`);
}
