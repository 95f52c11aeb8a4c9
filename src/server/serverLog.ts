import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

const TAG = "[gridsync]";

let logPath: string | null = null;

/** Initialize file logging. Call once at startup with the data directory. */
export function initServerLog(dataDir: string): void {
  mkdirSync(dataDir, { recursive: true });
  logPath = join(dataDir, "server.log");
}

/** Stop writing to the log file (stderr output continues). */
export function closeServerLog(): void {
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
  } catch (err) {
    // Fall back to stderr only rather than failing every log call.
    const failedPath = logPath;
    logPath = null;
    console.error(`${timestamp()} ${TAG} log file ${failedPath} disabled: ${String(err)}`);
  }
}

/** Log an informational message to stderr and the log file. */
export function serverLog(msg: string): void {
  write(`${timestamp()} ${TAG} ${msg}`);
}

/** Log an error (with stack trace and cause) to stderr and the log file. */
export function serverLogError(label: string, err: unknown): void {
  write(`${timestamp()} ${TAG} ${label}: ${describeError(err)}`);
}

export function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const base = `${err.message}\n${err.stack ?? ""}`.trimEnd();
  return err.cause === undefined ? base : `${base}\ncaused by: ${describeError(err.cause)}`;
}

/**
 * Install global handlers for uncaught exceptions and unhandled rejections.
 * Logs the error, then exits so the process still crashes visibly.
 */
export function installCrashHandlers(): void {
  process.on("uncaughtException", (err) => {
    serverLogError("uncaughtException", err);
    process.exit(1);
  });
  process.on("unhandledRejection", (reason) => {
    serverLogError("unhandledRejection", reason);
    process.exit(1);
  });
}
