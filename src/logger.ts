import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import type { CommandReport } from "./types.js";

export interface LogEntryJson {
  timestamp: string;
  command: string;
  elevation_intended: boolean;
  duration_ms: number;
  report: CommandReport;
}

/**
 * Abstraction for log writing backends.
 */
export interface LogWriter {
  write(command: string, elevationIntended: boolean, report: CommandReport, durationMs: number): void;
}

let activeWriter: LogWriter | null = null;

// JSONL writer state
let logFilePath: string | false = false;
let dirEnsured = false;
let writeChain: Promise<void> = Promise.resolve();

/**
 * Initialize the logger with the configured log file path (JSONL backend).
 * Pass `false` to disable logging entirely.
 */
export function initLogger(path: string | false): void {
  logFilePath = path;
  dirEnsured = false;
  writeChain = Promise.resolve();
  activeWriter = null;
}

/**
 * Initialize the logger with a custom LogWriter backend (e.g. SQLite).
 */
export function initLoggerWithWriter(writer: LogWriter): void {
  activeWriter = writer;
  logFilePath = false;
}

function reportFailure(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`cmdrisk: failed to write assessment log: ${message}`);
}

/**
 * Write a log entry. Fire-and-forget: failures go to stderr, never to the caller.
 * Writes are serialized to preserve ordering.
 */
export function writeLogEntry(
  command: string,
  elevationIntended: boolean,
  report: CommandReport,
  durationMs: number,
): void {
  if (activeWriter) {
    try {
      activeWriter.write(command, elevationIntended, report, durationMs);
    } catch (error) {
      reportFailure(error);
    }
    return;
  }

  if (logFilePath === false) return;

  const entry: LogEntryJson = {
    timestamp: new Date().toISOString(),
    command,
    elevation_intended: elevationIntended,
    duration_ms: durationMs,
    report,
  };

  const line = JSON.stringify(entry) + "\n";
  const path = logFilePath;
  writeChain = writeChain.then(() => doWrite(path, line)).catch(reportFailure);
}

/** Resolves once every write queued so far has settled. */
export function flushLog(): Promise<void> {
  return writeChain;
}

async function doWrite(filePath: string, line: string): Promise<void> {
  if (!dirEnsured) {
    await mkdir(dirname(filePath), { recursive: true });
    dirEnsured = true;
  }
  await appendFile(filePath, line, "utf-8");
}
