import { readFileSync } from "fs";
import { isRiskLevel } from "./scorer.js";
import type { Action, CommandReport, RiskLevel } from "./types.js";
import type { LogEntryJson } from "./logger.js";

export interface LogEntry extends LogEntryJson {
  id: string;
}

export interface LogQuery {
  search?: string;
  risk?: RiskLevel;
  action?: Action;
  from?: string;       // ISO timestamp
  to?: string;         // ISO timestamp
  order?: "asc" | "desc";
  limit?: number;
  offset?: number;
}

export interface LogQueryResult {
  entries: LogEntry[];
  total: number;       // total matching (before pagination)
}

export interface LogStore {
  query(q: LogQuery): LogQueryResult;
}

export const DEFAULT_QUERY_LIMIT = 200;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isReport(value: unknown): value is CommandReport {
  return (
    isRecord(value) &&
    typeof value.risk_level === "string" &&
    isRiskLevel(value.risk_level) &&
    typeof value.action === "string" &&
    Array.isArray(value.reasons)
  );
}

function toEntry(value: unknown, id: string): LogEntry | null {
  if (!isRecord(value)) return null;
  const { timestamp, command, report, duration_ms } = value;
  if (!isReport(report) || typeof timestamp !== "string" || typeof command !== "string") return null;
  return {
    id,
    timestamp,
    command,
    elevation_intended: value.elevation_intended === true,
    duration_ms: typeof duration_ms === "number" ? duration_ms : 0,
    report,
  };
}

function readJsonlFile(path: string): LogEntry[] {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
    throw error;
  }

  const entries: LogEntry[] = [];
  const lines = raw.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      // a torn trailing line from an interrupted append
      continue;
    }
    const entry = toEntry(parsed, String(i));
    if (entry) entries.push(entry);
  }
  return entries;
}

function matchesSearch(entry: LogEntry, search: string): boolean {
  const hay = [entry.command, ...entry.report.reasons].join(" ").toLowerCase();
  return hay.includes(search);
}

export function createJsonlStore(filePath: string): LogStore {
  return {
    query(q: LogQuery): LogQueryResult {
      let entries = readJsonlFile(filePath);

      const { risk, action, from, to } = q;
      if (risk) entries = entries.filter(e => e.report.risk_level === risk);
      if (action) entries = entries.filter(e => e.report.action === action);
      if (from) entries = entries.filter(e => e.timestamp >= from);
      if (to) entries = entries.filter(e => e.timestamp <= to);
      if (q.search) {
        const s = q.search.toLowerCase();
        entries = entries.filter(e => matchesSearch(e, s));
      }

      const total = entries.length;

      // id is the line index, so ties fall back to append order.
      const mul = (q.order ?? "desc") === "asc" ? 1 : -1;
      entries.sort((a, b) => (a.timestamp.localeCompare(b.timestamp) || Number(a.id) - Number(b.id)) * mul);

      const offset = q.offset ?? 0;
      const limit = q.limit ?? DEFAULT_QUERY_LIMIT;
      return { entries: entries.slice(offset, offset + limit), total };
    },
  };
}
