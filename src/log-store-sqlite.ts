import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { DEFAULT_QUERY_LIMIT, type LogStore, type LogEntry, type LogQuery, type LogQueryResult } from "./log-store.js";
import type { LogWriter } from "./logger.js";
import type { CommandReport } from "./types.js";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS assessments (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL,
  command TEXT NOT NULL,
  elevation_intended INTEGER NOT NULL DEFAULT 0,
  duration_ms INTEGER NOT NULL,
  risk_level TEXT NOT NULL,
  action TEXT NOT NULL,
  reasons_text TEXT NOT NULL,
  report_json TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_timestamp ON assessments(timestamp);
CREATE INDEX IF NOT EXISTS idx_risk_level ON assessments(risk_level);
CREATE INDEX IF NOT EXISTS idx_action ON assessments(action);
`;

interface SqliteRow {
  id: number;
  timestamp: string;
  command: string;
  elevation_intended: number;
  duration_ms: number;
  risk_level: string;
  action: string;
  reasons_text: string;
  report_json: string;
}

export interface SqliteStore extends LogStore, LogWriter {
  close(): void;
}

export function createSqliteStore(dbPath: string): SqliteStore {
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.exec(SCHEMA);

  const insertStmt = db.prepare(`
    INSERT INTO assessments (timestamp, command, elevation_intended, duration_ms, risk_level, action, reasons_text, report_json)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `);

  return {
    write(command: string, elevationIntended: boolean, report: CommandReport, durationMs: number): void {
      insertStmt.run(
        new Date().toISOString(),
        command,
        elevationIntended ? 1 : 0,
        durationMs,
        report.risk_level,
        report.action,
        report.reasons.join("\n"),
        JSON.stringify(report),
      );
    },

    query(q: LogQuery): LogQueryResult {
      const conditions: string[] = [];
      const params: Array<string | number> = [];

      if (q.risk) {
        conditions.push("risk_level = ?");
        params.push(q.risk);
      }
      if (q.action) {
        conditions.push("action = ?");
        params.push(q.action);
      }
      if (q.from) {
        conditions.push("timestamp >= ?");
        params.push(q.from);
      }
      if (q.to) {
        conditions.push("timestamp <= ?");
        params.push(q.to);
      }
      if (q.search) {
        conditions.push("(command LIKE ? OR reasons_text LIKE ?)");
        const pattern = `%${q.search}%`;
        params.push(pattern, pattern);
      }

      const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";

      const totalRow = db.prepare<unknown[], { cnt: number }>(`SELECT COUNT(*) as cnt FROM assessments ${where}`).get(...params);
      const total = totalRow?.cnt ?? 0;

      // id breaks timestamp ties in insertion order
      const orderDir = (q.order ?? "desc") === "asc" ? "ASC" : "DESC";
      const limit = q.limit ?? DEFAULT_QUERY_LIMIT;
      const offset = q.offset ?? 0;

      const rows = db
        .prepare<unknown[], SqliteRow>(
          `SELECT * FROM assessments ${where} ORDER BY timestamp ${orderDir}, id ${orderDir} LIMIT ? OFFSET ?`,
        )
        .all(...params, limit, offset);

      const entries: LogEntry[] = rows.map(row => ({
        id: String(row.id),
        timestamp: row.timestamp,
        command: row.command,
        elevation_intended: row.elevation_intended === 1,
        duration_ms: row.duration_ms,
        report: JSON.parse(row.report_json) as CommandReport,
      }));

      return { entries, total };
    },

    close(): void {
      db.close();
    },
  };
}
