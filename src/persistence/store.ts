import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getConfig } from "../config.js";
import { StoreError } from "../errors.js";
import type { Report, StoredReport } from "../report/types.js";
import { ReportSchema } from "../schemas.js";

const IN_MEMORY = ":memory:";

/** SQLite history of produced run and comparison reports. */
export class ReportStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? getConfig().store.path;
    if (path !== IN_MEMORY) {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    if (path !== IN_MEMORY) {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS reports (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        kind        TEXT NOT NULL,
        source      TEXT NOT NULL,
        payload     TEXT NOT NULL,
        created_at  INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_reports_created ON reports(created_at DESC);
    `);
  }

  /** Store a report. Returns its row id. */
  insert(report: Report, createdAt = Date.now()): number {
    const result = this.db
      .prepare("INSERT INTO reports (kind, source, payload, created_at) VALUES (?, ?, ?, ?)")
      .run(report.kind, report.source, JSON.stringify(report), createdAt);
    return Number(result.lastInsertRowid);
  }

  get(id: number): StoredReport | undefined {
    const row = this.db.prepare("SELECT * FROM reports WHERE id = ?").get(id);
    return row === undefined ? undefined : rowToStoredReport(row);
  }

  /** Newest first; ties on timestamp fall back to insertion order. */
  list(limit = getConfig().store.historyLimit): StoredReport[] {
    const rows = this.db.prepare("SELECT * FROM reports ORDER BY created_at DESC, id DESC LIMIT ?").all(limit);
    return rows.map(rowToStoredReport);
  }

  /** Delete all reports. Returns count of deleted rows. */
  deleteAll(): number {
    const result = this.db.prepare("DELETE FROM reports").run();
    return result.changes;
  }

  close(): void {
    this.db.close();
  }
}

type ReportRow = {
  id: number;
  kind: string;
  source: string;
  payload: string;
  created_at: number;
};

function isReportRow(row: unknown): row is ReportRow {
  if (typeof row !== "object" || row === null) return false;
  return "id" in row && typeof row.id === "number"
    && "payload" in row && typeof row.payload === "string"
    && "created_at" in row && typeof row.created_at === "number";
}

function rowToStoredReport(row: unknown): StoredReport {
  if (!isReportRow(row)) {
    throw new StoreError("Unexpected row shape in reports table");
  }
  let payload: unknown;
  try {
    payload = JSON.parse(row.payload);
  } catch (err) {
    throw new StoreError(`Report ${row.id} holds invalid JSON`, { cause: err });
  }
  const parsed = ReportSchema.safeParse(payload);
  if (!parsed.success) {
    throw new StoreError(`Report ${row.id} does not match the report schema`, { cause: parsed.error });
  }
  return { id: row.id, createdAt: row.created_at, report: parsed.data };
}
