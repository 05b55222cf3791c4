import Database from "better-sqlite3";
import type { PromotionEventEnvelope, PromotionEventType } from "../contracts/events.js";
import type { KnownGoodConfig } from "../platform/ports.js";
import type { PromotionRun, TransitionRecord } from "../state/types.js";

export interface RunStore {
  saveRun(run: PromotionRun): void;
  recordTransition(runId: string, record: TransitionRecord): void;
  recordEvent<T>(event: PromotionEventEnvelope<T>): void;
  getRun(id: string): PromotionRun | null;
  /** Newest first. */
  listRuns(limit: number): PromotionRun[];
  listActiveRuns(): PromotionRun[];
  saveKnownGood(config: KnownGoodConfig): void;
  listKnownGood(): KnownGoodConfig[];
  /** Newest first; `runId` null returns events of every run. */
  getRecentEvents(runId: string | null, limit?: number): PromotionEventEnvelope[];
  close(): void;
}

export const TERMINAL_STATE_LIST = ["PROMOTED", "FAILED", "ROLLED_BACK", "ROLLBACK_FAILED"] as const;

interface RunRow {
  run_json: string;
}

interface EventRow {
  run_id: string;
  event_type: PromotionEventType;
  payload_json: string;
  timestamp: string;
}

export class SqliteRunStore implements RunStore {
  private db: Database.Database;

  constructor(filePath: string) {
    this.db = new Database(filePath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.init();
  }

  init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id TEXT PRIMARY KEY,
        artifact_id TEXT NOT NULL,
        environment TEXT NOT NULL,
        state TEXT NOT NULL,
        run_json TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        completed_at TEXT
      );

      CREATE INDEX IF NOT EXISTS runs_by_state ON runs(state);

      CREATE TABLE IF NOT EXISTS transitions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id TEXT NOT NULL,
        from_state TEXT,
        to_state TEXT NOT NULL,
        detail TEXT NOT NULL,
        at TEXT NOT NULL,
        FOREIGN KEY(run_id) REFERENCES runs(id)
      );

      CREATE TABLE IF NOT EXISTS events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id TEXT NOT NULL,
        event_type TEXT NOT NULL,
        payload_json TEXT NOT NULL,
        timestamp TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS known_good (
        environment TEXT PRIMARY KEY,
        artifact_id TEXT NOT NULL,
        config_json TEXT NOT NULL,
        promoted_at TEXT NOT NULL
      );
    `);
  }

  saveRun(run: PromotionRun): void {
    const stmt = this.db.prepare(`
      INSERT INTO runs (id, artifact_id, environment, state, run_json, created_at, updated_at, completed_at)
      VALUES (@id, @artifact_id, @environment, @state, @run_json, @created_at, @updated_at, @completed_at)
      ON CONFLICT(id) DO UPDATE SET
        state = excluded.state,
        run_json = excluded.run_json,
        updated_at = excluded.updated_at,
        completed_at = excluded.completed_at
    `);

    stmt.run({
      id: run.id,
      artifact_id: run.request.artifactId,
      environment: run.request.environment,
      state: run.state,
      run_json: JSON.stringify(run),
      created_at: run.createdAt,
      updated_at: run.updatedAt,
      completed_at: run.completedAt
    });
  }

  recordTransition(runId: string, record: TransitionRecord): void {
    this.db
      .prepare(
        `INSERT INTO transitions (run_id, from_state, to_state, detail, at) VALUES (?, ?, ?, ?, ?)`
      )
      .run(runId, record.from, record.to, record.detail, record.at);
  }

  recordEvent<T>(event: PromotionEventEnvelope<T>): void {
    this.db
      .prepare(`INSERT INTO events (run_id, event_type, payload_json, timestamp) VALUES (?, ?, ?, ?)`)
      .run(event.run_id, event.type, JSON.stringify(event.data), event.timestamp);
  }

  getRun(id: string): PromotionRun | null {
    const row = this.db.prepare(`SELECT run_json FROM runs WHERE id = ?`).get(id) as
      | RunRow
      | undefined;
    return row ? this.fromRow(row) : null;
  }

  listRuns(limit: number): PromotionRun[] {
    const rows = this.db
      .prepare(`SELECT run_json FROM runs ORDER BY created_at DESC, rowid DESC LIMIT ?`)
      .all(limit) as RunRow[];
    return rows.map((row) => this.fromRow(row));
  }

  listActiveRuns(): PromotionRun[] {
    const placeholders = TERMINAL_STATE_LIST.map(() => "?").join(", ");
    const rows = this.db
      .prepare(
        `SELECT run_json FROM runs WHERE state NOT IN (${placeholders}) ORDER BY created_at ASC`
      )
      .all(...TERMINAL_STATE_LIST) as RunRow[];
    return rows.map((row) => this.fromRow(row));
  }

  saveKnownGood(config: KnownGoodConfig): void {
    this.db
      .prepare(
        `INSERT INTO known_good (environment, artifact_id, config_json, promoted_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(environment) DO UPDATE SET
           artifact_id = excluded.artifact_id,
           config_json = excluded.config_json,
           promoted_at = excluded.promoted_at`
      )
      .run(config.environment, config.artifactId, JSON.stringify(config), config.promotedAt);
  }

  listKnownGood(): KnownGoodConfig[] {
    const rows = this.db
      .prepare(`SELECT config_json FROM known_good ORDER BY environment ASC`)
      .all() as Array<{ config_json: string }>;
    return rows.map((row) => JSON.parse(row.config_json) as KnownGoodConfig);
  }

  getRecentEvents(runId: string | null, limit = 50): PromotionEventEnvelope[] {
    const rows = (
      runId === null
        ? this.db
            .prepare(
              `SELECT run_id, event_type, payload_json, timestamp FROM events ORDER BY id DESC LIMIT ?`
            )
            .all(limit)
        : this.db
            .prepare(
              `SELECT run_id, event_type, payload_json, timestamp FROM events WHERE run_id = ? ORDER BY id DESC LIMIT ?`
            )
            .all(runId, limit)
    ) as EventRow[];

    return rows.map((row) => ({
      type: row.event_type,
      timestamp: row.timestamp,
      run_id: row.run_id,
      data: JSON.parse(row.payload_json) as unknown
    }));
  }

  close(): void {
    this.db.close();
  }

  private fromRow(row: RunRow): PromotionRun {
    return JSON.parse(row.run_json) as PromotionRun;
  }
}
