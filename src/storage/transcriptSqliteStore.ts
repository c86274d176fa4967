import Database from 'better-sqlite3';
import path from 'node:path';
import { mkdir } from 'node:fs/promises';
import type {
  RetentionPolicy,
  SessionModel,
  TranscriptLogEntry,
  TranscriptLogStore,
  TranscriptSessionSummary,
} from '../types.js';

interface TranscriptRow {
  sessionId: string;
  taskId: string;
  model: SessionModel;
  recordedAt: string;
  payload: string;
}

export class TranscriptSqliteStore implements TranscriptLogStore {
  private db: Database.Database | null = null;
  private readonly retentionMs: number | undefined;
  private readonly maxRows: number | undefined;
  private readonly pruneIntervalMs: number;
  private lastPruned = 0;

  constructor(
    private readonly dbPath: string,
    retention?: RetentionPolicy
  ) {
    this.retentionMs = retention?.retentionMs;
    this.maxRows = retention?.maxRows;
    this.pruneIntervalMs = retention?.pruneIntervalMs ?? 5 * 60 * 1000;
  }

  async init(): Promise<void> {
    if (this.dbPath !== ':memory:') {
      await mkdir(path.dirname(this.dbPath), { recursive: true });
    }
    if (!this.db) {
      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('busy_timeout = 1000');
    }

    this.db
      .prepare(
        `CREATE TABLE IF NOT EXISTS transcript_logs (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          sessionId TEXT NOT NULL,
          taskId TEXT NOT NULL,
          model TEXT NOT NULL,
          recordedAt TEXT NOT NULL,
          kind TEXT NOT NULL,
          payload TEXT NOT NULL
        )`
      )
      .run();
    this.db.prepare(`CREATE INDEX IF NOT EXISTS idx_transcript_logs_session ON transcript_logs(sessionId)`).run();
    this.db.prepare(`CREATE INDEX IF NOT EXISTS idx_transcript_logs_recorded ON transcript_logs(recordedAt)`).run();
  }

  async append(entry: TranscriptLogEntry): Promise<void> {
    const db = this.requireDb();
    db.prepare(
      `INSERT INTO transcript_logs (sessionId, taskId, model, recordedAt, kind, payload)
       VALUES (@sessionId, @taskId, @model, @recordedAt, @kind, @payload)`
    ).run({
      sessionId: entry.sessionId,
      taskId: entry.taskId,
      model: entry.model,
      recordedAt: entry.recordedAt,
      kind: entry.payload.kind,
      payload: JSON.stringify(entry.payload),
    });

    this.maybePrune(db);
  }

  async readSession(sessionId: string): Promise<TranscriptLogEntry[]> {
    const rows = this.requireDb()
      .prepare(
        `SELECT sessionId, taskId, model, recordedAt, payload
         FROM transcript_logs
         WHERE sessionId = ?
         ORDER BY id ASC`
      )
      .all(sessionId) as TranscriptRow[];

    return rows.map((row) => ({
      ...row,
      payload: JSON.parse(row.payload) as TranscriptLogEntry['payload'],
    }));
  }

  async listSessions(limit = 20): Promise<TranscriptSessionSummary[]> {
    return this.requireDb()
      .prepare(
        `SELECT sessionId, taskId, model, MIN(recordedAt) as startedAt, MAX(recordedAt) as lastRecordedAt, COUNT(*) as entryCount
         FROM transcript_logs
         GROUP BY sessionId, taskId, model
         ORDER BY lastRecordedAt DESC
         LIMIT ?`
      )
      .all(Math.max(1, Math.min(50, limit))) as TranscriptSessionSummary[];
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  private requireDb(): Database.Database {
    if (!this.db) throw new Error('SQLite transcript store not initialized');
    return this.db;
  }

  private maybePrune(db: Database.Database): void {
    if (!this.retentionMs && !this.maxRows) return;
    const now = Date.now();
    if (now - this.lastPruned < this.pruneIntervalMs) return;
    this.lastPruned = now;

    const trx = db.transaction(() => {
      if (this.retentionMs) {
        const cutoffIso = new Date(now - this.retentionMs).toISOString();
        db.prepare(`DELETE FROM transcript_logs WHERE recordedAt < ?`).run(cutoffIso);
      }
      if (this.maxRows) {
        db.prepare(
          `DELETE FROM transcript_logs WHERE id NOT IN (
            SELECT id FROM transcript_logs ORDER BY id DESC LIMIT ?
          )`
        ).run(this.maxRows);
      }
    });
    trx();
  }
}
