import path from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { createRequire } from 'node:module';
import type BetterSqlite3 from 'better-sqlite3';
import { describe, it, expect } from 'vitest';
import { TranscriptSqliteStore } from './transcriptSqliteStore.js';
import type { TranscriptLogEntry } from '../types.js';

const require = createRequire(import.meta.url);

let sqliteAvailable = true;
type DatabaseConstructor = typeof BetterSqlite3;
try {
  const Database: DatabaseConstructor = require('better-sqlite3');
  try {
    const probe = new Database(':memory:');
    probe.close();
  } catch {
    sqliteAvailable = false;
  }
} catch {
  sqliteAvailable = false;
}
const maybeIt = sqliteAvailable ? it : it.skip;

const entry = (sessionId: string, recordedAt: string, seq: number): TranscriptLogEntry => ({
  sessionId,
  taskId: `task-${sessionId}`,
  model: 'quality',
  recordedAt,
  payload: { kind: 'message', seq, text: `{"text":"line ${seq}"}` },
});

describe('TranscriptSqliteStore', () => {
  const makeDbPath = () => path.join(tmpdir(), `transcript-logs-${randomUUID()}.sqlite`);

  maybeIt('persists and reads entries per session', async () => {
    const store = new TranscriptSqliteStore(makeDbPath());
    await store.init();

    await store.append(entry('s1', '2026-01-01T00:00:00.000Z', 1));
    await store.append(entry('s2', '2026-01-01T00:00:01.000Z', 1));
    await store.append({
      sessionId: 's1',
      taskId: 'task-s1',
      model: 'quality',
      recordedAt: '2026-01-01T00:00:02.000Z',
      payload: { kind: 'session_end', reason: 'signal:SIGINT', droppedFrames: 0, bytesSent: 12800 },
    });

    const rows = await store.readSession('s1');
    expect(rows).toHaveLength(2);
    expect(rows[0]).toEqual(entry('s1', '2026-01-01T00:00:00.000Z', 1));
    expect(rows[1].payload).toEqual({ kind: 'session_end', reason: 'signal:SIGINT', droppedFrames: 0, bytesSent: 12800 });

    const sessions = await store.listSessions();
    expect(sessions[0]).toEqual({
      sessionId: 's1',
      taskId: 'task-s1',
      model: 'quality',
      startedAt: '2026-01-01T00:00:00.000Z',
      lastRecordedAt: '2026-01-01T00:00:02.000Z',
      entryCount: 2,
    });
    expect(sessions).toHaveLength(2);

    await store.close();
  });

  maybeIt('prunes by age and row cap', async () => {
    const store = new TranscriptSqliteStore(':memory:', { retentionMs: 5_000, maxRows: 2, pruneIntervalMs: 0 });
    await store.init();

    await store.append(entry('s1', new Date(Date.now() - 10_000).toISOString(), 1));
    await store.append(entry('s1', new Date().toISOString(), 2));
    await store.append(entry('s1', new Date().toISOString(), 3));
    await store.append(entry('s1', new Date().toISOString(), 4));

    const rows = await store.readSession('s1');
    expect(rows.map((row) => (row.payload.kind === 'message' ? row.payload.seq : -1))).toEqual([3, 4]);

    await store.close();
  });

  it('requires init before use', async () => {
    const store = new TranscriptSqliteStore(':memory:');
    await expect(store.readSession('s1')).rejects.toThrow('SQLite transcript store not initialized');
  });
});
