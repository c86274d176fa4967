import { JsonlStore } from './jsonlStore.js';
import type {
  RetentionPolicy,
  TranscriptLogEntry,
  TranscriptLogStore,
  TranscriptSessionSummary,
} from '../types.js';

export function summarizeSessions(entries: TranscriptLogEntry[], limit: number): TranscriptSessionSummary[] {
  const sessions = new Map<string, TranscriptSessionSummary>();
  const parseTime = (value: string) => {
    const ts = Date.parse(value);
    return Number.isFinite(ts) ? ts : 0;
  };
  for (const entry of entries) {
    const existing = sessions.get(entry.sessionId);
    if (!existing) {
      sessions.set(entry.sessionId, {
        sessionId: entry.sessionId,
        taskId: entry.taskId,
        model: entry.model,
        startedAt: entry.recordedAt,
        lastRecordedAt: entry.recordedAt,
        entryCount: 1,
      });
      continue;
    }
    if (parseTime(entry.recordedAt) < parseTime(existing.startedAt)) {
      existing.startedAt = entry.recordedAt;
    }
    if (parseTime(entry.recordedAt) > parseTime(existing.lastRecordedAt)) {
      existing.lastRecordedAt = entry.recordedAt;
    }
    existing.entryCount += 1;
  }
  return Array.from(sessions.values())
    .sort((a, b) => parseTime(b.lastRecordedAt) - parseTime(a.lastRecordedAt))
    .slice(0, Math.max(1, Math.min(50, limit)));
}

export class TranscriptJsonlStore implements TranscriptLogStore {
  private readonly store: JsonlStore<TranscriptLogEntry>;

  constructor(filepath: string, retention?: RetentionPolicy) {
    this.store = new JsonlStore<TranscriptLogEntry>(filepath, (entry) => entry.recordedAt, retention);
  }

  async init(): Promise<void> {
    await this.store.init();
  }

  async append(entry: TranscriptLogEntry): Promise<void> {
    await this.store.append(entry);
  }

  async readSession(sessionId: string): Promise<TranscriptLogEntry[]> {
    const all = await this.store.readAll();
    return all.filter((entry) => entry.sessionId === sessionId);
  }

  async listSessions(limit = 20): Promise<TranscriptSessionSummary[]> {
    return summarizeSessions(await this.store.readAll(), limit);
  }

  async close(): Promise<void> {
    // appends are not buffered
  }
}
