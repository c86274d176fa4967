import path from 'node:path';
import { TranscriptJsonlStore } from './transcriptLogStore.js';
import { TranscriptSqliteStore } from './transcriptSqliteStore.js';
import type { AppConfig, RetentionPolicy, TranscriptLogStore } from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export function retentionFromConfig(storage: AppConfig['storage']): RetentionPolicy {
  return {
    retentionMs: storage.retentionDays * DAY_MS,
    maxRows: storage.maxRows,
  };
}

export function createTranscriptStore(storage: AppConfig['storage']): TranscriptLogStore | null {
  const retention = retentionFromConfig(storage);
  switch (storage.driver) {
    case 'none':
      return null;
    case 'jsonl':
      return new TranscriptJsonlStore(path.resolve(storage.path, 'transcripts.jsonl'), retention);
    case 'sqlite':
      return new TranscriptSqliteStore(path.resolve(storage.path, 'transcripts.sqlite'), retention);
  }
}
