import { appendFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import type { RetentionPolicy } from '../types.js';

export class JsonlStore<T> {
  private readonly retentionMs: number | undefined;
  private readonly maxRows: number | undefined;
  private readonly pruneIntervalMs: number;
  private lastPruned = 0;

  constructor(
    private readonly filepath: string,
    private readonly timestampOf: (row: T) => string | undefined,
    retention?: RetentionPolicy
  ) {
    this.retentionMs = retention?.retentionMs;
    this.maxRows = retention?.maxRows;
    this.pruneIntervalMs = retention?.pruneIntervalMs ?? 5 * 60 * 1000; // 5 minutes
  }

  async init(): Promise<void> {
    await mkdir(path.dirname(this.filepath), { recursive: true });
  }

  async append(record: T): Promise<void> {
    await appendFile(this.filepath, `${JSON.stringify(record)}\n`);
    await this.maybePrune();
  }

  async readAll(): Promise<T[]> {
    try {
      const data = await readFile(this.filepath, 'utf-8');
      return data
        .split('\n')
        .filter(Boolean)
        .map((line) => JSON.parse(line) as T);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw error;
    }
  }

  private async maybePrune(): Promise<void> {
    if (!this.retentionMs && !this.maxRows) return;
    const now = Date.now();
    if (now - this.lastPruned < this.pruneIntervalMs) return;
    this.lastPruned = now;

    const all = await this.readAll();
    if (all.length === 0) return;

    const cutoff = this.retentionMs ? now - this.retentionMs : null;
    const filtered = all.filter((row) => {
      if (cutoff === null) return true;
      const ts = Date.parse(this.timestampOf(row) ?? '');
      return Number.isFinite(ts) && ts >= cutoff;
    });
    const pruned = this.maxRows ? filtered.slice(-this.maxRows) : filtered;

    // Only rewrite when something changed
    if (pruned.length !== all.length) {
      const tmpPath = `${this.filepath}.${randomUUID()}.tmp`;
      const payload = pruned.map((r) => JSON.stringify(r)).join('\n') + '\n';
      await writeFile(tmpPath, payload, 'utf-8');
      await rename(tmpPath, this.filepath);
    }
  }
}
