import { logger } from '../logger.js';
import type {
  OutputSink,
  SessionModel,
  TranscriptLogPayload,
  TranscriptLogStore,
  TranscriptSessionEndRecord,
} from '../types.js';

export interface TranscriptLogContext {
  sessionId: string;
  taskId: string;
  model: SessionModel;
}

/**
 * Persists received messages to the transcript log in receipt order.
 * Writes are chained; a failed append is logged and does not stop the chain.
 */
export class TranscriptLogSink implements OutputSink {
  #chain: Promise<void> = Promise.resolve();
  #seq = 0;

  constructor(
    private readonly store: TranscriptLogStore,
    private readonly context: TranscriptLogContext
  ) {}

  write(message: string): void {
    this.#seq += 1;
    this.#enqueue({ kind: 'message', seq: this.#seq, text: message });
  }

  recordSessionEnd(record: Omit<TranscriptSessionEndRecord, 'kind'>): void {
    this.#enqueue({ kind: 'session_end', ...record });
  }

  async close(): Promise<void> {
    await this.#chain;
    await this.store.close();
  }

  #enqueue(payload: TranscriptLogPayload): void {
    const entry = { ...this.context, recordedAt: new Date().toISOString(), payload };
    this.#chain = this.#chain
      .then(() => this.store.append(entry))
      .catch((error: unknown) => {
        logger.error({
          event: 'transcript_log_error',
          sessionId: this.context.sessionId,
          message: error instanceof Error ? error.message : String(error),
        });
      });
  }
}
