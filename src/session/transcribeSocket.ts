import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { TransportError } from '../errors.js';
import { logger } from '../logger.js';
import type { Session } from '../types.js';

const DEFAULT_OPEN_TIMEOUT_MS = 10_000;

export interface TranscribeSocketOptions {
  streamUrl: string;
  openTimeoutMs?: number;
}

type Reader = (message: string | null, error?: Error) => void;

export function buildStreamUrl(streamUrl: string, sessionId: string): string {
  const url = new URL(streamUrl);
  url.searchParams.set('session_id', sessionId);
  return url.toString();
}

/**
 * Realtime transcription stream over a WebSocket: binary audio (and optional text control
 * messages) out, text results in.
 * Inbound messages are queued until pulled with `readNext`.
 */
export class TranscribeSocket implements Session {
  readonly sessionId: string;
  readonly #url: string;
  readonly #openTimeoutMs: number;
  #ws: WebSocket | null = null;
  #inbound: string[] = [];
  #readers: Reader[] = [];
  #ended = false;
  #stopRequested = false;
  #closedByRemote = false;
  #failure: TransportError | null = null;

  constructor(sessionId: string, options: TranscribeSocketOptions) {
    this.sessionId = sessionId;
    this.#url = buildStreamUrl(options.streamUrl, sessionId);
    this.#openTimeoutMs = options.openTimeoutMs ?? DEFAULT_OPEN_TIMEOUT_MS;
  }

  get closedByRemote(): boolean {
    return this.#closedByRemote;
  }

  async start(): Promise<void> {
    if (this.#ws) {
      throw new TransportError('session already started');
    }
    const ws = new WebSocket(this.#url);
    this.#ws = ws;

    ws.on('message', (data, isBinary) => {
      const text = decodeMessage(data);
      if (!isBinary || text.length > 0) {
        this.#deliver(text);
      }
    });
    ws.on('error', (err) => {
      logger.error({ event: 'session_socket_error', sessionId: this.sessionId, message: err.message });
      this.#failure = new TransportError(`session socket error: ${err.message}`, { cause: err });
      this.#end();
    });
    ws.on('close', (code) => {
      if (!this.#stopRequested) {
        this.#closedByRemote = true;
        logger.info({ event: 'session_socket_closed', sessionId: this.sessionId, code });
      }
      this.#end();
    });

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new TransportError(`session socket did not open within ${this.#openTimeoutMs}ms`));
        ws.terminate();
      }, this.#openTimeoutMs);
      ws.once('open', () => {
        clearTimeout(timer);
        resolve();
      });
      ws.once('error', (err) => {
        clearTimeout(timer);
        reject(new TransportError(`session socket failed to open: ${err.message}`, { cause: err }));
      });
      ws.once('close', () => {
        clearTimeout(timer);
        reject(new TransportError('session socket closed before open'));
      });
    });
    logger.info({ event: 'session_socket_open', sessionId: this.sessionId });
  }

  async sendBytes(bytes: Buffer): Promise<void> {
    await this.#send(bytes, true);
  }

  async sendText(message: string): Promise<void> {
    await this.#send(message, false);
  }

  readNext(timeoutMs: number | null): Promise<string | null> {
    const queued = this.#inbound.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.#ended) {
      return this.#failure && !this.#stopRequested ? Promise.reject(this.#failure) : Promise.resolve(null);
    }

    return new Promise<string | null>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null;
      const reader: Reader = (message, error) => {
        if (timer) clearTimeout(timer);
        const index = this.#readers.indexOf(reader);
        if (index >= 0) this.#readers.splice(index, 1);
        if (error) {
          reject(error);
          return;
        }
        resolve(message);
      };
      if (timeoutMs !== null && timeoutMs >= 0) {
        timer = setTimeout(() => reader(null), timeoutMs);
      }
      this.#readers.push(reader);
    });
  }

  async stop(): Promise<void> {
    if (this.#stopRequested) return;
    this.#stopRequested = true;
    const ws = this.#ws;
    try {
      if (ws && ws.readyState !== WebSocket.CLOSED && ws.readyState !== WebSocket.CLOSING) {
        ws.close(1000, 'client stop');
      }
    } finally {
      this.#end();
    }
  }

  async #send(payload: Buffer | string, binary: boolean): Promise<void> {
    const ws = this.#ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      throw this.#failure ?? new TransportError('session socket is not open');
    }
    await new Promise<void>((resolve, reject) => {
      ws.send(payload, { binary }, (err) => {
        if (err) {
          reject(new TransportError(`session write failed: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  #deliver(message: string): void {
    const reader = this.#readers[0];
    if (reader) {
      reader(message);
      return;
    }
    this.#inbound.push(message);
  }

  #end(): void {
    this.#ended = true;
    const readers = this.#readers;
    this.#readers = [];
    const error = this.#failure && !this.#stopRequested ? this.#failure : undefined;
    readers.forEach((reader) => reader(null, error));
  }
}

function decodeMessage(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}
