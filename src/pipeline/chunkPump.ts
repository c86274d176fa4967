import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { PipelineFlags, PumpStats, Session } from '../types.js';
import type { BoundedChannel } from './boundedChannel.js';

export interface ChunkPumpOptions {
  chunkSizeBytes: number;
  chunkDurationMs: number;
  now?: () => number;
  logger?: Logger;
  /** Updated in place; holds the counts up to a failed send. */
  stats?: PumpStats;
}

export function createPumpStats(): PumpStats {
  return { chunksSent: 0, bytesSent: 0, sizeFlushes: 0, timeFlushes: 0, exitFlushBytes: 0 };
}

/**
 * Drains frames from the channel and sends them as wire chunks.
 * A chunk goes out when `chunkSizeBytes` have accumulated, or when the flush deadline
 * passes with a smaller residue buffered. Whatever is left on exit is sent once,
 * unless the session has already been stopped or the remote side has closed it.
 */
export async function pumpAudio(
  channel: BoundedChannel<Buffer>,
  session: Pick<Session, 'sendBytes' | 'closedByRemote'>,
  flags: PipelineFlags,
  options: ChunkPumpOptions
): Promise<PumpStats> {
  const { chunkSizeBytes, chunkDurationMs } = options;
  if (chunkSizeBytes <= 0) {
    throw new Error(`chunkSizeBytes must be positive, got ${chunkSizeBytes}`);
  }
  const now = options.now ?? Date.now;
  const log = options.logger ?? defaultLogger;
  const stats = options.stats ?? createPumpStats();
  const sessionGone = () => flags.sessionClosed || session.closedByRemote;

  let buffer: Buffer = Buffer.alloc(0);
  let nextFlushAt = now() + chunkDurationMs;

  const send = async (chunk: Buffer) => {
    await session.sendBytes(chunk);
    stats.chunksSent += 1;
    stats.bytesSent += chunk.length;
  };

  log.debug({ event: 'pump_started', chunkSizeBytes, chunkDurationMs });

  while (!flags.signal.aborted && !sessionGone()) {
    const frame = await channel.next(chunkDurationMs, flags.signal);
    if (frame) {
      buffer = buffer.length === 0 ? frame : Buffer.concat([buffer, frame]);
    }

    while (buffer.length >= chunkSizeBytes && !sessionGone()) {
      const segment = buffer.subarray(0, chunkSizeBytes);
      buffer = buffer.subarray(chunkSizeBytes);
      await send(segment);
      stats.sizeFlushes += 1;
    }

    if (sessionGone()) break;

    const current = now();
    if (buffer.length > 0 && current >= nextFlushAt) {
      const residue = buffer;
      buffer = Buffer.alloc(0);
      await send(residue);
      stats.timeFlushes += 1;
      nextFlushAt = current + chunkDurationMs;
    }
  }

  if (buffer.length > 0 && !sessionGone()) {
    const remaining = buffer;
    buffer = Buffer.alloc(0);
    await send(remaining);
    stats.exitFlushBytes = remaining.length;
    log.info({ event: 'pump_exit_flush', bytes: remaining.length });
  }

  log.debug({ event: 'pump_stopped', ...stats });
  return stats;
}
