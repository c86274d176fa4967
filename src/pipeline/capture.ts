import { CaptureError } from '../errors.js';
import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { FrameSource, PipelineFlags } from '../types.js';
import type { BoundedChannel } from './boundedChannel.js';

export interface CaptureStats {
  framesCaptured: number;
}

/**
 * Keeps the capture device open until cancellation, pushing every frame into the channel.
 * Returns only after the device handle has been released.
 */
export async function captureAudio(
  source: FrameSource,
  channel: BoundedChannel<Buffer>,
  flags: Pick<PipelineFlags, 'signal'>,
  log: Logger = defaultLogger
): Promise<CaptureStats> {
  const stats: CaptureStats = { framesCaptured: 0 };
  log.info({ event: 'capture_starting' });

  const handle = await source.open(
    (frame) => {
      stats.framesCaptured += 1;
      channel.push(frame);
    },
    (status) => log.warn({ event: 'capture_status', status })
  );
  log.info({ event: 'capture_opened' });

  try {
    await new Promise<void>((resolve, reject) => {
      const onAbort = () => resolve();
      if (flags.signal.aborted) {
        resolve();
        return;
      }
      flags.signal.addEventListener('abort', onAbort, { once: true });
      handle.onExit((code) => {
        flags.signal.removeEventListener('abort', onAbort);
        if (flags.signal.aborted) {
          resolve();
          return;
        }
        reject(new CaptureError(`capture device stopped unexpectedly (exit code ${code ?? 'null'})`, code));
      });
    });
  } finally {
    await handle.close();
    log.info({ event: 'capture_closed', framesCaptured: stats.framesCaptured });
  }
  return stats;
}
