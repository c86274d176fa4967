import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { OutputSink, PipelineFlags, Session } from '../types.js';
import { sleep } from '../utils/abort.js';

export interface ReceiverOptions {
  idleRetryMs: number;
  /** Invoked once when the remote side ends the stream on its own. */
  onRemoteClose?: () => void;
  logger?: Logger;
}

export async function receiveMessages(
  session: Pick<Session, 'readNext' | 'closedByRemote'>,
  sink: OutputSink,
  flags: PipelineFlags,
  options: ReceiverOptions
): Promise<number> {
  const log = options.logger ?? defaultLogger;
  let received = 0;
  let remoteCloseReported = false;

  log.debug({ event: 'receiver_started' });
  while (!flags.signal.aborted) {
    const message = await session.readNext(null);
    if (message === null) {
      if (session.closedByRemote && !remoteCloseReported) {
        remoteCloseReported = true;
        log.info({ event: 'session_closed_by_remote' });
        options.onRemoteClose?.();
      }
      if (flags.signal.aborted) break;
      await sleep(options.idleRetryMs, flags.signal);
      continue;
    }
    received += 1;
    sink.write(message);
  }
  log.debug({ event: 'receiver_stopped', received });
  return received;
}
