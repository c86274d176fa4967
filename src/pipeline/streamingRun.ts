import { chunkSizeBytes } from '../config.js';
import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type {
  AppConfig,
  FrameSource,
  OutputSink,
  Session,
  SessionCreateResult,
  SessionFactory,
  SessionModel,
  StreamingRunResult,
} from '../types.js';
import { BoundedChannel } from './boundedChannel.js';
import { captureAudio } from './capture.js';
import { createPumpStats, pumpAudio } from './chunkPump.js';
import { receiveMessages } from './receiver.js';
import { ShutdownCoordinator } from './shutdownCoordinator.js';
import type { SignalSource } from './shutdownCoordinator.js';

export interface StreamingRunDeps {
  factory: SessionFactory;
  openSession: (created: SessionCreateResult) => Session;
  frameSource: FrameSource;
  sink: OutputSink;
  signalSource?: SignalSource;
  logger?: Logger;
  /** Awaited once the session is live, before any audio flows. */
  onSessionStarted?: (created: SessionCreateResult) => Promise<void> | void;
}

export interface StreamingRunOptions {
  credential: string;
  model: SessionModel;
  audio: AppConfig['audio'];
  queue: AppConfig['queue'];
  receiver: AppConfig['receiver'];
  signals: AppConfig['signals'];
}

/**
 * One streaming run: create the remote session, wire capture → channel → pump → session
 * and session → receiver → sink, then wait for the coordinated shutdown to complete.
 */
export async function runStreaming(deps: StreamingRunDeps, options: StreamingRunOptions): Promise<StreamingRunResult> {
  const log = deps.logger ?? defaultLogger;
  const created = await deps.factory.createSession(options.model, options.credential);
  const session = deps.openSession(created);

  try {
    log.info({ event: 'session_starting', sessionId: created.sessionId, taskId: created.taskId });
    await session.start();
    await deps.onSessionStarted?.(created);
  } catch (error) {
    log.error({
      event: 'session_start_failed',
      sessionId: created.sessionId,
      message: error instanceof Error ? error.message : String(error),
    });
    await deps.factory.closeSession(created.taskId, options.credential, null).catch((closeError: unknown) => {
      log.warn({
        event: 'session_close_failed',
        taskId: created.taskId,
        message: closeError instanceof Error ? closeError.message : String(closeError),
      });
    });
    throw error;
  }

  const coordinator = new ShutdownCoordinator({
    session,
    factory: deps.factory,
    taskId: created.taskId,
    credential: options.credential,
    logger: log,
  });
  coordinator.bindSignals(deps.signalSource ?? process, options.signals);

  const channel = new BoundedChannel<Buffer>({
    capacity: options.queue.maxFrames,
    logEvery: options.queue.dropLogEvery,
    onDropMilestone: (dropped) => log.warn({ event: 'audio_queue_overflow', dropped }),
  });

  const capture = coordinator.track(
    'capture',
    captureAudio(
      deps.frameSource,
      channel,
      coordinator,
      log
    )
  );
  const pumpStats = createPumpStats();
  const pump = coordinator.track(
    'pump',
    pumpAudio(channel, session, coordinator, {
      chunkSizeBytes: chunkSizeBytes(options.audio),
      chunkDurationMs: options.audio.chunkDurationMs,
      logger: log,
      stats: pumpStats,
    })
  );
  const receiver = coordinator.track(
    'receiver',
    receiveMessages(session, deps.sink, coordinator, {
      idleRetryMs: options.receiver.idleRetryMs,
      logger: log,
      onRemoteClose: () => {
        void coordinator.requestStop('session_closed');
      },
    })
  );

  const outcome = await coordinator.stopped;
  const [captureStats, , received] = await Promise.all([capture, pump, receiver]);

  const result: StreamingRunResult = {
    sessionId: created.sessionId,
    taskId: created.taskId,
    stopReason: outcome.reason,
    droppedFrames: channel.dropCount,
    framesCaptured: captureStats?.framesCaptured ?? 0,
    pump: pumpStats,
    messagesReceived: received ?? 0,
    sessionClosed: coordinator.sessionClosed,
    closeResult: outcome.closeResult,
  };
  log.info({ event: 'streaming_run_finished', ...result });
  return result;
}
