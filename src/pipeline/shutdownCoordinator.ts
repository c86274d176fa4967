import { setImmediate as yieldToLoop } from 'node:timers/promises';
import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type {
  PipelineFlags,
  Session,
  SessionCloseResult,
  SessionFactory,
  ShutdownState,
} from '../types.js';

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface ShutdownCoordinatorOptions {
  session: Pick<Session, 'stop'>;
  factory: Pick<SessionFactory, 'closeSession'>;
  taskId: string;
  credential: string;
  logger?: Logger;
}

export interface ShutdownOutcome {
  reason: string;
  closeResult: SessionCloseResult | null;
}

/**
 * Owns the run-wide cancellation flag and the one-shot stop sequence:
 * cancel → session.stop() → await tasks → release signals → close the remote task.
 */
export class ShutdownCoordinator implements PipelineFlags {
  readonly #controller = new AbortController();
  readonly #session: Pick<Session, 'stop'>;
  readonly #factory: Pick<SessionFactory, 'closeSession'>;
  readonly #taskId: string;
  readonly #credential: string;
  readonly #log: Logger;
  readonly #tasks = new Map<string, Promise<unknown>>();
  #signalBindings: Array<{ source: SignalSource; signal: NodeJS.Signals; listener: () => void }> = [];
  #state: ShutdownState = 'running';
  #sessionClosed = false;
  #stopping: Promise<ShutdownOutcome> | null = null;
  #resolveStopped: (outcome: ShutdownOutcome) => void = () => undefined;
  /** Settles once the stop sequence has run to completion, whatever triggered it. */
  readonly stopped: Promise<ShutdownOutcome>;

  constructor(options: ShutdownCoordinatorOptions) {
    this.stopped = new Promise<ShutdownOutcome>((resolve) => {
      this.#resolveStopped = resolve;
    });
    this.#session = options.session;
    this.#factory = options.factory;
    this.#taskId = options.taskId;
    this.#credential = options.credential;
    this.#log = options.logger ?? defaultLogger;
  }

  get signal(): AbortSignal {
    return this.#controller.signal;
  }

  get sessionClosed(): boolean {
    return this.#sessionClosed;
  }

  get state(): ShutdownState {
    return this.#state;
  }

  bindSignals(source: SignalSource, signals: readonly NodeJS.Signals[]): void {
    for (const signal of signals) {
      const listener = () => {
        if (this.#state === 'running') {
          this.#log.warn({ event: 'interrupt_received', signal });
        }
        void this.requestStop(`signal:${signal}`);
      };
      source.on(signal, listener);
      this.#signalBindings.push({ source, signal, listener });
    }
  }

  /**
   * Registers a pipeline task. When it settles while the pipeline is still running,
   * the stop sequence starts; an exit seen during shutdown is plain propagation.
   * The returned promise never rejects: a failed task yields `undefined`.
   */
  track<T>(name: string, task: Promise<T>): Promise<T | undefined> {
    const joined = task.then(
      (value) => {
        if (this.#state === 'running') {
          this.#log.info({ event: 'task_exited', task: name });
          void this.requestStop(`${name}_exited`);
        }
        return value;
      },
      (error: unknown) => {
        this.#log.error({ event: 'task_failed', task: name, message: errorMessage(error) });
        void this.requestStop(`${name}_failed`);
        return undefined;
      }
    );
    this.#tasks.set(name, joined);
    return joined;
  }

  requestStop(reason: string): Promise<ShutdownOutcome> {
    if (this.#stopping) {
      this.#log.debug({ event: 'stop_already_scheduled', reason });
      return this.#stopping;
    }
    this.#state = 'stopping';
    // Deferred so that re-entrant calls made while cancelling already see `#stopping`.
    this.#stopping = Promise.resolve()
      .then(() => this.#runStopSequence(reason))
      .then((outcome) => {
        this.#state = 'stopped';
        this.#resolveStopped(outcome);
        return outcome;
      });
    return this.#stopping;
  }

  async #runStopSequence(reason: string): Promise<ShutdownOutcome> {
    this.#log.info({ event: 'shutdown_started', reason });

    this.#controller.abort();
    // Let tasks parked on a cancellable wait reach their loop boundary (and the pump
    // its exit flush) before the session stops accepting writes.
    await yieldToLoop();

    try {
      await this.#session.stop();
      this.#log.info({ event: 'shutdown_session_stopped' });
    } catch (error) {
      this.#log.warn({ event: 'shutdown_session_stop_failed', message: errorMessage(error) });
    } finally {
      this.#sessionClosed = true;
    }

    // Tracked promises never reject; failures were logged when they happened.
    await Promise.all(this.#tasks.values());
    this.#log.info({ event: 'shutdown_tasks_joined', tasks: Array.from(this.#tasks.keys()) });

    try {
      this.#releaseSignals();
      this.#log.debug({ event: 'shutdown_signals_released' });
    } catch (error) {
      this.#log.warn({ event: 'shutdown_signal_release_failed', message: errorMessage(error) });
    }

    let closeResult: SessionCloseResult | null = null;
    try {
      closeResult = await this.#factory.closeSession(this.#taskId, this.#credential, null);
      this.#log.info({ event: 'shutdown_session_closed', taskId: this.#taskId, status: closeResult.status });
    } catch (error) {
      this.#log.warn({ event: 'shutdown_session_close_failed', taskId: this.#taskId, message: errorMessage(error) });
    }

    return { reason, closeResult };
  }

  #releaseSignals(): void {
    const bindings = this.#signalBindings;
    this.#signalBindings = [];
    for (const { source, signal, listener } of bindings) {
      source.off(signal, listener);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
