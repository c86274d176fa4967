import type { OutputSink } from '../types.js';

export class ConsoleSink implements OutputSink {
  constructor(private readonly stream: { write(chunk: string): unknown } = process.stdout) {}

  write(message: string): void {
    this.stream.write(message.endsWith('\n') ? message : `${message}\n`);
  }

  async close(): Promise<void> {
    // stdout is owned by the process
  }
}

/** Fans each message out to every sink, in order. */
export function teeSink(sinks: readonly OutputSink[]): OutputSink {
  return {
    write(message) {
      sinks.forEach((sink) => sink.write(message));
    },
    async close() {
      await Promise.all(sinks.map((sink) => sink.close()));
    },
  };
}
