import { spawn } from 'node:child_process';
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import { CaptureError } from '../errors.js';
import type {
  FrameCallback,
  FrameSource,
  FrameSourceHandle,
  FrameSourceOptions,
  FrameStatusCallback,
} from '../types.js';
import { FrameAssembler } from './frameAssembler.js';

const KILL_GRACE_MS = 2_000;

const PCM_FORMATS: Record<FrameSourceOptions['sampleWidthBytes'], string> = {
  1: 'u8',
  2: 's16le',
  4: 's32le',
};

export interface CaptureInput {
  inputFormat: string;
  inputDevice: string;
}

export interface FfmpegFrameSourceOptions extends FrameSourceOptions, Partial<CaptureInput> {}

export function defaultCaptureInput(platform: NodeJS.Platform = process.platform): CaptureInput {
  switch (platform) {
    case 'darwin':
      return { inputFormat: 'avfoundation', inputDevice: ':0' };
    case 'win32':
      return { inputFormat: 'dshow', inputDevice: 'audio=default' };
    default:
      return { inputFormat: 'alsa', inputDevice: 'default' };
  }
}

export function frameBytesFor(options: FrameSourceOptions): number {
  const samples = Math.floor((options.sampleRate * options.blockDurationMs) / 1000);
  return samples * options.channels * options.sampleWidthBytes;
}

export function buildCaptureArgs(options: FrameSourceOptions & CaptureInput): string[] {
  return [
    '-nostdin',
    '-hide_banner',
    '-loglevel',
    'warning',
    '-f',
    options.inputFormat,
    '-i',
    options.inputDevice,
    '-ac',
    String(options.channels),
    '-ar',
    String(options.sampleRate),
    '-f',
    PCM_FORMATS[options.sampleWidthBytes],
    'pipe:1',
  ];
}

/** Microphone capture through an ffmpeg child process writing raw PCM to stdout. */
export class FfmpegFrameSource implements FrameSource {
  readonly #options: FfmpegFrameSourceOptions;

  constructor(options: FfmpegFrameSourceOptions) {
    this.#options = options;
  }

  async open(onFrame: FrameCallback, onStatus: FrameStatusCallback): Promise<FrameSourceHandle> {
    const defaults = defaultCaptureInput();
    const input: CaptureInput = {
      inputFormat: this.#options.inputFormat ?? defaults.inputFormat,
      inputDevice: this.#options.inputDevice ?? defaults.inputDevice,
    };
    const assembler = new FrameAssembler(frameBytesFor(this.#options));
    const proc = spawn(ffmpegInstaller.path, buildCaptureArgs({ ...this.#options, ...input }), {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    await new Promise<void>((resolve, reject) => {
      proc.once('spawn', () => resolve());
      proc.once('error', (err) => reject(new CaptureError(`ffmpeg failed to start: ${err.message}`)));
    });

    let released = false;
    let exited = false;
    const exitListeners: Array<(code: number | null) => void> = [];
    const closed = new Promise<void>((resolve) => {
      proc.once('close', (code) => {
        exited = true;
        if (!released) {
          exitListeners.forEach((cb) => cb(code));
        }
        resolve();
      });
    });

    proc.on('error', (err) => {
      onStatus(`ffmpeg error: ${err.message}`);
    });

    proc.stdout.on('data', (chunk: Buffer) => {
      if (released) return;
      for (const frame of assembler.push(chunk)) {
        if (released) return;
        onFrame(frame);
      }
    });

    let stderrTail = '';
    proc.stderr.on('data', (chunk: Buffer) => {
      const lines = (stderrTail + chunk.toString('utf8')).split(/\r?\n/);
      stderrTail = lines.pop() ?? '';
      lines
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .forEach((line) => onStatus(line));
    });

    return {
      async close() {
        if (released) {
          await closed;
          return;
        }
        released = true;
        proc.stdout.removeAllListeners('data');
        assembler.reset();
        if (!exited) {
          proc.kill('SIGTERM');
          const killTimer = setTimeout(() => {
            if (!exited) proc.kill('SIGKILL');
          }, KILL_GRACE_MS);
          killTimer.unref();
          await closed;
          clearTimeout(killTimer);
        }
      },
      onExit(cb) {
        exitListeners.push(cb);
      },
    };
  }
}
