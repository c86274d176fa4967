import { EventEmitter } from 'node:events';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildCaptureArgs, defaultCaptureInput, frameBytesFor } from './ffmpegCapture.js';

vi.mock('@ffmpeg-installer/ffmpeg', () => ({ default: { path: '/bin/ffmpeg' }, path: '/bin/ffmpeg' }));

class FakeProcess extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  kill = vi.fn((signal?: NodeJS.Signals) => {
    setImmediate(() => this.emit('close', null, signal));
    return true;
  });
}

const format = { sampleRate: 16_000, channels: 1, sampleWidthBytes: 2, blockDurationMs: 200 } as const;

describe('capture arguments', () => {
  it('requests raw PCM in the configured format on stdout', () => {
    expect(buildCaptureArgs({ ...format, inputFormat: 'alsa', inputDevice: 'hw:1' })).toEqual([
      '-nostdin',
      '-hide_banner',
      '-loglevel',
      'warning',
      '-f',
      'alsa',
      '-i',
      'hw:1',
      '-ac',
      '1',
      '-ar',
      '16000',
      '-f',
      's16le',
      'pipe:1',
    ]);
  });

  it('picks a platform input when none is configured', () => {
    expect(defaultCaptureInput('darwin')).toEqual({ inputFormat: 'avfoundation', inputDevice: ':0' });
    expect(defaultCaptureInput('win32')).toEqual({ inputFormat: 'dshow', inputDevice: 'audio=default' });
    expect(defaultCaptureInput('linux')).toEqual({ inputFormat: 'alsa', inputDevice: 'default' });
  });

  it('sizes one block from rate, duration, channels and width', () => {
    expect(frameBytesFor(format)).toBe(6400);
    expect(frameBytesFor({ ...format, channels: 2, blockDurationMs: 100 })).toBe(6400);
  });
});

describe('FfmpegFrameSource', () => {
  const processes: FakeProcess[] = [];

  const mockSpawn = (event: 'spawn' | 'error' = 'spawn') => {
    const spawn = vi.fn(() => {
      const proc = new FakeProcess();
      processes.push(proc);
      setImmediate(() => {
        if (event === 'spawn') proc.emit('spawn');
        else proc.emit('error', new Error('spawn ENOENT'));
      });
      return proc;
    });
    vi.doMock('node:child_process', () => ({ spawn }));
    vi.doMock('@ffmpeg-installer/ffmpeg', () => ({
      default: { path: '/bin/ffmpeg' },
      path: '/bin/ffmpeg',
    }));
    return spawn;
  };

  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    processes.length = 0;
    vi.clearAllMocks();
    vi.doUnmock('node:child_process');
    vi.doUnmock('@ffmpeg-installer/ffmpeg');
    vi.resetModules();
  });

  it('ffmpeg の標準出力をブロック単位に切り直して渡す', async () => {
    const spawn = mockSpawn();
    const { FfmpegFrameSource } = await import('./ffmpegCapture.js');
    const source = new FfmpegFrameSource({ ...format, inputFormat: 'alsa', inputDevice: 'hw:1' });
    const frames: Buffer[] = [];
    const statuses: string[] = [];

    await source.open(
      (frame) => frames.push(frame),
      (status) => statuses.push(status)
    );
    const proc = processes[0];
    proc.stdout.emit('data', Buffer.alloc(10_000, 1));
    proc.stdout.emit('data', Buffer.alloc(2_800, 2));
    proc.stderr.emit('data', Buffer.from('buffer underrun\nlast line without newl'));

    expect(spawn).toHaveBeenCalledWith('/bin/ffmpeg', expect.arrayContaining(['-i', 'hw:1']), {
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    expect(frames.map((frame) => frame.length)).toEqual([6400, 6400]);
    expect(frames[1]?.subarray(0, 3600)).toEqual(Buffer.alloc(3600, 1));
    expect(statuses).toEqual(['buffer underrun']);
  });

  it('stops delivering frames once closed', async () => {
    mockSpawn();
    const { FfmpegFrameSource } = await import('./ffmpegCapture.js');
    const source = new FfmpegFrameSource(format);
    const frames: Buffer[] = [];
    const onExit = vi.fn();

    const handle = await source.open(
      (frame) => frames.push(frame),
      () => undefined
    );
    handle.onExit(onExit);
    const proc = processes[0];

    await handle.close();
    proc.stdout.emit('data', Buffer.alloc(6400));

    expect(proc.kill).toHaveBeenCalledWith('SIGTERM');
    expect(frames).toHaveLength(0);
    expect(onExit).not.toHaveBeenCalled();
  });

  it('reports an exit it did not ask for', async () => {
    mockSpawn();
    const { FfmpegFrameSource } = await import('./ffmpegCapture.js');
    const handle = await new FfmpegFrameSource(format).open(
      () => undefined,
      () => undefined
    );
    const onExit = vi.fn();
    handle.onExit(onExit);
    const proc = processes[0];

    proc.emit('close', 1);
    await handle.close();

    expect(onExit).toHaveBeenCalledWith(1);
    expect(proc.kill).not.toHaveBeenCalled();
  });

  it('rejects when ffmpeg cannot be started', async () => {
    mockSpawn('error');
    const { FfmpegFrameSource } = await import('./ffmpegCapture.js');

    await expect(
      new FfmpegFrameSource(format).open(
        () => undefined,
        () => undefined
      )
    ).rejects.toMatchObject({ name: 'CaptureError', message: 'ffmpeg failed to start: spawn ENOENT' });
  });
});
