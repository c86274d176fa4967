import { afterEach, describe, expect, it, vi } from 'vitest';
import { CaptureError } from '../errors.js';
import { logger } from '../logger.js';
import type { FrameCallback, FrameSource, FrameStatusCallback } from '../types.js';
import { BoundedChannel } from './boundedChannel.js';
import { captureAudio } from './capture.js';

function createFakeSource() {
  const state: {
    onFrame?: FrameCallback;
    onStatus?: FrameStatusCallback;
    exitListeners: Array<(code: number | null) => void>;
  } = { exitListeners: [] };
  const close = vi.fn(async () => undefined);
  const source: FrameSource = {
    open: vi.fn(async (onFrame: FrameCallback, onStatus: FrameStatusCallback) => {
      state.onFrame = onFrame;
      state.onStatus = onStatus;
      return {
        close,
        onExit: (cb: (code: number | null) => void) => {
          state.exitListeners.push(cb);
        },
      };
    }),
  };
  return { source, state, close };
}

describe('captureAudio', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('pushes every frame into the channel until cancelled', async () => {
    const { source, state, close } = createFakeSource();
    const channel = new BoundedChannel<Buffer>({ capacity: 10 });
    const controller = new AbortController();

    const task = captureAudio(source, channel, { signal: controller.signal }, logger);
    await vi.waitFor(() => expect(state.onFrame).toBeDefined());
    state.onFrame?.(Buffer.alloc(6400, 1));
    state.onFrame?.(Buffer.alloc(6400, 2));

    controller.abort();
    await expect(task).resolves.toEqual({ framesCaptured: 2 });
    expect(channel.size).toBe(2);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('logs every device status it receives', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    const { source, state } = createFakeSource();
    const controller = new AbortController();

    const task = captureAudio(source, new BoundedChannel<Buffer>({ capacity: 10 }), { signal: controller.signal }, logger);
    await vi.waitFor(() => expect(state.onStatus).toBeDefined());
    state.onStatus?.('overflow');
    state.onStatus?.('overflow');
    controller.abort();
    await task;

    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith({ event: 'capture_status', status: 'overflow' });
  });

  it('デバイスが勝手に止まったら CaptureError で終わる', async () => {
    const { source, state, close } = createFakeSource();
    const channel = new BoundedChannel<Buffer>({ capacity: 10 });
    const controller = new AbortController();

    const task = captureAudio(source, channel, { signal: controller.signal }, logger);
    await vi.waitFor(() => expect(state.exitListeners).toHaveLength(1));
    state.exitListeners.forEach((cb) => cb(1));

    const error = await task.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CaptureError);
    expect(error).toMatchObject({ exitCode: 1 });
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('treats an exit after cancellation as a normal stop', async () => {
    const { source, state } = createFakeSource();
    const channel = new BoundedChannel<Buffer>({ capacity: 10 });
    const controller = new AbortController();

    const task = captureAudio(source, channel, { signal: controller.signal }, logger);
    await vi.waitFor(() => expect(state.exitListeners).toHaveLength(1));
    controller.abort();
    state.exitListeners.forEach((cb) => cb(null));

    await expect(task).resolves.toEqual({ framesCaptured: 0 });
  });

  it('propagates a failure to open the device', async () => {
    const source: FrameSource = {
      open: vi.fn(async () => Promise.reject(new CaptureError('ffmpeg failed to start: ENOENT'))),
    };
    const controller = new AbortController();

    await expect(
      captureAudio(source, new BoundedChannel<Buffer>({ capacity: 1 }), { signal: controller.signal }, logger)
    ).rejects.toThrow('ffmpeg failed to start');
  });
});
