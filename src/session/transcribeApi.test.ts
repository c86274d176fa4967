import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { tmpdir } from 'node:os';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ApiError } from '../errors.js';
import { TranscribeApi } from './transcribeApi.js';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

function stubFetch(response: Response | (() => Promise<Response>)) {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
    typeof response === 'function' ? response() : response
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

const api = () => new TranscribeApi({ baseUrl: 'http://localhost:8080/api/', requestTimeoutMs: 1_000 });

describe('TranscribeApi', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('creates a session with the credential as Authorization', async () => {
    const fetchMock = stubFetch(
      jsonResponse({ task_id: 'task-1', session_id: 'sess-1', usage_id: 'usage-1', max_time: 3600 })
    );

    const created = await api().createSession('quality', 'Bearer test-secret');

    expect(created).toEqual({ sessionId: 'sess-1', taskId: 'task-1', usageId: 'usage-1', maxTime: 3600 });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:8080/api/transcribe/sessions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toEqual({ model: 'quality' });
  });

  it('accepts a response wrapped in a data envelope', async () => {
    stubFetch(jsonResponse({ data: { task_id: 'task-2', session_id: 'sess-2' } }));

    await expect(api().createSession('speed', 'test-secret')).resolves.toEqual({
      sessionId: 'sess-2',
      taskId: 'task-2',
      usageId: '',
      maxTime: 0,
    });
  });

  it('必須フィールドが欠けた応答は 502 の ApiError になる', async () => {
    stubFetch(jsonResponse({ session_id: 'sess-1' }));

    await expect(api().createSession('speed', 'test-secret')).rejects.toMatchObject({
      name: 'ApiError',
      statusCode: 502,
      message: 'unexpected session create response: task_id: Required',
    });
  });

  it('surfaces HTTP failures with status and body', async () => {
    stubFetch(new Response('invalid token', { status: 401, statusText: 'Unauthorized' }));

    const error = await api()
      .createSession('speed', 'test-secret')
      .catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      statusCode: 401,
      body: 'invalid token',
      message: 'request to /transcribe/sessions failed: 401 invalid token',
    });
  });

  it('closes a task and maps the optional fields', async () => {
    const fetchMock = stubFetch(jsonResponse({ status: 'ok', duration: 42, error_code: null }));

    const closed = await api().closeSession('task/1', 'test-secret', null);

    expect(closed).toEqual({ status: 'ok', duration: 42, errorCode: undefined, message: undefined });
    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:8080/api/transcribe/sessions/task%2F1/close');
  });

  it('applies no client timeout to close when none is given', async () => {
    const fetchMock = stubFetch(jsonResponse({ status: 'ok' }));

    await api().closeSession('task-1', 'test-secret', null);

    expect(fetchMock.mock.calls[0][1]?.signal).toBeUndefined();
  });

  it('maps a timed-out request to a 408 ApiError', async () => {
    stubFetch(
      () =>
        new Promise<Response>((_resolve, reject) => {
          setTimeout(() => reject(Object.assign(new Error('aborted'), { name: 'AbortError' })), 50);
        })
    );

    await expect(api().closeSession('task-1', 'test-secret', 10)).rejects.toMatchObject({
      statusCode: 408,
      message: 'request to /transcribe/sessions/task-1/close timed out after 10ms',
    });
  });

  it('translates text into the canonical language code', async () => {
    const fetchMock = stubFetch(jsonResponse({ status: 'ok', data: 'Hello' }));

    const result = await api().translateText('こんにちは', 'en', 'test-secret');

    expect(result).toEqual({ status: 'ok', data: 'Hello' });
    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:8080/api/translate/text');
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toEqual({ text: 'こんにちは', target_lang: 'en' });
  });

  it('uploads the file under its own name', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'transcribe-upload-'));
    const filePath = path.join(dir, 'meeting.mp3');
    await writeFile(filePath, Buffer.from('not really audio'));
    const fetchMock = stubFetch(jsonResponse({ task_id: 'task-3' }));

    const result = await api().upload(filePath, { model: 'speed', transcribeOnly: true, shortAsr: false }, 'test-secret');

    expect(result).toEqual({ kind: 'normal', taskId: 'task-3' });
    const init = fetchMock.mock.calls[0][1];
    expect(init?.headers).toEqual({ Authorization: 'test-secret', Accept: 'application/json' });
    expect(init?.signal).toBeUndefined();
    const body = init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      expect(body.get('file')).toMatchObject({ name: 'meeting.mp3', size: 16 });
      expect(body.get('transcribe_only')).toBe('true');
    }
    await rm(dir, { recursive: true, force: true });
  });

  it('omits the expiry from a share link request when none is given', async () => {
    const fetchMock = stubFetch(
      jsonResponse({ share_url: 'https://share.example.test/x', expiration_day: 7, expired_at: '2026-10-26' })
    );

    const link = await api().shareLink('task-1', undefined, 'test-secret');

    expect(link).toEqual({ shareUrl: 'https://share.example.test/x', expirationDays: 7, expiredAt: '2026-10-26' });
    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:8080/api/transcribe/share-link?task_id=task-1');
  });

  it('maps callback history and missing lists in a status response', async () => {
    stubFetch(
      jsonResponse({
        data: {
          status: 'transcribe_running',
          task_type: 'normal_quality',
          callback_history: [{ timestamp: '2026-10-19T10:00:00Z', status: 'convert_success', code: 200 }],
        },
      })
    );

    await expect(api().status({ shareId: 'share-1' }, 'test-secret')).resolves.toEqual({
      status: 'transcribe_running',
      taskId: undefined,
      taskType: 'normal_quality',
      usageId: undefined,
      message: undefined,
      overviewMd: undefined,
      summaryMd: undefined,
      details: [],
      keywords: [],
      callbackHistory: [{ timestamp: '2026-10-19T10:00:00Z', status: 'convert_success', code: 200 }],
    });
  });

  it('エクスポートの失敗は本文付きの ApiError になる', async () => {
    stubFetch(new Response('task not found', { status: 404 }));

    await expect(api().exportTask('task-x', 'transcript', 'pdf', 'test-secret')).rejects.toMatchObject({
      name: 'ApiError',
      statusCode: 404,
      body: 'task not found',
      message: 'request to /transcribe/export failed: 404 task not found',
    });
  });

  it('returns the exported document bytes', async () => {
    const fetchMock = stubFetch(new Response(new Uint8Array([37, 80, 68, 70]), { status: 200 }));

    const data = await api().exportTask('task-1', 'overview', 'pdf', 'test-secret');

    expect(data).toEqual(Buffer.from('%PDF'));
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ Authorization: 'test-secret', Accept: '*/*' });
  });

  it('rejects a transcription translation without a task id', async () => {
    stubFetch(jsonResponse({ task_type: 'transcribe', status: 'done', lang: 'en' }));

    await expect(api().translateTranscribe('task-1', 'en', 'test-secret')).rejects.toMatchObject({
      statusCode: 502,
      message: 'unexpected transcription translation response: task_id: Required',
    });
  });
});
