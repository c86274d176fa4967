import { openAsBlob } from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import { ApiError } from '../errors.js';
import { logger } from '../logger.js';
import type {
  ExportFormat,
  ExportType,
  SessionCloseResult,
  SessionCreateResult,
  SessionFactory,
  SessionModel,
  ShareLink,
  TaskReference,
  TextTranslationResult,
  TranscribeStatus,
  TranscribeTranslationResult,
  TranslationLanguage,
  UploadOptions,
  UploadResult,
  Utterance,
  UtteranceTranslationResult,
} from '../types.js';
import { withTimeoutSignal } from '../utils/abort.js';
import {
  sessionCloseResponseSchema,
  sessionCreateResponseSchema,
  shareLinkResponseSchema,
  summaryCreateResponseSchema,
  textTranslationResponseSchema,
  transcribeStatusResponseSchema,
  transcribeTranslationResponseSchema,
  unwrapEnvelope,
  uploadResponseSchema,
  utteranceTranslationResponseSchema,
} from '../validation.js';

export interface TranscribeApiOptions {
  baseUrl: string;
  /** Default per-request timeout; 0 disables it. */
  requestTimeoutMs: number;
}

interface RequestSpec {
  method: 'GET' | 'POST';
  query?: Record<string, string | number | undefined>;
  json?: Record<string, unknown>;
  form?: FormData;
  accept?: string;
  timeoutMs: number;
}

interface WireUtterance {
  start_time: number;
  end_time: number;
  text: string;
  speaker: number;
}

export const toUtterance = (wire: WireUtterance): Utterance => ({
  startTime: wire.start_time,
  endTime: wire.end_time,
  text: wire.text,
  speaker: wire.speaker,
});

const toWireUtterance = (utterance: Utterance): WireUtterance => ({
  start_time: utterance.startTime,
  end_time: utterance.endTime,
  text: utterance.text,
  speaker: utterance.speaker,
});

/**
 * HTTP side of the transcription service: realtime session lifecycle, file transcription
 * tasks (upload, status, share links, summaries, export) and translation.
 */
export class TranscribeApi implements SessionFactory {
  readonly #baseUrl: string;
  readonly #requestTimeoutMs: number;

  constructor(options: TranscribeApiOptions) {
    this.#baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.#requestTimeoutMs = options.requestTimeoutMs;
  }

  async createSession(model: SessionModel, credential: string): Promise<SessionCreateResult> {
    const json = await this.#requestJson(
      '/transcribe/sessions',
      { method: 'POST', json: { model }, timeoutMs: this.#requestTimeoutMs },
      credential
    );
    const parsed = parseResponse(sessionCreateResponseSchema, json, 'session create');
    logger.info({ event: 'session_created', sessionId: parsed.session_id, taskId: parsed.task_id, model });
    return {
      sessionId: parsed.session_id,
      taskId: parsed.task_id,
      usageId: parsed.usage_id,
      maxTime: parsed.max_time,
    };
  }

  async closeSession(taskId: string, credential: string, timeoutMs: number | null): Promise<SessionCloseResult> {
    const json = await this.#requestJson(
      `/transcribe/sessions/${encodeURIComponent(taskId)}/close`,
      { method: 'POST', json: {}, timeoutMs: timeoutMs ?? 0 },
      credential
    );
    const parsed = parseResponse(sessionCloseResponseSchema, json, 'session close');
    return {
      status: parsed.status,
      duration: parsed.duration ?? undefined,
      errorCode: parsed.error_code ?? undefined,
      message: parsed.message ?? undefined,
    };
  }

  async upload(filePath: string, options: UploadOptions, credential: string): Promise<UploadResult> {
    const form = new FormData();
    form.append('file', await openAsBlob(filePath), path.basename(filePath));
    form.append('model', options.model);
    form.append('transcribe_only', String(options.transcribeOnly));
    form.append('short_asr', String(options.shortAsr));

    // Uploads run as long as the transfer takes.
    const json = await this.#requestJson('/transcribe/upload', { method: 'POST', form, timeoutMs: 0 }, credential);
    const parsed = parseResponse(uploadResponseSchema, json, 'upload');
    if ('task_id' in parsed) {
      logger.info({ event: 'upload_queued', taskId: parsed.task_id, model: options.model });
      return { kind: 'normal', taskId: parsed.task_id };
    }
    return { kind: 'one_sentence', status: parsed.status, message: parsed.message, data: parsed.data };
  }

  async status(ref: TaskReference, credential: string): Promise<TranscribeStatus> {
    const query = 'taskId' in ref ? { task_id: ref.taskId } : { share_id: ref.shareId };
    const json = await this.#requestJson(
      '/transcribe/status',
      { method: 'GET', query, timeoutMs: this.#requestTimeoutMs },
      credential
    );
    const parsed = parseResponse(transcribeStatusResponseSchema, json, 'status');
    return {
      status: parsed.status,
      taskId: parsed.task_id ?? undefined,
      taskType: parsed.task_type ?? undefined,
      usageId: parsed.usage_id ?? undefined,
      message: parsed.message ?? undefined,
      overviewMd: parsed.overview_md ?? undefined,
      summaryMd: parsed.summary_md ?? undefined,
      details: (parsed.details ?? []).map(toUtterance),
      keywords: parsed.keywords ?? [],
      callbackHistory: parsed.callback_history ?? [],
    };
  }

  async shareLink(taskId: string, expirationDays: number | undefined, credential: string): Promise<ShareLink> {
    const json = await this.#requestJson(
      '/transcribe/share-link',
      { method: 'GET', query: { task_id: taskId, expiration_day: expirationDays }, timeoutMs: this.#requestTimeoutMs },
      credential
    );
    const parsed = parseResponse(shareLinkResponseSchema, json, 'share link');
    return { shareUrl: parsed.share_url, expirationDays: parsed.expiration_day, expiredAt: parsed.expired_at };
  }

  async createSummary(utterances: Utterance[], credential: string): Promise<{ taskId: string }> {
    const json = await this.#requestJson(
      '/transcribe/summary',
      { method: 'POST', json: { utterances: utterances.map(toWireUtterance) }, timeoutMs: this.#requestTimeoutMs },
      credential
    );
    const parsed = parseResponse(summaryCreateResponseSchema, json, 'summary create');
    return { taskId: parsed.task_id };
  }

  /** Raw bytes of the exported document in the requested format. */
  async exportTask(taskId: string, type: ExportType, format: ExportFormat, credential: string): Promise<Buffer> {
    const res = await this.#fetch(
      '/transcribe/export',
      {
        method: 'GET',
        query: { task_id: taskId, type, format },
        accept: '*/*',
        timeoutMs: this.#requestTimeoutMs,
      },
      credential
    );
    return Buffer.from(await res.arrayBuffer());
  }

  async translateText(
    text: string,
    language: TranslationLanguage,
    credential: string
  ): Promise<TextTranslationResult> {
    const json = await this.#requestJson(
      '/translate/text',
      { method: 'POST', json: { text, target_lang: language }, timeoutMs: this.#requestTimeoutMs },
      credential
    );
    const parsed = parseResponse(textTranslationResponseSchema, json, 'text translation');
    return { status: parsed.status, data: parsed.data };
  }

  async translateUtterances(
    utterances: Utterance[],
    language: TranslationLanguage,
    credential: string
  ): Promise<UtteranceTranslationResult> {
    const json = await this.#requestJson(
      '/translate/utterances',
      {
        method: 'POST',
        json: { utterances: utterances.map(toWireUtterance), target_lang: language },
        timeoutMs: this.#requestTimeoutMs,
      },
      credential
    );
    const parsed = parseResponse(utteranceTranslationResponseSchema, json, 'utterance translation');
    return { status: parsed.status, targetLanguage: parsed.lang, details: parsed.details.map(toUtterance) };
  }

  async translateTranscribe(
    taskId: string,
    language: TranslationLanguage,
    credential: string
  ): Promise<TranscribeTranslationResult> {
    const json = await this.#requestJson(
      '/translate/transcribe',
      { method: 'GET', query: { task_id: taskId, target_lang: language }, timeoutMs: this.#requestTimeoutMs },
      credential
    );
    const parsed = parseResponse(transcribeTranslationResponseSchema, json, 'transcription translation');
    return {
      taskId: parsed.task_id,
      taskType: parsed.task_type,
      status: parsed.status,
      targetLanguage: parsed.lang,
      message: parsed.message ?? undefined,
      details: parsed.details?.map((detail) => ({ ...toUtterance(detail), translations: detail.translations })),
      overviewMd: parsed.overview_md ?? undefined,
      summaryMd: parsed.summary_md ?? undefined,
      keywords: parsed.keywords ?? undefined,
    };
  }

  async #requestJson(pathname: string, spec: RequestSpec, credential: string): Promise<unknown> {
    const res = await this.#fetch(pathname, { accept: 'application/json', ...spec }, credential);
    try {
      return await res.json();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ApiError(res.status, `request to ${pathname} returned invalid JSON: ${reason}`);
    }
  }

  async #fetch(pathname: string, spec: RequestSpec, credential: string): Promise<Response> {
    const url = new URL(`${this.#baseUrl}${pathname}`);
    for (const [key, value] of Object.entries(spec.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    const headers: Record<string, string> = { Authorization: credential };
    if (spec.accept) headers.Accept = spec.accept;
    let body: string | FormData | undefined;
    if (spec.form) {
      body = spec.form;
    } else if (spec.json) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(spec.json);
    }

    const timeout = withTimeoutSignal({ timeoutMs: spec.timeoutMs });
    let res: Response;
    try {
      res = await fetch(url.toString(), { method: spec.method, headers, body, signal: timeout.signal });
    } catch (error) {
      if (timeout.didTimeout()) {
        throw new ApiError(408, `request to ${pathname} timed out after ${spec.timeoutMs}ms`);
      }
      throw error;
    } finally {
      timeout.cleanup();
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new ApiError(res.status, `request to ${pathname} failed: ${res.status} ${text || res.statusText}`, text);
    }
    return res;
  }
}

function parseResponse<S extends z.ZodTypeAny>(schema: S, payload: unknown, label: string): z.output<S> {
  const result = schema.safeParse(unwrapEnvelope(payload));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ApiError(502, `unexpected ${label} response: ${issues.join('; ')}`);
  }
  return result.data;
}
