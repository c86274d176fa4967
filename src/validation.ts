import { z } from 'zod';

export const sessionCreateResponseSchema = z
  .object({
    task_id: z.string().min(1),
    session_id: z.string().min(1),
    usage_id: z.string().default(''),
    max_time: z.number().int().nonnegative().default(0),
  })
  .passthrough();

export const sessionCloseResponseSchema = z
  .object({
    status: z.string(),
    duration: z.number().nullish(),
    error_code: z.number().int().nullish(),
    message: z.string().nullish(),
  })
  .passthrough();

export const textTranslationResponseSchema = z
  .object({
    status: z.string(),
    data: z.string(),
  })
  .passthrough();

const utteranceSchema = z
  .object({
    start_time: z.number(),
    end_time: z.number(),
    text: z.string(),
    speaker: z.number().int(),
  })
  .passthrough();

// Queued uploads answer with a task id; one-sentence uploads answer with the text itself.
export const uploadResponseSchema = z.union([
  z.object({ task_id: z.string().min(1) }),
  z.object({
    status: z.string(),
    message: z.string().default(''),
    data: z.string(),
  }),
]);

export const transcribeStatusResponseSchema = z
  .object({
    status: z.string(),
    task_id: z.string().nullish(),
    task_type: z.string().nullish(),
    usage_id: z.string().nullish(),
    message: z.string().nullish(),
    overview_md: z.string().nullish(),
    summary_md: z.string().nullish(),
    details: z.array(utteranceSchema).nullish(),
    keywords: z.array(z.string()).nullish(),
    callback_history: z
      .array(z.object({ timestamp: z.string(), status: z.string(), code: z.number().int() }))
      .nullish(),
  })
  .passthrough();

export const shareLinkResponseSchema = z
  .object({
    share_url: z.string().min(1),
    expiration_day: z.number().int(),
    expired_at: z.string(),
  })
  .passthrough();

export const summaryCreateResponseSchema = z.object({ task_id: z.string().min(1) }).passthrough();

export const utteranceTranslationResponseSchema = z
  .object({
    status: z.string(),
    lang: z.string(),
    details: z.array(utteranceSchema).default([]),
  })
  .passthrough();

export const transcribeTranslationResponseSchema = z
  .object({
    task_id: z.string().min(1),
    task_type: z.string(),
    status: z.string(),
    lang: z.string(),
    message: z.string().nullish(),
    details: z.array(utteranceSchema.extend({ translations: z.record(z.string()) })).nullish(),
    overview_md: z.string().nullish(),
    summary_md: z.string().nullish(),
    keywords: z.array(z.string()).nullish(),
  })
  .passthrough();

// Utterance lists read from disk for summary or translation requests.
export const utteranceListSchema = z.array(
  z.object({
    start_time: z.number(),
    end_time: z.number(),
    text: z.string(),
    speaker: z.number().int(),
  })
);

// Some deployments wrap payloads as `{ data: {...} }`; unwrap before validating.
export function unwrapEnvelope(payload: unknown): unknown {
  if (payload && typeof payload === 'object' && 'data' in payload) {
    const inner = payload.data;
    if (inner && typeof inner === 'object' && !Array.isArray(inner)) {
      return inner;
    }
  }
  return payload;
}
