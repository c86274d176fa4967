import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { SESSION_MODELS, STORAGE_DRIVERS } from './types.js';
import type { AppConfig } from './types.js';

const DEFAULT_API_URL = 'http://localhost:8080/api';
const DEFAULT_STREAM_URL = 'ws://localhost:8080/ws/transcribe';

const audioSchema = z
  .object({
    sampleRate: z.number().int().min(8_000).max(96_000).default(16_000),
    channels: z.number().int().min(1).max(2).default(1),
    sampleWidthBytes: z.union([z.literal(1), z.literal(2), z.literal(4)]).default(2),
    chunkDurationMs: z.number().int().min(10).max(5_000).default(200),
  })
  .default({});

const configSchema = z.object({
  audio: audioSchema,
  queue: z
    .object({
      maxFrames: z.number().int().min(1).max(10_000).default(50),
      dropLogEvery: z.number().int().min(1).default(10),
    })
    .default({}),
  receiver: z
    .object({
      idleRetryMs: z.number().int().min(1).max(10_000).default(50),
    })
    .default({}),
  capture: z
    .object({
      inputFormat: z.string().min(1).optional(),
      inputDevice: z.string().min(1).optional(),
    })
    .default({}),
  api: z
    .object({
      baseUrl: z.string().url().optional(),
      streamUrl: z.string().url().optional(),
      requestTimeoutMs: z.number().int().min(0).default(30_000),
      openTimeoutMs: z.number().int().min(1).default(10_000),
    })
    .default({}),
  session: z
    .object({
      model: z.enum(SESSION_MODELS).default('speed'),
    })
    .default({}),
  storage: z
    .object({
      driver: z.enum(STORAGE_DRIVERS).default('jsonl'),
      path: z.string().default('./runs/{date}'),
      retentionDays: z.number().min(1).max(3650).default(30),
      maxRows: z.number().int().min(100).max(1_000_000).default(100_000),
    })
    .default({}),
  signals: z.array(z.enum(['SIGINT', 'SIGTERM', 'SIGHUP'])).min(1).default(['SIGINT']),
});

let cachedConfig: AppConfig | null = null;

const formatLocalDate = (date: Date) => {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
};

async function readConfigFile(configPath: string): Promise<unknown> {
  try {
    const raw = await readFile(configPath, 'utf-8');
    return JSON.parse(raw);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return {};
    throw error;
  }
}

export function parseConfig(input: unknown): AppConfig {
  const parsed = configSchema.parse(input);
  return {
    ...parsed,
    api: {
      ...parsed.api,
      baseUrl: process.env.TRANSCRIBE_API_URL ?? parsed.api.baseUrl ?? DEFAULT_API_URL,
      streamUrl: process.env.TRANSCRIBE_STREAM_URL ?? parsed.api.streamUrl ?? DEFAULT_STREAM_URL,
    },
    storage: {
      ...parsed.storage,
      path: parsed.storage.path.replace('{date}', formatLocalDate(new Date())),
    },
  };
}

export async function loadConfig(configPath = path.resolve('config.json')): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = parseConfig(await readConfigFile(configPath));
  return cachedConfig;
}

export function reloadConfig(): void {
  cachedConfig = null;
}

/** Bytes in one capture block / one size-triggered wire chunk. */
export function chunkSizeBytes(audio: AppConfig['audio']): number {
  const samples = Math.floor((audio.sampleRate * audio.chunkDurationMs) / 1000);
  return samples * audio.channels * audio.sampleWidthBytes;
}
