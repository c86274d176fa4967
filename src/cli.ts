#!/usr/bin/env node

import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { FfmpegFrameSource } from './audio/ffmpegCapture.js';
import { chunkSizeBytes, loadConfig } from './config.js';
import { logger } from './logger.js';
import { ConsoleSink, teeSink } from './output/consoleSink.js';
import { TranscriptLogSink } from './output/transcriptLogSink.js';
import { runStreaming } from './pipeline/streamingRun.js';
import {
  parseExportFormat,
  parseExportType,
  parseSessionModel,
  parseTranslationLanguage,
} from './session/options.js';
import { TranscribeApi, toUtterance } from './session/transcribeApi.js';
import { TranscribeSocket } from './session/transcribeSocket.js';
import { createTranscriptStore } from './storage/index.js';
import type {
  AppConfig,
  OutputSink,
  SessionModel,
  StreamingRunResult,
  TranscriptLogEntry,
  TranscriptLogStore,
  Utterance,
} from './types.js';
import { loadEnvironment, requireCredential } from './utils/env.js';
import { utteranceListSchema } from './validation.js';

export const COMMANDS = [
  'stream',
  'translate',
  'upload',
  'status',
  'share',
  'summary',
  'export',
  'sessions',
  'show',
] as const;

export type Command = (typeof COMMANDS)[number];

export type ParsedArgs = {
  help: boolean;
  command?: Command;
  model?: string;
  config?: string;
  device?: string;
  format?: string;
  log: boolean;
  to?: string;
  task?: string;
  utterances?: string;
  share?: string;
  days?: string;
  type?: string;
  out?: string;
  limit?: string;
  transcribeOnly: boolean;
  short: boolean;
  positionals: string[];
};

export const USAGE = `
Live microphone transcription

Usage:
  transcribe-live stream [options]
  transcribe-live translate <text> --to <lang>
  transcribe-live translate --task <taskId> --to <lang>
  transcribe-live translate --utterances <file.json> --to <lang>
  transcribe-live upload <audio-file> [--model <name>] [--transcribe-only] [--short]
  transcribe-live status <taskId> | --share <shareId>
  transcribe-live share <taskId> [--days <n>]
  transcribe-live summary <utterances.json>
  transcribe-live export <taskId> --out <path> [--type <type>] [--format <format>]
  transcribe-live sessions [--limit <n>]
  transcribe-live show <sessionId>

Stream options:
  --model <name>       speed / quality / quality_v2 (default: config session.model)
  --config <path>      Config file (default: ./config.json)
  --device <name>      Capture device passed to ffmpeg -i
  --format <name>      Capture input format passed to ffmpeg -f
  --no-log             Do not write the transcript log

Translate options:
  --to <lang>          zh / en / ja / ko / fr / de

Upload options:
  --transcribe-only    Skip the summary step
  --short              One-sentence mode (short clips, text returned directly)

Export options:
  --type <type>        transcript / overview / summary (default: transcript)
  --format <format>    pdf / txt / docx (default: pdf)
  --out <path>         File to write

Transcript log (read from storage.path, today's directory by default):
  --limit <n>          Number of recent sessions to list (1-50, default: 20)

  --help               Show this message

Utterance files hold a JSON array of { start_time, end_time, text, speaker }.

Environment:
  TRANSCRIBE_TOKEN       Credential sent as the Authorization header (required)
  TRANSCRIBE_API_URL     Session / translation API base URL
  TRANSCRIBE_STREAM_URL  Realtime WebSocket URL
`;

const isCommand = (value: string): value is Command => COMMANDS.some((command) => command === value);

export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = { help: false, log: true, transcribeOnly: false, short: false, positionals: [] };

  for (let index = 0; index < argv.length; index += 1) {
    const raw = argv[index];
    if (!raw.startsWith('--')) {
      if (!result.command) {
        if (!isCommand(raw)) {
          throw new Error(`Unknown command: ${raw}`);
        }
        result.command = raw;
      } else {
        result.positionals.push(raw);
      }
      continue;
    }

    const eq = raw.indexOf('=');
    const name = (eq >= 0 ? raw.slice(0, eq) : raw).replace(/^--/, '');
    const inlineValue = eq >= 0 ? raw.slice(eq + 1) : undefined;

    const getValue = () => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const nextValue = argv[index + 1];
      if (nextValue === undefined || nextValue.startsWith('--')) {
        throw new Error(`--${name} requires a value`);
      }
      index += 1;
      return nextValue;
    };

    switch (name) {
      case 'help':
        result.help = true;
        break;
      case 'model':
        result.model = getValue();
        break;
      case 'config':
        result.config = getValue();
        break;
      case 'device':
        result.device = getValue();
        break;
      case 'format':
        result.format = getValue();
        break;
      case 'no-log':
        result.log = false;
        break;
      case 'to':
        result.to = getValue();
        break;
      case 'task':
        result.task = getValue();
        break;
      case 'utterances':
        result.utterances = getValue();
        break;
      case 'share':
        result.share = getValue();
        break;
      case 'days':
        result.days = getValue();
        break;
      case 'type':
        result.type = getValue();
        break;
      case 'out':
        result.out = getValue();
        break;
      case 'limit':
        result.limit = getValue();
        break;
      case 'transcribe-only':
        result.transcribeOnly = true;
        break;
      case 'short':
        result.short = true;
        break;
      default:
        throw new Error(`Unknown option: --${name}`);
    }
  }

  return result;
}

function parsePositiveInt(value: string, option: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`--${option} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

function requirePositional(args: ParsedArgs, label: string): string {
  const value = args.positionals[0];
  if (!value) {
    throw new Error(`${args.command ?? 'command'} requires ${label}`);
  }
  return value;
}

const loadCommandConfig = (args: ParsedArgs) => loadConfig(args.config ? path.resolve(args.config) : undefined);

const createApi = (config: AppConfig) =>
  new TranscribeApi({ baseUrl: config.api.baseUrl, requestTimeoutMs: config.api.requestTimeoutMs });

const formatJson = (value: unknown) => JSON.stringify(value, null, 2);

async function loadUtterances(filePath: string): Promise<Utterance[]> {
  const raw = await readFile(path.resolve(filePath), 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`${filePath} is not valid JSON: ${reason}`);
  }
  const parsed = utteranceListSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new Error(`invalid utterances in ${filePath}: ${issues.join('; ')}`);
  }
  return parsed.data.map(toUtterance);
}

async function openTranscriptSink(
  config: AppConfig,
  context: { sessionId: string; taskId: string; model: SessionModel }
): Promise<TranscriptLogSink | null> {
  const store = createTranscriptStore(config.storage);
  if (!store) return null;
  await store.init();
  logger.info({ event: 'transcript_log_opened', driver: config.storage.driver, dir: config.storage.path });
  return new TranscriptLogSink(store, context);
}

async function runStreamCommand(args: ParsedArgs): Promise<StreamingRunResult> {
  const config = await loadCommandConfig(args);
  const credential = requireCredential();
  const model = args.model ? parseSessionModel(args.model) : config.session.model;

  const api = createApi(config);
  const frameSource = new FfmpegFrameSource({
    sampleRate: config.audio.sampleRate,
    channels: config.audio.channels,
    sampleWidthBytes: config.audio.sampleWidthBytes,
    blockDurationMs: config.audio.chunkDurationMs,
    inputFormat: args.format ?? config.capture.inputFormat,
    inputDevice: args.device ?? config.capture.inputDevice,
  });

  // The transcript log joins the sinks once the session id is known.
  const sinks: OutputSink[] = [new ConsoleSink()];
  const transcript: { sink?: TranscriptLogSink } = {};
  const sink = teeSink(sinks);

  logger.info({
    event: 'stream_starting',
    model,
    sampleRate: config.audio.sampleRate,
    chunkBytes: chunkSizeBytes(config.audio),
  });

  const result = await runStreaming(
    {
      factory: api,
      openSession: (created) =>
        new TranscribeSocket(created.sessionId, {
          streamUrl: config.api.streamUrl,
          openTimeoutMs: config.api.openTimeoutMs,
        }),
      frameSource,
      sink,
      onSessionStarted: async (created) => {
        if (!args.log) return;
        try {
          const opened = await openTranscriptSink(config, {
            sessionId: created.sessionId,
            taskId: created.taskId,
            model,
          });
          if (opened) {
            transcript.sink = opened;
            sinks.push(opened);
          }
        } catch (error) {
          logger.error({
            event: 'transcript_log_open_failed',
            message: error instanceof Error ? error.message : String(error),
          });
        }
      },
    },
    {
      credential,
      model,
      audio: config.audio,
      queue: config.queue,
      receiver: config.receiver,
      signals: config.signals,
    }
  );

  transcript.sink?.recordSessionEnd({
    reason: result.stopReason,
    droppedFrames: result.droppedFrames,
    bytesSent: result.pump.bytesSent,
  });
  await sink.close();
  return result;
}

async function runTranslateCommand(args: ParsedArgs): Promise<string> {
  if (!args.to) {
    throw new Error('translate requires --to <lang>');
  }
  const language = parseTranslationLanguage(args.to);
  const text = args.positionals.join(' ').trim();
  const sources = [text ? 'text' : null, args.task ? '--task' : null, args.utterances ? '--utterances' : null].filter(
    (source) => source !== null
  );
  if (sources.length === 0) {
    throw new Error('translate requires the text to translate, --task or --utterances');
  }
  if (sources.length > 1) {
    throw new Error(`translate takes one source, got ${sources.join(' and ')}`);
  }

  const config = await loadCommandConfig(args);
  const credential = requireCredential();
  const api = createApi(config);

  if (args.task) {
    return formatJson(await api.translateTranscribe(args.task, language, credential));
  }
  if (args.utterances) {
    const utterances = await loadUtterances(args.utterances);
    return formatJson(await api.translateUtterances(utterances, language, credential));
  }
  const result = await api.translateText(text, language, credential);
  logger.debug({ event: 'translation_done', status: result.status, language });
  return result.data;
}

async function runUploadCommand(args: ParsedArgs): Promise<string> {
  const filePath = path.resolve(requirePositional(args, 'an audio file'));
  const config = await loadCommandConfig(args);
  const credential = requireCredential();
  const model = args.model ? parseSessionModel(args.model) : config.session.model;
  const result = await createApi(config).upload(
    filePath,
    { model, transcribeOnly: args.transcribeOnly, shortAsr: args.short },
    credential
  );
  return result.kind === 'normal' ? result.taskId : result.data;
}

async function runStatusCommand(args: ParsedArgs): Promise<string> {
  const taskId = args.positionals[0];
  if (taskId && args.share) {
    throw new Error('status takes either a task id or --share, not both');
  }
  const ref = taskId ? { taskId } : args.share ? { shareId: args.share } : null;
  if (!ref) {
    throw new Error('status requires a task id or --share <shareId>');
  }
  const config = await loadCommandConfig(args);
  const credential = requireCredential();
  return formatJson(await createApi(config).status(ref, credential));
}

async function runShareCommand(args: ParsedArgs): Promise<string> {
  const taskId = requirePositional(args, 'a task id');
  const days = args.days ? parsePositiveInt(args.days, 'days') : undefined;
  const config = await loadCommandConfig(args);
  const credential = requireCredential();
  const link = await createApi(config).shareLink(taskId, days, credential);
  return `${link.shareUrl} (expires ${link.expiredAt})`;
}

async function runSummaryCommand(args: ParsedArgs): Promise<string> {
  const utterances = await loadUtterances(requirePositional(args, 'an utterances file'));
  const config = await loadCommandConfig(args);
  const credential = requireCredential();
  const created = await createApi(config).createSummary(utterances, credential);
  return created.taskId;
}

async function runExportCommand(args: ParsedArgs): Promise<string> {
  const taskId = requirePositional(args, 'a task id');
  if (!args.out) {
    throw new Error('export requires --out <path>');
  }
  const type = parseExportType(args.type ?? 'transcript');
  const format = parseExportFormat(args.format ?? 'pdf');
  const config = await loadCommandConfig(args);
  const credential = requireCredential();
  const data = await createApi(config).exportTask(taskId, type, format, credential);
  const outPath = path.resolve(args.out);
  await writeFile(outPath, data);
  logger.info({ event: 'export_written', taskId, type, format, bytes: data.length, outPath });
  return outPath;
}

async function withTranscriptStore<T>(config: AppConfig, fn: (store: TranscriptLogStore) => Promise<T>): Promise<T> {
  const store = createTranscriptStore(config.storage);
  if (!store) {
    throw new Error('transcript log is disabled (storage.driver is none)');
  }
  await store.init();
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}

async function runSessionsCommand(args: ParsedArgs): Promise<string> {
  const limit = args.limit ? parsePositiveInt(args.limit, 'limit') : 20;
  const config = await loadCommandConfig(args);
  const sessions = await withTranscriptStore(config, (store) => store.listSessions(limit));
  if (sessions.length === 0) {
    return 'no recorded sessions';
  }
  return sessions
    .map((session) =>
      [session.startedAt, session.sessionId, session.taskId, session.model, String(session.entryCount)].join('\t')
    )
    .join('\n');
}

function formatTranscriptEntry(entry: TranscriptLogEntry): string {
  const { payload } = entry;
  if (payload.kind === 'message') {
    return payload.text;
  }
  return `-- session ended: ${payload.reason} (bytes sent ${payload.bytesSent}, dropped frames ${payload.droppedFrames})`;
}

async function runShowCommand(args: ParsedArgs): Promise<string> {
  const sessionId = requirePositional(args, 'a session id');
  const config = await loadCommandConfig(args);
  const entries = await withTranscriptStore(config, (store) => store.readSession(sessionId));
  if (entries.length === 0) {
    throw new Error(`no transcript log for session ${sessionId}`);
  }
  return entries.map(formatTranscriptEntry).join('\n');
}

const OUTPUT_COMMANDS: Record<Exclude<Command, 'stream'>, (args: ParsedArgs) => Promise<string>> = {
  translate: runTranslateCommand,
  upload: runUploadCommand,
  status: runStatusCommand,
  share: runShareCommand,
  summary: runSummaryCommand,
  export: runExportCommand,
  sessions: runSessionsCommand,
  show: runShowCommand,
};

export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  if (args.help || !args.command) {
    console.log(USAGE);
    return args.help ? 0 : 1;
  }

  loadEnvironment();

  if (args.command !== 'stream') {
    console.log(await OUTPUT_COMMANDS[args.command](args));
    return 0;
  }

  const result = await runStreamCommand(args);
  logger.info({
    event: 'stream_summary',
    stopReason: result.stopReason,
    messages: result.messagesReceived,
    bytesSent: result.pump.bytesSent,
    droppedFrames: result.droppedFrames,
    closeStatus: result.closeResult?.status ?? null,
  });
  return 0;
}

if (process.env.NODE_ENV !== 'test') {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error({ event: 'cli_failed', message: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
}
