export const SESSION_MODELS = ['speed', 'quality', 'quality_v2'] as const;

export type SessionModel = (typeof SESSION_MODELS)[number];

export const TRANSLATION_LANGUAGES = ['zh', 'en', 'ja', 'ko', 'fr', 'de'] as const;

export type TranslationLanguage = (typeof TRANSLATION_LANGUAGES)[number];

export const EXPORT_TYPES = ['transcript', 'overview', 'summary'] as const;

export type ExportType = (typeof EXPORT_TYPES)[number];

export const EXPORT_FORMATS = ['pdf', 'txt', 'docx'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const STORAGE_DRIVERS = ['jsonl', 'sqlite', 'none'] as const;

export type StorageDriverName = (typeof STORAGE_DRIVERS)[number];

export interface AudioFormat {
  sampleRate: number;
  channels: number;
  sampleWidthBytes: 1 | 2 | 4;
}

export interface AppConfig {
  audio: AudioFormat & {
    /** Duration of one capture block and of the flush deadline window. */
    chunkDurationMs: number;
  };
  queue: {
    maxFrames: number;
    dropLogEvery: number;
  };
  receiver: {
    idleRetryMs: number;
  };
  capture: {
    /** ffmpeg input format (`-f`); platform default when omitted. */
    inputFormat?: string;
    /** ffmpeg input device (`-i`); platform default when omitted. */
    inputDevice?: string;
  };
  api: {
    baseUrl: string;
    streamUrl: string;
    requestTimeoutMs: number;
    openTimeoutMs: number;
  };
  session: {
    model: SessionModel;
  };
  storage: {
    driver: StorageDriverName;
    path: string;
    retentionDays: number;
    maxRows: number;
  };
  signals: readonly NodeJS.Signals[];
}

export interface SessionCreateResult {
  sessionId: string;
  taskId: string;
  usageId: string;
  /** Maximum session length granted by the server, in seconds. */
  maxTime: number;
}

export interface SessionCloseResult {
  status: string;
  duration?: number;
  errorCode?: number;
  message?: string;
}

export interface TextTranslationResult {
  status: string;
  data: string;
}

/** One speaker-attributed segment of a transcript; times are in seconds. */
export interface Utterance {
  startTime: number;
  endTime: number;
  text: string;
  speaker: number;
}

export interface UploadOptions {
  model: SessionModel;
  /** Skip the summary step. */
  transcribeOnly: boolean;
  /** One-sentence mode: short clips are transcribed inline instead of queued as a task. */
  shortAsr: boolean;
}

export type UploadResult =
  | { kind: 'normal'; taskId: string }
  | { kind: 'one_sentence'; status: string; message: string; data: string };

export type TaskReference = { taskId: string } | { shareId: string };

export interface CallbackHistoryItem {
  timestamp: string;
  status: string;
  code: number;
}

export interface TranscribeStatus {
  status: string;
  taskId?: string;
  taskType?: string;
  usageId?: string;
  message?: string;
  overviewMd?: string;
  summaryMd?: string;
  details: Utterance[];
  keywords: string[];
  callbackHistory: CallbackHistoryItem[];
}

export interface ShareLink {
  shareUrl: string;
  expirationDays: number;
  expiredAt: string;
}

export interface UtteranceTranslationResult {
  status: string;
  targetLanguage: string;
  details: Utterance[];
}

export interface TranslatedUtterance extends Utterance {
  /** Translated text keyed by language code. */
  translations: Record<string, string>;
}

export interface TranscribeTranslationResult {
  taskId: string;
  taskType: string;
  status: string;
  targetLanguage: string;
  message?: string;
  details?: TranslatedUtterance[];
  overviewMd?: string;
  summaryMd?: string;
  keywords?: string[];
}

/**
 * One bidirectional realtime transcription stream.
 * Outbound audio goes through `sendBytes`; inbound result messages are pulled with `readNext`.
 */
export interface Session {
  readonly sessionId: string;
  start(): Promise<void>;
  sendBytes(bytes: Buffer): Promise<void>;
  /** Sends a text frame on the same stream. */
  sendText(message: string): Promise<void>;
  /** Resolves `null` when nothing arrived within `timeoutMs` or the stream has ended. */
  readNext(timeoutMs: number | null): Promise<string | null>;
  stop(): Promise<void>;
  /** true once the remote side closed the stream without a local `stop()`. */
  readonly closedByRemote: boolean;
}

export interface SessionFactory {
  createSession(model: SessionModel, credential: string): Promise<SessionCreateResult>;
  closeSession(taskId: string, credential: string, timeoutMs: number | null): Promise<SessionCloseResult>;
}

export type FrameCallback = (frame: Buffer) => void;

export type FrameStatusCallback = (status: string) => void;

export interface FrameSourceOptions extends AudioFormat {
  blockDurationMs: number;
}

export interface FrameSourceHandle {
  /** After this resolves no further frame callbacks are delivered. */
  close(): Promise<void>;
  /** Fires when the device stops on its own (not through `close`). */
  onExit(cb: (code: number | null) => void): void;
}

export interface FrameSource {
  open(onFrame: FrameCallback, onStatus: FrameStatusCallback): Promise<FrameSourceHandle>;
}

export interface OutputSink {
  write(message: string): void;
  close(): Promise<void>;
}

/** Read-only view of the run-wide flags shared with every pipeline task. */
export interface PipelineFlags {
  readonly signal: AbortSignal;
  readonly sessionClosed: boolean;
}

export type ShutdownState = 'running' | 'stopping' | 'stopped';

export interface TranscriptMessageRecord {
  kind: 'message';
  seq: number;
  text: string;
}

export interface TranscriptSessionEndRecord {
  kind: 'session_end';
  reason: string;
  droppedFrames: number;
  bytesSent: number;
}

export type TranscriptLogPayload = TranscriptMessageRecord | TranscriptSessionEndRecord;

export interface TranscriptLogEntry {
  sessionId: string;
  taskId: string;
  model: SessionModel;
  recordedAt: string;
  payload: TranscriptLogPayload;
}

export interface TranscriptSessionSummary {
  sessionId: string;
  taskId: string;
  model: SessionModel;
  startedAt: string;
  lastRecordedAt: string;
  entryCount: number;
}

export interface TranscriptLogStore {
  init(): Promise<void>;
  append(entry: TranscriptLogEntry): Promise<void>;
  readSession(sessionId: string): Promise<TranscriptLogEntry[]>;
  listSessions(limit?: number): Promise<TranscriptSessionSummary[]>;
  close(): Promise<void>;
}

export interface RetentionPolicy {
  retentionMs?: number;
  maxRows?: number;
  pruneIntervalMs?: number;
}

export interface PumpStats {
  chunksSent: number;
  bytesSent: number;
  sizeFlushes: number;
  timeFlushes: number;
  exitFlushBytes: number;
}

export interface StreamingRunResult {
  sessionId: string;
  taskId: string;
  stopReason: string;
  droppedFrames: number;
  framesCaptured: number;
  pump: PumpStats;
  messagesReceived: number;
  sessionClosed: boolean;
  closeResult: SessionCloseResult | null;
}
