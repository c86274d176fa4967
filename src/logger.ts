import pino from 'pino';

const level = process.env.LOG_LEVEL ?? 'info';
const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

// stdout carries transcription messages only; diagnostics go to stderr.
export const logger = pino(
  {
    level,
    redact: ['credential', 'token', 'headers.Authorization'],
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            destination: 2,
          },
        }
      : undefined,
  },
  pretty ? undefined : pino.destination(2)
);

export type Logger = typeof logger;
