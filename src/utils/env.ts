import path from 'node:path';
import dotenv from 'dotenv';

const DEFAULT_ENV_PATH = path.resolve('.env');

export function loadEnvironment(envPath = DEFAULT_ENV_PATH) {
  const result = dotenv.config({ path: path.resolve(envPath), override: true });
  if (result.error && (result.error as NodeJS.ErrnoException).code !== 'ENOENT') {
    throw result.error;
  }
}

export function requireCredential(): string {
  const token = process.env.TRANSCRIBE_TOKEN?.trim();
  if (!token) {
    throw new Error('Transcription credential is required. Set TRANSCRIBE_TOKEN in .env');
  }
  return token;
}
