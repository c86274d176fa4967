import { afterEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { tmpdir } from 'node:os';
import { loadEnvironment, requireCredential } from './env.js';

describe('environment', () => {
  const saved = process.env.TRANSCRIBE_TOKEN;
  let tempDir: string | null = null;

  afterEach(async () => {
    if (saved === undefined) delete process.env.TRANSCRIBE_TOKEN;
    else process.env.TRANSCRIBE_TOKEN = saved;
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it('loads the credential from an env file', async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'transcribe-env-'));
    const envPath = path.join(tempDir, '.env');
    await writeFile(envPath, 'TRANSCRIBE_TOKEN=Bearer test-secret\n', 'utf-8');

    loadEnvironment(envPath);
    expect(requireCredential()).toBe('Bearer test-secret');
  });

  it('ignores a missing env file', () => {
    expect(() => loadEnvironment(path.join(tmpdir(), 'transcribe-env-missing', '.env'))).not.toThrow();
  });

  it('requires a non-blank credential', () => {
    process.env.TRANSCRIBE_TOKEN = '   ';
    expect(() => requireCredential()).toThrow('Transcription credential is required');
  });
});
