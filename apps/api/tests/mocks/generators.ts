import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig, type AppConfig } from '../../src/config.js';
import type { JobContext } from '../../src/queue/types.js';

let idCounter = 0;

export function resetMockIdCounter(): void {
  idCounter = 0;
}

export function generateId(prefix = 'test'): string {
  return `${prefix}-${++idCounter}`;
}

export const TEST_ENV: Record<string, string> = {
  TELEGRAM_BOT_TOKEN: 'test-bot-token',
  OPENAI_API_KEY: 'test-openai-key',
  RESEND_API_KEY: 'test-resend-key',
  MAIL_FROM: 'scribe@example.test',
  MAIL_RECIPIENTS: 'first@example.test,second@example.test',
};

/**
 * Configuration rooted in `dataDir`, with short timeouts unless overridden.
 */
export function createTestConfig(dataDir: string, overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    ...TEST_ENV,
    DATA_DIR: dataDir,
    DB_PATH: ':memory:',
    FETCH_TIMEOUT_MS: '2000',
    TRANSCODE_TIMEOUT_MS: '2000',
    TRANSCRIBE_TIMEOUT_MS: '2000',
    GENERATE_TIMEOUT_MS: '2000',
    MAIL_TIMEOUT_MS: '2000',
    ...overrides,
  });
}

export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'session-scribe-'));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function listFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs.readdirSync(dir).sort();
}

export function createJobContext(overrides: Partial<JobContext> = {}): JobContext {
  return {
    jobId: generateId('job'),
    chatId: '1001',
    remoteRef: generateId('file'),
    ...overrides,
  };
}

export const SAMPLE_TRANSCRIPT =
  'Client says the week was difficult and sleep has been poor. We talked about the new job and agreed on a wind-down routine.';

export const SAMPLE_NOTE = [
  'Subjective:',
  '[CLIENT] reports a difficult week with poor sleep.',
  'Objective:',
  '[CLIENT] appeared tired but engaged.',
  'Assessment:',
  'Stress related to a job change is affecting sleep.',
  'Plan:',
  'Practice a wind-down routine before bed; review next session.',
].join('\n');
