import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database as DatabaseType } from 'better-sqlite3';
import type { AppConfig } from '../../src/config.js';
import { MAX_MESSAGE_LENGTH } from '../../src/chat/types.js';
import { GENERIC_FAILURE_MESSAGE } from '../../src/errors.js';
import { startJob } from '../../src/pipeline/jobs.js';
import { TaskQueue } from '../../src/queue/manager.js';
import { WorkerRunner } from '../../src/queue/runner.js';
import { reviewControls } from '../../src/review/callbacks.js';
import { ReportStore } from '../../src/staging/reports.js';
import { SqliteStagingStore } from '../../src/staging/sqlite-store.js';
import { createPipelineWorkers, readyMessage } from '../../src/workers/index.js';
import { closeTestDb, createTestDb } from '../utils/database.js';
import { FakeGateway, FakeGenerator, FakeTranscoder, FakeTranscriber } from '../mocks/fakes.js';
import {
  createTempDir,
  createTestConfig,
  listFiles,
  removeTempDir,
  SAMPLE_NOTE,
  SAMPLE_TRANSCRIPT,
} from '../mocks/generators.js';

const CHAT = '42';

class BrokenReportStore extends ReportStore {
  stage(): never {
    throw new Error('database is locked');
  }
}
const NOW = new Date(2026, 9, 19, 14, 0).getTime();

describe('audio pipeline', () => {
  let dir: string;
  let db: DatabaseType;
  let queue: TaskQueue;
  let staging: SqliteStagingStore;
  let reports: ReportStore;
  let gateway: FakeGateway;
  let transcoder: FakeTranscoder;
  let transcriber: FakeTranscriber;
  let generator: FakeGenerator;

  function runnerFor(config: AppConfig): WorkerRunner {
    const runner = new WorkerRunner(queue, config.worker);
    createPipelineWorkers(
      { config, queue, gateway },
      { transcoder, transcriber, generator, reports }
    ).forEach(worker => runner.register(worker));
    return runner;
  }

  async function runJob(overrides: Record<string, string> = {}): Promise<{ jobId: string; downloadsDir: string }> {
    const config = createTestConfig(dir, overrides);
    const task = startJob(queue, { chatId: CHAT, remoteRef: 'file-1' });
    await runnerFor(config).runUntilIdle();
    return { jobId: task.jobId, downloadsDir: config.storage.downloadsDir };
  }

  function stagesOf(jobId: string): [string, string][] {
    return queue.getTasksByJob(jobId).map((t): [string, string] => [t.stage, t.status]);
  }

  beforeEach(() => {
    dir = createTempDir();
    db = createTestDb();
    queue = new TaskQueue(db);
    staging = new SqliteStagingStore(db, () => NOW);
    reports = new ReportStore(staging, 60 * 60 * 1000, () => NOW);
    gateway = new FakeGateway();
    gateway.files.set('file-1', { data: Buffer.from('fake ogg bytes'), extension: 'ogg' });
    transcoder = new FakeTranscoder();
    transcriber = new FakeTranscriber();
    transcriber.text = SAMPLE_TRANSCRIPT;
    generator = new FakeGenerator();
    generator.note = SAMPLE_NOTE;
  });

  afterEach(() => {
    closeTestDb();
    removeTempDir(dir);
  });

  describe('a valid clip', () => {
    it('should deliver the note and exactly one ready message with the review controls', async () => {
      const { jobId } = await runJob();

      const ready = gateway.withControls();
      expect(ready).toHaveLength(1);

      const reportId = ready[0].controls?.[0].token.split(':')[1] ?? '';
      expect(gateway.sent).toEqual([
        { chatId: CHAT, text: SAMPLE_NOTE },
        { chatId: CHAT, text: readyMessage('Session Report 2026-10-19'), controls: reviewControls(reportId) },
      ]);
      expect(reports.load(reportId)).toEqual({
        reportId,
        subject: 'Session Report 2026-10-19',
        body: SAMPLE_NOTE,
      });
      expect(stagesOf(jobId)).toEqual([
        ['fetch', 'completed'],
        ['transcode', 'completed'],
        ['transcribe', 'completed'],
        ['generate', 'completed'],
        ['deliver', 'completed'],
      ]);
    });

    it('should pass each stage the output of the previous one', async () => {
      const { jobId, downloadsDir } = await runJob({ TRANSCRIPTION_LANGUAGE: 'de' });

      expect(transcoder.calls).toEqual([path.join(downloadsDir, `${jobId}.ogg`)]);
      expect(transcriber.calls).toEqual([
        { audioPath: path.join(downloadsDir, `${jobId}.normalized.mp3`), languageHint: 'de' },
      ]);
      expect(generator.calls).toEqual([SAMPLE_TRANSCRIPT]);
    });

    it('should leave no temporary files behind', async () => {
      const { downloadsDir } = await runJob();

      expect(listFiles(downloadsDir)).toEqual([]);
    });

    it('should split a long note into 4095-character messages before the ready message', async () => {
      generator.note = `Subjective:\n${'a'.repeat(9000)}`;

      await runJob();

      const texts = gateway.texts(CHAT);
      expect(texts).toHaveLength(4);
      expect(texts.slice(0, 3).map(t => t.length)).toEqual([MAX_MESSAGE_LENGTH, MAX_MESSAGE_LENGTH, 822]);
      expect(texts.slice(0, 3).join('')).toBe(generator.note);
      expect(texts[3]).toBe(readyMessage('Session Report 2026-10-19'));
    });
  });

  describe('failures', () => {
    it('should stop at transcode when the input has no audio stream', async () => {
      transcoder.result = 'no_audio_stream';

      const { jobId, downloadsDir } = await runJob();

      expect(gateway.texts(CHAT)).toEqual(['Failed to compress audio.']);
      expect(transcriber.calls).toEqual([]);
      expect(generator.calls).toEqual([]);
      expect(stagesOf(jobId)).toEqual([
        ['fetch', 'completed'],
        ['transcode', 'failed'],
      ]);
      expect(listFiles(downloadsDir)).toEqual([]);
    });

    it('should remove a partial output when transcoding fails', async () => {
      transcoder.result = 'failed';

      const { downloadsDir } = await runJob();

      expect(gateway.texts(CHAT)).toEqual(['Failed to compress audio.']);
      expect(listFiles(downloadsDir)).toEqual([]);
    });

    it('should report a download failure', async () => {
      gateway.fetchError = new Error('HTTP 404');

      const { jobId } = await runJob();

      expect(gateway.texts(CHAT)).toEqual(['Failed to download audio.']);
      expect(stagesOf(jobId)).toEqual([['fetch', 'failed']]);
      expect(transcoder.calls).toEqual([]);
    });

    it('should report an empty transcription', async () => {
      transcriber.text = '   ';

      const { downloadsDir } = await runJob();

      expect(gateway.texts(CHAT)).toEqual(['Failed to transcribe audio.']);
      expect(generator.calls).toEqual([]);
      expect(listFiles(downloadsDir)).toEqual([]);
    });

    it('should report a transcription service error', async () => {
      transcriber.error = new Error('429 Too Many Requests');

      await runJob();

      expect(gateway.texts(CHAT)).toEqual(['Failed to transcribe audio.']);
    });

    it('should report an empty generated note and stage nothing', async () => {
      generator.note = '';

      const { downloadsDir } = await runJob();

      expect(gateway.texts(CHAT)).toEqual(['Failed to generate report.']);
      expect(staging.purgeExpired()).toBe(0);
      expect(db.prepare('SELECT COUNT(*) AS n FROM staging_entries').get()).toEqual({ n: 0 });
      expect(listFiles(downloadsDir)).toEqual([]);
    });

    it('should treat a stage that outlives its timeout as failed', async () => {
      transcoder.hang = true;

      const { jobId, downloadsDir } = await runJob({ TRANSCODE_TIMEOUT_MS: '50' });

      expect(gateway.texts(CHAT)).toEqual(['Failed to compress audio.']);
      expect(queue.getTasksByJob(jobId)[1].errorMessage).toBe('transcode_failure: Timed out after 50ms');
      expect(listFiles(downloadsDir)).toEqual([]);
    });

    it('should withdraw the staged report when the ready message cannot be sent', async () => {
      gateway.failSendsMatching = /^Report ready/;

      const { jobId } = await runJob();

      expect(gateway.texts(CHAT)).toEqual([SAMPLE_NOTE, 'Failed to deliver report.']);
      expect(db.prepare('SELECT COUNT(*) AS n FROM staging_entries').get()).toEqual({ n: 0 });
      expect(stagesOf(jobId).at(-1)).toEqual(['deliver', 'failed']);
    });

    it('should report a generation service error', async () => {
      generator.error = new Error('503 Service Unavailable');

      const { jobId, downloadsDir } = await runJob();

      expect(gateway.texts(CHAT)).toEqual(['Failed to generate report.']);
      expect(queue.getTasksByJob(jobId)[3].errorMessage).toBe('generation_failure: 503 Service Unavailable');
      expect(listFiles(downloadsDir)).toEqual([]);
    });

    it('should apologize for an unexpected error while staging and remove the files', async () => {
      reports = new BrokenReportStore(staging, 60 * 60 * 1000, () => NOW);

      const { jobId, downloadsDir } = await runJob();

      expect(gateway.texts(CHAT)).toEqual([SAMPLE_NOTE, GENERIC_FAILURE_MESSAGE]);
      expect(gateway.withControls()).toEqual([]);
      expect(queue.getTasksByJob(jobId)[4].errorMessage).toBe('unexpected: database is locked');
      expect(listFiles(downloadsDir)).toEqual([]);
    });

    it('should apologize when the download cannot be stored', async () => {
      fs.writeFileSync(path.join(dir, 'downloads'), '');

      const { jobId } = await runJob();

      expect(gateway.texts(CHAT)).toEqual([GENERIC_FAILURE_MESSAGE]);
      expect(stagesOf(jobId)).toEqual([['fetch', 'failed']]);
      expect(transcoder.calls).toEqual([]);
      expect(listFiles(dir)).toEqual(['downloads']);
    });

    it('should stop delivering and stage nothing when a chunk cannot be sent', async () => {
      generator.note = `Subjective:\n${'a'.repeat(9000)}`;
      gateway.failSendsMatching = new RegExp(`^a{${MAX_MESSAGE_LENGTH}}$`);

      const { downloadsDir } = await runJob();

      expect(gateway.texts(CHAT)).toEqual([generator.note.slice(0, MAX_MESSAGE_LENGTH), 'Failed to deliver report.']);
      expect(db.prepare('SELECT COUNT(*) AS n FROM staging_entries').get()).toEqual({ n: 0 });
      expect(listFiles(downloadsDir)).toEqual([]);
    });
  });
});
