import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database as DatabaseType } from 'better-sqlite3';
import { GENERIC_FAILURE_MESSAGE } from '../../src/errors.js';
import { cleanupJobFiles, rawFilePath } from '../../src/pipeline/files.js';
import { recoverInterruptedJobs, startJob } from '../../src/pipeline/jobs.js';
import { TaskQueue } from '../../src/queue/manager.js';
import { closeTestDb, createTestDb } from '../utils/database.js';
import { FakeGateway } from '../mocks/fakes.js';
import { createJobContext, createTempDir, listFiles, removeTempDir } from '../mocks/generators.js';

describe('jobs', () => {
  let dir: string;
  let db: DatabaseType;
  let queue: TaskQueue;
  let gateway: FakeGateway;

  beforeEach(() => {
    dir = createTempDir();
    db = createTestDb();
    queue = new TaskQueue(db);
    gateway = new FakeGateway();
  });

  afterEach(() => {
    closeTestDb();
    removeTempDir(dir);
  });

  describe('startJob', () => {
    it('should queue the fetch stage of a new job', () => {
      const task = startJob(queue, { chatId: '42', remoteRef: 'file-1' });

      expect(task.stage).toBe('fetch');
      expect(task.payload).toEqual({ jobId: task.jobId, chatId: '42', remoteRef: 'file-1' });
    });

    it('should give every upload its own job', () => {
      const first = startJob(queue, { chatId: '42', remoteRef: 'file-1' });
      const second = startJob(queue, { chatId: '42', remoteRef: 'file-1' });

      expect(first.jobId).not.toBe(second.jobId);
    });
  });

  describe('recoverInterruptedJobs', () => {
    it('should notify each interrupted job once and clear its files and tasks', async () => {
      const a = createJobContext({ chatId: '1' });
      const b = createJobContext({ chatId: '2' });
      queue.enqueue('transcribe', a);
      queue.claim();
      queue.enqueue('generate', a);
      queue.enqueue('fetch', b);
      fs.mkdirSync(dir, { recursive: true });
      fs.writeFileSync(rawFilePath(dir, a.jobId, 'ogg'), 'left over');
      fs.writeFileSync(path.join(dir, `${a.jobId}.normalized.mp3`), 'left over');

      expect(await recoverInterruptedJobs(queue, gateway, dir)).toBe(2);

      expect(gateway.sent).toEqual([
        { chatId: '1', text: GENERIC_FAILURE_MESSAGE },
        { chatId: '2', text: GENERIC_FAILURE_MESSAGE },
      ]);
      expect(listFiles(dir)).toEqual([]);
      expect(queue.getStats().pending).toBe(0);
    });

    it('should do nothing when nothing was interrupted', async () => {
      expect(await recoverInterruptedJobs(queue, gateway, path.join(dir, 'missing'))).toBe(0);
      expect(gateway.sent).toEqual([]);
    });

    it('should carry on when a chat cannot be notified', async () => {
      queue.enqueue('fetch', createJobContext({ chatId: '1' }));
      gateway.failSendsMatching = /.*/;

      expect(await recoverInterruptedJobs(queue, gateway, dir)).toBe(1);
    });
  });

  describe('cleanupJobFiles', () => {
    it('should delete the files a job recorded and skip the missing ones', async () => {
      const context = createJobContext({
        rawPath: path.join(dir, 'raw.ogg'),
        normalizedPath: path.join(dir, 'never-written.mp3'),
      });
      fs.writeFileSync(path.join(dir, 'raw.ogg'), 'audio');

      expect(await cleanupJobFiles(context)).toEqual({ deleted: [path.join(dir, 'raw.ogg')], errors: [] });
      expect(listFiles(dir)).toEqual([]);
    });
  });

  describe('rawFilePath', () => {
    it('should fall back to a neutral extension for unsafe ones', () => {
      expect(rawFilePath('/data', 'job-1', '../../x')).toBe(path.join('/data', 'job-1.bin'));
      expect(rawFilePath('/data', 'job-1', null)).toBe(path.join('/data', 'job-1.bin'));
      expect(rawFilePath('/data', 'job-1', 'm4a')).toBe(path.join('/data', 'job-1.m4a'));
    });
  });
});
