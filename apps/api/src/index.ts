import 'dotenv/config';
import { createOpenAIClient, OpenAINoteGenerator, OpenAITranscriber } from './adapters/openai.js';
import { ResendMailTransport } from './adapters/mail.js';
import { FfmpegTranscoder } from './adapters/transcoder.js';
import { ChatRouter } from './chat/router.js';
import { attachDispatcher, createBot, TelegramGateway, UpdateDispatcher } from './chat/telegram.js';
import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { openDatabase } from './db/connection.js';
import { migrate } from './db/migrate.js';
import { recoverInterruptedJobs } from './pipeline/jobs.js';
import { TaskQueue } from './queue/manager.js';
import { WorkerRunner } from './queue/runner.js';
import { ReviewService } from './review/service.js';
import { buildServer } from './server.js';
import { PendingInputStore } from './staging/pending-input.js';
import { ReportStore } from './staging/reports.js';
import { SqliteStagingStore } from './staging/sqlite-store.js';
import { scheduleCleanup } from './ttl/manager.js';
import { createPipelineWorkers } from './workers/index.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[Server] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();

const db = openDatabase(config.storage.dbPath);
migrate(db);

const staging = new SqliteStagingStore(db);
const reports = new ReportStore(staging, config.staging.reportTtlMs);
const pending = new PendingInputStore(staging, config.staging.pendingInputTtlMs);
const queue = new TaskQueue(db);

const bot = createBot(config.telegram.botToken);
const gateway = new TelegramGateway(bot.api, config.telegram.botToken);

const openai = createOpenAIClient(config.openai);
const mail = new ResendMailTransport(config.mail);

const review = new ReviewService({
  gateway,
  reports,
  pending,
  mail,
  recipients: config.mail.recipients,
  mailTimeoutMs: config.timeouts.mailMs,
});
const dispatcher = new UpdateDispatcher(new ChatRouter({ queue, review, gateway }), gateway);
attachDispatcher(bot, dispatcher);

const runner = new WorkerRunner(queue, config.worker);
const server = buildServer({ config, bot, queue, runner, staging });

// Initialize and start workers
async function initializeWorkers(): Promise<void> {
  console.log('[Server] Initializing workers...');

  await recoverInterruptedJobs(queue, gateway, config.storage.downloadsDir);

  const workers = createPipelineWorkers(
    { config, queue, gateway },
    {
      transcoder: new FfmpegTranscoder(config.audio),
      transcriber: new OpenAITranscriber(openai, config.openai.transcriptionModel),
      generator: new OpenAINoteGenerator(openai, config.openai.generationModel),
      reports,
    }
  );
  workers.forEach(worker => runner.register(worker));

  runner.start();
  console.log('[Server] Workers initialized and started');
}

async function registerWebhook(): Promise<void> {
  if (!config.telegram.publicUrl) {
    console.log('[Server] PUBLIC_URL not set, skipping webhook registration');
    return;
  }

  const url = new URL(config.telegram.webhookPath, config.telegram.publicUrl).toString();
  await bot.api.setWebhook(url, {
    ...(config.telegram.webhookSecret ? { secret_token: config.telegram.webhookSecret } : {}),
  });
  console.log(`[Server] Telegram webhook set to ${url}`);
}

let cleanupInterval: NodeJS.Timeout | null = null;

// Graceful shutdown
async function closeGracefully(signal: string): Promise<void> {
  server.log.info(`Received signal ${signal}, closing gracefully...`);

  if (cleanupInterval) {
    clearInterval(cleanupInterval);
  }

  // Stop taking updates before draining the workers
  await server.close();
  await dispatcher.drain();
  await runner.stop();
  db.close();

  server.log.info('Shutdown complete');
  process.exit(0);
}

function onSignal(signal: string): void {
  closeGracefully(signal).catch(err => {
    console.error('[Server] Shutdown failed:', err);
    process.exit(1);
  });
}

process.on('SIGINT', () => onSignal('SIGINT'));
process.on('SIGTERM', () => onSignal('SIGTERM'));

// Start server
try {
  await initializeWorkers();
  cleanupInterval = scheduleCleanup({ staging, queue }, config.cleanupIntervalMs);

  await server.listen({ port: config.server.port, host: config.server.host });
  server.log.info(`Server listening on http://${config.server.host}:${config.server.port}`);

  await registerWebhook();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
