// Application configuration - parsed once from the environment at startup

import path from 'path';
import { z } from 'zod';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  DATA_DIR: z.string().default('./data'),
  DB_PATH: z.string().optional(),

  TELEGRAM_BOT_TOKEN: z.string().min(1, 'TELEGRAM_BOT_TOKEN is required'),
  TELEGRAM_WEBHOOK_PATH: z.string().startsWith('/').default('/telegram/webhook'),
  TELEGRAM_WEBHOOK_SECRET: z.string().min(1).optional(),
  PUBLIC_URL: z.string().url().optional(),

  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_BASE_URL: z.string().url().optional(),
  TRANSCRIPTION_MODEL: z.string().default('whisper-1'),
  TRANSCRIPTION_LANGUAGE: z.string().min(2).default('en'),
  GENERATION_MODEL: z.string().default('gpt-4o-mini'),

  RESEND_API_KEY: z.string().min(1, 'RESEND_API_KEY is required'),
  RESEND_API_URL: z.string().url().default('https://api.resend.com/emails'),
  MAIL_FROM: z.string().min(1, 'MAIL_FROM is required'),
  MAIL_RECIPIENTS: z
    .string()
    .min(1, 'MAIL_RECIPIENTS is required')
    .transform(value => value.split(',').map(r => r.trim()).filter(r => r.length > 0))
    .pipe(z.array(z.string().email()).min(1, 'MAIL_RECIPIENTS must list at least one address')),

  REPORT_TTL_SECONDS: intFromEnv(3 * 60 * 60),
  PENDING_INPUT_TTL_SECONDS: intFromEnv(15 * 60),

  FFMPEG_PATH: z.string().default('ffmpeg'),
  FFPROBE_PATH: z.string().default('ffprobe'),
  AUDIO_BITRATE: z.string().regex(/^\d+k$/, 'AUDIO_BITRATE must look like 32k').default('32k'),
  AUDIO_SAMPLE_RATE: intFromEnv(16000),

  FETCH_TIMEOUT_MS: intFromEnv(60_000),
  TRANSCODE_TIMEOUT_MS: intFromEnv(120_000),
  TRANSCRIBE_TIMEOUT_MS: intFromEnv(300_000),
  GENERATE_TIMEOUT_MS: intFromEnv(120_000),
  MAIL_TIMEOUT_MS: intFromEnv(30_000),

  WORKER_POLL_INTERVAL_MS: intFromEnv(3000),
  WORKER_MAX_CONCURRENT: intFromEnv(2),
  WORKER_SHUTDOWN_TIMEOUT_MS: intFromEnv(30_000),
  CLEANUP_INTERVAL_MINUTES: intFromEnv(30),
});

export interface AppConfig {
  readonly server: {
    readonly port: number;
    readonly host: string;
    readonly logLevel: string;
  };
  readonly storage: {
    readonly dataDir: string;
    readonly dbPath: string;
    readonly downloadsDir: string;
  };
  readonly telegram: {
    readonly botToken: string;
    readonly webhookPath: string;
    readonly webhookSecret: string | null;
    readonly publicUrl: string | null;
  };
  readonly openai: {
    readonly apiKey: string;
    readonly baseUrl: string | null;
    readonly transcriptionModel: string;
    readonly transcriptionLanguage: string;
    readonly generationModel: string;
  };
  readonly mail: {
    readonly apiKey: string;
    readonly apiUrl: string;
    readonly from: string;
    readonly recipients: readonly string[];
  };
  readonly staging: {
    readonly reportTtlMs: number;
    readonly pendingInputTtlMs: number;
  };
  readonly audio: {
    readonly ffmpegPath: string;
    readonly ffprobePath: string;
    readonly bitrate: string;
    readonly sampleRate: number;
  };
  readonly timeouts: {
    readonly fetchMs: number;
    readonly transcodeMs: number;
    readonly transcribeMs: number;
    readonly generateMs: number;
    readonly mailMs: number;
  };
  readonly worker: {
    readonly pollIntervalMs: number;
    readonly maxConcurrent: number;
    readonly shutdownTimeoutMs: number;
  };
  readonly cleanupIntervalMs: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Build the immutable configuration from an environment map.
 * Throws ConfigError listing every invalid or missing variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const e = parsed.data;

  return deepFreeze({
    server: {
      port: e.PORT,
      host: e.HOST,
      logLevel: e.LOG_LEVEL,
    },
    storage: {
      dataDir: e.DATA_DIR,
      dbPath: e.DB_PATH ?? path.join(e.DATA_DIR, 'session-scribe.db'),
      downloadsDir: path.join(e.DATA_DIR, 'downloads'),
    },
    telegram: {
      botToken: e.TELEGRAM_BOT_TOKEN,
      webhookPath: e.TELEGRAM_WEBHOOK_PATH,
      webhookSecret: e.TELEGRAM_WEBHOOK_SECRET ?? null,
      publicUrl: e.PUBLIC_URL ?? null,
    },
    openai: {
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL ?? null,
      transcriptionModel: e.TRANSCRIPTION_MODEL,
      transcriptionLanguage: e.TRANSCRIPTION_LANGUAGE,
      generationModel: e.GENERATION_MODEL,
    },
    mail: {
      apiKey: e.RESEND_API_KEY,
      apiUrl: e.RESEND_API_URL,
      from: e.MAIL_FROM,
      recipients: e.MAIL_RECIPIENTS,
    },
    staging: {
      reportTtlMs: e.REPORT_TTL_SECONDS * 1000,
      pendingInputTtlMs: e.PENDING_INPUT_TTL_SECONDS * 1000,
    },
    audio: {
      ffmpegPath: e.FFMPEG_PATH,
      ffprobePath: e.FFPROBE_PATH,
      bitrate: e.AUDIO_BITRATE,
      sampleRate: e.AUDIO_SAMPLE_RATE,
    },
    timeouts: {
      fetchMs: e.FETCH_TIMEOUT_MS,
      transcodeMs: e.TRANSCODE_TIMEOUT_MS,
      transcribeMs: e.TRANSCRIBE_TIMEOUT_MS,
      generateMs: e.GENERATE_TIMEOUT_MS,
      mailMs: e.MAIL_TIMEOUT_MS,
    },
    worker: {
      pollIntervalMs: e.WORKER_POLL_INTERVAL_MS,
      maxConcurrent: e.WORKER_MAX_CONCURRENT,
      shutdownTimeoutMs: e.WORKER_SHUTDOWN_TIMEOUT_MS,
    },
    cleanupIntervalMs: e.CLEANUP_INTERVAL_MINUTES * 60 * 1000,
  });
}
