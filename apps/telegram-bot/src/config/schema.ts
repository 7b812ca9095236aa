/**
 * Environment schema and the typed configuration built from it
 */

import { isAbsolute, resolve } from 'node:path';
import { z } from 'zod';

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // Telegram
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_ALLOWED_GROUPS: z.string().optional(), // Comma-separated list of group IDs
  TELEGRAM_ALLOW_PRIVATE: z.string().transform(v => v === 'true').default('true'),

  // External services
  YOUTUBE_API_KEY: z.string().default(''),
  GOFILE_TOKEN: z.string().optional(),

  // Storage (relative to monorepo root)
  STORAGE_WORKING: z.string().default('./storage/working'),

  // Binary paths
  SPOTDL_PATH: z.string().default('spotdl'),
  YTDLP_PATH: z.string().default('yt-dlp'),
  FFMPEG_PATH: z.string().optional(),

  // Pipeline tuning
  DIRECT_SEND_LIMIT_MB: z.coerce.number().positive().default(50),
  PRIMARY_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(120),
  PROGRESS_PUBLISH_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
  PROGRESS_RECOUNT_INTERVAL_MS: z.coerce.number().int().positive().default(15_000),
  CLEANUP_GRACE_MS: z.coerce.number().int().nonnegative().default(2_000),
  CONVERSATION_TTL_MS: z.coerce.number().int().positive().default(10 * 60_000),
});

export type Env = z.infer<typeof envSchema>;

function resolvePath(rootDir: string, p: string): string {
  return isAbsolute(p) ? p : resolve(rootDir, p);
}

export function buildConfig(env: Env, rootDir: string) {
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,

    botToken: env.TELEGRAM_BOT_TOKEN,
    allowedGroups: env.TELEGRAM_ALLOWED_GROUPS?.split(',').map(id => id.trim()).filter(Boolean) ?? [],
    allowPrivate: env.TELEGRAM_ALLOW_PRIVATE,

    youtubeApiKey: env.YOUTUBE_API_KEY,
    gofileToken: env.GOFILE_TOKEN,

    storage: {
      working: resolvePath(rootDir, env.STORAGE_WORKING),
    },

    binaries: {
      spotdl: env.SPOTDL_PATH,
      ytdlp: env.YTDLP_PATH,
      ffmpeg: env.FFMPEG_PATH,
    },

    pipeline: {
      directSendLimitBytes: Math.floor(env.DIRECT_SEND_LIMIT_MB * 1024 * 1024),
      primaryTimeoutSeconds: env.PRIMARY_TIMEOUT_SECONDS,
      publishIntervalMs: env.PROGRESS_PUBLISH_INTERVAL_MS,
      recountIntervalMs: env.PROGRESS_RECOUNT_INTERVAL_MS,
      cleanupGraceMs: env.CLEANUP_GRACE_MS,
      conversationTtlMs: env.CONVERSATION_TTL_MS,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof buildConfig>;
