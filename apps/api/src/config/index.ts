/**
 * API Configuration
 *
 * All configuration loaded from environment variables.
 * Uses sensible defaults for development.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname, isAbsolute, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { TitleMatching } from '@seedsync/sync';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
export const monorepoRoot = resolve(__dirname, '../../../..');

/**
 * Load .env from the monorepo root into process.env
 */
export function loadEnvFile(): void {
  dotenvConfig({ path: resolve(monorepoRoot, '.env') });
}

// Helper to resolve relative paths from monorepo root
function resolvePath(p: string): string {
  return isAbsolute(p) ? p : resolve(monorepoRoot, p);
}

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_HOST: z.string().default('127.0.0.1'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(8242),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('http://localhost:8242,http://127.0.0.1:8242'),

  // Local state
  DATA_DIR: z.string().default('./data'),
  CREDENTIALS_SECRET: optionalString,

  // Cloud store
  CLOUD_API_BASE_URL: z.string().url().default('https://v2.seedr.cc'),
  CLOUD_CLIENT_ID: optionalString,
  CLOUD_SCOPE: optionalString,

  // Library manager
  LIBRARY_HOST: z.string().url().default('http://localhost:8989'),
  LIBRARY_API_KEY: optionalString,

  // Watcher
  TORRENT_DIR: optionalString,
  DOWNLOAD_DIR: optionalString,
  ARCHIVE_DIR: optionalString,
  WATCH_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),

  // Sync
  RECONCILE_INTERVAL_MS: z.coerce.number().int().positive().default(15_000),
  TOKEN_CHECK_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  TOKEN_SAFETY_MARGIN_MS: z.coerce.number().int().nonnegative().default(60_000),
  FETCH_MAX_RETRIES: z.coerce.number().int().positive().default(5),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DEVICE_LOGIN_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  TITLE_MATCHING: z.enum(['exact', 'normalized']).default('exact'),
});

export type Environment = z.infer<typeof envSchema>;

export interface AppConfig {
  nodeEnv: Environment['NODE_ENV'];
  host: string;
  port: number;
  logLevel: Environment['LOG_LEVEL'];
  corsOrigins: string[];

  // Paths
  dataDir: string;
  credentialsPath: string;
  watcherSettingsPath: string;
  transfersPath: string;
  activityLogPath: string;
  credentialsSecret?: string;

  cloud: {
    baseUrl: string;
    clientId?: string;
    scope?: string;
  };

  library: {
    host: string;
    apiKey?: string;
  };

  watcher: {
    torrentDir?: string;
    downloadDir: string;
    archiveDir?: string;
    intervalMs: number;
  };

  reconcileIntervalMs: number;
  tokenCheckIntervalMs: number;
  tokenSafetyMarginMs: number;
  fetchMaxRetries: number;
  httpTimeoutMs: number;
  deviceLoginTimeoutMs: number;
  titleMatching: TitleMatching;
}

/**
 * Parse and validate the environment. Throws ZodError on invalid values.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);
  const dataDir = resolvePath(env.DATA_DIR);

  return {
    nodeEnv: env.NODE_ENV,
    host: env.API_HOST,
    port: env.API_PORT,
    logLevel: env.LOG_LEVEL,
    corsOrigins: env.CORS_ORIGINS.split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0),

    dataDir,
    credentialsPath: join(dataDir, 'credentials.json'),
    watcherSettingsPath: join(dataDir, 'watcher.json'),
    transfersPath: join(dataDir, 'transfers.json'),
    activityLogPath: join(dataDir, 'activity.log'),
    credentialsSecret: env.CREDENTIALS_SECRET,

    cloud: {
      baseUrl: env.CLOUD_API_BASE_URL,
      clientId: env.CLOUD_CLIENT_ID,
      scope: env.CLOUD_SCOPE,
    },

    library: {
      host: env.LIBRARY_HOST,
      apiKey: env.LIBRARY_API_KEY,
    },

    watcher: {
      torrentDir: env.TORRENT_DIR ? resolvePath(env.TORRENT_DIR) : undefined,
      downloadDir: env.DOWNLOAD_DIR ? resolvePath(env.DOWNLOAD_DIR) : join(dataDir, 'downloads'),
      archiveDir: env.ARCHIVE_DIR ? resolvePath(env.ARCHIVE_DIR) : undefined,
      intervalMs: env.WATCH_INTERVAL_MS,
    },

    reconcileIntervalMs: env.RECONCILE_INTERVAL_MS,
    tokenCheckIntervalMs: env.TOKEN_CHECK_INTERVAL_MS,
    tokenSafetyMarginMs: env.TOKEN_SAFETY_MARGIN_MS,
    fetchMaxRetries: env.FETCH_MAX_RETRIES,
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
    deviceLoginTimeoutMs: env.DEVICE_LOGIN_TIMEOUT_MS,
    titleMatching: env.TITLE_MATCHING,
  };
}
