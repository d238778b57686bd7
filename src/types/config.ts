/**
 * Tracker Relay — Configuration Types
 *
 * Environment schema and the immutable configuration value built from it.
 * The configuration is constructed once at startup and passed to every
 * component; nothing reads process.env after that.
 */

import { z } from 'zod';

// ============================================================
// ENVIRONMENT SCHEMA
// ============================================================

const BooleanFromEnvSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['text', 'json']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const EnvSchema = z.object({
  GITHUB_TOKEN: z.string().min(1).optional(),
  REPO_OWNER: z.string().min(1).optional(),
  REPO_NAME: z.string().min(1).optional(),
  GITHUB_BRANCH: z.string().min(1).optional(),
  GITHUB_API_URL: z.string().url().default('https://api.github.com'),

  TRACKERS_FILE_PATH: z.string().min(1).default('trackers.txt'),
  BEST_TRACKERS_FILE_PATH: z.string().min(1).default('trackers_best.txt'),
  README_FILE_PATH: z.string().min(1).default('README.md'),

  TRACKER_SOURCES: z.string().optional(),
  INCLUDE_PUBLISHED_SOURCES: BooleanFromEnvSchema.default('true'),

  POOL_WIDTH: z.coerce.number().int().min(1).max(64).default(4),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(2_000),
  PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  BEST_TRACKERS_COUNT: z.coerce.number().int().min(1).default(4),
  MIN_TRACKERS: z.coerce.number().int().min(0).default(50),
  MAX_RATE_LIMIT_WAITS: z.coerce.number().int().min(0).default(5),

  LOG_LEVEL: LogLevelSchema.default('info'),
  LOG_FORMAT: LogFormatSchema.default('text'),
});
export type EnvInput = z.input<typeof EnvSchema>;
export type ParsedEnv = z.infer<typeof EnvSchema>;

// ============================================================
// APPLICATION CONFIG
// ============================================================

export interface GitHubTarget {
  token?: string;
  owner?: string;
  repo?: string;
  branch?: string;
  baseUrl: string;
}

export interface ArtifactPaths {
  /** Primary list; the only path that may be created from nothing */
  trackers: string;
  bestTrackers: string;
  readme: string;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export interface AppConfig {
  github: GitHubTarget;
  artifacts: ArtifactPaths;
  sources: readonly string[];
  poolWidth: number;
  requestTimeoutMs: number;
  retry: RetryPolicy;
  probeTimeoutMs: number;
  bestTrackersCount: number;
  minTrackers: number;
  maxRateLimitWaits: number;
  log: {
    level: LogLevel;
    format: LogFormat;
  };
}
