/**
 * Tracker Relay — Configuration Loader
 *
 * Validates the environment once and freezes the result.
 * Scripts call `import 'dotenv/config'` before this runs.
 */

import { EnvSchema } from '../types';
import type { AppConfig, ParsedEnv } from '../types';
import { DEFAULT_SOURCES, parseSourceList, publishedSources, uniqueSources } from '../feeds/sources';
import { ConfigError } from './errors';

type Env = Record<string, string | undefined>;

/**
 * Blank variables (`FOO=` in .env) count as unset.
 */
function withoutBlanks(env: Env): Env {
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

function resolveSources(env: ParsedEnv): string[] {
  const base = env.TRACKER_SOURCES ? parseSourceList(env.TRACKER_SOURCES) : [...DEFAULT_SOURCES];

  if (env.INCLUDE_PUBLISHED_SOURCES && env.REPO_OWNER && env.REPO_NAME) {
    base.push(
      ...publishedSources(
        env.REPO_OWNER,
        env.REPO_NAME,
        { trackers: env.TRACKERS_FILE_PATH, bestTrackers: env.BEST_TRACKERS_FILE_PATH },
        env.GITHUB_BRANCH
      )
    );
  }

  return uniqueSources(base);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Build the application configuration from environment variables.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }

  const e = parsed.data;

  const sources = resolveSources(e);
  if (sources.length === 0) {
    throw new ConfigError('Invalid configuration', ['TRACKER_SOURCES: no source URLs given']);
  }

  return deepFreeze({
    github: {
      token: e.GITHUB_TOKEN,
      owner: e.REPO_OWNER,
      repo: e.REPO_NAME,
      branch: e.GITHUB_BRANCH,
      baseUrl: e.GITHUB_API_URL,
    },
    artifacts: {
      trackers: e.TRACKERS_FILE_PATH,
      bestTrackers: e.BEST_TRACKERS_FILE_PATH,
      readme: e.README_FILE_PATH,
    },
    sources,
    poolWidth: e.POOL_WIDTH,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    retry: {
      maxAttempts: e.RETRY_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
    },
    probeTimeoutMs: e.PROBE_TIMEOUT_MS,
    bestTrackersCount: e.BEST_TRACKERS_COUNT,
    minTrackers: e.MIN_TRACKERS,
    maxRateLimitWaits: e.MAX_RATE_LIMIT_WAITS,
    log: {
      level: e.LOG_LEVEL,
      format: e.LOG_FORMAT,
    },
  });
}

export interface PublishTarget {
  token: string;
  owner: string;
  repo: string;
  branch?: string;
  baseUrl: string;
}

/**
 * The GitHub target, or ConfigError when a publishing run lacks credentials.
 */
export function requirePublishTarget(config: AppConfig): PublishTarget {
  const { token, owner, repo, branch, baseUrl } = config.github;
  const missing = [
    token ? null : 'GITHUB_TOKEN',
    owner ? null : 'REPO_OWNER',
    repo ? null : 'REPO_NAME',
  ].filter((name): name is string => name !== null);

  if (!token || !owner || !repo) {
    throw new ConfigError(
      'Publishing requires GitHub credentials',
      missing.map(name => `${name}: required`)
    );
  }

  return { token, owner, repo, branch, baseUrl };
}
