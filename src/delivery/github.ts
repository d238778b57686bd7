/**
 * Tracker Relay — GitHub Content Store
 *
 * Reads and writes repository files through the REST "contents" API:
 *   GET /repos/{owner}/{repo}/contents/{path}
 *   PUT /repos/{owner}/{repo}/contents/{path}  { message, content, sha? }
 *
 * Octokit's retry and throttling plugins are switched off: backoff and
 * rate-limit waits belong to the publish client, which needs to see every
 * status and rate-limit header itself.
 */

import { Octokit, RequestError } from 'octokit';
import type { RemoteArtifact } from '../types';
import type {
  ContentStore,
  ReadFileResponse,
  WriteFileRequest,
  WriteFileResponse,
} from './content-store';
import { parseRateLimit } from './content-store';

// ============================================================
// TYPES
// ============================================================

export interface GitHubContentStoreOptions {
  token: string;
  owner: string;
  repo: string;
  /** Branch to read and commit to; the repository default when omitted */
  branch?: string;
  baseUrl?: string;
  /** Per-request timeout in ms (default: 10000) */
  timeoutMs?: number;
  /** Replaces the global fetch, e.g. in tests */
  fetchImpl?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 10_000;

export const USER_AGENT = 'tracker-relay/1.0';

// ============================================================
// GITHUB CLIENT
// ============================================================

export function createOctokit(options: GitHubContentStoreOptions): Octokit {
  return new Octokit({
    auth: options.token,
    baseUrl: options.baseUrl,
    userAgent: USER_AGENT,
    request: options.fetchImpl ? { fetch: options.fetchImpl } : undefined,
    throttle: {
      enabled: false,
      onRateLimit: () => false,
      onSecondaryRateLimit: () => false,
    },
    retry: { enabled: false },
  });
}

function encodeContent(content: string): string {
  return Buffer.from(content, 'utf-8').toString('base64');
}

function decodeContent(content: string): string {
  return Buffer.from(content, 'base64').toString('utf-8');
}

// ============================================================
// CONTENT STORE
// ============================================================

export class GitHubContentStore implements ContentStore {
  private readonly octokit: Octokit;
  private readonly owner: string;
  private readonly repo: string;
  private readonly branch?: string;
  private readonly timeoutMs: number;

  constructor(options: GitHubContentStoreOptions, octokit: Octokit = createOctokit(options)) {
    this.octokit = octokit;
    this.owner = options.owner;
    this.repo = options.repo;
    this.branch = options.branch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async getFile(path: string): Promise<ReadFileResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.octokit.rest.repos.getContent({
        owner: this.owner,
        repo: this.repo,
        path,
        ref: this.branch,
        request: { signal: controller.signal },
      });

      const rateLimit = parseRateLimit(response.headers);
      let file: RemoteArtifact | null = null;

      if ('content' in response.data && response.data.type === 'file') {
        file = {
          path,
          content: decodeContent(response.data.content),
          sha: response.data.sha,
        };
      }

      return { status: response.status, rateLimit, file };
    } catch (error) {
      // A status from GitHub is an answer, not a transport failure
      if (error instanceof RequestError && error.response) {
        return {
          status: error.status,
          rateLimit: parseRateLimit(error.response.headers),
          file: null,
          message: error.message,
        };
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async putFile(path: string, request: WriteFileRequest): Promise<WriteFileResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.octokit.rest.repos.createOrUpdateFileContents({
        owner: this.owner,
        repo: this.repo,
        path,
        message: request.message,
        content: encodeContent(request.content),
        sha: request.sha,
        branch: this.branch,
        request: { signal: controller.signal },
      });

      return {
        status: response.status,
        rateLimit: parseRateLimit(response.headers),
        sha: response.data.content?.sha,
      };
    } catch (error) {
      if (error instanceof RequestError && error.response) {
        return {
          status: error.status,
          rateLimit: parseRateLimit(error.response.headers),
          message: error.message,
        };
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
