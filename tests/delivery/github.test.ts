/**
 * Tests for the GitHub content store
 *
 * Octokit runs against a stand-in fetch; nothing leaves the process.
 */

import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import { GitHubContentStore } from '../../src/delivery/github';
import { parseRateLimit } from '../../src/delivery/content-store';

const RATE_HEADERS = {
  'content-type': 'application/json; charset=utf-8',
  'x-ratelimit-remaining': '4999',
  'x-ratelimit-reset': '1700000600',
};

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = RATE_HEADERS): Response {
  return new Response(JSON.stringify(body), { status, headers });
}

function createStore(fetchImpl: typeof fetch): GitHubContentStore {
  return new GitHubContentStore({
    token: 'test-secret',
    owner: 'octo',
    repo: 'lists',
    branch: 'main',
    fetchImpl,
  });
}

function requestUrl(fetchImpl: Mock<typeof fetch>, call = 0): string {
  return String(fetchImpl.mock.calls[call][0]);
}

describe('parseRateLimit', () => {
  it('should read both headers in any case', () => {
    expect(parseRateLimit({ 'X-RateLimit-Remaining': '3', 'X-RateLimit-Reset': '1700000000' })).toEqual({
      remaining: 3,
      resetEpoch: 1_700_000_000,
    });
  });

  it('should return null without a remaining header', () => {
    expect(parseRateLimit({ 'x-ratelimit-reset': '1700000000' })).toBeNull();
  });

  it('should default a missing reset to 0', () => {
    expect(parseRateLimit({ 'x-ratelimit-remaining': 0 })).toEqual({ remaining: 0, resetEpoch: 0 });
  });
});

describe('GitHubContentStore', () => {
  describe('getFile', () => {
    it('should decode a file and its version token', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () =>
        jsonResponse({
          type: 'file',
          path: 'trackers.txt',
          sha: 'abc123',
          encoding: 'base64',
          content: Buffer.from('udp://a.example:1\n').toString('base64'),
        })
      );

      const response = await createStore(fetchImpl).getFile('trackers.txt');

      expect(response).toEqual({
        status: 200,
        rateLimit: { remaining: 4999, resetEpoch: 1_700_000_600 },
        file: { path: 'trackers.txt', content: 'udp://a.example:1\n', sha: 'abc123' },
      });
      expect(requestUrl(fetchImpl)).toContain('/repos/octo/lists/contents/trackers.txt');
      expect(requestUrl(fetchImpl)).toContain('ref=main');
    });

    it('should send the token and user agent', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () =>
        jsonResponse({ type: 'file', path: 'a', sha: 's', encoding: 'base64', content: '' })
      );

      await createStore(fetchImpl).getFile('a');

      const headers = new Headers(fetchImpl.mock.calls[0][1]?.headers);
      expect(headers.get('authorization')).toContain('test-secret');
      expect(headers.get('user-agent')).toContain('tracker-relay/1.0');
    });

    it('should return a directory listing as no file', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse([{ type: 'file', name: 'a.txt' }]));

      const response = await createStore(fetchImpl).getFile('lists');

      expect(response.status).toBe(200);
      expect(response.file).toBeNull();
    });

    it('should return an error status instead of throwing', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ message: 'Not Found' }, 404));

      const response = await createStore(fetchImpl).getFile('missing.txt');

      expect(response.status).toBe(404);
      expect(response.file).toBeNull();
      expect(response.rateLimit).toEqual({ remaining: 4999, resetEpoch: 1_700_000_600 });
    });

    it('should throw on a transport failure', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => {
        throw new TypeError('fetch failed');
      });

      await expect(createStore(fetchImpl).getFile('trackers.txt')).rejects.toThrow();
    });
  });

  describe('putFile', () => {
    it('should send base64 content with the version token and branch', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () =>
        jsonResponse({ content: { sha: 'def456', path: 'trackers.txt' }, commit: { sha: 'c1' } })
      );

      const response = await createStore(fetchImpl).putFile('trackers.txt', {
        message: 'Update trackers',
        content: 'udp://a.example:1\n',
        sha: 'abc123',
      });

      expect(response).toEqual({
        status: 200,
        rateLimit: { remaining: 4999, resetEpoch: 1_700_000_600 },
        sha: 'def456',
      });

      const init = fetchImpl.mock.calls[0][1];
      expect(init?.method).toBe('PUT');
      expect(JSON.parse(String(init?.body))).toEqual({
        message: 'Update trackers',
        content: Buffer.from('udp://a.example:1\n').toString('base64'),
        sha: 'abc123',
        branch: 'main',
      });
    });

    it('should report a rate-limited 403 with its headers', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () =>
        jsonResponse({ message: 'API rate limit exceeded' }, 403, {
          'content-type': 'application/json',
          'x-ratelimit-remaining': '0',
          'x-ratelimit-reset': '1700000060',
        })
      );

      const response = await createStore(fetchImpl).putFile('trackers.txt', {
        message: 'Update trackers',
        content: 'a\n',
      });

      expect(response.status).toBe(403);
      expect(response.rateLimit).toEqual({ remaining: 0, resetEpoch: 1_700_000_060 });
      expect(response.message).toContain('API rate limit exceeded');
    });
  });
});
