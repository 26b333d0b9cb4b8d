import { afterEach, describe, expect, it, vi } from 'vitest';
import { SyncFailure } from '../../errors';
import { commitMessage } from '../../replication/backends/repository-backend';
import { createMockErrorResponse, createMockResponse, requestUrl } from '../../test-utils/fetch-mock';
import { createMockLogger } from '../../test-utils/mocks';
import { GitHubContentsClient } from './GitHubContentsClient';

const DIGEST = `sha256:${'ab'.repeat(32)}`;

function createClient() {
  return new GitHubContentsClient({
    token: 'test-token',
    owner: 'acme',
    repo: 'prices',
    branch: 'main',
    directory: 'snapshots',
    logger: createMockLogger(),
  });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error
  );
}

function callUrl(spy: { mock: { calls: ReadonlyArray<Parameters<typeof fetch>> } }, index: number): URL {
  const input = spy.mock.calls[index]?.[0];
  return new URL(input ? requestUrl(input) : '');
}

describe('GitHubContentsClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('describes its location', () => {
    expect(createClient().location).toBe('github://acme/prices@main/snapshots');
  });

  describe('headRef', () => {
    it('returns null when the file does not exist', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(createMockErrorResponse('Not Found', 404));

      await expect(createClient().headRef('stock_warehouse.db')).resolves.toBeNull();
    });

    it('reads the blob sha and the digest trailer of the last commit', async () => {
      const fetchSpy = vi
        .spyOn(globalThis, 'fetch')
        .mockResolvedValueOnce(createMockResponse({ type: 'file', sha: 'blob-1', size: 4096 }))
        .mockResolvedValueOnce(
          createMockResponse([
            {
              sha: 'commit-1',
              commit: {
                message: commitMessage('stock_warehouse.db', DIGEST),
                committer: { date: '2025-03-03T08:10:00Z' },
              },
            },
          ])
        );

      await expect(createClient().headRef('stock_warehouse.db')).resolves.toEqual({
        id: 'blob-1',
        contentDigest: DIGEST,
        size: 4096,
        modifiedAt: new Date('2025-03-03T08:10:00Z'),
      });

      const contents = callUrl(fetchSpy, 0);
      expect(contents.pathname).toBe('/repos/acme/prices/contents/snapshots/stock_warehouse.db');
      expect(contents.searchParams.get('ref')).toBe('main');

      const commits = callUrl(fetchSpy, 1);
      expect(commits.pathname).toBe('/repos/acme/prices/commits');
      expect(commits.searchParams.get('path')).toBe('snapshots/stock_warehouse.db');
      expect(commits.searchParams.get('per_page')).toBe('1');
    });

    it('leaves the digest unknown for commits without a trailer', async () => {
      vi.spyOn(globalThis, 'fetch')
        .mockResolvedValueOnce(createMockResponse({ type: 'file', sha: 'blob-1', size: 10 }))
        .mockResolvedValueOnce(
          createMockResponse([{ sha: 'c', commit: { message: 'manual upload', committer: null } }])
        );

      const revision = await createClient().headRef('stock_warehouse.db');

      expect(revision?.contentDigest).toBeNull();
      expect(revision?.modifiedAt).toBeNull();
    });

    it('rejects a directory at the snapshot path', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(createMockResponse({ type: 'dir', sha: 'tree-1', size: 0 }));

      const error = await captureError(createClient().headRef('stock_warehouse.db'));

      expect(error instanceof SyncFailure && error.kind).toBe('conflict');
    });
  });

  describe('commit', () => {
    it('puts base64 content on the branch with the parent blob sha', async () => {
      const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
        createMockResponse({
          content: { sha: 'blob-2', size: 6 },
          commit: { sha: 'commit-2', committer: { date: '2025-03-03T08:20:00Z' } },
        })
      );

      const revision = await createClient().commit('stock_warehouse.db', Buffer.from('SQLite'), 'blob-1', {
        message: 'Update stock_warehouse.db',
        contentDigest: DIGEST,
      });

      expect(revision).toEqual({
        id: 'blob-2',
        contentDigest: DIGEST,
        size: 6,
        modifiedAt: new Date('2025-03-03T08:20:00Z'),
      });
      const init = fetchSpy.mock.calls[0]?.[1];
      expect(init?.method).toBe('PUT');
      expect(JSON.parse(String(init?.body))).toEqual({
        message: 'Update stock_warehouse.db',
        content: 'U1FMaXRl',
        branch: 'main',
        sha: 'blob-1',
      });
    });

    it('omits the sha when creating the file', async () => {
      const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
        createMockResponse({ content: { sha: 'blob-1', size: 6 }, commit: { sha: 'commit-1' } })
      );

      await createClient().commit('stock_warehouse.db', Buffer.from('SQLite'), null, {
        message: 'm',
        contentDigest: DIGEST,
      });

      const body: unknown = JSON.parse(String(fetchSpy.mock.calls[0]?.[1]?.body));
      expect(body).not.toHaveProperty('sha');
    });

    it.each([
      [409, 'is at blob-9 but expected blob-1', 'conflict'],
      [422, '"sha" wasn\'t supplied.', 'conflict'],
      [401, 'Bad credentials', 'unauthorized'],
      [403, 'Resource not accessible by integration', 'unauthorized'],
      [403, 'You have exceeded a secondary rate limit', 'transient'],
      [404, 'Not Found', 'unauthorized'],
      [502, 'Bad Gateway', 'transient'],
    ])('maps HTTP %i (%s) to %s', async (status, message, kind) => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(createMockErrorResponse(message, status));

      const error = await captureError(
        createClient().commit('stock_warehouse.db', Buffer.from('SQLite'), 'blob-1', {
          message: 'm',
          contentDigest: DIGEST,
        })
      );

      expect(error).toBeInstanceOf(SyncFailure);
      expect(error instanceof SyncFailure && error.kind).toBe(kind);
      expect(error instanceof SyncFailure && error.backend).toBe('repository');
    });
  });
});
