import { z } from 'zod';
import { SyncFailure } from '../../errors';
import { parseDigestTrailer, type RepositoryClient } from '../../replication/backends/repository-backend';
import type { Revision } from '../../replication/backends/types';
import { getErrorMessage, toError } from '../../utils/error-helpers';
import type { ILogger } from '../../utils/logger-interface';
import { BaseHttpClient } from '../base/BaseHttpClient';
import { OperationCancelledError } from '../base/BatchExecutor';
import { HttpApiError } from '../base/errors';

export const GITHUB_API_BASE_URL = 'https://api.github.com';

const ContentMetadataSchema = z.object({
  type: z.string(),
  sha: z.string(),
  size: z.number(),
});

const CommitListSchema = z.array(
  z.object({
    sha: z.string(),
    commit: z.object({
      message: z.string(),
      committer: z.object({ date: z.string() }).nullable(),
    }),
  })
);

const PutContentResponseSchema = z.object({
  content: z.object({ sha: z.string(), size: z.number() }),
  commit: z.object({
    sha: z.string(),
    committer: z.object({ date: z.string() }).nullable().optional(),
  }),
});

export interface GitHubContentsClientOptions {
  token: string;
  owner: string;
  repo: string;
  branch: string;
  /** Directory inside the repository holding the snapshot */
  directory?: string;
  backendName?: string;
  baseURL?: string;
  timeoutMs?: number;
  logger?: ILogger;
}

/**
 * GitHub contents API client. The blob sha of the file is the revision; the
 * content digest travels in the commit message trailer.
 */
export class GitHubContentsClient extends BaseHttpClient implements RepositoryClient {
  private readonly options: GitHubContentsClientOptions;
  private readonly backendName: string;

  constructor(options: GitHubContentsClientOptions) {
    super({ baseURL: options.baseURL ?? GITHUB_API_BASE_URL, timeoutMs: options.timeoutMs, logger: options.logger });
    this.options = options;
    this.backendName = options.backendName ?? 'repository';
  }

  get location(): string {
    const { owner, repo, branch, directory } = this.options;
    return directory ? `github://${owner}/${repo}@${branch}/${directory}` : `github://${owner}/${repo}@${branch}`;
  }

  protected override defaultHeaders(): Record<string, string> {
    return {
      Accept: 'application/vnd.github+json',
      Authorization: `Bearer ${this.options.token}`,
      'X-GitHub-Api-Version': '2022-11-28',
      'User-Agent': 'stock-warehouse',
    };
  }

  async headRef(path: string, signal?: AbortSignal): Promise<Revision | null> {
    const filePath = this.filePath(path);

    let metadata: z.infer<typeof ContentMetadataSchema>;
    try {
      metadata = await this.requestJson(
        { path: this.contentsPath(filePath), query: { ref: this.options.branch }, signal },
        ContentMetadataSchema
      );
    } catch (error) {
      if (error instanceof HttpApiError && error.status === 404) return null;
      throw this.toSyncFailure(error);
    }

    if (metadata.type !== 'file') {
      throw new SyncFailure('conflict', this.backendName, `${filePath} is a ${metadata.type}, not a file`);
    }

    const lastCommit = await this.lastCommit(filePath, signal);
    return {
      id: metadata.sha,
      contentDigest: lastCommit ? parseDigestTrailer(lastCommit.commit.message) : null,
      size: metadata.size,
      modifiedAt: lastCommit?.commit.committer ? new Date(lastCommit.commit.committer.date) : null,
    };
  }

  async commit(
    path: string,
    bytes: Uint8Array,
    expectedParentRef: string | null,
    options: { message: string; contentDigest: string; signal?: AbortSignal }
  ): Promise<Revision> {
    const filePath = this.filePath(path);

    try {
      const response = await this.requestJson(
        {
          method: 'PUT',
          path: this.contentsPath(filePath),
          json: {
            message: options.message,
            content: Buffer.from(bytes).toString('base64'),
            branch: this.options.branch,
            ...(expectedParentRef ? { sha: expectedParentRef } : {}),
          },
          signal: options.signal,
        },
        PutContentResponseSchema
      );

      this.logger.info(`Committed ${filePath}`, { commit: response.commit.sha, blob: response.content.sha });
      return {
        id: response.content.sha,
        contentDigest: options.contentDigest,
        size: response.content.size,
        modifiedAt: response.commit.committer ? new Date(response.commit.committer.date) : null,
      };
    } catch (error) {
      throw this.toSyncFailure(error);
    }
  }

  private async lastCommit(filePath: string, signal?: AbortSignal) {
    const { owner, repo, branch } = this.options;
    try {
      const commits = await this.requestJson(
        { path: `repos/${owner}/${repo}/commits`, query: { path: filePath, sha: branch, per_page: 1 }, signal },
        CommitListSchema
      );
      return commits[0] ?? null;
    } catch (error) {
      throw this.toSyncFailure(error);
    }
  }

  private filePath(path: string): string {
    const { directory } = this.options;
    return directory ? `${directory.replace(/\/+$/, '')}/${path}` : path;
  }

  private contentsPath(filePath: string): string {
    const { owner, repo } = this.options;
    return `repos/${owner}/${repo}/contents/${filePath.split('/').map(encodeURIComponent).join('/')}`;
  }

  private toSyncFailure(error: unknown): Error {
    if (error instanceof OperationCancelledError || error instanceof SyncFailure) return error;
    if (!(error instanceof HttpApiError)) {
      return new SyncFailure('transient', this.backendName, getErrorMessage(error), toError(error));
    }

    const fail = (kind: SyncFailure['kind']) => new SyncFailure(kind, this.backendName, error.message, error);
    switch (error.status) {
      case 401:
      case 404:
        return fail('unauthorized');
      case 403:
        // secondary rate limits also answer 403
        return /rate limit/i.test(error.message) ? fail('transient') : fail('unauthorized');
      case 409:
        return fail('conflict');
      case 422:
        // missing or stale blob sha
        return /sha/i.test(error.message) ? fail('conflict') : fail('transient');
      default:
        return fail('transient');
    }
  }
}
