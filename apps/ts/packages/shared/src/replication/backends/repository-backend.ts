import { toSyncFailure } from './errors';
import type { BackendKind, RemoteBackend, RemoteWriteRequest, Revision } from './types';

/**
 * Version-controlled repository holding the snapshot as a single file
 */
export interface RepositoryClient {
  readonly location: string;
  headRef(path: string, signal?: AbortSignal): Promise<Revision | null>;
  /**
   * Commit `bytes` on top of `expectedParentRef` (null: the file must not exist yet)
   */
  commit(
    path: string,
    bytes: Uint8Array,
    expectedParentRef: string | null,
    options: { message: string; contentDigest: string; signal?: AbortSignal }
  ): Promise<Revision>;
}

export const CONTENT_DIGEST_TRAILER = 'Content-Digest';

export function commitMessage(remotePath: string, contentDigest: string): string {
  return `Update ${remotePath}\n\n${CONTENT_DIGEST_TRAILER}: ${contentDigest}\n`;
}

/**
 * Digest recorded in a commit message trailer, null when absent
 */
export function parseDigestTrailer(message: string): string | null {
  const match = message.match(new RegExp(`^${CONTENT_DIGEST_TRAILER}: (sha256:[0-9a-f]{64})$`, 'm'));
  return match?.[1] ?? null;
}

export class RepositoryBackend implements RemoteBackend {
  readonly kind: BackendKind = 'repository';

  constructor(
    private readonly client: RepositoryClient,
    private readonly remotePath: string,
    readonly name = 'repository'
  ) {}

  get location(): string {
    return `${this.client.location}/${this.remotePath}`;
  }

  async head(signal?: AbortSignal): Promise<Revision | null> {
    try {
      return await this.client.headRef(this.remotePath, signal);
    } catch (error) {
      throw toSyncFailure(error, this.name);
    }
  }

  async write(request: RemoteWriteRequest): Promise<Revision> {
    try {
      return await this.client.commit(this.remotePath, request.bytes, request.expectedRevision, {
        message: commitMessage(this.remotePath, request.contentDigest),
        contentDigest: request.contentDigest,
        signal: request.signal,
      });
    } catch (error) {
      throw toSyncFailure(error, this.name);
    }
  }
}
