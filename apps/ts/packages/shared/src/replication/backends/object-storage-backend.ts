import { toSyncFailure } from './errors';
import type { BackendKind, RemoteBackend, RemoteWriteRequest, Revision } from './types';

/**
 * Object store with revision-conditional uploads
 */
export interface ObjectStorageClient {
  readonly location: string;
  getRevision(path: string, signal?: AbortSignal): Promise<Revision | null>;
  /**
   * Upload `bytes` when the stored object is still at `expectedPriorRevision`
   * (null: the object must not exist yet)
   */
  put(
    path: string,
    bytes: Uint8Array,
    expectedPriorRevision: string | null,
    options: { contentDigest: string; signal?: AbortSignal }
  ): Promise<Revision>;
}

export class ObjectStorageBackend implements RemoteBackend {
  readonly kind: BackendKind = 'object_storage';

  constructor(
    private readonly client: ObjectStorageClient,
    private readonly remotePath: string,
    readonly name = 'object-storage'
  ) {}

  get location(): string {
    return `${this.client.location}/${this.remotePath}`;
  }

  async head(signal?: AbortSignal): Promise<Revision | null> {
    try {
      return await this.client.getRevision(this.remotePath, signal);
    } catch (error) {
      throw toSyncFailure(error, this.name);
    }
  }

  async write(request: RemoteWriteRequest): Promise<Revision> {
    try {
      return await this.client.put(this.remotePath, request.bytes, request.expectedRevision, {
        contentDigest: request.contentDigest,
        signal: request.signal,
      });
    } catch (error) {
      throw toSyncFailure(error, this.name);
    }
  }
}
