/**
 * In-memory stand-ins for the Drive and GitHub clients
 */

import { SyncFailure } from '../errors';
import type { ObjectStorageClient } from '../replication/backends/object-storage-backend';
import { parseDigestTrailer, type RepositoryClient } from '../replication/backends/repository-backend';
import type { Revision } from '../replication/backends/types';

interface StoredObject {
  revision: string;
  bytes: Uint8Array;
  contentDigest: string | null;
}

abstract class InMemoryRemote {
  readonly objects = new Map<string, StoredObject>();
  /** Errors thrown by the next write calls, in order */
  readonly writeFailures: Error[] = [];
  /** Errors thrown by the next head calls, in order */
  readonly headFailures: Error[] = [];
  headCalls = 0;
  writeCalls = 0;
  private counter = 0;

  constructor(
    readonly location: string,
    private readonly revisionPrefix: string
  ) {}

  /** Replace the stored object as another writer would */
  overwrite(path: string, bytes: Uint8Array, contentDigest: string | null): string {
    const revision = this.nextRevision();
    this.objects.set(path, { revision, bytes, contentDigest });
    return revision;
  }

  protected readHead(path: string): Revision | null {
    this.headCalls++;
    const failure = this.headFailures.shift();
    if (failure) throw failure;
    const stored = this.objects.get(path);
    return stored ? toRevision(stored) : null;
  }

  protected store(path: string, bytes: Uint8Array, expected: string | null, contentDigest: string): Revision {
    this.writeCalls++;
    const failure = this.writeFailures.shift();
    if (failure) throw failure;

    const current = this.objects.get(path)?.revision ?? null;
    if (current !== expected) {
      throw new SyncFailure('conflict', this.revisionPrefix, `expected ${expected ?? 'none'}, found ${current ?? 'none'}`);
    }
    const stored = { revision: this.nextRevision(), bytes, contentDigest };
    this.objects.set(path, stored);
    return toRevision(stored);
  }

  private nextRevision(): string {
    this.counter++;
    return `${this.revisionPrefix}-${this.counter}`;
  }
}

function toRevision(stored: StoredObject): Revision {
  return {
    id: stored.revision,
    contentDigest: stored.contentDigest,
    size: stored.bytes.byteLength,
    modifiedAt: null,
  };
}

export class FakeObjectStorageClient extends InMemoryRemote implements ObjectStorageClient {
  constructor(location = 'memory://drive') {
    super(location, 'rev');
  }

  async getRevision(path: string): Promise<Revision | null> {
    return this.readHead(path);
  }

  async put(
    path: string,
    bytes: Uint8Array,
    expectedPriorRevision: string | null,
    options: { contentDigest: string }
  ): Promise<Revision> {
    return this.store(path, bytes, expectedPriorRevision, options.contentDigest);
  }
}

export class FakeRepositoryClient extends InMemoryRemote implements RepositoryClient {
  readonly messages: string[] = [];

  constructor(location = 'memory://repo@main') {
    super(location, 'sha');
  }

  async headRef(path: string): Promise<Revision | null> {
    return this.readHead(path);
  }

  async commit(
    path: string,
    bytes: Uint8Array,
    expectedParentRef: string | null,
    options: { message: string; contentDigest: string }
  ): Promise<Revision> {
    const revision = this.store(path, bytes, expectedParentRef, parseDigestTrailer(options.message) ?? options.contentDigest);
    this.messages.push(options.message);
    return revision;
  }
}
