/**
 * Replication - Public API
 */

import { GitHubContentsClient } from '../clients/repository/GitHubContentsClient';
import { GoogleDriveClient } from '../clients/storage/GoogleDriveClient';
import type { AppConfig } from '../config';
import type { ILogger } from '../utils/logger-interface';
import { ObjectStorageBackend } from './backends/object-storage-backend';
import { RepositoryBackend } from './backends/repository-backend';
import type { RemoteBackend } from './backends/types';

export { toSyncFailure } from './backends/errors';
export { ObjectStorageBackend, type ObjectStorageClient } from './backends/object-storage-backend';
export {
  CONTENT_DIGEST_TRAILER,
  commitMessage,
  parseDigestTrailer,
  RepositoryBackend,
  type RepositoryClient,
} from './backends/repository-backend';
export type { BackendKind, RemoteBackend, RemoteWriteRequest, Revision } from './backends/types';
export { BackendRun, detectConflict, SyncReconciler, type SyncReconcilerDeps, type SyncOptions } from './sync-reconciler';
export * from './sync-report';

/**
 * Backends with credentials in the configuration, object storage first
 */
export function createBackends(
  config: Pick<AppConfig, 'objectStorage' | 'repository' | 'sync'>,
  logger?: ILogger
): RemoteBackend[] {
  const backends: RemoteBackend[] = [];
  const timeoutMs = config.sync.attemptTimeoutMs;

  if (config.objectStorage) {
    const client = new GoogleDriveClient({ ...config.objectStorage, timeoutMs, logger });
    backends.push(new ObjectStorageBackend(client, config.sync.remotePath));
  } else {
    logger?.warn('Object storage credentials missing, object-storage backend disabled');
  }

  if (config.repository) {
    const client = new GitHubContentsClient({ ...config.repository, timeoutMs, logger });
    backends.push(new RepositoryBackend(client, config.sync.remotePath));
  } else {
    logger?.warn('Repository credentials missing, repository backend disabled');
  }

  return backends;
}
