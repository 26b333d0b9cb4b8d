/**
 * Remote backend capability shared by the object-storage and repository replicas
 */

export type BackendKind = 'object_storage' | 'repository';

/**
 * Observed state of the remote snapshot
 */
export interface Revision {
  /** Opaque token: a Drive head revision id or a repository blob sha */
  id: string;
  contentDigest: string | null;
  size: number | null;
  modifiedAt: Date | null;
}

export interface RemoteWriteRequest {
  bytes: Uint8Array;
  contentDigest: string;
  /** Head the caller observed; null when it saw no remote file */
  expectedRevision: string | null;
  signal?: AbortSignal;
}

/**
 * Replica target for the warehouse snapshot. Implementations reject with
 * SyncFailure (conflict, quota_exceeded, unauthorized or transient).
 */
export interface RemoteBackend {
  readonly name: string;
  readonly kind: BackendKind;
  /** Human readable location used in reports and escalations */
  readonly location: string;
  head(signal?: AbortSignal): Promise<Revision | null>;
  write(request: RemoteWriteRequest): Promise<Revision>;
}
