import { z } from 'zod';
import { SyncFailure } from '../../errors';
import type { ObjectStorageClient } from '../../replication/backends/object-storage-backend';
import type { Revision } from '../../replication/backends/types';
import { getErrorMessage, toError } from '../../utils/error-helpers';
import type { ILogger } from '../../utils/logger-interface';
import { BaseHttpClient } from '../base/BaseHttpClient';
import { OperationCancelledError } from '../base/BatchExecutor';
import { HttpApiError } from '../base/errors';

export const GOOGLE_APIS_BASE_URL = 'https://www.googleapis.com';

const FILE_FIELDS = 'id,name,headRevisionId,size,modifiedTime,appProperties';

const DriveFileSchema = z.object({
  id: z.string(),
  name: z.string(),
  headRevisionId: z.string().optional(),
  size: z.string().optional(),
  modifiedTime: z.string().optional(),
  appProperties: z.record(z.string()).optional(),
});

export type DriveFile = z.infer<typeof DriveFileSchema>;

const DriveFileListSchema = z.object({
  files: z.array(DriveFileSchema),
});

const DriveErrorBodySchema = z.object({
  error: z.object({
    errors: z.array(z.object({ reason: z.string() })).optional(),
  }),
});

const QUOTA_REASONS = new Set([
  'storageQuotaExceeded',
  'quotaExceeded',
  'dailyLimitExceeded',
  'teamDriveFileLimitExceeded',
]);
const RATE_LIMIT_REASONS = new Set(['userRateLimitExceeded', 'rateLimitExceeded']);

export interface GoogleDriveClientOptions {
  accessToken: string;
  folderId: string;
  /** Backend name carried by raised SyncFailures */
  backendName?: string;
  baseURL?: string;
  timeoutMs?: number;
  logger?: ILogger;
}

/**
 * Drive v3 client storing one file per name inside a folder.
 * Drive has no conditional upload, so `put` re-reads the head revision and
 * refuses to write when it no longer matches the expected one.
 */
export class GoogleDriveClient extends BaseHttpClient implements ObjectStorageClient {
  private readonly accessToken: string;
  private readonly folderId: string;
  private readonly backendName: string;

  constructor(options: GoogleDriveClientOptions) {
    super({ baseURL: options.baseURL ?? GOOGLE_APIS_BASE_URL, timeoutMs: options.timeoutMs, logger: options.logger });
    this.accessToken = options.accessToken;
    this.folderId = options.folderId;
    this.backendName = options.backendName ?? 'object-storage';
  }

  get location(): string {
    return `gdrive://${this.folderId}`;
  }

  protected override defaultHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.accessToken}` };
  }

  async getRevision(path: string, signal?: AbortSignal): Promise<Revision | null> {
    const file = await this.findFile(path, signal);
    return file ? toRevision(file) : null;
  }

  async put(
    path: string,
    bytes: Uint8Array,
    expectedPriorRevision: string | null,
    options: { contentDigest: string; signal?: AbortSignal }
  ): Promise<Revision> {
    const current = await this.findFile(path, options.signal);
    const currentRevision = current ? revisionId(current) : null;
    if (currentRevision !== expectedPriorRevision) {
      throw new SyncFailure(
        'conflict',
        this.backendName,
        `Remote ${path} moved from ${expectedPriorRevision ?? 'none'} to ${currentRevision ?? 'none'}`
      );
    }

    const appProperties = { contentDigest: options.contentDigest };
    const boundary = `warehouse-${Date.now().toString(36)}`;
    const metadata = current ? { appProperties } : { name: path, parents: [this.folderId], appProperties };

    try {
      const file = await this.requestJson(
        {
          method: current ? 'PATCH' : 'POST',
          path: current ? `upload/drive/v3/files/${encodeURIComponent(current.id)}` : 'upload/drive/v3/files',
          query: { uploadType: 'multipart', fields: FILE_FIELDS, supportsAllDrives: true },
          headers: { 'Content-Type': `multipart/related; boundary=${boundary}` },
          body: multipartRelated(metadata, bytes, boundary),
          signal: options.signal,
        },
        DriveFileSchema
      );
      this.logger.info(`Uploaded ${path} (${bytes.byteLength} bytes)`, { revision: revisionId(file) });
      return toRevision(file);
    } catch (error) {
      // 404 on an existing file: it vanished after the head check
      throw this.toSyncFailure(error, current ? 'conflict' : undefined);
    }
  }

  private async findFile(name: string, signal?: AbortSignal): Promise<DriveFile | null> {
    try {
      const { files } = await this.requestJson(
        {
          path: 'drive/v3/files',
          query: {
            q: [
              `name = '${escapeQueryValue(name)}'`,
              `'${escapeQueryValue(this.folderId)}' in parents`,
              'trashed = false',
            ].join(' and '),
            fields: `files(${FILE_FIELDS})`,
            orderBy: 'modifiedTime desc',
            pageSize: 10,
            supportsAllDrives: true,
            includeItemsFromAllDrives: true,
          },
          signal,
        },
        DriveFileListSchema
      );

      if (files.length > 1) {
        this.logger.warn(`Found ${files.length} files named ${name}, using the most recent`);
      }
      return files[0] ?? null;
    } catch (error) {
      throw this.toSyncFailure(error);
    }
  }

  private toSyncFailure(error: unknown, onNotFound?: 'conflict'): Error {
    if (error instanceof OperationCancelledError || error instanceof SyncFailure) return error;
    if (!(error instanceof HttpApiError)) {
      return new SyncFailure('transient', this.backendName, getErrorMessage(error), toError(error));
    }

    const fail = (kind: SyncFailure['kind']) => new SyncFailure(kind, this.backendName, error.message, error);
    switch (error.status) {
      case 401:
        return fail('unauthorized');
      case 403: {
        const reasons = errorReasons(error.responseBody);
        if (reasons.some((reason) => QUOTA_REASONS.has(reason))) return fail('quota_exceeded');
        if (reasons.some((reason) => RATE_LIMIT_REASONS.has(reason))) return fail('transient');
        return fail('unauthorized');
      }
      case 404:
        return fail(onNotFound ?? 'unauthorized');
      case 409:
      case 412:
        return fail('conflict');
      default:
        return fail('transient');
    }
  }
}

function revisionId(file: DriveFile): string {
  return file.headRevisionId ?? `${file.id}@${file.modifiedTime ?? 'unknown'}`;
}

function toRevision(file: DriveFile): Revision {
  const size = file.size !== undefined ? Number(file.size) : null;
  return {
    id: revisionId(file),
    contentDigest: file.appProperties?.contentDigest ?? null,
    size: size !== null && Number.isFinite(size) ? size : null,
    modifiedAt: file.modifiedTime ? new Date(file.modifiedTime) : null,
  };
}

function errorReasons(body: unknown): string[] {
  const parsed = DriveErrorBodySchema.safeParse(body);
  return parsed.success ? (parsed.data.error.errors ?? []).map((e) => e.reason) : [];
}

function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/**
 * multipart/related body carrying JSON metadata and the media bytes
 */
export function multipartRelated(metadata: object, bytes: Uint8Array, boundary: string): Buffer {
  return Buffer.concat([
    Buffer.from(
      `--${boundary}\r\nContent-Type: application/json; charset=UTF-8\r\n\r\n${JSON.stringify(metadata)}\r\n` +
        `--${boundary}\r\nContent-Type: application/octet-stream\r\n\r\n`
    ),
    bytes,
    Buffer.from(`\r\n--${boundary}--\r\n`),
  ]);
}
