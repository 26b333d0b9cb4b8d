/**
 * Market Sync - run lock
 * Advisory lock file keeping two runs from touching the warehouse at once.
 */

import { linkSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import { RunConflictError } from '../errors';
import { logger as defaultLogger } from '../utils/logger';
import type { ILogger } from '../utils/logger-interface';

const LockFileSchema = z.object({
  pid: z.number().int().positive(),
  acquiredAt: z.string(),
});

export type LockHolder = z.infer<typeof LockFileSchema>;

/** Age after which a lock file nobody can read is considered abandoned */
export const DEFAULT_STALE_GRACE_MS = 60_000;

export interface RunLockOptions {
  logger?: ILogger;
  /** Liveness check for the recorded holder pid */
  isProcessAlive?: (pid: number) => boolean;
  pid?: number;
  clock?: () => Date;
  staleGraceMs?: number;
}

type LockState = { kind: 'free' } | { kind: 'held'; pid?: number } | { kind: 'stale'; pid?: number };

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return hasErrorCode(error, 'EPERM');
  }
}

export class RunLock {
  private held = false;
  private readonly logger: ILogger;
  private readonly isAlive: (pid: number) => boolean;
  private readonly pid: number;
  private readonly clock: () => Date;
  private readonly staleGraceMs: number;

  constructor(
    readonly lockPath: string,
    options: RunLockOptions = {}
  ) {
    this.logger = (options.logger ?? defaultLogger).child({ component: 'run-lock' });
    this.isAlive = options.isProcessAlive ?? isProcessAlive;
    this.pid = options.pid ?? process.pid;
    this.clock = options.clock ?? (() => new Date());
    this.staleGraceMs = options.staleGraceMs ?? DEFAULT_STALE_GRACE_MS;
  }

  get isHeld(): boolean {
    return this.held;
  }

  private get takeoverPath(): string {
    return `${this.lockPath}.takeover`;
  }

  /**
   * Create the lock file. A lock left by a dead process is taken over; an
   * unreadable one only once it is older than the grace period.
   *
   * @throws RunConflictError when another run holds the lock
   */
  acquire(): void {
    if (this.held) return;
    if (this.tryCreate(this.lockPath)) {
      this.markHeld();
      return;
    }

    this.assertStale();

    // Only one run clears a stale lock; the others see the new holder
    if (!this.tryCreate(this.takeoverPath)) {
      if (this.inspect(this.takeoverPath).kind === 'held') {
        throw new RunConflictError(this.lockPath);
      }
      rmSync(this.takeoverPath, { force: true });
      if (!this.tryCreate(this.takeoverPath)) {
        throw new RunConflictError(this.lockPath);
      }
    }

    try {
      const stale = this.assertStale();
      this.logger.warn('Removing stale run lock', { lockPath: this.lockPath, holderPid: stale.pid });
      rmSync(this.lockPath, { force: true });
      if (!this.tryCreate(this.lockPath)) {
        throw new RunConflictError(this.lockPath, this.readHolder()?.pid);
      }
      this.markHeld();
    } finally {
      rmSync(this.takeoverPath, { force: true });
    }
  }

  release(): void {
    if (!this.held) return;
    rmSync(this.lockPath, { force: true });
    this.held = false;
    this.logger.debug('Run lock released', { lockPath: this.lockPath });
  }

  /**
   * Run `fn` while holding the lock, releasing it whatever the outcome
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  readHolder(file = this.lockPath): LockHolder | null {
    const raw = readIfExists(file);
    if (raw === null) return null;

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      return null;
    }
    const parsed = LockFileSchema.safeParse(payload);
    return parsed.success ? parsed.data : null;
  }

  private assertStale(): { pid?: number } {
    const state = this.inspect(this.lockPath);
    if (state.kind === 'held') {
      throw new RunConflictError(this.lockPath, state.pid);
    }
    return state.kind === 'stale' ? { pid: state.pid } : {};
  }

  private inspect(file: string): LockState {
    const holder = this.readHolder(file);
    if (holder) {
      return this.isAlive(holder.pid) ? { kind: 'held', pid: holder.pid } : { kind: 'stale', pid: holder.pid };
    }

    let modifiedAt: number;
    try {
      modifiedAt = statSync(file).mtimeMs;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return { kind: 'free' };
      throw error;
    }
    return this.clock().getTime() - modifiedAt > this.staleGraceMs ? { kind: 'stale' } : { kind: 'held' };
  }

  /**
   * Write the holder record beside `target` and hard-link it into place, so
   * the lock file never exists without its content
   */
  private tryCreate(target: string): boolean {
    const holder: LockHolder = { pid: this.pid, acquiredAt: this.clock().toISOString() };
    const staging = `${target}.${this.pid}.tmp`;
    writeFileSync(staging, JSON.stringify(holder));

    try {
      linkSync(staging, target);
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) return false;
      throw error;
    } finally {
      rmSync(staging, { force: true });
    }
  }

  private markHeld(): void {
    this.held = true;
    this.logger.debug('Run lock acquired', { lockPath: this.lockPath, pid: this.pid });
  }
}

function readIfExists(file: string): string | null {
  try {
    return readFileSync(file, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw error;
  }
}
