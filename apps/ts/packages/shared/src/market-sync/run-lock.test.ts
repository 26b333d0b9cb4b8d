import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, utimesSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { RunConflictError } from '../errors';
import { createMockLogger } from '../test-utils/mocks';
import { isProcessAlive, RunLock } from './run-lock';

describe('RunLock', () => {
  let dir: string;
  let lockPath: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'run-lock-'));
    lockPath = path.join(dir, 'warehouse.lock');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function createLock(pid: number, alive: (pid: number) => boolean = () => true) {
    return new RunLock(lockPath, {
      pid,
      isProcessAlive: alive,
      logger: createMockLogger(),
      clock: () => new Date('2025-03-03T08:00:00Z'),
    });
  }

  it('records the holder pid and removes the file on release', () => {
    const lock = createLock(4242);
    lock.acquire();

    expect(JSON.parse(readFileSync(lockPath, 'utf8'))).toEqual({ pid: 4242, acquiredAt: '2025-03-03T08:00:00.000Z' });
    expect(lock.isHeld).toBe(true);

    lock.release();
    expect(existsSync(lockPath)).toBe(false);
  });

  it('leaves no staging files behind', () => {
    createLock(4243).acquire();

    expect(readdirSync(dir)).toEqual(['warehouse.lock']);
  });

  it('refuses a lock held by a live process', () => {
    createLock(100).acquire();

    const error = (() => {
      try {
        createLock(200).acquire();
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(RunConflictError);
    expect(error instanceof RunConflictError && error.holderPid).toBe(100);
  });

  it('takes over a lock left by a dead process', () => {
    writeFileSync(lockPath, JSON.stringify({ pid: 999999, acquiredAt: '2025-03-01T00:00:00.000Z' }));

    const lock = createLock(300, () => false);
    lock.acquire();

    expect(lock.readHolder()?.pid).toBe(300);
  });

  it('refuses a fresh lock file whose holder is not readable yet', () => {
    writeFileSync(lockPath, '');
    const lock = createLock(301, () => false);

    expect(() => lock.acquire()).toThrow(RunConflictError);
    expect(lock.isHeld).toBe(false);
    expect(readFileSync(lockPath, 'utf8')).toBe('');
  });

  it('takes over an unreadable lock file older than the grace period', () => {
    writeFileSync(lockPath, 'garbage');
    const modified = new Date('2025-03-03T07:58:00Z');
    utimesSync(lockPath, modified, modified);

    const lock = createLock(302);
    lock.acquire();

    expect(lock.readHolder()?.pid).toBe(302);
  });

  it('leaves a stale lock alone while another run is taking it over', () => {
    writeFileSync(lockPath, JSON.stringify({ pid: 999999, acquiredAt: '2025-03-01T00:00:00.000Z' }));
    writeFileSync(`${lockPath}.takeover`, JSON.stringify({ pid: 700, acquiredAt: '2025-03-03T08:00:00.000Z' }));

    const lock = createLock(303, (pid) => pid === 700);

    expect(() => lock.acquire()).toThrow(RunConflictError);
    expect(lock.readHolder()?.pid).toBe(999999);
  });

  it('removes a takeover marker left by a crashed run', () => {
    writeFileSync(lockPath, JSON.stringify({ pid: 999999, acquiredAt: '2025-03-01T00:00:00.000Z' }));
    writeFileSync(`${lockPath}.takeover`, JSON.stringify({ pid: 701, acquiredAt: '2025-03-02T00:00:00.000Z' }));

    const lock = createLock(304, () => false);
    lock.acquire();

    expect(lock.readHolder()?.pid).toBe(304);
    expect(readdirSync(dir)).toEqual(['warehouse.lock']);
  });

  it('releases after the wrapped function throws', async () => {
    const lock = createLock(400);

    await expect(lock.withLock(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(existsSync(lockPath)).toBe(false);
  });

  it('does not remove a lock it does not hold', () => {
    createLock(500).acquire();
    createLock(501).release();

    expect(existsSync(lockPath)).toBe(true);
  });
});

describe('isProcessAlive', () => {
  it('sees the current process', () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });
});
