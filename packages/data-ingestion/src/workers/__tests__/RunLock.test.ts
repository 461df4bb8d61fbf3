/**
 * RunLock Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm, stat, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { RunLock } from '../RunLock';
import { RunLockError } from '../../errors';

const HOUR = 60 * 60 * 1000;

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

describe('RunLock', () => {
  let dir: string;
  let lockPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'run-lock-'));
    lockPath = join(dir, '.etl-run.lock');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the run id into the marker and remove it on release', async () => {
    const lock = new RunLock(lockPath, 'run-a', HOUR);

    await lock.acquire();
    expect(JSON.parse(await readFile(lockPath, 'utf8'))).toMatchObject({ runId: 'run-a', pid: process.pid });

    await lock.release();
    expect(await exists(lockPath)).toBe(false);
  });

  it('should refuse a second run while the lock is fresh', async () => {
    const first = new RunLock(lockPath, 'run-a', HOUR);
    await first.acquire();

    const attempt = new RunLock(lockPath, 'run-b', HOUR).acquire();

    await expect(attempt).rejects.toBeInstanceOf(RunLockError);
    await expect(attempt).rejects.toThrow(`Run lock ${lockPath} is held by run run-a`);
    await first.release();
  });

  it('should take over a lock older than the stale limit', async () => {
    await writeFile(lockPath, JSON.stringify({ runId: 'run-old', pid: 1, acquiredAt: '2024-01-01T00:00:00.000Z' }));
    const past = new Date(Date.now() - 2 * HOUR);
    await utimes(lockPath, past, past);

    const lock = new RunLock(lockPath, 'run-new', HOUR);
    await lock.acquire();

    expect(JSON.parse(await readFile(lockPath, 'utf8')).runId).toBe('run-new');
    await lock.release();
  });

  it('should leave a marker that names another run in place', async () => {
    const lock = new RunLock(lockPath, 'run-a', HOUR);
    await lock.acquire();
    await writeFile(lockPath, JSON.stringify({ runId: 'run-b', pid: 2, acquiredAt: '2024-01-01T00:00:00.000Z' }));

    await lock.release();

    expect(await exists(lockPath)).toBe(true);
  });

  it('should do nothing on release when the lock was never acquired', async () => {
    await writeFile(lockPath, 'held elsewhere');

    await new RunLock(lockPath, 'run-a', HOUR).release();

    expect(await readFile(lockPath, 'utf8')).toBe('held elsewhere');
  });
});
