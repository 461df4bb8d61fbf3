import { open, readFile, rm, stat } from 'fs/promises';
import { RunLockError } from '../errors';
import { logger } from '../utils/logger';

interface LockContents {
  runId: string;
  pid: number;
  acquiredAt: string;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function parseContents(text: string): LockContents | null {
  try {
    const value: unknown = JSON.parse(text);
    if (
      typeof value === 'object' &&
      value !== null &&
      'runId' in value &&
      typeof value.runId === 'string' &&
      'pid' in value &&
      typeof value.pid === 'number' &&
      'acquiredAt' in value &&
      typeof value.acquiredAt === 'string'
    ) {
      return { runId: value.runId, pid: value.pid, acquiredAt: value.acquiredAt };
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Marker-file lock held for the duration of one run.
 * The file is created exclusively; a lock older than staleLockMs is taken over.
 */
export class RunLock {
  private held = false;
  private readonly log = logger.child({ component: 'RunLock' });

  constructor(
    readonly lockPath: string,
    private readonly runId: string,
    private readonly staleLockMs: number
  ) {}

  async acquire(): Promise<void> {
    try {
      await this.create();
      return;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw new RunLockError(this.lockPath, undefined, error);
      }
    }

    const holder = await this.readHolder();
    const age = await this.age();
    if (age === null || age < this.staleLockMs) {
      throw new RunLockError(this.lockPath, holder?.runId);
    }

    this.log.warn('Taking over stale run lock', {
      lockPath: this.lockPath,
      previousRunId: holder?.runId,
      ageMs: age,
    });
    await rm(this.lockPath, { force: true });
    try {
      await this.create();
    } catch (error) {
      throw new RunLockError(this.lockPath, undefined, error);
    }
  }

  // Only removes the marker while it still names this run
  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    this.held = false;
    const holder = await this.readHolder();
    if (holder?.runId === this.runId) {
      await rm(this.lockPath, { force: true });
    }
  }

  private async create(): Promise<void> {
    const handle = await open(this.lockPath, 'wx');
    try {
      const contents: LockContents = { runId: this.runId, pid: process.pid, acquiredAt: new Date().toISOString() };
      await handle.writeFile(JSON.stringify(contents));
    } finally {
      await handle.close();
    }
    this.held = true;
  }

  private async readHolder(): Promise<LockContents | null> {
    try {
      return parseContents(await readFile(this.lockPath, 'utf8'));
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  private async age(): Promise<number | null> {
    try {
      const stats = await stat(this.lockPath);
      return Date.now() - stats.mtimeMs;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}

export default RunLock;
