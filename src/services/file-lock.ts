import { promises as fs } from 'fs';
import { randomUUID } from 'crypto';
import { isErrnoException, isMissingFileError } from '../utils/utils.js';

export interface FileLockOptions {
  /** Give up waiting for a held lock after this many milliseconds (default 5s) */
  waitMs?: number;
  /** Break a lock older than this many milliseconds (default 30s) */
  staleMs?: number;
}

/** Suffix of the private name a lock is moved to while it is being broken */
export const CLAIMED_LOCK_SUFFIX = '.claimed';

interface LockHolder {
  /** Raw lock file content at inspection time */
  content: string;
  pid: number | null;
  acquiredAt: number;
  corrupt: boolean;
}

/**
 * PID-based lock file guarding writes to one cache file across processes.
 *
 * The lock is a sibling file created with the exclusive `wx` flag and holding
 * `<pid>\n<timestamp>`. A lock whose process is gone, whose content is
 * unreadable, or which is older than `staleMs` is removed and retried.
 *
 * Only one process can create the file, so two processes writing the same key
 * serialize; different keys use different lock files and never contend.
 */
export class FileLock {
  private static readonly MAX_BACKOFF_MS = 250;
  private readonly waitMs: number;
  private readonly staleMs: number;

  constructor(
    private readonly lockPath: string,
    options: FileLockOptions = {}
  ) {
    this.waitMs = options.waitMs ?? 5_000;
    this.staleMs = options.staleMs ?? 30_000;
  }

  /**
   * Acquire the lock, waiting with backoff while another live process holds it
   *
   * @throws Error if the lock is still held after `waitMs`, or on a file system
   *   fault other than "lock already exists" (e.g. read-only directory)
   */
  async acquire(): Promise<void> {
    const startTime = Date.now();

    for (let attempt = 1; ; attempt++) {
      if (await this.tryCreate()) {
        return;
      }

      const holder = await this.readHolder();
      let broken = false;

      if (holder !== 'gone') {
        const reason = this.abandonedReason(holder);
        if (reason !== null) {
          console.warn(`[FileLock] ${reason}`);
          await this.breakLock(holder);
          broken = true;
        }
      }

      const elapsed = Date.now() - startTime;
      if (elapsed > this.waitMs) {
        const pid = holder === 'gone' ? null : holder.pid;
        throw new Error(
          `Lock ${this.lockPath} held by process ${pid ?? 'unknown'} (waited ${elapsed}ms, ${attempt} attempts)`
        );
      }

      if (holder !== 'gone' && !broken) {
        await this.sleep(attempt, this.waitMs - elapsed);
      }
    }
  }

  /**
   * Release the lock (safe to call when it is not held)
   */
  async release(): Promise<void> {
    try {
      await fs.unlink(this.lockPath);
    } catch (error: unknown) {
      if (!isMissingFileError(error)) {
        throw error;
      }
    }
  }

  /**
   * Hold the lock for the duration of `callback`, releasing it on success or error
   */
  async withLock<T>(callback: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await callback();
    } finally {
      await this.release();
    }
  }

  private async tryCreate(): Promise<boolean> {
    try {
      const handle = await fs.open(this.lockPath, 'wx');
      try {
        await handle.writeFile(`${process.pid}\n${Date.now()}`, 'utf-8');
      } finally {
        await handle.close();
      }
      return true;
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        return false;
      }
      throw error;
    }
  }

  private async readHolder(): Promise<LockHolder | 'gone'> {
    let content: string;
    let modifiedAt: number;
    try {
      content = await fs.readFile(this.lockPath, 'utf-8');
      modifiedAt = (await fs.stat(this.lockPath)).mtimeMs;
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return 'gone';
      }
      throw error;
    }

    // Created but not yet written by its holder: only its age is known
    if (content === '') {
      return { content, pid: null, acquiredAt: modifiedAt, corrupt: false };
    }

    const [pidStr, timestampStr, ...rest] = content.trim().split('\n');
    const pid = Number.parseInt(pidStr ?? '', 10);
    const acquiredAt = Number.parseInt(timestampStr ?? '', 10);

    if (rest.length > 0 || Number.isNaN(pid) || Number.isNaN(acquiredAt)) {
      return { content, pid: null, acquiredAt: modifiedAt, corrupt: true };
    }

    return { content, pid, acquiredAt, corrupt: false };
  }

  /**
   * @returns why the lock may be broken, or null while its holder is live
   */
  private abandonedReason(holder: LockHolder): string | null {
    if (holder.corrupt) {
      return `Lock file ${this.lockPath} is corrupted, removing`;
    }
    if (holder.pid !== null && !this.processExists(holder.pid)) {
      return `Lock process ${holder.pid} no longer running, removing ${this.lockPath}`;
    }
    if (Date.now() - holder.acquiredAt > this.staleMs) {
      return `Removing stale lock ${this.lockPath} (>${this.staleMs}ms old)`;
    }
    return null;
  }

  /**
   * Remove an abandoned lock, unless it was replaced after inspection.
   *
   * The lock is first renamed to a private name. If its content no longer
   * matches what was inspected, another waiter already broke it and took a
   * fresh lock, which is linked back into place.
   */
  private async breakLock(inspected: LockHolder): Promise<void> {
    const claimedPath = `${this.lockPath}.${process.pid}.${randomUUID()}${CLAIMED_LOCK_SUFFIX}`;

    try {
      await fs.rename(this.lockPath, claimedPath);
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return;
      }
      throw error;
    }

    try {
      const claimed = await fs.readFile(claimedPath, 'utf-8');
      if (claimed !== inspected.content) {
        await this.restore(claimedPath);
      }
    } finally {
      await fs.unlink(claimedPath);
    }
  }

  private async restore(claimedPath: string): Promise<void> {
    try {
      await fs.link(claimedPath, this.lockPath);
    } catch (error: unknown) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw error;
      }
      console.warn(`[FileLock] Lock ${this.lockPath} was replaced while being broken`);
    }
  }

  /**
   * Check if process exists (signal 0 = existence check only)
   */
  private processExists(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error: unknown) {
      // EPERM: the process exists but belongs to another user
      return isErrnoException(error) && error.code === 'EPERM';
    }
  }

  /**
   * Exponential backoff: 10ms, 20ms, 40ms ... capped at 250ms and at the
   * time left before the deadline
   */
  private sleep(attempt: number, remainingMs: number): Promise<void> {
    const backoffMs = Math.min(10 * Math.pow(2, attempt - 1), FileLock.MAX_BACKOFF_MS, remainingMs + 1);
    return new Promise(resolve => setTimeout(resolve, backoffMs));
  }
}
