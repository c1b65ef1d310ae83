import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileLock } from '../../src/services/file-lock.js';

describe('FileLock', () => {
  let testDir: string;
  let testLockPath: string;
  let lock: FileLock;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'file-lock-test-'));
    testLockPath = path.join(testDir, 'entry.cache.lock');
    lock = new FileLock(testLockPath, { waitMs: 200, staleMs: 5_000 });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('acquire', () => {
    it('should_writePidAndTimestamp_when_noLockExists', async () => {
      const before = Date.now();
      await lock.acquire();

      const [pid, timestamp] = (await fs.readFile(testLockPath, 'utf-8')).split('\n');
      expect(pid).toBe(String(process.pid));
      expect(Number(timestamp)).toBeGreaterThanOrEqual(before);
    });

    it('should_removeLock_when_holderProcessNoLongerExists', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      await fs.writeFile(testLockPath, `999999\n${Date.now()}`, 'utf-8');

      await lock.acquire();

      const lockContent = await fs.readFile(testLockPath, 'utf-8');
      expect(lockContent.startsWith(`${process.pid}\n`)).toBe(true);
    });

    it('should_removeLock_when_olderThanStaleThreshold', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const oldTimestamp = Date.now() - 10_000;
      await fs.writeFile(testLockPath, `${process.pid}\n${oldTimestamp}`, 'utf-8');

      await lock.acquire();

      const [, timestamp] = (await fs.readFile(testLockPath, 'utf-8')).split('\n');
      expect(Number(timestamp)).toBeGreaterThan(oldTimestamp);
    });

    it('should_removeLock_when_contentIsCorrupted', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      await fs.writeFile(testLockPath, 'garbage', 'utf-8');

      await lock.acquire();

      expect(warn).toHaveBeenCalledWith(`[FileLock] Lock file ${testLockPath} is corrupted, removing`);
    });

    it('should_throwAfterWait_when_liveProcessHoldsFreshLock', async () => {
      await fs.writeFile(testLockPath, `${process.pid}\n${Date.now()}`, 'utf-8');

      await expect(lock.acquire()).rejects.toThrow(`Lock ${testLockPath} held by process ${process.pid}`);
    });

    it('should_waitForEmptyLock_when_itIsFresh', async () => {
      await fs.writeFile(testLockPath, '', 'utf-8');

      await expect(lock.acquire()).rejects.toThrow(`Lock ${testLockPath} held by process unknown`);
    });

    it('should_waitFullDeadline_when_waitExceedsBackoffBudget', async () => {
      await fs.writeFile(testLockPath, `${process.pid}\n${Date.now()}`, 'utf-8');
      const patient = new FileLock(testLockPath, { waitMs: 30_000, staleMs: 3_600_000 });
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });

      try {
        const startedAt = Date.now();
        let settled = false;
        const outcome = patient.acquire().then(
          () => 'acquired',
          (error: unknown) => String(error)
        );
        void outcome.finally(() => { settled = true; });

        // Advance fake time only while the lock is sleeping between attempts
        while (!settled) {
          if (vi.getTimerCount() > 0) {
            await vi.advanceTimersToNextTimerAsync();
          } else {
            await new Promise(resolve => setImmediate(resolve));
          }
        }

        expect(await outcome).toContain(`Error: Lock ${testLockPath} held by process ${process.pid}`);
        expect(Date.now() - startedAt).toBeGreaterThan(30_000);
      } finally {
        vi.useRealTimers();
      }
    });

    it('should_keepReplacementLock_when_staleLockReplacedWhileBreaking', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      await fs.writeFile(testLockPath, `${process.pid}\n${Date.now() - 60_000}`, 'utf-8');
      const replacement = `${process.pid}\n${Date.now()}`;
      const rename = fs.rename.bind(fs);

      // Another waiter breaks the stale lock and takes a fresh one first
      vi.spyOn(fs, 'rename').mockImplementationOnce(async (from, to) => {
        await fs.writeFile(testLockPath, replacement, 'utf-8');
        return rename(from, to);
      });

      await expect(lock.acquire()).rejects.toThrow(`Lock ${testLockPath} held by process ${process.pid}`);
      expect(await fs.readFile(testLockPath, 'utf-8')).toBe(replacement);
      expect(await fs.readdir(testDir)).toEqual([path.basename(testLockPath)]);
    });

    it('should_propagateFault_when_directoryMissing', async () => {
      const orphan = new FileLock(path.join(testDir, 'missing', 'x.lock'));

      await expect(orphan.acquire()).rejects.toHaveProperty('code', 'ENOENT');
    });
  });

  describe('release', () => {
    it('should_removeLockFile_when_released', async () => {
      await lock.acquire();
      await lock.release();

      await expect(fs.stat(testLockPath)).rejects.toHaveProperty('code', 'ENOENT');
    });

    it('should_notThrow_when_lockNotHeld', async () => {
      await expect(lock.release()).resolves.toBeUndefined();
    });
  });

  describe('withLock', () => {
    it('should_releaseLock_when_callbackSucceeds', async () => {
      const result = await lock.withLock(async () => {
        await fs.stat(testLockPath);
        return 'done';
      });

      expect(result).toBe('done');
      await expect(fs.stat(testLockPath)).rejects.toHaveProperty('code', 'ENOENT');
    });

    it('should_releaseLock_when_callbackThrows', async () => {
      await expect(
        lock.withLock(async () => {
          throw new Error('write failed');
        })
      ).rejects.toThrow('write failed');

      await expect(fs.stat(testLockPath)).rejects.toHaveProperty('code', 'ENOENT');
    });

    it('should_serializeHolders_when_twoLocksShareAPath', async () => {
      const other = new FileLock(testLockPath, { waitMs: 2_000 });
      const order: string[] = [];

      const first = lock.withLock(async () => {
        order.push('first:start');
        await new Promise(resolve => setTimeout(resolve, 50));
        order.push('first:end');
      });
      await vi.waitFor(() => expect(order).toContain('first:start'));

      await other.withLock(async () => {
        order.push('second:start');
        order.push('second:end');
      });
      await first;

      expect(order).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
    });
  });
});
