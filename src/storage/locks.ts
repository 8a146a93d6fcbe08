import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../utils/logger';

export interface LockOptions {
  staleMs?: number;
  retryIntervalMs?: number;
  maxRetries?: number;
}

interface LockOwner {
  pid: number;
  createdAt: number;
}

function isLockOwner(data: unknown): data is LockOwner {
  return typeof data === 'object' && data !== null
    && typeof Reflect.get(data, 'pid') === 'number'
    && typeof Reflect.get(data, 'createdAt') === 'number';
}

/**
 * Runs `fn` while holding a file lock at `lockPath`, so two annotation runs never
 * append to the same checkpoint. A lock is broken only when its owner process no
 * longer exists, or when the lock file is unreadable and older than `staleMs`.
 * A live owner keeps its lock however long the run takes.
 */
export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const {
    staleMs = 6 * 60 * 60 * 1000,
    retryIntervalMs = 1000,
    maxRetries = 5,
  } = options;

  await fs.ensureDir(path.dirname(lockPath));

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    if (await acquireLock(lockPath, staleMs)) {
      try {
        return await fn();
      } finally {
        await releaseLock(lockPath);
      }
    }
    if (attempt < maxRetries) {
      await new Promise((resolve) => setTimeout(resolve, retryIntervalMs));
    }
  }

  throw new Error(`Another annotation run holds ${lockPath}; gave up after ${maxRetries} attempts`);
}

function processIsAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

async function acquireLock(lockPath: string, staleMs: number): Promise<boolean> {
  const owner: LockOwner = { pid: process.pid, createdAt: Date.now() };
  try {
    // 'wx' fails if the path exists
    await fs.writeFile(lockPath, JSON.stringify(owner), { flag: 'wx' });
    return true;
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
      throw error;
    }
  }

  let existing: unknown = null;
  try {
    existing = await fs.readJson(lockPath);
  } catch (readError) {
    logger.debug(`Could not read lock file ${lockPath}: ${readError}`);
  }

  if (isLockOwner(existing)) {
    if (processIsAlive(existing.pid)) {
      return false;
    }
    logger.warn(`Lock file ${lockPath} belongs to process ${existing.pid}, which has exited. Breaking lock.`);
    await fs.remove(lockPath);
    return false;
  }

  const age = await lockFileAge(lockPath);
  if (age !== undefined && age > staleMs) {
    logger.warn(`Lock file ${lockPath} is unreadable and ${age}ms old. Breaking lock.`);
    await fs.remove(lockPath);
  }
  return false;
}

async function lockFileAge(lockPath: string): Promise<number | undefined> {
  try {
    const stats = await fs.stat(lockPath);
    return Date.now() - stats.mtimeMs;
  } catch (error) {
    // Released between our write attempt and now
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

async function releaseLock(lockPath: string): Promise<void> {
  try {
    await fs.remove(lockPath);
  } catch (error) {
    logger.error(`Failed to release lock at ${lockPath}: ${error}`);
  }
}
