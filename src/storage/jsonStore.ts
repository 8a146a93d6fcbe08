import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../utils/logger';

const TEMP_FILE_PATTERN = /\.tmp\.\d+\.\d+$/; // Matches .tmp.{pid}.{timestamp}

/**
 * Writes text to a file atomically:
 * 1) write to a temp file beside the target
 * 2) fsync
 * 3) rename over the target
 * The target is either the old content or the new content, never a partial write.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));

  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;

  try {
    await fs.writeFile(tempPath, content, 'utf-8');

    const fd = await fs.open(tempPath, 'r+');
    try {
      await fs.fsync(fd);
    } finally {
      await fs.close(fd);
    }

    await fs.rename(tempPath, filePath);
  } catch (error) {
    logger.error(`Failed to write ${filePath} atomically: ${error}`);
    await fs.remove(tempPath);
    throw error;
  }
}

export async function writeJsonAtomic<T>(filePath: string, data: T): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(data, null, 2) + '\n');
}

/**
 * Removes temp files left behind by interrupted atomic writes in `directory`.
 * Returns the number of files removed.
 */
export async function cleanupOrphanedTempFiles(directory: string): Promise<number> {
  if (!(await fs.pathExists(directory))) {
    return 0;
  }

  let cleanedCount = 0;
  const entries = await fs.readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.isFile() && TEMP_FILE_PATTERN.test(entry.name)) {
      await fs.remove(path.join(directory, entry.name));
      cleanedCount++;
      logger.debug(`Cleaned up orphaned temp file: ${entry.name}`);
    }
  }
  return cleanedCount;
}
