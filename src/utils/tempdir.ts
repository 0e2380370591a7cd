import * as fs from 'fs/promises';
import * as path from 'path';
import { errorMessage } from '../errors.js';
import { logger } from './logger.js';

/** Delete a file if present. Cleanup failures are logged, never thrown. */
export async function removeIfExists(filePath: string): Promise<void> {
  try {
    await fs.rm(filePath, { force: true });
  } catch (err) {
    logger.warn('Cleanup: could not remove file', { filePath, error: errorMessage(err) });
  }
}

/**
 * Run `fn` inside a fresh private directory under `parent`; the directory and
 * everything in it is removed when `fn` settles, whichever way.
 */
export async function withTempDir<T>(
  parent: string,
  prefix: string,
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  await fs.mkdir(parent, { recursive: true });
  const dir = await fs.mkdtemp(path.join(parent, prefix));
  logger.debug('Temp dir created', { dir });
  try {
    return await fn(dir);
  } finally {
    try {
      await fs.rm(dir, { recursive: true, force: true });
      logger.debug('Temp dir removed', { dir });
    } catch (err) {
      logger.warn('Cleanup: could not remove temp dir', { dir, error: errorMessage(err) });
    }
  }
}
