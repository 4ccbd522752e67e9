/**
 * Scoped temporary directories
 * The directory exists for the duration of the callback and is removed afterwards,
 * whether the callback resolves or throws.
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { StagingError, errorMessage } from '../errors.js';
import { logger } from './logger.js';

const log = logger('workspace');

export interface TempWorkspaceOptions {
  prefix: string;
  /** Defaults to os.tmpdir() */
  root?: string;
}

export async function withTempWorkspace<T>(
  options: TempWorkspaceOptions,
  fn: (dir: string) => Promise<T>
): Promise<T> {
  let dir: string;
  try {
    dir = await mkdtemp(join(options.root ?? tmpdir(), options.prefix));
  } catch (error) {
    throw new StagingError(`Failed to create temporary directory: ${errorMessage(error)}`, { cause: error });
  }

  log.debug('created', { dir });
  try {
    return await fn(dir);
  } finally {
    try {
      await rm(dir, { recursive: true, force: true });
      log.debug('removed', { dir });
    } catch (error) {
      // Never mask the callback's own outcome with a cleanup failure
      log.error('failed to remove temporary directory', { dir, error: errorMessage(error) });
    }
  }
}
