import fs from 'fs';
import path from 'path';
import { CreateDirError, RenameError } from './errors.js';
import { ensureDir, lstatKind } from '../utils/fs.js';
import type { PathKind } from '../utils/fs.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export function backupPathFor(backupDir: string, relativePath: string): string {
  return path.join(backupDir, relativePath);
}

/**
 * Move whatever sits at `existingPath` to `backupDir/relativePath`.
 * Refuses to overwrite an earlier backup at the same place.
 */
export async function displace(
  existingPath: string,
  relativePath: string,
  backupDir: string,
  logger: Logger = silentLogger,
): Promise<string> {
  const destination = backupPathFor(backupDir, relativePath);
  const parent = path.dirname(destination);
  try {
    await ensureDir(parent);
  } catch (err) {
    throw new CreateDirError(parent, err);
  }

  let destinationKind: PathKind;
  try {
    destinationKind = await lstatKind(destination);
  } catch (err) {
    throw new RenameError(existingPath, destination, err);
  }
  if (destinationKind !== 'missing') {
    throw new RenameError(existingPath, destination, new Error('backup destination already exists'));
  }

  logger.warn('Moving to backup', { from: existingPath, to: destination });
  try {
    await fs.promises.rename(existingPath, destination);
  } catch (err) {
    throw new RenameError(existingPath, destination, err);
  }
  return destination;
}
