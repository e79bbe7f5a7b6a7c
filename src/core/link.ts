import fs from 'fs';
import path from 'path';
import { DeleteError, IOError, SymlinkError, errorCode } from './errors.js';
import { displace } from './backup.js';
import { lstatKind } from '../utils/fs.js';
import type { PathKind } from '../utils/fs.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { LinkOutcome } from './types.js';

export type TargetState =
  | { state: 'missing' }
  | { state: 'linked' }
  | { state: 'link-elsewhere'; linkTarget: string }
  | { state: 'link-broken'; linkTarget: string }
  | { state: 'dir' }
  | { state: 'file' }
  | { state: 'other' };

async function linkTargetExists(linkPath: string): Promise<boolean> {
  try {
    await fs.promises.stat(linkPath);
    return true;
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR' || code === 'ELOOP') return false;
    throw new IOError(linkPath, err);
  }
}

/** What sits at `targetPath`, judged against the link it should become. */
export async function inspectTarget(targetPath: string, sourcePath: string): Promise<TargetState> {
  let kind: PathKind;
  try {
    kind = await lstatKind(targetPath);
  } catch (err) {
    throw new IOError(targetPath, err);
  }
  if (kind === 'missing') return { state: 'missing' };
  if (kind === 'dir') return { state: 'dir' };
  if (kind === 'file') return { state: 'file' };
  if (kind === 'other') return { state: 'other' };

  let linkTarget: string;
  try {
    linkTarget = await fs.promises.readlink(targetPath);
  } catch (err) {
    throw new IOError(targetPath, err);
  }
  if (linkTarget === sourcePath) return { state: 'linked' };
  if (await linkTargetExists(targetPath)) return { state: 'link-elsewhere', linkTarget };
  return { state: 'link-broken', linkTarget };
}

async function removeLink(targetPath: string): Promise<void> {
  try {
    await fs.promises.unlink(targetPath);
  } catch (err) {
    throw new DeleteError(targetPath, err);
  }
}

async function clearTarget(
  existing: TargetState,
  targetPath: string,
  sourcePath: string,
  relativePath: string,
  backupDir: string,
  logger: Logger,
): Promise<LinkOutcome> {
  switch (existing.state) {
    case 'linked':
      return 'unchanged';
    case 'link-elsewhere':
      logger.warn('Link points elsewhere, changing it', { path: targetPath, from: existing.linkTarget, to: sourcePath });
      await removeLink(targetPath);
      return 'relinked';
    case 'link-broken':
      logger.warn('Removing existing broken link', { path: targetPath, dest: existing.linkTarget });
      await removeLink(targetPath);
      return 'replaced-broken';
    case 'dir':
    case 'file':
    case 'other':
      await displace(targetPath, relativePath, backupDir, logger);
      return 'backed-up';
    case 'missing':
      return 'linked';
  }
}

/**
 * Make `toDir/relativePath` a symlink to `sourcePath`, moving anything in the
 * way into `backupDir`. The parent directory must already exist.
 */
export async function ensureLink(
  sourcePath: string,
  toDir: string,
  relativePath: string,
  backupDir: string,
  logger: Logger = silentLogger,
): Promise<LinkOutcome> {
  const targetPath = path.join(toDir, relativePath);
  const existing = await inspectTarget(targetPath, sourcePath);
  if (existing.state === 'linked') {
    logger.debug('Link already points at source, skipping', { path: targetPath });
    return 'unchanged';
  }

  const outcome = await clearTarget(existing, targetPath, sourcePath, relativePath, backupDir, logger);
  logger.info('Linking', { from: sourcePath, to: targetPath });
  try {
    await fs.promises.symlink(sourcePath, targetPath);
  } catch (err) {
    throw new SymlinkError(sourcePath, targetPath, err);
  }
  return outcome;
}
