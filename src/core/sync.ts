import fs from 'fs';
import path from 'path';
import {
  CanonicalizeError,
  CreateDirError,
  DeleteError,
  IOError,
  MissingDirectoryError,
  ParentConflictError,
} from './errors.js';
import { displace } from './backup.js';
import { ensureLink } from './link.js';
import { ancestorsOf, walkSourceEntries } from './walk.js';
import { ensureDir, lstatKind } from '../utils/fs.js';
import type { PathKind } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { LinkConfig, SyncSummary } from './types.js';

export type SyncOptions = {
  exclude?: readonly string[];
  logger?: Logger;
  /**
   * Directory `backupDir` was placed under, e.g. `~/backup` for a timestamped
   * run. Removed at the end as well when this run created it and it is empty.
   */
  backupRoot?: string;
};

/** Ensure `dir` is an existing directory and return its canonical path. */
export async function resolveDirectory(dir: string, label: string): Promise<string> {
  const stat = await fs.promises.stat(dir).catch(() => null);
  if (!stat?.isDirectory()) throw new MissingDirectoryError(label, dir);
  try {
    return await fs.promises.realpath(dir);
  } catch (err) {
    throw new CanonicalizeError(dir, err);
  }
}

async function kindAt(p: string): Promise<PathKind> {
  try {
    return await lstatKind(p);
  } catch (err) {
    throw new IOError(p, err);
  }
}

type ParentFix = { backedUp: number; removedLinks: number };

/**
 * Create the directory the link for `relativePath` lives in. Files blocking
 * the way are moved to the backup tree, symlinks are removed.
 */
export async function ensureParentDir(
  toDir: string,
  relativePath: string,
  backupDir: string,
  logger: Logger,
): Promise<ParentFix> {
  const parentDir = path.dirname(path.join(toDir, relativePath));
  const fix: ParentFix = { backedUp: 0, removedLinks: 0 };
  try {
    await ensureDir(parentDir);
    return fix;
  } catch (err) {
    logger.info('Failed to create parent dir, walking up the tree for a file that needs to become a directory', {
      path: parentDir,
      error: err,
    });

    for (const ancestor of ancestorsOf(relativePath)) {
      const absolute = path.join(toDir, ancestor);
      const kind = await kindAt(absolute);
      logger.debug('Checking path', { path: absolute, kind });
      if (kind === 'missing' || kind === 'dir') continue;

      logger.warn('File will be overwritten by parent directory of link', {
        file: absolute,
        link: path.join(toDir, relativePath),
      });
      if (kind === 'symlink') {
        try {
          await fs.promises.unlink(absolute);
        } catch (unlinkErr) {
          throw new DeleteError(absolute, unlinkErr);
        }
        fix.removedLinks += 1;
      } else {
        await displace(absolute, ancestor, backupDir, logger);
        fix.backedUp += 1;
      }
    }

    if (fix.backedUp === 0 && fix.removedLinks === 0) {
      throw new ParentConflictError(parentDir, err);
    }
  }

  try {
    await ensureDir(parentDir);
  } catch (err) {
    throw new CreateDirError(parentDir, err);
  }
  return fix;
}

/**
 * Symlink every non-directory entry of `fromDir` into the same place under
 * `toDir`. Anything in the way is moved under `backupDir`; the backup dir
 * (and a `backupRoot` this run created) is removed again when nothing needed
 * moving.
 */
export async function synchronize(config: LinkConfig, opts: SyncOptions = {}): Promise<SyncSummary> {
  const logger = opts.logger ?? createLogger('sync');
  const fromDir = await resolveDirectory(config.fromDir, 'From');
  const toDir = await resolveDirectory(config.toDir, 'To');

  const createdRoot = opts.backupRoot !== undefined && (await kindAt(opts.backupRoot)) === 'missing';
  if ((await kindAt(config.backupDir)) === 'missing') {
    logger.debug("Backup dir doesn't exist, creating it", { path: config.backupDir });
    try {
      await ensureDir(config.backupDir);
    } catch (err) {
      throw new CreateDirError(config.backupDir, err);
    }
  }
  const backupDir = await resolveDirectory(config.backupDir, 'Backup');

  logger.info('Linking', { from: fromDir, to: toDir, backup: backupDir });

  const summary: SyncSummary = {
    linked: 0,
    unchanged: 0,
    relinked: 0,
    backedUp: 0,
    removedLinks: 0,
    backupDir,
    backupKept: false,
  };

  for await (const entry of walkSourceEntries(fromDir, { exclude: opts.exclude })) {
    const fix = await ensureParentDir(toDir, entry.relativePath, backupDir, logger);
    summary.backedUp += fix.backedUp;
    summary.removedLinks += fix.removedLinks;

    const outcome = await ensureLink(entry.absolutePath, toDir, entry.relativePath, backupDir, logger);
    if (outcome === 'unchanged') {
      summary.unchanged += 1;
      continue;
    }
    summary.linked += 1;
    if (outcome === 'relinked' || outcome === 'replaced-broken') summary.relinked += 1;
    if (outcome === 'backed-up') summary.backedUp += 1;
  }

  try {
    await fs.promises.rmdir(backupDir);
  } catch (err) {
    summary.backupKept = true;
    logger.info('Backup dir non-empty, check contents', { path: backupDir, error: err });
  }

  if (!summary.backupKept && createdRoot && opts.backupRoot !== undefined) {
    try {
      await fs.promises.rmdir(opts.backupRoot);
    } catch (err) {
      logger.info('Backup root not removed', { path: opts.backupRoot, error: err });
    }
  }

  return summary;
}
