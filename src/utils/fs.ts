import fs from 'fs';
import { errorCode } from '../core/errors.js';

export type PathKind = 'missing' | 'file' | 'dir' | 'symlink' | 'other';

/**
 * Kind of whatever sits at `p`, without following a final symlink.
 * ENOENT and ENOTDIR both mean "nothing there"; other errors propagate.
 */
export async function lstatKind(p: string): Promise<PathKind> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.lstat(p);
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') return 'missing';
    throw err;
  }
  if (stat.isSymbolicLink()) return 'symlink';
  if (stat.isDirectory()) return 'dir';
  if (stat.isFile()) return 'file';
  return 'other';
}

export async function ensureDir(p: string): Promise<void> {
  await fs.promises.mkdir(p, { recursive: true });
}
