import fs from 'fs';
import path from 'path';
import { IOError } from './errors.js';
import type { SourceEntry, SourceKind } from './types.js';

export type WalkOptions = {
  /** Path segment names to prune, e.g. `.git`. */
  exclude?: readonly string[];
};

export type EntryFilter = (relativePath: string) => boolean;

export function excludeSegments(names: readonly string[]): EntryFilter {
  const excluded = new Set(names);
  return (relativePath) => !relativePath.split(path.sep).some((segment) => excluded.has(segment));
}

function entryKind(dirent: fs.Dirent): SourceKind {
  if (dirent.isSymbolicLink()) return 'symlink';
  if (dirent.isFile()) return 'file';
  return 'other';
}

/**
 * Every non-directory object below `root`, depth-first with siblings sorted by
 * name. Symlinks to directories are yielded, not followed.
 */
export async function* walkSourceEntries(root: string, opts: WalkOptions = {}): AsyncGenerator<SourceEntry> {
  const keep = excludeSegments(opts.exclude ?? []);

  async function* visit(dir: string): AsyncGenerator<SourceEntry> {
    let dirents: fs.Dirent[];
    try {
      dirents = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (err) {
      throw new IOError(dir, err);
    }
    dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const dirent of dirents) {
      const absolutePath = path.join(dir, dirent.name);
      const relativePath = path.relative(root, absolutePath);
      if (!keep(relativePath)) continue;
      if (dirent.isDirectory()) {
        yield* visit(absolutePath);
        continue;
      }
      yield { relativePath, absolutePath, kind: entryKind(dirent) };
    }
  }

  yield* visit(root);
}

/** Ancestors of a relative path, immediate parent first, excluding the root. */
export function ancestorsOf(relativePath: string): string[] {
  const ancestors: string[] = [];
  let current = path.dirname(relativePath);
  while (current !== '.' && current !== '' && current !== path.sep) {
    ancestors.push(current);
    current = path.dirname(current);
  }
  return ancestors;
}
