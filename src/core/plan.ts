import fs from 'fs';
import path from 'path';
import { IOError } from './errors.js';
import { backupPathFor } from './backup.js';
import { inspectTarget } from './link.js';
import { resolveDirectory } from './sync.js';
import { ancestorsOf, walkSourceEntries } from './walk.js';
import { lstatKind } from '../utils/fs.js';
import type { PathKind } from '../utils/fs.js';
import type { BackupTask, LinkConfig, LinkPlan, LinkTask } from './types.js';

async function blockingAncestor(
  toDir: string,
  relativePath: string,
): Promise<{ ancestor: string; kind: 'file' | 'symlink' | 'other' } | null> {
  for (const ancestor of ancestorsOf(relativePath)) {
    const absolute = path.join(toDir, ancestor);
    let kind: PathKind;
    try {
      kind = await lstatKind(absolute);
    } catch (err) {
      throw new IOError(absolute, err);
    }
    if (kind === 'missing' || kind === 'dir') continue;
    // mkdir -p goes through a link to a directory, so it never blocks.
    if (kind === 'symlink' && (await fs.promises.stat(absolute).catch(() => null))?.isDirectory()) continue;
    return { ancestor, kind };
  }
  return null;
}

async function analyzeTarget(
  source: string,
  toDir: string,
  relativePath: string,
  backupDir: string,
  cleared: Set<string>,
): Promise<LinkTask> {
  const target = path.join(toDir, relativePath);
  const blocked = await blockingAncestor(toDir, relativePath);
  if (blocked) {
    if (cleared.has(blocked.ancestor)) return { type: 'link', source, target };
    cleared.add(blocked.ancestor);
    return { type: 'clear-parent', source, target, ancestor: blocked.ancestor, ancestorKind: blocked.kind };
  }

  const existing = await inspectTarget(target, source);
  switch (existing.state) {
    case 'linked':
      return { type: 'noop', source, target };
    case 'missing':
      return { type: 'link', source, target };
    case 'link-elsewhere':
      return { type: 'relink', source, target, currentTarget: existing.linkTarget };
    case 'link-broken':
      return { type: 'replace-broken', source, target, currentTarget: existing.linkTarget };
    case 'dir':
    case 'file':
    case 'other':
      return {
        type: 'backup',
        source,
        target,
        existingKind: existing.state,
        backupPath: backupPathFor(backupDir, relativePath),
      };
  }
}

/** Classify every source entry without touching the filesystem. */
export async function buildLinkPlan(config: LinkConfig, opts: { exclude?: readonly string[] } = {}): Promise<LinkPlan> {
  const fromDir = await resolveDirectory(config.fromDir, 'From');
  const toDir = await resolveDirectory(config.toDir, 'To');
  let backupDir = path.resolve(config.backupDir);
  if ((await lstatKind(backupDir)) !== 'missing') {
    backupDir = await resolveDirectory(backupDir, 'Backup');
  }

  const tasks: LinkTask[] = [];
  const cleared = new Set<string>();
  for await (const entry of walkSourceEntries(fromDir, { exclude: opts.exclude })) {
    tasks.push(await analyzeTarget(entry.absolutePath, toDir, entry.relativePath, backupDir, cleared));
  }

  const changes = tasks.filter((t) => t.type !== 'noop');
  const backups = tasks.filter((t): t is BackupTask => t.type === 'backup' || t.type === 'clear-parent');

  return { config: { fromDir, toDir, backupDir }, tasks, changes, backups };
}
