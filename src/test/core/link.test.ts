import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ensureLink, inspectTarget } from '../../core/link.js';
import { exists, makeSandbox, removeSandbox, writeTree } from '../helpers.js';
import type { Sandbox } from '../helpers.js';

describe('ensureLink', () => {
  let sandbox: Sandbox;
  let source: string;
  let target: string;

  beforeEach(async () => {
    sandbox = await makeSandbox();
    await writeTree(sandbox.fromDir, { '.vimrc': 'set nu' });
    source = path.join(sandbox.fromDir, '.vimrc');
    target = path.join(sandbox.toDir, '.vimrc');
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it('creates an absolute link when nothing is there', async () => {
    expect(await ensureLink(source, sandbox.toDir, '.vimrc', sandbox.backupDir)).toBe('linked');
    expect(await fs.promises.readlink(target)).toBe(source);
    expect(await exists(sandbox.backupDir)).toBe(false);
  });

  it('leaves a correct link alone', async () => {
    await fs.promises.symlink(source, target);
    const before = await fs.promises.lstat(target);

    expect(await ensureLink(source, sandbox.toDir, '.vimrc', sandbox.backupDir)).toBe('unchanged');

    const after = await fs.promises.lstat(target);
    expect(after.ino).toBe(before.ino);
    expect(after.mtimeMs).toBe(before.mtimeMs);
  });

  it('repoints a link that points elsewhere without backing it up', async () => {
    await writeTree(sandbox.root, { 'other/.vimrc': 'other' });
    const other = path.join(sandbox.root, 'other/.vimrc');
    await fs.promises.symlink(other, target);

    expect(await ensureLink(source, sandbox.toDir, '.vimrc', sandbox.backupDir)).toBe('relinked');
    expect(await fs.promises.readlink(target)).toBe(source);
    expect(await fs.promises.readFile(other, 'utf8')).toBe('other');
    expect(await exists(path.join(sandbox.backupDir, '.vimrc'))).toBe(false);
  });

  it('replaces a broken link', async () => {
    await fs.promises.symlink(path.join(sandbox.root, 'gone'), target);

    expect(await ensureLink(source, sandbox.toDir, '.vimrc', sandbox.backupDir)).toBe('replaced-broken');
    expect(await fs.promises.readlink(target)).toBe(source);
  });

  it('backs up a regular file before linking', async () => {
    await writeTree(sandbox.toDir, { '.vimrc': 'local edits' });

    expect(await ensureLink(source, sandbox.toDir, '.vimrc', sandbox.backupDir)).toBe('backed-up');
    expect(await fs.promises.readlink(target)).toBe(source);
    expect(await fs.promises.readFile(path.join(sandbox.backupDir, '.vimrc'), 'utf8')).toBe('local edits');
  });

  it('backs up a whole directory before linking', async () => {
    await writeTree(sandbox.toDir, { '.vimrc/nested/file': 'deep' });

    expect(await ensureLink(source, sandbox.toDir, '.vimrc', sandbox.backupDir)).toBe('backed-up');
    expect((await fs.promises.lstat(target)).isSymbolicLink()).toBe(true);
    expect(await fs.promises.readFile(path.join(sandbox.backupDir, '.vimrc/nested/file'), 'utf8')).toBe('deep');
  });

  it('is a no-op the second time', async () => {
    await writeTree(sandbox.toDir, { '.vimrc': 'local edits' });
    await ensureLink(source, sandbox.toDir, '.vimrc', sandbox.backupDir);
    expect(await ensureLink(source, sandbox.toDir, '.vimrc', sandbox.backupDir)).toBe('unchanged');
  });
});

describe('inspectTarget', () => {
  let sandbox: Sandbox;

  beforeEach(async () => {
    sandbox = await makeSandbox();
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it('treats a path below a file as missing', async () => {
    await writeTree(sandbox.toDir, { a: 'file' });
    expect(await inspectTarget(path.join(sandbox.toDir, 'a', 'b'), '/src/a/b')).toEqual({ state: 'missing' });
  });

  it('reports where a foreign link points', async () => {
    await writeTree(sandbox.root, { 'real.txt': 'x' });
    const link = path.join(sandbox.toDir, 'l');
    await fs.promises.symlink(path.join(sandbox.root, 'real.txt'), link);
    expect(await inspectTarget(link, '/src/l')).toEqual({
      state: 'link-elsewhere',
      linkTarget: path.join(sandbox.root, 'real.txt'),
    });
  });
});
