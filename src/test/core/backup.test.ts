import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { displace } from '../../core/backup.js';
import { RenameError } from '../../core/errors.js';
import { exists, makeSandbox, removeSandbox, writeTree } from '../helpers.js';
import type { Sandbox } from '../helpers.js';

describe('displace', () => {
  let sandbox: Sandbox;

  beforeEach(async () => {
    sandbox = await makeSandbox();
  });

  afterEach(async () => {
    await removeSandbox(sandbox);
  });

  it('moves a file under the backup dir at the same relative path', async () => {
    await writeTree(sandbox.toDir, { 'config/app/settings.ini': 'keep me' });
    const existing = path.join(sandbox.toDir, 'config/app/settings.ini');

    const moved = await displace(existing, path.join('config', 'app', 'settings.ini'), sandbox.backupDir);

    expect(moved).toBe(path.join(sandbox.backupDir, 'config', 'app', 'settings.ini'));
    expect(await fs.promises.readFile(moved, 'utf8')).toBe('keep me');
    expect(await exists(existing)).toBe(false);
  });

  it('moves a whole directory', async () => {
    await writeTree(sandbox.toDir, { 'plugins/a.lua': 'a', 'plugins/deep/b.lua': 'b' });

    await displace(path.join(sandbox.toDir, 'plugins'), 'plugins', sandbox.backupDir);

    expect(await fs.promises.readFile(path.join(sandbox.backupDir, 'plugins/deep/b.lua'), 'utf8')).toBe('b');
    expect(await exists(path.join(sandbox.toDir, 'plugins'))).toBe(false);
  });

  it('refuses to overwrite an earlier backup', async () => {
    await writeTree(sandbox.toDir, { '.bashrc': 'new' });
    await writeTree(sandbox.backupDir, { '.bashrc': 'earlier' });

    await expect(displace(path.join(sandbox.toDir, '.bashrc'), '.bashrc', sandbox.backupDir))
      .rejects.toBeInstanceOf(RenameError);
    expect(await fs.promises.readFile(path.join(sandbox.backupDir, '.bashrc'), 'utf8')).toBe('earlier');
    expect(await fs.promises.readFile(path.join(sandbox.toDir, '.bashrc'), 'utf8')).toBe('new');
  });
});
