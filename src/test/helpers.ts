import fs from 'fs';
import os from 'os';
import path from 'path';

export type Sandbox = {
  root: string;
  fromDir: string;
  toDir: string;
  backupDir: string;
};

/** Fresh from/ and to/ dirs under a canonical temp root; backup/ is left absent. */
export async function makeSandbox(): Promise<Sandbox> {
  const root = await fs.promises.realpath(await fs.promises.mkdtemp(path.join(os.tmpdir(), 'dotsync-')));
  const fromDir = path.join(root, 'from');
  const toDir = path.join(root, 'to');
  await fs.promises.mkdir(fromDir);
  await fs.promises.mkdir(toDir);
  return { root, fromDir, toDir, backupDir: path.join(root, 'backup') };
}

export async function removeSandbox(sandbox: Sandbox): Promise<void> {
  await fs.promises.rm(sandbox.root, { recursive: true, force: true });
}

/** Write each `relativePath -> content` pair below `dir`, creating parents. */
export async function writeTree(dir: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const file = path.join(dir, rel);
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(file, content);
  }
}

export async function exists(p: string): Promise<boolean> {
  try {
    await fs.promises.lstat(p);
    return true;
  } catch {
    return false;
  }
}
