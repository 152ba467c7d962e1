import fs from 'fs';
import path from 'path';

/** True when something exists at `p`, including a dangling symlink. */
export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.promises.lstat(p);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

export async function isExecutableFile(p: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(p);
    if (!stat.isFile()) return false;
    await fs.promises.access(p, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function readTextFile(p: string): Promise<string | null> {
  try {
    return await fs.promises.readFile(p, 'utf8');
  } catch {
    return null;
  }
}

export async function readLinkAbsolute(linkPath: string): Promise<string | null> {
  try {
    const link = await fs.promises.readlink(linkPath);
    return path.isAbsolute(link) ? link : path.resolve(path.dirname(linkPath), link);
  } catch {
    return null;
  }
}

export async function ensureDir(dir: string): Promise<void> {
  await fs.promises.mkdir(dir, { recursive: true });
}

export async function removePath(p: string): Promise<void> {
  await fs.promises.rm(p, { recursive: true, force: true });
}
