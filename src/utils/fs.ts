import fs from 'fs';
import type { Stats } from 'fs';
import { isNotFoundError } from '../core/errors.js';

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.promises.access(p);
    return true;
  } catch {
    return false;
  }
}

/** Like `lstat`, but `null` when nothing (not even a dangling link) is at `p`. */
export async function lstatOrNull(p: string): Promise<Stats | null> {
  try {
    return await fs.promises.lstat(p);
  } catch (err) {
    if (isNotFoundError(err)) return null;
    throw err;
  }
}

export async function ensureDir(dir: string): Promise<void> {
  await fs.promises.mkdir(dir, { recursive: true });
}

export async function removePath(p: string): Promise<void> {
  await fs.promises.rm(p, { recursive: true, force: true });
}

export async function readLines(file: string): Promise<string[]> {
  const content = await fs.promises.readFile(file, 'utf8');
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}
