import fs from 'fs';
import chalk from 'chalk';
import type { Stats } from 'fs';
import os from 'os';
import path from 'path';
import type { LinkOutcome, LinkStrategyName, OsKind, SourceKind } from './types.js';
import type { Logger } from '../utils/logger.js';
import { getErrorMessage, isPermissionError } from './errors.js';
import { ensureDir, lstatOrNull, removePath } from '../utils/fs.js';

export const BACKUP_SUFFIX = '.backup';

export type LinkStrategy = {
  readonly name: LinkStrategyName;
  create(source: string, target: string, kind: SourceKind): Promise<void>;
};

export type Linker = {
  readonly strategy: LinkStrategy;
  link(source: string, target: string): Promise<LinkOutcome>;
};

async function realpathOrResolve(p: string): Promise<string> {
  try {
    return await fs.promises.realpath(p);
  } catch {
    return path.resolve(p);
  }
}

export const symlinkStrategy: LinkStrategy = {
  name: 'symlink',
  async create(source, target, kind) {
    // Relative to the real location of the target's directory; a parent may itself be a link
    const realDir = await fs.promises.realpath(path.dirname(target));
    const relativeSource = path.relative(realDir, await realpathOrResolve(source));
    await fs.promises.symlink(relativeSource, target, kind);
  },
};

/**
 * For hosts without unprivileged symbolic links: directories become junctions,
 * files become hard links, or copies when the two paths sit on different volumes.
 */
export const fallbackStrategy: LinkStrategy = {
  name: 'fallback',
  async create(source, target, kind) {
    if (kind === 'dir') {
      await fs.promises.symlink(path.resolve(source), target, 'junction');
      return;
    }
    try {
      await fs.promises.link(source, target);
    } catch (err) {
      if (isPermissionError(err)) throw err;
      await fs.promises.copyFile(source, target);
    }
  },
};

/**
 * Picks the link strategy once at startup. Only Windows needs a check: a
 * scratch symlink tells us whether the current user may create them. Any
 * failure along the way means the fallback.
 */
export async function detectLinkStrategy(
  osKind: OsKind,
  opts: { scratchRoot?: string; logger?: Logger } = {},
): Promise<LinkStrategy> {
  if (osKind !== 'windows') return symlinkStrategy;
  let dir: string | undefined;
  try {
    dir = await fs.promises.mkdtemp(path.join(opts.scratchRoot ?? os.tmpdir(), 'dotfiles-linktest-'));
    const scratchSource = path.join(dir, 'source');
    await fs.promises.writeFile(scratchSource, '');
    await fs.promises.symlink(scratchSource, path.join(dir, 'link'), 'file');
    return symlinkStrategy;
  } catch (err) {
    opts.logger?.debug(`Symbolic links unavailable (${getErrorMessage(err)}), using junctions and hard links`);
    return fallbackStrategy;
  } finally {
    if (dir) await removeScratch(dir, opts.logger);
  }
}

async function removeScratch(dir: string, logger?: Logger): Promise<void> {
  try {
    await removePath(dir);
  } catch (err) {
    logger?.debug(`Could not remove ${dir}: ${getErrorMessage(err)}`);
  }
}

async function sourceKind(source: string): Promise<SourceKind> {
  try {
    const stat = await fs.promises.stat(source);
    return stat.isDirectory() ? 'dir' : 'file';
  } catch {
    return 'file';
  }
}

async function isHardLinkOf(target: Stats, source: string): Promise<boolean> {
  if (!target.isFile() || target.nlink < 2) return false;
  const stat = await lstatOrNull(source);
  return !!stat && stat.ino === target.ino && stat.dev === target.dev;
}

async function removeLink(target: string): Promise<void> {
  try {
    await fs.promises.unlink(target);
  } catch (err) {
    // Directory symlinks and junctions on Windows refuse unlink
    if (!isPermissionError(err)) throw err;
    await fs.promises.rmdir(target);
  }
}

async function backupExisting(target: string, logger: Logger): Promise<string> {
  const backupPath = `${target}${BACKUP_SUFFIX}`;
  await removePath(backupPath);
  await fs.promises.rename(target, backupPath);
  logger.info(`Backed up existing config: ${chalk.cyan(backupPath)}`);
  return backupPath;
}

export function createLinker(opts: { strategy: LinkStrategy; logger: Logger }): Linker {
  const { strategy, logger } = opts;

  async function link(source: string, target: string): Promise<LinkOutcome> {
    let backedUp = false;
    try {
      await ensureDir(path.dirname(target));
      const existing = await lstatOrNull(target);
      if (existing) {
        if (existing.isSymbolicLink() || await isHardLinkOf(existing, source)) {
          await removeLink(target);
          logger.debug(`Replaced existing link: ${chalk.cyan(target)}`);
        } else {
          await backupExisting(target, logger);
          backedUp = true;
        }
      }
      await strategy.create(source, target, await sourceKind(source));
      logger.success(`Linked ${chalk.cyan(target)} -> ${chalk.dim(source)}`);
      return { status: 'linked', backedUp, strategy: strategy.name };
    } catch (err) {
      logger.error(`Failed to link ${chalk.cyan(target)} -> ${chalk.dim(source)}: ${getErrorMessage(err)}`);
      return { status: 'failed', backedUp, strategy: strategy.name };
    }
  }

  return { strategy, link };
}
