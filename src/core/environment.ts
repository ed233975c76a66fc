import os from 'os';
import path from 'path';
import type { Environment, OsKind } from './types.js';
import { FatalSetupError, getErrorMessage } from './errors.js';

export type ProbeOptions = {
  platform?: NodeJS.Platform;
  homeDir?: () => string;
  dotfilesDir?: string;
  env?: Record<string, string | undefined>;
  cwd?: string;
};

export function classifyPlatform(platform: NodeJS.Platform): OsKind {
  if (platform === 'darwin') return 'macos';
  if (platform === 'win32') return 'windows';
  return 'linux';
}

function resolveHome(resolver: () => string): string {
  let home: string;
  try {
    home = resolver();
  } catch (err) {
    throw new FatalSetupError(`Unable to resolve the home directory: ${getErrorMessage(err)}`, { cause: err });
  }
  if (!home) throw new FatalSetupError('Unable to resolve the home directory.');
  return home;
}

function expandPath(p: string, homeDir: string, cwd: string): string {
  if (p === '~') return homeDir;
  if (p.startsWith('~/') || p.startsWith('~\\')) return path.join(homeDir, p.slice(2));
  return path.resolve(cwd, p);
}

/**
 * Resolves the environment once at startup. The dotfiles root comes from the
 * explicit option, then DOTFILES_PATH, then `<home>/dotfiles`.
 */
export function probe(opts: ProbeOptions = {}): Environment {
  const homeDir = resolveHome(opts.homeDir ?? os.homedir);
  const cwd = opts.cwd ?? process.cwd();
  const override = opts.dotfilesDir || (opts.env ?? process.env).DOTFILES_PATH;
  const dotfilesDir = override ? expandPath(override, homeDir, cwd) : path.join(homeDir, 'dotfiles');
  return Object.freeze({
    homeDir,
    dotfilesDir,
    osKind: classifyPlatform(opts.platform ?? process.platform),
  });
}
