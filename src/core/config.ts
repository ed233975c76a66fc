import type { StepName } from './types.js';
import { STEP_NAMES } from './types.js';

export type Config = {
  dotfilesPath?: string;
  skip: ReadonlySet<StepName>;
  unknownSkips: string[];
  verbose: boolean;
};

type EnvLike = Record<string, string | undefined>;

function isStepName(value: string): value is StepName {
  return STEP_NAMES.some((name) => name === value);
}

function parseFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Reads DOTFILES_PATH, DOTFILES_SKIP (comma-separated step names) and
 * DOTFILES_VERBOSE. Unknown step names are returned in `unknownSkips`
 * rather than rejected.
 */
export function loadConfig(env: EnvLike = process.env): Config {
  const skip = new Set<StepName>();
  const unknownSkips: string[] = [];
  for (const raw of (env.DOTFILES_SKIP || '').split(',')) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    if (isStepName(name)) skip.add(name);
    else unknownSkips.push(raw.trim());
  }
  const dotfilesPath = env.DOTFILES_PATH?.trim();
  return {
    dotfilesPath: dotfilesPath || undefined,
    skip,
    unknownSkips,
    verbose: parseFlag(env.DOTFILES_VERBOSE),
  };
}
