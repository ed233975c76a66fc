import type { Environment, Mapping, OsKind, StepName } from './types.js';
import type { DotfileSources, ResolvedTargets } from './paths.js';
import type { Linker } from './link.js';
import type { CommandRunner } from './commands.js';
import type { Logger } from '../utils/logger.js';
import type { Prompter } from '../utils/prompts.js';
import { ITERM_DOMAIN } from './paths.js';
import { runRemoteScript } from './commands.js';
import { gitMappings, itermMappings, vscodeMappings, zshMappings } from './mappings.js';
import { pathExists, readLines } from '../utils/fs.js';

export const HOMEBREW_INSTALL_URL = 'https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh';
export const OH_MY_ZSH_INSTALL_URL = 'https://raw.githubusercontent.com/ohmyzsh/ohmyzsh/master/tools/install.sh';
export const BREW_PACKAGES = ['python3', 'git', 'visual-studio-code', 'iterm2', 'zsh'] as const;
export const WINDOWS_PREREQUISITES = [
  'Python (from python.org)',
  'Git (from git-scm.com)',
  'VS Code (from code.visualstudio.com)',
] as const;

export type StepContext = {
  env: Environment;
  sources: DotfileSources;
  targets: ResolvedTargets;
  linker: Linker;
  commands: CommandRunner;
  prompter: Prompter;
  logger: Logger;
};

export type Step = {
  name: StepName;
  title: string;
  /** Platforms the step applies to; everywhere when omitted. */
  platforms?: readonly OsKind[];
  run(ctx: StepContext): Promise<void>;
};

/** Links every mapping whose source exists; returns how many were attempted. */
export async function linkMappings(ctx: StepContext, mappings: Mapping[]): Promise<number> {
  let attempted = 0;
  for (const mapping of mappings) {
    if (!await pathExists(mapping.source)) {
      ctx.logger.debug(`Skipping ${mapping.name}: ${mapping.source} not found`);
      continue;
    }
    await ctx.linker.link(mapping.source, mapping.target);
    attempted += 1;
  }
  return attempted;
}

function pythonCommand(osKind: OsKind): string {
  return osKind === 'windows' ? 'python' : 'python3';
}

async function installPackages(ctx: StepContext): Promise<void> {
  const { env, commands, logger } = ctx;
  if (env.osKind === 'macos') {
    if (!await commands.exists('brew')) {
      logger.info('Installing Homebrew...');
      await runRemoteScript(commands, HOMEBREW_INSTALL_URL, '/bin/bash');
    }
    for (const pkg of BREW_PACKAGES) {
      await commands.run(['brew', 'install', pkg]);
    }
    return;
  }

  if (env.osKind === 'windows') {
    logger.info([
      'Please ensure you have the following installed:',
      ...WINDOWS_PREREQUISITES.map((item, i) => `${i + 1}. ${item}`),
    ].join('\n'));
    const ready = await ctx.prompter.confirm('Ready to continue?');
    if (!ready) logger.warn('Continuing without confirmation that prerequisites are installed.');
    return;
  }

  logger.info('Package installation is left to your distribution\'s package manager on Linux.');
}

async function setupVscode(ctx: StepContext): Promise<void> {
  await linkMappings(ctx, vscodeMappings(ctx.sources, ctx.targets));

  const extensionsFile = ctx.sources.vscodeExtensions;
  if (!await pathExists(extensionsFile)) {
    ctx.logger.debug(`No extensions list at ${extensionsFile}`);
    return;
  }
  for (const extension of await readLines(extensionsFile)) {
    await ctx.commands.run(['code', '--install-extension', extension]);
  }
}

async function setupPython(ctx: StepContext): Promise<void> {
  const { sources, commands } = ctx;
  const python = pythonCommand(ctx.env.osKind);
  if (await pathExists(sources.pythonRequirements)) {
    await commands.run([python, '-m', 'pip', 'install', '-r', sources.pythonRequirements]);
  }
  if (!await pathExists(sources.pythonVenv)) {
    await commands.run([python, '-m', 'venv', sources.pythonVenv]);
  }
}

async function setupZsh(ctx: StepContext): Promise<void> {
  if (!await pathExists(ctx.targets.ohMyZshDir)) {
    ctx.logger.info('Installing Oh My Zsh...');
    await runRemoteScript(ctx.commands, OH_MY_ZSH_INSTALL_URL, 'sh');
  }
  await linkMappings(ctx, zshMappings(ctx.sources, ctx.targets));
}

async function setupIterm(ctx: StepContext): Promise<void> {
  const linked = await linkMappings(ctx, itermMappings(ctx.sources, ctx.targets));
  if (linked === 0) return;
  await ctx.commands.run(['defaults', 'write', ITERM_DOMAIN, 'LoadPrefsFromCustomFolder', '-bool', 'true']);
  await ctx.commands.run(['defaults', 'write', ITERM_DOMAIN, 'PrefsCustomFolder', '-string', ctx.sources.itermDir]);
}

export const STEPS: readonly Step[] = [
  { name: 'packages', title: 'Installing necessary packages', run: installPackages },
  {
    name: 'git',
    title: 'Setting up Git configuration',
    run: async (ctx) => {
      await linkMappings(ctx, gitMappings(ctx.sources, ctx.targets));
    },
  },
  { name: 'vscode', title: 'Setting up VS Code', run: setupVscode },
  { name: 'python', title: 'Setting up Python environment', run: setupPython },
  { name: 'zsh', title: 'Setting up Zsh configuration', platforms: ['macos', 'linux'], run: setupZsh },
  { name: 'iterm', title: 'Setting up iTerm2 configuration', platforms: ['macos'], run: setupIterm },
];
