#!/usr/bin/env node
import chalk from 'chalk';
import { intro, outro, note } from '@clack/prompts';
import { loadConfig } from './core/config.js';
import { probe } from './core/environment.js';
import { createLinker, detectLinkStrategy } from './core/link.js';
import { createCommandRunner } from './core/commands.js';
import { runAll } from './core/runner.js';
import { getErrorMessage } from './core/errors.js';
import { createLogger } from './utils/logger.js';
import { createPrompter } from './utils/prompts.js';
import { STEP_NAMES } from './core/types.js';

const appTitle = 'dotfiles-bootstrap';

function formatCount(count: number, singular: string, plural?: string): string {
  return `${count} ${count === 1 ? singular : (plural || `${singular}s`)}`;
}

async function run(): Promise<void> {
  intro(chalk.cyan(appTitle));
  const config = loadConfig(process.env);
  const logger = createLogger({ verbose: config.verbose });

  if (config.unknownSkips.length > 0) {
    logger.warn(`Ignoring unknown steps in DOTFILES_SKIP: ${config.unknownSkips.join(', ')} (known: ${STEP_NAMES.join(', ')})`);
  }

  const env = probe({ dotfilesDir: config.dotfilesPath });
  const strategy = await detectLinkStrategy(env.osKind, { logger });

  note([
    `Home: ${env.homeDir}`,
    `Dotfiles: ${env.dotfilesDir}`,
    `Platform: ${env.osKind}`,
    `Links: ${strategy.name === 'symlink' ? 'symbolic links' : 'junctions / hard links'}`,
  ].join('\n'), 'Environment');

  const summary = await runAll(env, {
    linker: createLinker({ strategy, logger }),
    commands: createCommandRunner({ logger, osKind: env.osKind }),
    prompter: createPrompter(),
    logger,
    skip: config.skip,
  });

  const pieces = [`Ran ${formatCount(summary.completed.length, 'step')}`, `${summary.skipped.length} skipped`];
  if (summary.failed.length > 0) pieces.push(chalk.red(`${summary.failed.length} failed`));
  outro(pieces.join(' · '));
}

run().catch((err: unknown) => {
  note(getErrorMessage(err), 'Fatal error');
  process.exit(1);
});
