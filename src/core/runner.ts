import type { Environment, RunSummary, StepName } from './types.js';
import type { Linker } from './link.js';
import type { CommandRunner } from './commands.js';
import type { Logger } from '../utils/logger.js';
import type { Prompter } from '../utils/prompts.js';
import type { Step, StepContext } from './steps.js';
import { STEPS } from './steps.js';
import { resolveSources, resolveTargets } from './paths.js';
import { FatalSetupError, getErrorMessage } from './errors.js';
import { ensureDir } from '../utils/fs.js';

export type RunDependencies = {
  linker: Linker;
  commands: CommandRunner;
  prompter: Prompter;
  logger: Logger;
  skip?: ReadonlySet<StepName>;
  steps?: readonly Step[];
};

export async function runAll(env: Environment, deps: RunDependencies): Promise<RunSummary> {
  const { logger } = deps;
  const summary: RunSummary = { completed: [], skipped: [], failed: [] };
  logger.info('Starting development environment setup...');

  try {
    await ensureDir(env.dotfilesDir);
  } catch (err) {
    throw new FatalSetupError(`Unable to create dotfiles directory ${env.dotfilesDir}: ${getErrorMessage(err)}`, { cause: err });
  }

  const ctx: StepContext = {
    env,
    sources: resolveSources(env.dotfilesDir),
    targets: resolveTargets(env),
    linker: deps.linker,
    commands: deps.commands,
    prompter: deps.prompter,
    logger,
  };

  for (const step of deps.steps ?? STEPS) {
    if (deps.skip?.has(step.name)) {
      logger.debug(`Skipping ${step.name} (disabled)`);
      summary.skipped.push(step.name);
      continue;
    }
    if (step.platforms && !step.platforms.includes(env.osKind)) {
      logger.debug(`Skipping ${step.name} (not applicable on ${env.osKind})`);
      summary.skipped.push(step.name);
      continue;
    }
    logger.step(`${step.title}...`);
    try {
      await step.run(ctx);
      summary.completed.push(step.name);
    } catch (err) {
      logger.error(`Step ${step.name} failed: ${getErrorMessage(err)}`);
      summary.failed.push(step.name);
    }
  }

  logger.success('Setup complete!');
  if (env.osKind === 'windows') {
    logger.info('Note: Some features are not available on Windows.');
    logger.info('Consider using WSL2 for a more Unix-like experience.');
  }
  return summary;
}
