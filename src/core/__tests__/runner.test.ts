/**
 * Tests for runner.ts
 */

import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { runAll } from '../runner.js';
import type { RunDependencies } from '../runner.js';
import type { Step } from '../steps.js';
import { createLinker, symlinkStrategy } from '../link.js';
import { FatalSetupError } from '../errors.js';
import { createMemoryLogger } from '../../utils/logger.js';
import type { MemoryLogger } from '../../utils/logger.js';
import type { Environment } from '../types.js';
import { createRecordingRunner, createScriptedPrompter, makeEnv, makeTempDir, writeFile } from './test-helpers.js';
import type { RecordingCommandRunner } from './test-helpers.js';

describe('runAll', () => {
  let root: string;
  let logger: MemoryLogger;
  let commands: RecordingCommandRunner;

  function deps(overrides: Partial<RunDependencies> = {}): RunDependencies {
    return {
      linker: createLinker({ strategy: symlinkStrategy, logger }),
      commands,
      prompter: createScriptedPrompter([true]),
      logger,
      ...overrides,
    };
  }

  beforeEach(async () => {
    root = await makeTempDir();
    logger = createMemoryLogger();
    commands = createRecordingRunner({ onPath: ['brew'] });
  });

  afterEach(async () => {
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  describe('git step', () => {
    let env: Environment;

    beforeEach(async () => {
      env = makeEnv(root);
      await writeFile(path.join(env.dotfilesDir, 'git', '.gitconfig'), '[user]\nname=A');
    });

    it('links ~/.gitconfig to the dotfiles copy without a backup', async () => {
      await runAll(env, deps({ skip: new Set(['packages', 'vscode', 'python', 'zsh', 'iterm'] as const) }));

      const target = path.join(env.homeDir, '.gitconfig');
      expect((await fs.promises.lstat(target)).isSymbolicLink()).toBe(true);
      expect(await fs.promises.readFile(target, 'utf8')).toBe('[user]\nname=A');
      expect(fs.existsSync(`${target}.backup`)).toBe(false);
    });

    it('backs up an existing ~/.gitconfig', async () => {
      const target = path.join(env.homeDir, '.gitconfig');
      await writeFile(target, 'old');

      await runAll(env, deps({ skip: new Set(['packages', 'vscode', 'python', 'zsh', 'iterm'] as const) }));

      expect(await fs.promises.readFile(`${target}.backup`, 'utf8')).toBe('old');
      expect(await fs.promises.readFile(target, 'utf8')).toBe('[user]\nname=A');
    });
  });

  it('creates the dotfiles root before any step runs', async () => {
    const env = makeEnv(root);
    const seen: boolean[] = [];
    const observingStep: Step = {
      name: 'git',
      title: 'Observe',
      run: async () => {
        seen.push(fs.existsSync(env.dotfilesDir));
      },
    };

    await runAll(env, deps({ steps: [observingStep] }));

    expect(seen).toEqual([true]);
  });

  it('fails hard when the dotfiles root cannot be created', async () => {
    const blocker = path.join(root, 'blocker');
    await writeFile(blocker, 'file');
    const env: Environment = { homeDir: path.join(root, 'home'), dotfilesDir: path.join(blocker, 'df'), osKind: 'linux' };

    await expect(runAll(env, deps())).rejects.toBeInstanceOf(FatalSetupError);
  });

  it('runs OS-gated steps only on their platforms', async () => {
    const linuxSummary = await runAll(makeEnv(root, 'linux'), deps());
    expect(linuxSummary.skipped).toEqual(['iterm']);
    expect(linuxSummary.completed).toEqual(['packages', 'git', 'vscode', 'python', 'zsh']);

    const windowsSummary = await runAll(makeEnv(root, 'windows'), deps());
    expect(windowsSummary.skipped).toEqual(['zsh', 'iterm']);
  });

  it('honours the skip set', async () => {
    const summary = await runAll(makeEnv(root, 'macos'), deps({ skip: new Set(['packages', 'python'] as const) }));

    expect(summary.skipped).toEqual(['packages', 'python']);
    expect(summary.completed).toEqual(['git', 'vscode', 'zsh', 'iterm']);
    expect(commands.calls.some((argv) => argv[0] === 'brew')).toBe(false);
  });

  it('keeps going after a step throws and still reports completion', async () => {
    const steps: Step[] = [
      { name: 'git', title: 'Broken', run: async () => { throw new Error('boom'); } },
      { name: 'vscode', title: 'Fine', run: async () => {} },
    ];

    const summary = await runAll(makeEnv(root), deps({ steps }));

    expect(summary).toEqual({ completed: ['vscode'], skipped: [], failed: ['git'] });
    expect(logger.messages('error')).toEqual(['Step git failed: boom']);
    expect(logger.messages('success')).toEqual(['Setup complete!']);
  });

  it('adds the WSL note on Windows', async () => {
    await runAll(makeEnv(root, 'windows'), deps({ steps: [] }));

    expect(logger.messages('info')).toEqual([
      'Starting development environment setup...',
      'Note: Some features are not available on Windows.',
      'Consider using WSL2 for a more Unix-like experience.',
    ]);
  });

  it('logs each step title', async () => {
    await runAll(makeEnv(root, 'macos'), deps({ skip: new Set(['packages'] as const) }));

    expect(logger.messages('step')).toEqual([
      'Setting up Git configuration...',
      'Setting up VS Code...',
      'Setting up Python environment...',
      'Setting up Zsh configuration...',
      'Setting up iTerm2 configuration...',
    ]);
  });
});
