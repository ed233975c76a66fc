import fs from 'fs';
import os from 'os';
import path from 'path';
import type { CommandRunner, RunOptions } from '../commands.js';
import type { Prompter } from '../../utils/prompts.js';
import type { Environment, OsKind } from '../types.js';

export type RecordingCommandRunner = CommandRunner & {
  calls: string[][];
  labels: (string | undefined)[];
};

/**
 * Records every command instead of spawning it. `failing` lists program names
 * whose runs report failure; `onPath` lists what `exists` answers yes to.
 */
export function createRecordingRunner(opts: {
  failing?: string[];
  onPath?: string[];
  captured?: Record<string, string>;
} = {}): RecordingCommandRunner {
  const calls: string[][] = [];
  const labels: (string | undefined)[] = [];
  const fails = (argv: readonly string[]) => (opts.failing ?? []).includes(argv[0] ?? '');
  return {
    calls,
    labels,
    async run(argv: readonly string[], runOpts?: RunOptions) {
      calls.push([...argv]);
      labels.push(runOpts?.label);
      return !fails(argv);
    },
    async capture(argv: readonly string[]) {
      calls.push([...argv]);
      labels.push(undefined);
      if (fails(argv)) return null;
      return opts.captured?.[argv[argv.length - 1] ?? ''] ?? '';
    },
    async exists(command: string) {
      return (opts.onPath ?? []).includes(command);
    },
  };
}

export function createScriptedPrompter(answers: boolean[]): Prompter & { asked: string[] } {
  const asked: string[] = [];
  return {
    asked,
    async confirm(message: string) {
      asked.push(message);
      return answers.shift() ?? false;
    },
  };
}

export async function makeTempDir(prefix = 'dotfiles-test-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFile(file: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  await fs.promises.writeFile(file, content);
}

export function makeEnv(root: string, osKind: OsKind = 'linux'): Environment {
  return Object.freeze({
    homeDir: path.join(root, 'home'),
    dotfilesDir: path.join(root, 'df'),
    osKind,
  });
}
