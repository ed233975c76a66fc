import crossSpawn from 'cross-spawn';
import chalk from 'chalk';
import type { ChildProcess, SpawnOptions } from 'child_process';
import type { OsKind } from './types.js';
import type { Logger } from '../utils/logger.js';
import { getErrorMessage } from './errors.js';

export type RunOptions = {
  /** Shown in logs instead of the full argument list. */
  label?: string;
};

export type CommandRunner = {
  run(argv: readonly string[], opts?: RunOptions): Promise<boolean>;
  capture(argv: readonly string[], opts?: RunOptions): Promise<string | null>;
  exists(command: string): Promise<boolean>;
};

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

type ProcessResult = { code: number | null; signal: NodeJS.Signals | null; stdout: string };

export function formatCommand(argv: readonly string[]): string {
  return argv.map((arg) => (/[\s"']/.test(arg) ? JSON.stringify(arg) : arg)).join(' ');
}

/**
 * Spawn without a shell: arguments reach the process as-is, so paths with
 * spaces or quotes need no escaping. cross-spawn resolves `.cmd` shims such
 * as VS Code's `code` on Windows and escapes their arguments.
 */
function spawnProcess(spawn: SpawnFn, argv: readonly string[], stdout: 'inherit' | 'pipe' | 'ignore'): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const [command, ...args] = argv;
    if (!command) {
      reject(new Error('Empty command'));
      return;
    }
    const child = spawn(command, args, {
      stdio: stdout === 'inherit' ? 'inherit' : ['inherit', stdout, 'inherit'],
      shell: false,
    });
    const chunks: Buffer[] = [];
    child.stdout?.on('data', (chunk: Buffer) => chunks.push(chunk));

    child.on('error', (err) => {
      reject(err);
    });

    child.on('close', (code, signal) => {
      resolve({ code, signal, stdout: Buffer.concat(chunks).toString('utf8') });
    });
  });
}

function describeExit(result: ProcessResult): string {
  if (result.code === null && result.signal) return `killed by ${result.signal}`;
  return `exited with code ${result.code ?? 1}`;
}

export function createCommandRunner(opts: { logger: Logger; osKind: OsKind; spawn?: SpawnFn }): CommandRunner {
  const { logger } = opts;
  const spawn = opts.spawn ?? crossSpawn;

  async function execute(argv: readonly string[], stdout: 'inherit' | 'pipe', runOpts?: RunOptions): Promise<ProcessResult | null> {
    const display = runOpts?.label ?? formatCommand(argv);
    logger.debug(`$ ${display}`);
    try {
      const result = await spawnProcess(spawn, argv, stdout);
      if (result.code === 0) return result;
      logger.error(`Command failed: ${chalk.cyan(display)}`);
      logger.error(`Error: ${describeExit(result)}`);
    } catch (err) {
      logger.error(`Command failed: ${chalk.cyan(display)}`);
      logger.error(`Error: ${getErrorMessage(err)}`);
    }
    return null;
  }

  return {
    async run(argv, runOpts) {
      return (await execute(argv, 'inherit', runOpts)) !== null;
    },
    async capture(argv, runOpts) {
      const result = await execute(argv, 'pipe', runOpts);
      return result ? result.stdout : null;
    },
    async exists(command) {
      const lookup = opts.osKind === 'windows' ? 'where' : 'which';
      try {
        const result = await spawnProcess(spawn, [lookup, command], 'ignore');
        return result.code === 0;
      } catch (err) {
        logger.debug(`Could not look up ${command}: ${getErrorMessage(err)}`);
        return false;
      }
    },
  };
}

/**
 * Downloads an installer script and hands it to `interpreter -c`. The script
 * text travels as a single argument; nothing is spliced into a shell line.
 */
export async function runRemoteScript(commands: CommandRunner, url: string, interpreter: string): Promise<boolean> {
  const script = await commands.capture(['curl', '-fsSL', url]);
  if (script === null) return false;
  return commands.run([interpreter, '-c', script], { label: `${interpreter} -c "$(curl -fsSL ${url})"` });
}
