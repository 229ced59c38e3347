/**
 * hostinfo command line
 */

import { Command, CommanderError, Option } from 'commander';
import { createSubsystemLogger, setLogLevel } from '../logging/subsystem.js';
import {
  collectSnapshot,
  formatJson,
  formatTable,
  isLocaleCode,
  LOCALES,
  resolveConfig,
  type HostInfoConfig,
  type Snapshot,
} from '../hostinfo/index.js';
import { isPackagedExecutable, shouldWaitBeforeExit, waitBeforeExit } from './wait-exit.js';

const log = createSubsystemLogger('cli');

export interface CliOptions {
  json?: boolean;
  full?: boolean;
  verbose?: boolean;
  color: boolean;
  lang?: string;
  waitExit?: boolean;
}

export interface CliOutput {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface CliDependencies {
  collect(config: HostInfoConfig): Promise<Snapshot>;
  stdout: CliOutput;
  waitBeforeExit(platform: NodeJS.Platform): Promise<void>;
  platform: NodeJS.Platform;
  packaged: boolean;
}

export function defaultDependencies(): CliDependencies {
  return {
    collect: config => collectSnapshot({ config }),
    stdout: process.stdout,
    waitBeforeExit,
    platform: process.platform,
    packaged: isPackagedExecutable(),
  };
}

export function createProgram(): Command {
  return new Command()
    .name('hostinfo')
    .description('Shows CPU and system information.')
    .option('--json', 'print the result as a plain JSON object')
    .option('--full', 'detailed mode with every available attribute')
    .option('--verbose', 'alias for --full')
    .option('--no-color', 'disable colored output')
    .addOption(new Option('--lang <code>', 'language of the table labels').choices(LOCALES))
    .option('--wait-exit', 'wait for a key before exiting (handy when started by double-click)')
    .option('--no-wait-exit', 'skip the automatic wait before exiting');
}

/**
 * Parses `argv` (including the executable and script entries), prints the
 * report and resolves with the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = defaultDependencies()): Promise<number> {
  const program = createProgram().exitOverride();
  const userArgs = argv.slice(2);

  try {
    program.parse([...argv]);
    if (userArgs.includes('--wait-exit') && userArgs.includes('--no-wait-exit')) {
      program.error('error: options --wait-exit and --no-wait-exit cannot be used together', {
        exitCode: 2,
        code: 'hostinfo.conflictingOptions',
      });
    }
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const opts = program.opts<CliOptions>();

  try {
    const config = resolveConfig(opts.lang !== undefined && isLocaleCode(opts.lang) ? { locale: opts.lang } : {});
    setLogLevel(config.logLevel);

    const snapshot = await deps.collect(config);
    const json = opts.json === true;
    const useColor = deps.stdout.isTTY === true && opts.color && !json;

    const output = json
      ? formatJson(snapshot)
      : formatTable(snapshot, {
          verbose: opts.full === true || opts.verbose === true,
          color: useColor,
          locale: config.locale,
        });
    deps.stdout.write(`${output}\n`);

    const wait = shouldWaitBeforeExit({
      waitExit: opts.waitExit,
      platform: deps.platform,
      packaged: deps.packaged,
      argCount: userArgs.length,
      isTTY: deps.stdout.isTTY === true,
    });
    if (wait) {
      await deps.waitBeforeExit(deps.platform);
    }
    return 0;
  } catch (error) {
    log.error('hostinfo failed', error);
    return 1;
  }
}
