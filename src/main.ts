/**
 * CLI composition root
 *
 * Parses argv, builds the configuration and runs the generator. Returns the
 * exit status instead of exiting so tests can drive it with fake I/O.
 */

import { Command, CommanderError } from 'commander';
import { generateBaseline } from './baseline/generator.js';
import type { CommandRunner } from './baseline/runner.js';
import { loadBaselineConfig } from './config/baseline-config.js';
import { UsageError, exitCodeOf, formatError } from './utils/BaselineError.js';
import type { Env } from './utils/env-check.js';
import { createStderrLogger, type WriteFn } from './utils/logger.js';
import { VERSION } from './version.js';

export const PROGRAM_NAME = 'gen-frameworks-baseline';

export const USAGE = `Usage: ${PROGRAM_NAME} <path to MacOSX.sdk>`;

export interface CliIO {
  stdout: WriteFn;
  stderr: WriteFn;
  env: Env;
  run: CommandRunner;
}

export type ParsedArgs =
  | { kind: 'run'; sdkPath: string }
  /** help or version was printed */
  | { kind: 'exit'; exitCode: number };

/**
 * Parse argv (`[node, script, ...args]`)
 *
 * @throws UsageError for a wrong argument count
 */
export function parseArgs(argv: readonly string[], io: Pick<CliIO, 'stdout' | 'stderr'>): ParsedArgs {
  let sdkPath: string | undefined;

  const program = new Command()
    .name(PROGRAM_NAME)
    .description('Generate frameworks.nix from the dependency scan of a macOS SDK')
    .version(VERSION)
    .argument('<sdk-path>', 'path to MacOSX.sdk')
    // 未知的 `-xxx` 作为路径参数处理，多出的参数仍然报错
    .allowUnknownOption()
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
    })
    .action((arg: string) => {
      sdkPath = arg;
    });

  try {
    program.parse([...argv], { from: 'node' });
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.exitCode === 0) return { kind: 'exit', exitCode: 0 };
      throw new UsageError(err.message);
    }
    throw err;
  }

  if (sdkPath === undefined) {
    io.stderr('error: missing SDK path\n');
    throw new UsageError('missing SDK path');
  }
  return { kind: 'run', sdkPath };
}

export function runCli(argv: readonly string[], io: CliIO): number {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv, io);
  } catch (err) {
    // the specific error is already on stderr
    if (err instanceof UsageError) {
      io.stderr(`${USAGE}\n`);
      return err.exitCode;
    }
    io.stderr(`${formatError(err)}\n`);
    return exitCodeOf(err);
  }

  if (parsed.kind === 'exit') {
    return parsed.exitCode;
  }

  const config = loadBaselineConfig(parsed.sdkPath, io.env);
  const logger = createStderrLogger(io.stderr, { verbose: config.verbose });

  try {
    const output = generateBaseline(config, { run: io.run, logger });
    io.stdout(output);
    return 0;
  } catch (err) {
    logger.error(formatError(err));
    return exitCodeOf(err);
  }
}
