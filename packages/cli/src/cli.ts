import { Command, CommanderError } from 'commander';
import { version } from '../package.json';
import { isUserError, UsageError } from '@embedcache/shared';
import { registerEmbedCommand } from './commands/embed';
import { registerNamespaceCommand } from './commands/namespace';
import type { CliEnvironment, GlobalOptions } from './context';
import { OutputRenderer } from './output/renderer';

export const name = '@embedcache/cli';

export function createProgram(env: CliEnvironment = { cwd: process.cwd() }): Command {
  const program = new Command();

  program
    .name('embedcache')
    .description('Cache-aside sentence embeddings backed by a key-value store')
    .version(version)
    .option('--json', 'Output errors as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    // Errors are rendered once, by runCli
    .exitOverride()
    .configureOutput({ outputError: () => {} });

  registerEmbedCommand(program, env);
  registerNamespaceCommand(program, env);

  return program;
}

/**
 * Parses argv, runs the selected command and returns the process exit code:
 * 0 on success, 2 for configuration or usage errors, 1 otherwise.
 */
export async function runCli(argv: string[], env?: CliEnvironment): Promise<number> {
  const program = createProgram(env);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    // --help and --version
    if (e instanceof CommanderError && e.exitCode === 0) {
      return 0;
    }

    const error =
      e instanceof CommanderError
        ? new UsageError(e.message.replace(/^error: /, ''), { cause: e })
        : e;
    const opts = program.opts<GlobalOptions>();
    new OutputRenderer(Boolean(opts.json), Boolean(opts.verbose)).error(error);

    return isUserError(error) ? 2 : 1;
  }
}
