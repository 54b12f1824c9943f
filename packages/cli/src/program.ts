import { Command } from 'commander';
import { version } from '../package.json';
import { AppError } from '@constify/shared';
import { registerRefactorCommand } from './commands/refactor';
import { registerScanCommand } from './commands/scan';
import { CliRuntime, processRuntime } from './runtime';

export const name = '@constify/cli';

export function createProgram(runtime: CliRuntime = processRuntime): Command {
  const program = new Command();

  program
    .name('constify')
    .description('Rewrite hard-coded string literals into named constants with an LLM')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerRefactorCommand(program, runtime);
  registerScanCommand(program, runtime);

  return program;
}

/**
 * Prints an error that escaped a command and returns the exit code for it:
 * 2 for configuration and usage problems, 1 for anything else.
 */
export function reportError(e: unknown, opts: { json?: boolean; verbose?: boolean }): number {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
  } else {
    // Human-readable output
    console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (opts.verbose && e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }

  if (e instanceof AppError && (e.code === 'ConfigError' || e.code === 'UsageError')) {
    return 2;
  }
  return 1;
}
