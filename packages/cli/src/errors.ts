import { AppError, BuildCancelledError, BuildFailureError, ConfigError, UsageError } from '@logkb/shared';
import type { GlobalOptions } from './types';

/** Exit status for a failed command: 2 for bad input or configuration, 1 otherwise. */
export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigError || error instanceof UsageError ? 2 : 1;
}

/**
 * Prints `error` the way the global flags ask for and returns the exit code.
 */
export function reportError(error: unknown, opts: GlobalOptions): number {
  const report =
    error instanceof BuildFailureError || error instanceof BuildCancelledError ? error.report : undefined;

  if (opts.json) {
    if (error instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: error.code,
            message: error.message,
            details: error.details,
            report,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: error instanceof Error ? error.message : String(error),
          },
        }),
      );
    }
  } else {
    console.error(`❌ Error: ${(error instanceof Error && error.message) || String(error)}`);
    if (error instanceof AppError && error.details) {
      console.error(
        `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
      );
    }
    if (report !== undefined) {
      console.error('  Nothing was committed; the previous knowledge base is still in place.');
    }
    if (opts.verbose && error instanceof Error && error.stack) {
      console.error(`\nStack Trace:\n${error.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }

  return exitCodeFor(error);
}
