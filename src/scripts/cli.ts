import { logger } from '../config/logger';
import { AppError } from '../utils/errors';

/** Value following `flag`, or undefined when the flag is absent or last. */
export function getFlagValue(args: readonly string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  const value = args[idx + 1];
  return value.startsWith('--') ? undefined : value;
}

export function hasFlag(args: readonly string[], flag: string): boolean {
  return args.includes(flag);
}

/** Run a CLI entry point, mapping failures to an exit code. */
export function runCli(main: () => Promise<void>): void {
  main().catch((error: unknown) => {
    if (error instanceof AppError) {
      logger.error(error.message);
      process.exitCode = error.exitCode;
      return;
    }
    logger.error('Unexpected failure', { error: error instanceof Error ? error.stack : String(error) });
    process.exitCode = 1;
  });
}
