import { CliError } from '../../domain/errors';
import { logger } from '../../infrastructure/logging/logger';

/**
 * Prints a terminal failure to stderr and returns the process exit code.
 */
export function handleCliError(err: unknown): number {
    if (err instanceof CliError) {
        logger.error(err.message);
        err.hints.forEach((hint) => console.error(hint));
        return err.exitCode;
    }

    if (err instanceof Error) {
        logger.error(err.message);
        if (err.stack) {
            logger.debug(err.stack);
        }
        return 1;
    }

    logger.error(String(err));
    return 1;
}
