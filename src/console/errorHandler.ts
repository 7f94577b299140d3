/**
 * Console error handling
 *
 * Every failure inside a menu command ends up here. The command is abandoned,
 * the error is shown and logged, and the menu carries on.
 */

import { isLibraryError } from '../errors/libraryError';
import { logger, getCommandId } from '../observability';
import { ErrorCode, errorCodeLabel } from '../types/errors';

/**
 * Lines shown to the user for an error
 */
export function formatError(error: unknown): string[] {
  if (isLibraryError(error)) {
    const lines = [`Error [${errorCodeLabel[error.errorCode]}]: ${error.message}`];
    for (const [field, messages] of Object.entries(error.validationErrors ?? {})) {
      for (const message of messages) {
        lines.push(`  - ${field}: ${message}`);
      }
    }
    return lines;
  }

  return [
    `Error [${errorCodeLabel[ErrorCode.INTERNAL_ERROR]}]: Something went wrong. See the log for details.`,
  ];
}

export function handleCommandError(error: unknown, print: (line: string) => void): void {
  const commandId = getCommandId() || 'unknown';

  if (isLibraryError(error) && error.isOperational) {
    logger.warn(
      {
        commandId,
        errorCode: error.errorCode,
        error: error.message,
        details: error.details,
        validationErrors: error.validationErrors,
      },
      `Command failed: ${error.message}`
    );
  } else {
    logger.error({ commandId, err: error }, 'Unexpected error while running command');
  }

  formatError(error).forEach((line) => print(line));
}
