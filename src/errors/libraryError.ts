/**
 * Library Error
 *
 * Every failure the core signals to its caller is a LibraryError carrying an
 * ErrorCode. The console decides how to present it.
 */

import { ErrorCode, ValidationErrors } from '../types/errors';

export type LibraryResource = 'book' | 'user';

export interface LibraryErrorOptions {
  isOperational?: boolean;
  validationErrors?: ValidationErrors;
  details?: Record<string, unknown>;
  cause?: unknown;
}

const resourceLabel: Record<LibraryResource, string> = {
  book: 'Book',
  user: 'User',
};

export class LibraryError extends Error {
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: ValidationErrors;
  details?: Record<string, unknown>;

  constructor(errorCode: ErrorCode, message: string, options: LibraryErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'LibraryError';
    this.errorCode = errorCode;
    this.isOperational = options.isOperational ?? true;
    this.validationErrors = options.validationErrors;
    this.details = options.details;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Factory methods for common errors
   */
  static notFound(resource: LibraryResource, key: string): LibraryError {
    return new LibraryError(ErrorCode.NOT_FOUND, `${resourceLabel[resource]} not found: ${key}`, {
      details: { resource, key },
    });
  }

  static duplicateKey(resource: LibraryResource, key: string): LibraryError {
    return new LibraryError(
      ErrorCode.DUPLICATE_KEY,
      `${resourceLabel[resource]} already exists: ${key}`,
      { details: { resource, key } }
    );
  }

  static outOfStock(title: string): LibraryError {
    return new LibraryError(ErrorCode.OUT_OF_STOCK, `No copies of "${title}" are available`, {
      details: { title },
    });
  }

  static notBorrowed(userName: string, title: string): LibraryError {
    return new LibraryError(ErrorCode.NOT_BORROWED, `${userName} has not borrowed "${title}"`, {
      details: { userName, title },
    });
  }

  static inUse(resource: LibraryResource, key: string, onLoan: number): LibraryError {
    const message =
      resource === 'book'
        ? `Book "${key}" has ${onLoan} cop${onLoan === 1 ? 'y' : 'ies'} on loan`
        : `User ${key} still holds ${onLoan} book${onLoan === 1 ? '' : 's'}`;
    return new LibraryError(ErrorCode.IN_USE, message, { details: { resource, key, onLoan } });
  }

  static invalidInput(message: string, validationErrors?: ValidationErrors): LibraryError {
    return new LibraryError(ErrorCode.INVALID_INPUT, message, { validationErrors });
  }

  static corruptData(
    message: string,
    validationErrors?: ValidationErrors,
    cause?: unknown
  ): LibraryError {
    return new LibraryError(ErrorCode.CORRUPT_DATA, message, { validationErrors, cause });
  }

  static fileNotFound(filePath: string): LibraryError {
    return new LibraryError(ErrorCode.FILE_NOT_FOUND, `No saved data at ${filePath}`, {
      details: { filePath },
    });
  }

  static storage(message: string, cause?: unknown): LibraryError {
    return new LibraryError(ErrorCode.STORAGE_ERROR, message, { cause });
  }

  static internal(message = 'Internal error'): LibraryError {
    return new LibraryError(ErrorCode.INTERNAL_ERROR, message, { isOperational: false });
  }
}

export const isLibraryError = (error: unknown): error is LibraryError =>
  error instanceof LibraryError;

export const hasErrorCode = (error: unknown, code: ErrorCode): boolean =>
  isLibraryError(error) && error.errorCode === code;
