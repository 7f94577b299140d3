/**
 * Error Codes for the library manager
 *
 * Categorized by error type:
 * - 1xxx: Lookup errors
 * - 2xxx: Circulation errors
 * - 3xxx: Validation errors
 * - 4xxx: Storage errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Lookup errors (1xxx)
  NOT_FOUND = 1001,
  DUPLICATE_KEY = 1002,

  // Circulation errors (2xxx)
  OUT_OF_STOCK = 2001,
  NOT_BORROWED = 2002,
  IN_USE = 2003,

  // Validation errors (3xxx)
  INVALID_INPUT = 3001,

  // Storage errors (4xxx)
  CORRUPT_DATA = 4001,
  FILE_NOT_FOUND = 4002,
  STORAGE_ERROR = 4003,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
}

/**
 * Short label shown next to every error printed by the console
 */
export const errorCodeLabel: Record<ErrorCode, string> = {
  [ErrorCode.NOT_FOUND]: 'NOT_FOUND',
  [ErrorCode.DUPLICATE_KEY]: 'DUPLICATE_KEY',
  [ErrorCode.OUT_OF_STOCK]: 'OUT_OF_STOCK',
  [ErrorCode.NOT_BORROWED]: 'NOT_BORROWED',
  [ErrorCode.IN_USE]: 'IN_USE',
  [ErrorCode.INVALID_INPUT]: 'INVALID_INPUT',
  [ErrorCode.CORRUPT_DATA]: 'CORRUPT_DATA',
  [ErrorCode.FILE_NOT_FOUND]: 'FILE_NOT_FOUND',
  [ErrorCode.STORAGE_ERROR]: 'STORAGE_ERROR',
  [ErrorCode.INTERNAL_ERROR]: 'INTERNAL_ERROR',
};

/**
 * Field name -> messages, as produced by input and document validation
 */
export type ValidationErrors = Record<string, string[]>;
