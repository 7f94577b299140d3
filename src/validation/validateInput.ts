import { z, ZodError, ZodTypeAny } from 'zod';

import { LibraryError } from '../errors/libraryError';
import { ValidationErrors } from '../types/errors';

/**
 * Group zod issues by field path, the way the console prints them
 */
export const collectValidationErrors = (error: ZodError): ValidationErrors => {
  const errors: ValidationErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : '_root';
    if (!errors[field]) errors[field] = [];
    errors[field].push(issue.message);
  }
  return errors;
};

/**
 * Parse caller input against a schema, throwing INVALID_INPUT on failure
 */
export const validateInput = <S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  message = 'Validation failed'
): z.output<S> => {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw LibraryError.invalidInput(message, collectValidationErrors(result.error));
  }
  return result.data;
};
