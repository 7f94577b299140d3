/**
 * Input validation Unit Tests
 */

import { ZodError } from 'zod';

import { LibraryError } from '../../../src/errors/libraryError';
import { bookSchema } from '../../../src/models/Book';
import { ErrorCode } from '../../../src/types/errors';
import { collectValidationErrors, validateInput } from '../../../src/validation/validateInput';
import { captureError } from '../../helpers/errors';

describe('validateInput', () => {
  it('should return the parsed, trimmed value', () => {
    const book = validateInput(bookSchema, {
      title: '  Dune  ',
      author: ' Frank Herbert',
      genre: 'Science Fiction ',
      quantity: 2,
    });

    expect(book).toEqual({
      title: 'Dune',
      author: 'Frank Herbert',
      genre: 'Science Fiction',
      quantity: 2,
    });
  });

  it('should throw INVALID_INPUT with messages grouped by field', () => {
    const error = captureError(() =>
      validateInput(bookSchema, { title: ' ', author: '', genre: '', quantity: -1.5 }, 'Invalid book')
    );

    expect(error).toBeInstanceOf(LibraryError);
    if (!(error instanceof LibraryError)) return;
    expect(error.errorCode).toBe(ErrorCode.INVALID_INPUT);
    expect(error.message).toBe('Invalid book');
    expect(error.validationErrors).toEqual({
      title: ['Title is required'],
      quantity: ['Quantity must be a whole number', 'Quantity cannot be negative'],
    });
  });

  it('should report a non-numeric quantity', () => {
    const error = captureError(() =>
      validateInput(bookSchema, { title: 'Dune', author: '', genre: '', quantity: 'three' })
    );

    expect(error).toBeInstanceOf(LibraryError);
    if (!(error instanceof LibraryError)) return;
    expect(error.message).toBe('Validation failed');
    expect(error.validationErrors).toEqual({ quantity: ['Quantity must be a number'] });
  });
});

describe('collectValidationErrors', () => {
  it('should file issues without a path under _root', () => {
    const result = bookSchema.safeParse(null);
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(Object.keys(collectValidationErrors(result.error))).toEqual(['_root']);
  });

  it('should join nested paths with dots', () => {
    const error = new ZodError([
      { code: 'custom', path: ['users', 0, 'name'], message: 'Name is required' },
    ]);

    expect(collectValidationErrors(error)).toEqual({ 'users.0.name': ['Name is required'] });
  });
});
