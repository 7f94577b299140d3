import { z } from 'zod';

import { bookSchema } from '../../models/Book';

export const addBookValidation = bookSchema;

export const updateBookValidation = bookSchema
  .pick({ author: true, genre: true, quantity: true })
  .partial();

export type AddBookDTO = z.input<typeof addBookValidation>;
export type UpdateBookDTO = z.input<typeof updateBookValidation>;
