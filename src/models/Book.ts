import { z } from 'zod';

export const bookSchema = z.object({
  title: z.string().trim().min(1, 'Title is required'),
  author: z.string().trim(),
  genre: z.string().trim(),
  quantity: z
    .number({ invalid_type_error: 'Quantity must be a number' })
    .int('Quantity must be a whole number')
    .min(0, 'Quantity cannot be negative')
    .max(Number.MAX_SAFE_INTEGER, 'Quantity is too large'),
});

/**
 * A catalog entry. `quantity` counts copies on the shelf, not copies owned.
 */
export type Book = z.infer<typeof bookSchema>;

export type BookUpdate = Partial<Pick<Book, 'author' | 'genre' | 'quantity'>>;
