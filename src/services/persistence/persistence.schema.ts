import { z } from 'zod';

import { bookSchema, transactionSchema, userSchema } from '../../models';

/**
 * The saved file: three ordered sections of flat records
 */
export const libraryDocumentSchema = z.object({
  books: z.array(bookSchema),
  users: z.array(userSchema),
  transactions: z.array(transactionSchema),
});

export type LibraryDocument = z.infer<typeof libraryDocumentSchema>;
