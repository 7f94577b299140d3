import { z } from 'zod';

export const userSchema = z.object({
  name: z.string().trim().min(1, 'Name is required'),
  contact: z.string().trim(),
  // One entry per copy held, so the same title may appear more than once
  borrowed: z.array(z.string().min(1, 'Borrowed title cannot be empty')),
});

export type User = z.infer<typeof userSchema>;

export type UserUpdate = Partial<Pick<User, 'contact'>>;
