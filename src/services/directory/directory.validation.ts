import { z } from 'zod';

import { userSchema } from '../../models/User';

export const addUserValidation = userSchema.pick({ name: true, contact: true });

export const updateUserValidation = userSchema.pick({ contact: true }).partial();

export type AddUserDTO = z.input<typeof addUserValidation>;
export type UpdateUserDTO = z.input<typeof updateUserValidation>;
