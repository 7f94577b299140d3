import { z } from 'zod';

export enum TransactionKind {
  ISSUE = 'issue',
  RETURN = 'return',
}

export const transactionSchema = z.object({
  user: z.string().min(1, 'User is required'),
  book: z.string().min(1, 'Book is required'),
  kind: z.nativeEnum(TransactionKind),
  timestamp: z.string().datetime({ offset: true, message: 'Timestamp must be an ISO-8601 date' }),
});

/**
 * One issue or return event as it is persisted
 */
export type Transaction = z.infer<typeof transactionSchema>;

/**
 * A transaction after the ledger has accepted it
 */
export interface LedgerEntry extends Transaction {
  readonly id: number;
}
