export { Book, BookUpdate, bookSchema } from './Book';
export { User, UserUpdate, userSchema } from './User';
export { Transaction, TransactionKind, LedgerEntry, transactionSchema } from './Transaction';
