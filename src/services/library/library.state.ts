import { Book, Transaction, User } from '../../models';
import { BookCatalog } from '../catalog';
import { UserDirectory } from '../directory';
import { TransactionLedger } from '../ledger';

/**
 * Everything the library knows, owned by one LibraryService at a time
 */
export interface LibraryState {
  catalog: BookCatalog;
  directory: UserDirectory;
  ledger: TransactionLedger;
}

export interface LibraryStateSeed {
  books?: Book[];
  users?: User[];
  transactions?: Transaction[];
}

export function createLibraryState(seed: LibraryStateSeed = {}): LibraryState {
  return {
    catalog: new BookCatalog(seed.books),
    directory: new UserDirectory(seed.users),
    ledger: new TransactionLedger(seed.transactions),
  };
}
