/**
 * Library Service
 *
 * Orchestrates the catalog, the user directory and the ledger. Every
 * circulation operation validates first and mutates afterwards, so a failed
 * call leaves the state exactly as it found it.
 */

import { config } from '../../config';
import { Book, LedgerEntry, TransactionKind, User } from '../../models';
import { LibraryError } from '../../errors/libraryError';
import { createServiceLogger } from '../../observability';
import { AddBookDTO, UpdateBookDTO } from '../catalog';
import { AddUserDTO, UpdateUserDTO } from '../directory';
import { HistoryFilter } from '../ledger';
import { LibraryState, createLibraryState } from './library.state';
import { ReportKind, ReportOf, ReportOptions, buildReport } from './library.reports';

const log = createServiceLogger('library');

export interface LibraryServiceOptions {
  clock?: () => Date;
  reports?: Partial<ReportOptions>;
}

export interface CirculationResult {
  transactionId: number;
  book: Book;
  user: User;
}

export class LibraryService {
  private state: LibraryState;
  private readonly clock: () => Date;
  private readonly reportOptions: ReportOptions;

  constructor(state: LibraryState = createLibraryState(), options: LibraryServiceOptions = {}) {
    this.state = state;
    this.clock = options.clock ?? (() => new Date());
    this.reportOptions = {
      popularTopN: options.reports?.popularTopN ?? config.reports.popularTopN,
    };
  }

  getState(): LibraryState {
    return this.state;
  }

  /**
   * Swap in a freshly loaded state
   */
  replaceState(state: LibraryState): void {
    this.state = state;
    log.info(
      {
        books: state.catalog.size,
        users: state.directory.size,
        transactions: state.ledger.size,
      },
      'Library state replaced'
    );
  }

  // ---------------------------------------------------------------------------
  // Books
  // ---------------------------------------------------------------------------

  addBook(dto: AddBookDTO): Book {
    const book = this.state.catalog.addBook(dto);
    log.info({ title: book.title, quantity: book.quantity }, 'Book added');
    return book;
  }

  /**
   * Remove a book with no copies on loan
   */
  removeBook(title: string): Book {
    const { catalog, ledger } = this.state;
    catalog.find(title);

    const onLoan = ledger.outstanding(title);
    if (onLoan > 0) {
      throw LibraryError.inUse('book', title, onLoan);
    }

    const book = catalog.removeBook(title);
    log.info({ title }, 'Book removed');
    return book;
  }

  updateBook(title: string, dto: UpdateBookDTO): Book {
    return this.state.catalog.updateBook(title, dto);
  }

  findBook(title: string): Book {
    return this.state.catalog.find(title);
  }

  listBooks(): Book[] {
    return this.state.catalog.list();
  }

  // ---------------------------------------------------------------------------
  // Users
  // ---------------------------------------------------------------------------

  addUser(dto: AddUserDTO): User {
    const user = this.state.directory.addUser(dto);
    log.info({ name: user.name }, 'User added');
    return user;
  }

  removeUser(name: string): User {
    const user = this.state.directory.removeUser(name);
    log.info({ name }, 'User removed');
    return user;
  }

  updateUser(name: string, dto: UpdateUserDTO): User {
    return this.state.directory.updateUser(name, dto);
  }

  findUser(name: string): User {
    return this.state.directory.find(name);
  }

  listUsers(): User[] {
    return this.state.directory.list();
  }

  // ---------------------------------------------------------------------------
  // Circulation
  // ---------------------------------------------------------------------------

  /**
   * Lend one copy of a book to a user
   */
  issueBook(userName: string, title: string): CirculationResult {
    const { catalog, directory, ledger } = this.state;

    directory.find(userName);
    const book = catalog.find(title);
    if (book.quantity === 0) {
      throw LibraryError.outOfStock(title);
    }
    const timestamp = this.clock().toISOString();

    const updatedBook = catalog.adjustQuantity(title, -1);
    const user = directory.addBorrowed(userName, title);
    const transactionId = ledger.record({
      user: userName,
      book: title,
      kind: TransactionKind.ISSUE,
      timestamp,
    });

    log.info({ transactionId, userName, title, remaining: updatedBook.quantity }, 'Book issued');
    return { transactionId, book: updatedBook, user };
  }

  /**
   * Take back one copy of a book from a user
   */
  returnBook(userName: string, title: string): CirculationResult {
    const { catalog, directory, ledger } = this.state;

    directory.find(userName);
    catalog.find(title);
    if (directory.holding(userName, title) === 0) {
      throw LibraryError.notBorrowed(userName, title);
    }
    const timestamp = this.clock().toISOString();

    const user = directory.removeBorrowed(userName, title);
    const updatedBook = catalog.adjustQuantity(title, 1);
    const transactionId = ledger.record({
      user: userName,
      book: title,
      kind: TransactionKind.RETURN,
      timestamp,
    });

    log.info({ transactionId, userName, title, remaining: updatedBook.quantity }, 'Book returned');
    return { transactionId, book: updatedBook, user };
  }

  history(filter?: HistoryFilter): Iterable<LedgerEntry> {
    return this.state.ledger.history(filter);
  }

  // ---------------------------------------------------------------------------
  // Reports
  // ---------------------------------------------------------------------------

  generateReport<K extends ReportKind>(kind: K): ReportOf<K> {
    return buildReport(kind, this.state, this.reportOptions);
  }
}
