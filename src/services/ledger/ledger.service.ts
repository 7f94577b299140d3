/**
 * Transaction Ledger
 *
 * Append-only history of issue and return events. Entries are frozen on the
 * way in and never edited or removed; a correction is a new entry.
 */

import { LedgerEntry, Transaction, TransactionKind } from '../../models/Transaction';
import { createServiceLogger } from '../../observability';

const log = createServiceLogger('transaction-ledger');

export interface HistoryFilter {
  user?: string;
  book?: string;
  kind?: TransactionKind;
  /** Inclusive lower bound */
  from?: Date;
  /** Inclusive upper bound */
  to?: Date;
}

const matches = (entry: LedgerEntry, filter: HistoryFilter): boolean => {
  if (filter.user !== undefined && entry.user !== filter.user) return false;
  if (filter.book !== undefined && entry.book !== filter.book) return false;
  if (filter.kind !== undefined && entry.kind !== filter.kind) return false;

  if (filter.from !== undefined || filter.to !== undefined) {
    const at = Date.parse(entry.timestamp);
    if (filter.from !== undefined && at < filter.from.getTime()) return false;
    if (filter.to !== undefined && at > filter.to.getTime()) return false;
  }

  return true;
};

export class TransactionLedger {
  private readonly records: LedgerEntry[] = [];

  constructor(initial: Transaction[] = []) {
    for (const transaction of initial) {
      this.record(transaction);
    }
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Append a transaction and return its sequential id (starting at 1)
   */
  record(transaction: Transaction): number {
    const entry: LedgerEntry = Object.freeze({
      id: this.records.length + 1,
      user: transaction.user,
      book: transaction.book,
      kind: transaction.kind,
      timestamp: transaction.timestamp,
    });
    this.records.push(entry);
    log.debug({ id: entry.id, kind: entry.kind, user: entry.user, book: entry.book }, 'Transaction recorded');
    return entry.id;
  }

  /**
   * Matching entries in insertion order. The result is lazy and can be
   * iterated any number of times; each pass sees the ledger as it is then.
   * The filter is fixed when history() is called.
   */
  history(filter: HistoryFilter = {}): Iterable<LedgerEntry> {
    const entries = this.records;
    const criteria: HistoryFilter = { ...filter };
    return {
      *[Symbol.iterator]() {
        for (const entry of entries) {
          if (matches(entry, criteria)) {
            yield entry;
          }
        }
      },
    };
  }

  entries(): LedgerEntry[] {
    return [...this.records];
  }

  issueCount(book: string): number {
    let count = 0;
    for (const _ of this.history({ book, kind: TransactionKind.ISSUE })) {
      count++;
    }
    return count;
  }

  /**
   * Copies of a book issued and not yet returned, optionally for one user
   */
  outstanding(book: string, user?: string): number {
    let balance = 0;
    for (const entry of this.history({ book, user })) {
      balance += entry.kind === TransactionKind.ISSUE ? 1 : -1;
    }
    return balance;
  }
}
