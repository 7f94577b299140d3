/**
 * Persistence Service
 *
 * Converts the library state to and from one JSON document and keeps that
 * document on disk. A save replaces the file wholesale: the JSON is written
 * to a temp file beside the target and renamed over it.
 */

import fs from 'fs/promises';
import path from 'path';

import { config } from '../../config';
import { LibraryError } from '../../errors/libraryError';
import { TransactionKind } from '../../models/Transaction';
import { addCommandFields, createServiceLogger } from '../../observability';
import { collectValidationErrors } from '../../validation/validateInput';
import { LibraryState, createLibraryState } from '../library/library.state';
import { LibraryDocument, libraryDocumentSchema } from './persistence.schema';

const log = createServiceLogger('persistence');

export interface PersistenceOptions {
  dataFile?: string;
  jsonIndent?: number;
}

const errnoCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

interface LoanCount {
  user: string;
  book: string;
  count: number;
}

const findDuplicate = (keys: string[]): string | undefined => {
  const seen = new Set<string>();
  for (const key of keys) {
    if (seen.has(key)) return key;
    seen.add(key);
  }
  return undefined;
};

/**
 * Reject documents whose sections disagree with each other
 */
function assertConsistent(document: LibraryDocument): void {
  const duplicateTitle = findDuplicate(document.books.map((book) => book.title));
  if (duplicateTitle !== undefined) {
    throw LibraryError.corruptData(`Duplicate book title in saved data: ${duplicateTitle}`);
  }

  const duplicateName = findDuplicate(document.users.map((user) => user.name));
  if (duplicateName !== undefined) {
    throw LibraryError.corruptData(`Duplicate user name in saved data: ${duplicateName}`);
  }

  const titles = new Set(document.books.map((book) => book.title));
  const pairKey = (user: string, book: string) => JSON.stringify([user, book]);
  const held = new Map<string, LoanCount>();
  const outstanding = new Map<string, LoanCount>();

  const bump = (counts: Map<string, LoanCount>, user: string, book: string, delta: number) => {
    const key = pairKey(user, book);
    const current = counts.get(key) ?? { user, book, count: 0 };
    current.count += delta;
    counts.set(key, current);
  };

  for (const user of document.users) {
    for (const title of user.borrowed) {
      if (!titles.has(title)) {
        throw LibraryError.corruptData(`${user.name} holds "${title}", which is not in the catalog`);
      }
      bump(held, user.name, title, 1);
    }
  }

  for (const transaction of document.transactions) {
    bump(
      outstanding,
      transaction.user,
      transaction.book,
      transaction.kind === TransactionKind.ISSUE ? 1 : -1
    );
  }

  for (const key of new Set([...held.keys(), ...outstanding.keys()])) {
    const borrowed = held.get(key);
    const fromLedger = outstanding.get(key);
    const pair = borrowed ?? fromLedger;
    const borrowedCount = borrowed?.count ?? 0;
    const ledgerCount = fromLedger?.count ?? 0;
    if (pair && borrowedCount !== ledgerCount) {
      throw LibraryError.corruptData(
        `Ledger shows ${ledgerCount} outstanding "${pair.book}" for ${pair.user}, but ${borrowedCount} borrowed`
      );
    }
  }
}

export class PersistenceService {
  private readonly dataFile: string;
  private readonly jsonIndent: number;

  constructor(options: PersistenceOptions = {}) {
    this.dataFile = options.dataFile ?? config.storage.dataFile;
    this.jsonIndent = options.jsonIndent ?? config.storage.jsonIndent;
  }

  get defaultPath(): string {
    return path.resolve(this.dataFile);
  }

  /**
   * Plain document for a state, sections in insertion order
   */
  serialize(state: LibraryState): LibraryDocument {
    return {
      books: state.catalog.list(),
      users: state.directory.list(),
      transactions: state.ledger.entries().map(({ user, book, kind, timestamp }) => ({
        user,
        book,
        kind,
        timestamp,
      })),
    };
  }

  /**
   * Rebuild a state from a parsed document, throwing CORRUPT_DATA on any mismatch
   */
  deserialize(raw: unknown): LibraryState {
    const parsed = libraryDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw LibraryError.corruptData(
        'Saved data has an invalid shape',
        collectValidationErrors(parsed.error)
      );
    }

    assertConsistent(parsed.data);
    return createLibraryState(parsed.data);
  }

  async save(state: LibraryState, filePath: string = this.dataFile): Promise<string> {
    const target = path.resolve(filePath);
    addCommandFields({ filePath: target });
    const tempPath = `${target}.tmp.${process.pid}`;
    const body = JSON.stringify(this.serialize(state), null, this.jsonIndent) + '\n';

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(tempPath, body, 'utf8');
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        log.warn({ err: cleanupError, tempPath }, 'Failed to remove temp file');
      });
      log.error({ err: error }, 'Save failed');
      throw LibraryError.storage(`Could not save library data to ${target}`, error);
    }

    log.info(
      {
        books: state.catalog.size,
        users: state.directory.size,
        transactions: state.ledger.size,
      },
      'Library saved'
    );
    return target;
  }

  async load(filePath: string = this.dataFile): Promise<LibraryState> {
    const target = path.resolve(filePath);
    addCommandFields({ filePath: target });

    let text: string;
    try {
      text = await fs.readFile(target, 'utf8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        throw LibraryError.fileNotFound(target);
      }
      throw LibraryError.storage(`Could not read library data from ${target}`, error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw LibraryError.corruptData(`Saved data at ${target} is not valid JSON`, undefined, error);
    }

    const state = this.deserialize(raw);
    log.info(
      {
        books: state.catalog.size,
        users: state.directory.size,
        transactions: state.ledger.size,
      },
      'Library loaded'
    );
    return state;
  }
}
