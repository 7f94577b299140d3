import { Book } from '../../models/Book';
import { LibraryError } from '../../errors/libraryError';
import { createServiceLogger } from '../../observability';
import { validateInput } from '../../validation/validateInput';
import {
  AddBookDTO,
  UpdateBookDTO,
  addBookValidation,
  updateBookValidation,
} from './catalog.validation';

const log = createServiceLogger('book-catalog');

/**
 * Book records keyed by title, in insertion order
 */
export class BookCatalog {
  private readonly books = new Map<string, Book>();

  constructor(initial: Book[] = []) {
    for (const book of initial) {
      this.addBook(book);
    }
  }

  get size(): number {
    return this.books.size;
  }

  has(title: string): boolean {
    return this.books.has(title);
  }

  /**
   * Get a copy of a book, or throw NOT_FOUND
   */
  find(title: string): Book {
    return { ...this.require(title) };
  }

  list(): Book[] {
    return Array.from(this.books.values(), (book) => ({ ...book }));
  }

  addBook(dto: AddBookDTO): Book {
    const book = validateInput(addBookValidation, dto, 'Invalid book');
    if (this.books.has(book.title)) {
      throw LibraryError.duplicateKey('book', book.title);
    }

    this.books.set(book.title, book);
    log.debug({ title: book.title, quantity: book.quantity }, 'Book added');
    return { ...book };
  }

  removeBook(title: string): Book {
    const book = this.require(title);
    this.books.delete(title);
    log.debug({ title }, 'Book removed');
    return { ...book };
  }

  /**
   * Partial update of author, genre and quantity. The title is the key and cannot change.
   */
  updateBook(title: string, dto: UpdateBookDTO): Book {
    const book = this.require(title);
    const fields = validateInput(updateBookValidation, dto, 'Invalid book update');

    if (fields.author !== undefined) book.author = fields.author;
    if (fields.genre !== undefined) book.genre = fields.genre;
    if (fields.quantity !== undefined) book.quantity = fields.quantity;

    log.debug({ title, fields }, 'Book updated');
    return { ...book };
  }

  /**
   * Move copies on or off the shelf. Quantity never drops below zero.
   */
  adjustQuantity(title: string, delta: number): Book {
    const book = this.require(title);
    const next = book.quantity + delta;
    if (next < 0) {
      throw LibraryError.outOfStock(title);
    }
    book.quantity = next;
    return { ...book };
  }

  private require(title: string): Book {
    const book = this.books.get(title);
    if (!book) {
      throw LibraryError.notFound('book', title);
    }
    return book;
  }
}
