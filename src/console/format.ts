import { Book } from '../models/Book';
import { User } from '../models/User';
import { LibraryReport, ReportKind } from '../services/library';

const copies = (count: number): string => `${count} cop${count === 1 ? 'y' : 'ies'}`;

export function formatBook(book: Book): string {
  const author = book.author || 'unknown author';
  const genre = book.genre ? ` [${book.genre}]` : '';
  return ` - ${book.title} by ${author}${genre} (${copies(book.quantity)} available)`;
}

/**
 * Borrowed titles are grouped, e.g. "1984 x2, Dune"
 */
export function formatUser(user: User): string {
  const contact = user.contact ? ` <${user.contact}>` : '';
  const counts = new Map<string, number>();
  for (const title of user.borrowed) {
    counts.set(title, (counts.get(title) ?? 0) + 1);
  }
  const held =
    counts.size === 0
      ? 'nothing'
      : Array.from(counts, ([title, count]) => (count > 1 ? `${title} x${count}` : title)).join(', ');
  return ` - ${user.name}${contact} borrowed: ${held}`;
}

export function formatListing(books: Book[], users: User[]): string[] {
  return [
    'Books:',
    ...(books.length > 0 ? books.map(formatBook) : [' (none)']),
    'Users:',
    ...(users.length > 0 ? users.map(formatUser) : [' (none)']),
  ];
}

export function formatReport(report: LibraryReport): string[] {
  switch (report.kind) {
    case ReportKind.AVAILABLE_VS_BORROWED:
      return [
        'Available vs borrowed:',
        ...(report.rows.length > 0
          ? report.rows.map(
              (row) => ` - ${row.title}: ${row.available} available, ${row.onLoan} on loan, ${row.total} total`
            )
          : [' (no books)']),
      ];
    case ReportKind.MOST_POPULAR:
      return [
        'Most popular:',
        ...(report.rows.length > 0
          ? report.rows.map(
              (row, index) =>
                ` ${index + 1}. ${row.title} (issued ${row.issueCount} time${row.issueCount === 1 ? '' : 's'})`
            )
          : [' (no books)']),
      ];
    case ReportKind.OVERDUE_USERS:
      return ['Overdue users:', ' (not tracked: books have no due dates)'];
    case ReportKind.SUMMARY:
      return [
        'Summary:',
        ` - ${report.uniqueTitles} titles, ${report.copiesAvailable} copies available, ${report.copiesOnLoan} on loan`,
        ` - ${report.totalUsers} users, ${report.totalTransactions} transactions`,
      ];
  }
}
