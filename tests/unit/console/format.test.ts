/**
 * Unit tests for console formatting
 */

import { formatBook, formatListing, formatReport, formatUser } from '../../../src/console/format';
import { ReportKind } from '../../../src/services/library/library.reports';

describe('Console formatting', () => {
  describe('formatBook', () => {
    it('should show title, author, genre and copies', () => {
      expect(formatBook({ title: '1984', author: 'George Orwell', genre: 'Dystopia', quantity: 1 })).toBe(
        ' - 1984 by George Orwell [Dystopia] (1 copy available)'
      );
    });

    it('should handle a missing author and genre', () => {
      expect(formatBook({ title: 'Notes', author: '', genre: '', quantity: 0 })).toBe(
        ' - Notes by unknown author (0 copies available)'
      );
    });
  });

  describe('formatUser', () => {
    it('should group borrowed copies', () => {
      expect(
        formatUser({ name: 'John Smith', contact: 'john@example.com', borrowed: ['1984', 'Dune', '1984'] })
      ).toBe(' - John Smith <john@example.com> borrowed: 1984 x2, Dune');
    });

    it('should say nothing is borrowed', () => {
      expect(formatUser({ name: 'Ada Lane', contact: '', borrowed: [] })).toBe(' - Ada Lane borrowed: nothing');
    });
  });

  describe('formatListing', () => {
    it('should mark empty sections', () => {
      expect(formatListing([], [])).toEqual(['Books:', ' (none)', 'Users:', ' (none)']);
    });
  });

  describe('formatReport', () => {
    it('should number the most popular books', () => {
      expect(
        formatReport({
          kind: ReportKind.MOST_POPULAR,
          rows: [
            { title: '1984', issueCount: 3 },
            { title: 'Brave New World', issueCount: 1 },
          ],
        })
      ).toEqual(['Most popular:', ' 1. 1984 (issued 3 times)', ' 2. Brave New World (issued 1 time)']);
    });

    it('should explain that overdue users are not tracked', () => {
      expect(formatReport({ kind: ReportKind.OVERDUE_USERS, implemented: false, rows: [] })).toEqual([
        'Overdue users:',
        ' (not tracked: books have no due dates)',
      ]);
    });

    it('should print the summary on two lines', () => {
      expect(
        formatReport({
          kind: ReportKind.SUMMARY,
          copiesAvailable: 5,
          copiesOnLoan: 1,
          uniqueTitles: 3,
          totalUsers: 2,
          totalTransactions: 4,
        })
      ).toEqual([
        'Summary:',
        ' - 3 titles, 5 copies available, 1 on loan',
        ' - 2 users, 4 transactions',
      ]);
    });
  });
});
