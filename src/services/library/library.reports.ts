/**
 * Library Reports
 *
 * Each report kind has one builder. Builders only read the state.
 */

import { LibraryState } from './library.state';

export enum ReportKind {
  AVAILABLE_VS_BORROWED = 'available-vs-borrowed',
  MOST_POPULAR = 'most-popular',
  OVERDUE_USERS = 'overdue-users',
  SUMMARY = 'summary',
}

export interface AvailabilityRow {
  title: string;
  available: number;
  onLoan: number;
  total: number;
}

export interface PopularityRow {
  title: string;
  issueCount: number;
}

export interface AvailableVsBorrowedReport {
  kind: ReportKind.AVAILABLE_VS_BORROWED;
  rows: AvailabilityRow[];
}

export interface MostPopularReport {
  kind: ReportKind.MOST_POPULAR;
  rows: PopularityRow[];
}

/**
 * Books carry no due dates, so there is nothing to be overdue yet
 */
export interface OverdueUsersReport {
  kind: ReportKind.OVERDUE_USERS;
  implemented: false;
  rows: [];
}

export interface SummaryReport {
  kind: ReportKind.SUMMARY;
  copiesAvailable: number;
  copiesOnLoan: number;
  uniqueTitles: number;
  totalUsers: number;
  totalTransactions: number;
}

export type LibraryReport =
  | AvailableVsBorrowedReport
  | MostPopularReport
  | OverdueUsersReport
  | SummaryReport;

export type ReportOf<K extends ReportKind> = Extract<LibraryReport, { kind: K }>;

export interface ReportOptions {
  popularTopN: number;
}

type ReportBuilders = {
  [K in ReportKind]: (state: LibraryState, options: ReportOptions) => ReportOf<K>;
};

const availability = (state: LibraryState): AvailabilityRow[] =>
  state.catalog.list().map((book) => {
    const onLoan = Math.max(0, state.ledger.outstanding(book.title));
    return {
      title: book.title,
      available: book.quantity,
      onLoan,
      total: book.quantity + onLoan,
    };
  });

const compareByPopularity = (a: PopularityRow, b: PopularityRow): number =>
  b.issueCount - a.issueCount || (a.title < b.title ? -1 : a.title > b.title ? 1 : 0);

export const reportBuilders: ReportBuilders = {
  [ReportKind.AVAILABLE_VS_BORROWED]: (state) => ({
    kind: ReportKind.AVAILABLE_VS_BORROWED,
    rows: availability(state),
  }),

  [ReportKind.MOST_POPULAR]: (state, options) => ({
    kind: ReportKind.MOST_POPULAR,
    rows: state.catalog
      .list()
      .map((book) => ({ title: book.title, issueCount: state.ledger.issueCount(book.title) }))
      .sort(compareByPopularity)
      .slice(0, options.popularTopN),
  }),

  [ReportKind.OVERDUE_USERS]: () => ({
    kind: ReportKind.OVERDUE_USERS,
    implemented: false,
    rows: [],
  }),

  [ReportKind.SUMMARY]: (state) => {
    const rows = availability(state);
    return {
      kind: ReportKind.SUMMARY,
      copiesAvailable: rows.reduce((sum, row) => sum + row.available, 0),
      copiesOnLoan: rows.reduce((sum, row) => sum + row.onLoan, 0),
      uniqueTitles: state.catalog.size,
      totalUsers: state.directory.size,
      totalTransactions: state.ledger.size,
    };
  },
};

export function buildReport<K extends ReportKind>(
  kind: K,
  state: LibraryState,
  options: ReportOptions
): ReportOf<K> {
  const build: ReportBuilders[K] = reportBuilders[kind];
  return build(state, options);
}
