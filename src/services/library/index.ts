export { LibraryService, LibraryServiceOptions, CirculationResult } from './library.service';
export { LibraryState, LibraryStateSeed, createLibraryState } from './library.state';
export {
  ReportKind,
  ReportOf,
  ReportOptions,
  LibraryReport,
  AvailabilityRow,
  PopularityRow,
  AvailableVsBorrowedReport,
  MostPopularReport,
  OverdueUsersReport,
  SummaryReport,
  buildReport,
} from './library.reports';
