export { bucketPlannedDates, PlannedByDate } from "./domain/dateBucketer";
export { classifyEntries, ClassifyOptions, DateAggregate, EntriesByDate, SkippedEntry } from "./domain/entryClassifier";
export { reconcile, ComparisonByDate, ComparisonRecord } from "./domain/reconciler";
export { summarizeComparison, getIncompleteDates, ComparisonSummary } from "./domain/comparisonSummary";
export { summarizeCapacities, JournalDetails, JournalHoursSummary } from "./domain/journalDetails";
export {
  RawJournalEntry,
  decodeEntryType,
  REGULAR_LESSON,
  INDEPENDENT_LESSON,
  UNKNOWN_ENTRY_TYPE,
} from "./domain/journalEntry";
export { ParseError } from "./domain/lessonDate";
export { TahvelClient, TahvelHttpError, TahvelResponseError } from "./services/tahvelClient";
export { checkJournal, checkJournals, JournalCheckResult } from "./services/journalCheckService";
export { loadConfig, AppConfig, ConfigError } from "./config";
