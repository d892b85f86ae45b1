import { PlannedByDate } from "./dateBucketer";
import { EntriesByDate } from "./entryClassifier";
import { NO_CONTENT } from "./journalEntry";
import { sortByDateKey } from "./lessonDate";
import { copyLookup } from "./lookup";

/**
 * Planned versus recorded lessons for one calendar date
 */
export interface ComparisonRecord {
  plannedLessons: number;
  enteredLessons: number;
  regularLessons: number;
  independentLessons: number;
  otherLessons: number;
  content: string;
  times: readonly string[];
  entryTypeCounts: Readonly<Record<string, number>>;
  allInserted: boolean;
  hasJournalEntry: boolean;
}

export type ComparisonByDate = ReadonlyMap<string, Readonly<ComparisonRecord>>;

/**
 * Merge planned lesson times and recorded entries into one record per date.
 *
 * A planned date is complete when its regular lessons cover every planned slot;
 * independent and other entries never fill a planned slot. A date that only has
 * journal entries carries no obligation and is always complete.
 */
export function reconcile(
  plannedByDate: PlannedByDate,
  entriesByDate: EntriesByDate
): ComparisonByDate {
  const comparison = new Map<string, ComparisonRecord>();

  for (const [date, times] of plannedByDate) {
    const aggregate = entriesByDate.get(date);
    const plannedLessons = times.length;
    const regularLessons = aggregate?.regularLessons ?? 0;

    comparison.set(date, {
      plannedLessons,
      enteredLessons: aggregate?.totalLessons ?? 0,
      regularLessons,
      independentLessons: aggregate?.independentLessons ?? 0,
      otherLessons: aggregate?.otherLessons ?? 0,
      content: aggregate?.content ?? NO_CONTENT,
      times: [...times],
      entryTypeCounts: copyLookup(aggregate?.entryTypeCounts),
      allInserted: regularLessons >= plannedLessons,
      hasJournalEntry: aggregate !== undefined,
    });
  }

  for (const [date, aggregate] of entriesByDate) {
    if (comparison.has(date)) {
      continue;
    }

    comparison.set(date, {
      plannedLessons: 0,
      enteredLessons: aggregate.totalLessons,
      regularLessons: aggregate.regularLessons,
      independentLessons: aggregate.independentLessons,
      otherLessons: aggregate.otherLessons,
      content: aggregate.content,
      times: [],
      entryTypeCounts: copyLookup(aggregate.entryTypeCounts),
      allInserted: true,
      hasJournalEntry: true,
    });
  }

  return sortByDateKey(comparison);
}
