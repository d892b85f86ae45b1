import { parseLessonInstant, sortByDateKey } from "./lessonDate";

/**
 * Planned lesson times grouped by calendar date.
 * Keys are YYYY-MM-DD in ascending order, each value a sorted list of HH:MM:SS strings.
 */
export type PlannedByDate = ReadonlyMap<string, readonly string[]>;

/**
 * Group planned lesson instants by calendar date.
 *
 * Planned dates come from the school timetable and are expected to be well formed,
 * so a malformed timestamp throws a ParseError instead of being skipped.
 */
export function bucketPlannedDates(timestamps: readonly string[]): PlannedByDate {
  const buckets = new Map<string, string[]>();

  for (const timestamp of timestamps) {
    const { date, time } = parseLessonInstant(timestamp);
    const times = buckets.get(date);
    if (times) {
      times.push(time);
    } else {
      buckets.set(date, [time]);
    }
  }

  const withSortedTimes = new Map<string, readonly string[]>();
  for (const [date, times] of buckets) {
    withSortedTimes.set(date, [...times].sort());
  }

  return sortByDateKey(withSortedTimes);
}
