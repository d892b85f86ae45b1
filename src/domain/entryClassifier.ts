import {
  RawJournalEntry,
  categorizeEntryType,
  decodeEntryType,
  readLessonCount,
  truncateContent,
} from "./journalEntry";
import { ParseError, parseLessonInstant, sortByDateKey } from "./lessonDate";
import { createLookup } from "./lookup";

/**
 * Everything recorded in the journal for one calendar date
 */
export interface DateAggregate {
  entries: RawJournalEntry[];
  totalLessons: number;
  content: string; // content of the first entry seen for the date
  regularLessons: number;
  independentLessons: number;
  otherLessons: number;
  entryTypeCounts: Record<string, number>; // lessons summed per type code
}

export type EntriesByDate = ReadonlyMap<string, DateAggregate>;

export interface SkippedEntry {
  entry: RawJournalEntry;
  reason: string;
}

export interface ClassifyOptions {
  /**
   * Called for each entry dropped because its date or lesson count is malformed.
   * Defaults to a console warning.
   */
  onSkip?: (skipped: SkippedEntry) => void;
}

function warnSkipped({ reason }: SkippedEntry): void {
  console.warn(`⚠️  Skipping journal entry: ${reason}`);
}

/**
 * Group journal entries by calendar date and count lessons per entry type.
 *
 * Entries without a date are left out silently. Entries with an unparseable date
 * or lesson count, or with content that is not text, are reported through onSkip
 * and left out; the rest are still processed.
 */
export function classifyEntries(
  entries: readonly RawJournalEntry[],
  options: ClassifyOptions = {}
): EntriesByDate {
  const onSkip = options.onSkip ?? warnSkipped;
  const byDate = new Map<string, DateAggregate>();

  for (const entry of entries) {
    const { entryDate } = entry;
    if (entryDate === undefined || entryDate === null || entryDate === "") {
      continue;
    }

    if (typeof entryDate !== "string") {
      onSkip({ entry, reason: `entryDate is not a string (${JSON.stringify(entryDate)})` });
      continue;
    }

    let date: string;
    try {
      date = parseLessonInstant(entryDate).date;
    } catch (error) {
      if (error instanceof ParseError) {
        onSkip({ entry, reason: error.message });
        continue;
      }
      throw error;
    }

    const lessons = readLessonCount(entry.lessons);
    if (lessons === null) {
      onSkip({ entry, reason: `invalid lesson count ${JSON.stringify(entry.lessons)} on ${date}` });
      continue;
    }

    const { content } = entry;
    if (content !== undefined && content !== null && typeof content !== "string") {
      onSkip({ entry, reason: `content is not text (${JSON.stringify(content)}) on ${date}` });
      continue;
    }

    const entryType = decodeEntryType(entry.entryType);

    let aggregate = byDate.get(date);
    if (!aggregate) {
      aggregate = {
        entries: [],
        totalLessons: 0,
        content: truncateContent(content),
        regularLessons: 0,
        independentLessons: 0,
        otherLessons: 0,
        entryTypeCounts: createLookup<number>(),
      };
      byDate.set(date, aggregate);
    }

    aggregate.entries.push(entry);
    aggregate.totalLessons += lessons;

    switch (categorizeEntryType(entryType)) {
      case "regular":
        aggregate.regularLessons += lessons;
        break;
      case "independent":
        aggregate.independentLessons += lessons;
        break;
      case "other":
        aggregate.otherLessons += lessons;
        break;
    }

    aggregate.entryTypeCounts[entryType] = (aggregate.entryTypeCounts[entryType] ?? 0) + lessons;
  }

  return sortByDateKey(byDate);
}
