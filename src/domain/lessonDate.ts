import { DateTime } from "luxon";

/**
 * Raised when a timestamp does not conform to ISO-8601.
 */
export class ParseError extends Error {
  readonly input: string;

  constructor(input: string, reason?: string | null) {
    super(`Invalid ISO-8601 timestamp "${input}"${reason ? `: ${reason}` : ""}`);
    this.name = "ParseError";
    this.input = input;
  }
}

/**
 * Calendar date (YYYY-MM-DD) and time of day (HH:MM:SS) of an instant,
 * read in the offset the timestamp itself carries.
 */
export interface LessonInstant {
  date: string;
  time: string;
}

/**
 * Parse an ISO-8601 timestamp. A trailing "Z" is treated as +00:00.
 * The date and time are taken as written; nothing is converted to the local zone.
 */
export function parseLessonInstant(value: string): LessonInstant {
  const parsed = DateTime.fromISO(value, { setZone: true });

  if (!parsed.isValid) {
    throw new ParseError(value, parsed.invalidExplanation ?? parsed.invalidReason);
  }

  return {
    date: parsed.toFormat("yyyy-MM-dd"),
    time: parsed.toFormat("HH:mm:ss"),
  };
}

/**
 * Return a copy of the map with keys in ascending lexical order.
 * For YYYY-MM-DD keys this is chronological order.
 */
export function sortByDateKey<T>(map: ReadonlyMap<string, T>): Map<string, T> {
  const keys = Array.from(map.keys()).sort();
  const sorted = new Map<string, T>();
  for (const key of keys) {
    const value = map.get(key);
    if (value !== undefined) {
      sorted.set(key, value);
    }
  }
  return sorted;
}
