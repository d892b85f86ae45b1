/**
 * A journal entry as returned by the Tahvel API.
 *
 * Entry data is user-entered and loosely shaped: any field may be missing,
 * null, or of an unexpected type. Values are narrowed by the classifier.
 */
export interface RawJournalEntry {
  entryDate?: unknown;
  lessons?: unknown;
  content?: unknown;
  entryType?: unknown;
  [field: string]: unknown;
}

// Entry type codes from the SISSEKANNE classifier
export const REGULAR_LESSON = "SISSEKANNE_T";
export const INDEPENDENT_LESSON = "SISSEKANNE_I";
export const UNKNOWN_ENTRY_TYPE = "UNKNOWN";

export type LessonCategory = "regular" | "independent" | "other";

export const NO_CONTENT = "N/A";
const CONTENT_MAX_LENGTH = 40;
const CONTENT_KEEP_LENGTH = 37;
const ELLIPSIS = "...";

/**
 * Normalize an entry type to its bare code.
 * The API sends either the code itself or a classifier object such as { code: "SISSEKANNE_T" }.
 */
export function decodeEntryType(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "object" && value !== null && "code" in value) {
    const { code } = value;
    if (typeof code === "string") {
      return code;
    }
  }
  return UNKNOWN_ENTRY_TYPE;
}

/**
 * Which lesson counter an entry type contributes to
 */
export function categorizeEntryType(code: string): LessonCategory {
  switch (code) {
    case REGULAR_LESSON:
      return "regular";
    case INDEPENDENT_LESSON:
      return "independent";
    default:
      return "other";
  }
}

/**
 * Shorten content longer than 40 characters to 37 characters plus "...".
 * Missing content becomes "N/A".
 */
export function truncateContent(value: unknown): string {
  if (typeof value !== "string") {
    return NO_CONTENT;
  }

  const chars = Array.from(value);
  if (chars.length <= CONTENT_MAX_LENGTH) {
    return value;
  }
  return chars.slice(0, CONTENT_KEEP_LENGTH).join("") + ELLIPSIS;
}

/**
 * Read the lesson count of an entry. Missing counts default to 0;
 * anything that is not a non-negative integer yields null.
 */
export function readLessonCount(value: unknown): number | null {
  if (value === undefined || value === null) {
    return 0;
  }
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    return value;
  }
  return null;
}
