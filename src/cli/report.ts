import { ComparisonSummary } from "../domain/comparisonSummary";
import { JournalHoursSummary } from "../domain/journalDetails";
import { ComparisonByDate } from "../domain/reconciler";
import { TahvelHttpError } from "../services/tahvelClient";

/**
 * Console rendering. Every function returns the lines to print,
 * so output can be checked without capturing the console.
 */

export interface MenuItem {
  id: string;
  name: string;
}

const INDENT = "   ";
const COMPLETE = "✓";
const INCOMPLETE = "✗";

const COLUMNS = [
  { title: "Date", width: 12 },
  { title: "Content", width: 42 },
  { title: "Planned", width: 9 },
  { title: "Entered", width: 9 },
  { title: "Regular", width: 9 },
  { title: "Indep.", width: 8 },
  { title: "Other", width: 7 },
  { title: "Complete", width: 8 },
];

const TABLE_WIDTH = COLUMNS.reduce((sum, column) => sum + column.width, 0);

/**
 * Pad string to the right
 */
function padRight(str: string, len: number): string {
  return str.padEnd(len);
}

function formatRow(cells: string[]): string {
  const last = cells.length - 1;
  return INDENT + cells.map((cell, i) => (i === last ? cell : padRight(cell, COLUMNS[i].width))).join("");
}

export function formatJournalHeader(journalId: string, name?: string): string[] {
  const title = name ? `${name} (ID: ${journalId})` : `Journal ID: ${journalId}`;
  return ["", "=".repeat(60), `Tahvel Lesson Completion Checker - ${title}`, "=".repeat(60)];
}

/**
 * Table of planned versus entered lessons, one row per date
 */
export function formatComparisonTable(comparison: ComparisonByDate): string[] {
  const lines = ["", "📋 Lesson Entries Comparison:", ""];

  if (comparison.size === 0) {
    lines.push(`${INDENT}No lesson dates found.`);
    return lines;
  }

  lines.push(formatRow(COLUMNS.map(column => column.title)));
  lines.push(INDENT + "-".repeat(TABLE_WIDTH));

  for (const [date, record] of comparison) {
    lines.push(
      formatRow([
        date,
        record.content,
        String(record.plannedLessons),
        String(record.enteredLessons),
        String(record.regularLessons),
        String(record.independentLessons),
        String(record.otherLessons),
        record.allInserted ? COMPLETE : INCOMPLETE,
      ])
    );
  }

  return lines;
}

export function formatCompletionRate(rate: number | null): string {
  return rate === null ? "N/A" : `${rate.toFixed(1)}%`;
}

export function formatSummary(summary: ComparisonSummary): string[] {
  return [
    "",
    "📊 Summary:",
    "",
    `${INDENT}Total Dates: ${summary.totalDates}`,
    `${INDENT}Complete Dates: ${summary.completeDates}`,
    `${INDENT}Incomplete Dates: ${summary.incompleteDates}`,
    `${INDENT}Completion Rate: ${formatCompletionRate(summary.completionRate)}`,
    `${INDENT}Lessons: ${summary.plannedLessons} planned, ${summary.enteredLessons} entered ` +
      `(${summary.regularLessons} regular, ${summary.independentLessons} independent, ${summary.otherLessons} other)`,
  ];
}

export function formatJournalDetails(details: JournalHoursSummary): string[] {
  const lines = ["", "🕒 Journal Hours:", "", `${INDENT}Total Planned Hours: ${details.totalPlannedHours}`];

  if (details.capacities.length === 0) {
    lines.push(`${INDENT}No hours by capacity.`);
    return lines;
  }

  for (const capacity of details.capacities) {
    const hours = details.byCapacity[capacity];
    lines.push(
      `${INDENT}${capacity}: ${hours.usedHours}/${hours.plannedHours} used, ${hours.remainingHours} remaining`
    );
  }
  return lines;
}

/**
 * Numbered list of study years or journals to choose from
 */
export function formatMenuTable(title: string, items: readonly MenuItem[]): string[] {
  const lines = ["", `${title}:`, "", INDENT + padRight("#", 6) + padRight("Name", 50) + "ID"];
  lines.push(INDENT + "-".repeat(62));

  items.forEach((item, i) => {
    lines.push(INDENT + padRight(`${i + 1}.`, 6) + padRight(item.name, 50) + item.id);
  });

  return lines;
}

export function formatEntryTypes(codes: readonly string[]): string[] {
  return [`🏷️  ${codes.length} entry types:`, ...codes.map(code => `${INDENT}${code}`)];
}

/**
 * Describe a failure, with a hint when the session cookie was rejected
 */
export function formatError(error: unknown, context?: string): string[] {
  const where = context ? ` for ${context}` : "";

  if (error instanceof TahvelHttpError) {
    const lines = [`❌ HTTP error${where}: ${error.message}`];
    if (error.isAuthError) {
      lines.push("⚠️  Authentication failed. Your cookie may be expired or invalid.");
    }
    return lines;
  }

  const message = error instanceof Error ? error.message : String(error);
  return [`❌ Error${where}: ${message}`];
}
