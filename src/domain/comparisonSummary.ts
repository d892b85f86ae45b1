import { ComparisonByDate } from "./reconciler";

export interface ComparisonSummary {
  totalDates: number;
  completeDates: number;
  incompleteDates: number;
  completionRate: number | null; // percent; null when there are no dates
  plannedLessons: number;
  enteredLessons: number;
  regularLessons: number;
  independentLessons: number;
  otherLessons: number;
}

/**
 * Summarize a reconciliation: how many dates are complete, and lesson totals
 */
export function summarizeComparison(comparison: ComparisonByDate): ComparisonSummary {
  const summary: ComparisonSummary = {
    totalDates: comparison.size,
    completeDates: 0,
    incompleteDates: 0,
    completionRate: null,
    plannedLessons: 0,
    enteredLessons: 0,
    regularLessons: 0,
    independentLessons: 0,
    otherLessons: 0,
  };

  for (const record of comparison.values()) {
    if (record.allInserted) {
      summary.completeDates++;
    } else {
      summary.incompleteDates++;
    }
    summary.plannedLessons += record.plannedLessons;
    summary.enteredLessons += record.enteredLessons;
    summary.regularLessons += record.regularLessons;
    summary.independentLessons += record.independentLessons;
    summary.otherLessons += record.otherLessons;
  }

  if (summary.totalDates > 0) {
    summary.completionRate = (summary.completeDates / summary.totalDates) * 100;
  }

  return summary;
}

/**
 * Dates whose planned regular lessons are not all recorded, oldest first
 */
export function getIncompleteDates(comparison: ComparisonByDate): string[] {
  const dates: string[] = [];
  for (const [date, record] of comparison) {
    if (!record.allInserted) {
      dates.push(date);
    }
  }
  return dates;
}
