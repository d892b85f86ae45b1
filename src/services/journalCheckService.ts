import { bucketPlannedDates } from "../domain/dateBucketer";
import { SkippedEntry, classifyEntries } from "../domain/entryClassifier";
import { ComparisonSummary, summarizeComparison } from "../domain/comparisonSummary";
import { JournalHoursSummary, summarizeCapacities } from "../domain/journalDetails";
import { ComparisonByDate, reconcile } from "../domain/reconciler";
import { JournalSummary, TahvelClient } from "./tahvelClient";

export interface JournalCheckResult {
  journalId: string;
  comparison: ComparisonByDate;
  summary: ComparisonSummary;
  skippedEntries: SkippedEntry[];
  details?: JournalHoursSummary;
}

export interface CheckJournalOptions {
  withDetails?: boolean;
}

export type JournalCheckOutcome =
  | { journal: JournalSummary; result: JournalCheckResult }
  | { journal: JournalSummary; error: unknown };

/**
 * The part of TahvelClient a journal check needs
 */
export type JournalSource = Pick<TahvelClient, "getPlannedDates" | "getJournalEntries" | "getJournalDetails">;

/**
 * Fetch a journal's planned lessons and entries and compare them date by date
 */
export async function checkJournal(
  source: JournalSource,
  journalId: string,
  options: CheckJournalOptions = {}
): Promise<JournalCheckResult> {
  const plannedDates = await source.getPlannedDates(journalId);
  console.log(`📅 Fetched ${plannedDates.length} planned lesson dates.`);

  const entries = await source.getJournalEntries(journalId);
  console.log(`📝 Fetched ${entries.length} journal entries.`);

  const skippedEntries: SkippedEntry[] = [];
  const plannedByDate = bucketPlannedDates(plannedDates);
  const entriesByDate = classifyEntries(entries, {
    onSkip: skipped => {
      skippedEntries.push(skipped);
      console.warn(`⚠️  Skipping journal entry: ${skipped.reason}`);
    },
  });

  const comparison = reconcile(plannedByDate, entriesByDate);
  const result: JournalCheckResult = {
    journalId,
    comparison,
    summary: summarizeComparison(comparison),
    skippedEntries,
  };

  if (options.withDetails) {
    result.details = summarizeCapacities(await source.getJournalDetails(journalId));
  }

  return result;
}

export interface CheckJournalsHooks {
  onStart?: (journal: JournalSummary, index: number) => void;
  onOutcome: (outcome: JournalCheckOutcome, index: number) => void;
}

/**
 * Check several journals one after another.
 * A failing journal is reported through onOutcome and does not stop the others.
 * Returns the number of journals checked successfully.
 */
export async function checkJournals(
  source: JournalSource,
  journals: readonly JournalSummary[],
  hooks: CheckJournalsHooks,
  options: CheckJournalOptions = {}
): Promise<number> {
  let succeeded = 0;

  for (const [index, journal] of journals.entries()) {
    hooks.onStart?.(journal, index);

    let outcome: JournalCheckOutcome;
    try {
      outcome = { journal, result: await checkJournal(source, journal.id, options) };
      succeeded++;
    } catch (error) {
      outcome = { journal, error };
    }

    hooks.onOutcome(outcome, index);
  }

  return succeeded;
}
