import { AppConfig } from "../config";
import { CookieStore } from "../stores/cookieStore";
import {
  JournalCheckResult,
  JournalSource,
  checkJournal,
  checkJournals,
} from "../services/journalCheckService";
import { TahvelClient } from "../services/tahvelClient";
import {
  MenuItem,
  formatComparisonTable,
  formatEntryTypes,
  formatError,
  formatJournalDetails,
  formatJournalHeader,
  formatSummary,
} from "./report";
import { printLines } from "./helpers";

// Parsed command-line flags
export type CheckerOptions = {
  journalId?: string;
  cookie?: string;
  saveCookie?: boolean;
  allJournals?: boolean;
  details?: boolean;
  entryTypes?: boolean;
  forgetCookie?: boolean;
};

export type CheckerClient = JournalSource &
  Pick<TahvelClient, "getEntryTypes" | "getStudyYears" | "getJournals">;

export interface CheckerDeps {
  config: AppConfig;
  cookieStore: Pick<CookieStore, "load" | "save" | "clear">;
  createClient: (config: AppConfig, cookie: string) => CheckerClient;
  choose: (title: string, items: readonly MenuItem[]) => Promise<number>;
}

const SEPARATOR = "-".repeat(80);

function printResult(result: JournalCheckResult): void {
  printLines(formatComparisonTable(result.comparison));
  printLines(formatSummary(result.summary));
  if (result.details) {
    printLines(formatJournalDetails(result.details));
  }
  if (result.skippedEntries.length > 0) {
    console.log(`\n⚠️  ${result.skippedEntries.length} journal entries could not be read and were skipped.`);
  }
}

/**
 * Check one journal and print the comparison. Returns false if the check failed.
 */
async function processJournal(
  client: CheckerClient,
  journal: { id: string; name?: string },
  withDetails: boolean
): Promise<boolean> {
  printLines(formatJournalHeader(journal.id, journal.name));

  try {
    printResult(await checkJournal(client, journal.id, { withDetails }));
    return true;
  } catch (error) {
    formatError(error, `journal ${journal.id}`).forEach(line => console.error(line));
    return false;
  }
}

/**
 * Resolve the cookie from the command line or the saved copy, saving it when asked
 */
function resolveCookie(options: CheckerOptions, deps: CheckerDeps): string | null {
  if (!options.cookie) {
    if (options.saveCookie) {
      console.warn("⚠️  --save-cookie needs a cookie given with --cookie; nothing was saved.");
    }
    return deps.cookieStore.load();
  }

  if (options.saveCookie) {
    try {
      deps.cookieStore.save(options.cookie);
      console.log("✅ Cookie saved successfully for future use.");
    } catch (error) {
      formatError(error, "saving the cookie").forEach(line => console.error(line));
    }
  }
  return options.cookie;
}

/**
 * Pick a study year and then one or all of its journals, and check them
 */
async function runInteractive(
  client: CheckerClient,
  options: CheckerOptions,
  deps: CheckerDeps
): Promise<number> {
  console.log("🔎 Fetching available study years...");
  const years = await client.getStudyYears();
  if (years.length === 0) {
    console.error("❌ No study years found.");
    return 1;
  }

  const year = years[await deps.choose("Available Study Years", years)];
  console.log(`\n✅ Selected study year: ${year.name}`);

  console.log("🔎 Fetching journals...");
  const journals = await client.getJournals(year.id);
  if (journals.length === 0) {
    console.error("❌ No journals found for the selected study year.");
    return 1;
  }
  console.log(`📚 Found ${journals.length} journals.`);

  if (!options.allJournals) {
    const journal = journals[await deps.choose("Available Journals", journals)];
    console.log(`\n✅ Selected journal: ${journal.name}`);
    return (await processJournal(client, journal, Boolean(options.details))) ? 0 : 1;
  }

  console.log(`\n🔁 Processing all ${journals.length} journals...`);
  const succeeded = await checkJournals(
    client,
    journals,
    {
      onStart: (journal, index) => {
        console.log(`\n📘 Processing journal ${index + 1} of ${journals.length}: ${journal.name} (ID: ${journal.id})`);
        printLines(formatJournalHeader(journal.id, journal.name));
      },
      onOutcome: outcome => {
        if ("result" in outcome) {
          printResult(outcome.result);
        } else {
          formatError(outcome.error, `journal ${outcome.journal.id}`).forEach(line => console.error(line));
        }
        console.log("\n" + SEPARATOR + "\n");
      },
    },
    { withDetails: Boolean(options.details) }
  );

  console.log(`🎉 Successfully processed ${succeeded} out of ${journals.length} journals`);
  return succeeded === journals.length ? 0 : 1;
}

/**
 * Run the checker for the parsed command-line options. Returns the process exit code.
 */
export async function runChecker(options: CheckerOptions, deps: CheckerDeps): Promise<number> {
  if (options.forgetCookie) {
    if (deps.cookieStore.clear()) {
      console.log("🗑️  Saved cookie deleted.");
    } else {
      console.log("No saved cookie to delete.");
    }
    return 0;
  }

  const cookie = resolveCookie(options, deps);
  if (!cookie) {
    console.error("❌ Error: No cookie provided and no saved cookie found.");
    console.error("Please provide a cookie with the --cookie/-c option.");
    console.error("You can save it for future use with the --save-cookie/-s flag.");
    return 1;
  }

  const client = deps.createClient(deps.config, cookie);

  try {
    if (options.entryTypes) {
      printLines(formatEntryTypes(await client.getEntryTypes()));
      return 0;
    }
    if (options.journalId) {
      return (await processJournal(client, { id: options.journalId }, Boolean(options.details))) ? 0 : 1;
    }
    return await runInteractive(client, options, deps);
  } catch (error) {
    formatError(error).forEach(line => console.error(line));
    return 1;
  }
}
