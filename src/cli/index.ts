#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { loadConfig } from "../config";
import { TahvelClient } from "../services/tahvelClient";
import { CookieStore } from "../stores/cookieStore";
import { CheckerOptions, runChecker } from "./checker";
import { MenuPrompt } from "./helpers";
import { formatError } from "./report";

export function buildProgram(): Command {
  return new Command()
    .name("tahvel-check")
    .description("Check Tahvel journal entries against planned lessons")
    .option("-j, --journal-id <id>", "journal ID to check (if not provided, journals are listed for selection)")
    .option("-c, --cookie <value>", "authentication cookie for Tahvel (if not provided, the saved cookie is used)")
    .option("-s, --save-cookie", "save the provided cookie for future use")
    .option("-a, --all-journals", "process all journals of the selected study year")
    .option("-d, --details", "also show planned and used hours of each journal")
    .option("--entry-types", "list the journal entry types known to Tahvel and exit")
    .option("--forget-cookie", "delete the saved cookie and exit");
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  const program = buildProgram();
  program.parse(process.argv);
  const options = program.opts<CheckerOptions>();

  const config = loadConfig();
  const prompt = new MenuPrompt();

  try {
    process.exitCode = await runChecker(options, {
      config,
      cookieStore: new CookieStore(config.configDir),
      createClient: (appConfig, cookie) =>
        new TahvelClient({
          baseUrl: appConfig.baseUrl,
          cookie,
          pageSize: appConfig.pageSize,
          lang: appConfig.lang,
        }),
      choose: (title, items) => prompt.choose(title, items),
    });
  } finally {
    prompt.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    formatError(error).forEach(line => console.error(line));
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exitCode = 1;
  });
}
