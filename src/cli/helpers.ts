import readline from "readline";
import { MenuItem, formatMenuTable } from "./report";

export type QuestionAsker = Pick<readline.Interface, "question">;

/**
 * Print lines to the console
 */
export function printLines(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

/**
 * Ask for an option number between 1 and optionCount, repeating until the answer is valid
 */
export async function askChoice(
  rl: QuestionAsker,
  question: string,
  optionCount: number
): Promise<number> {
  return new Promise((resolve) => {
    const ask = () => {
      rl.question(`\n${question}\n> `, (answer: string) => {
        const choice = Number(answer.trim());
        if (Number.isInteger(choice) && choice >= 1 && choice <= optionCount) {
          resolve(choice);
        } else {
          console.log(`Please enter a number between 1 and ${optionCount}`);
          ask();
        }
      });
    };
    ask();
  });
}

/**
 * Interactive menus on stdin/stdout. The readline interface is opened on first use.
 */
export class MenuPrompt {
  private rl: readline.Interface | null = null;

  /**
   * Show the items and return the index of the one picked
   */
  async choose(title: string, items: readonly MenuItem[]): Promise<number> {
    if (!this.rl) {
      this.rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
      });
    }

    printLines(formatMenuTable(title, items));
    const choice = await askChoice(this.rl, "Select an option (enter the number)", items.length);
    return choice - 1;
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }
}
