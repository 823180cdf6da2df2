import { formatVariableList } from '../logic/gridApi/variables';
import { isValidTimeFormat, normalizeTimeInput } from '../logic/utils/dateUtils';
import type { ConsoleIo } from './consoleIo';

/**
 * Prompt helpers for the interactive menu.
 * Each helper re-asks until the answer is usable.
 */

export const TIME_FORMAT_HINT = 'YYYY-MM-DD or YYYY-MM-DDTHH:MM:SSZ';

/**
 * Print the catalogue of common variables
 */
export function printVariables(io: ConsoleIo): void {
  io.write('');
  formatVariableList().forEach((line) => io.write(line));
}

/**
 * Ask for a variable id; "list" prints the catalogue and asks again
 * @returns Non-empty, trimmed variable id
 */
export async function askVariableId(io: ConsoleIo): Promise<string> {
  for (;;) {
    const answer = (await io.ask("Enter variable ID (e.g., 124 for Hydro, or 'list' to see all): ")).trim();
    if (answer.toLowerCase() === 'list') {
      printVariables(io);
      continue;
    }
    if (answer) {
      return answer;
    }
    io.write('Variable ID cannot be empty.');
  }
}

/**
 * Ask for a time until it is valid
 * @returns Full UTC ISO-8601 string, e.g. "2024-01-15T00:00:00Z"
 */
export async function askTimeInput(io: ConsoleIo, prompt: string): Promise<string> {
  for (;;) {
    const answer = (await io.ask(prompt)).trim();
    if (isValidTimeFormat(answer)) {
      return normalizeTimeInput(answer);
    }
    io.write(`Invalid format. Please use: ${TIME_FORMAT_HINT}`);
  }
}

/**
 * Ask a yes/no question; only "y" (any case) counts as yes
 */
export async function askYesNo(io: ConsoleIo, prompt: string): Promise<boolean> {
  const answer = (await io.ask(prompt)).trim().toLowerCase();
  return answer === 'y';
}
