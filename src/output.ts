import { chalkStderr as chalk } from "chalk";

// Diagnostics go to stderr: stdout carries the mirrored input.

let quiet = false;

export function setQuiet(value: boolean): void {
  quiet = value;
}

export function isQuiet(): boolean {
  return quiet;
}

export function printInfo(message: string): void {
  if (quiet) return;
  console.error(message);
}

export function printSuccess(message: string): void {
  if (quiet) return;
  console.error(chalk.green(message));
}

export function printNote(message: string): void {
  if (quiet) return;
  console.error(chalk.yellow(message));
}

/** Hard failures print regardless of quiet mode. */
export function printError(message: string, hint: readonly string[] = []): void {
  console.error(chalk.red(message));
  for (const line of hint) console.error(chalk.dim(line));
}
