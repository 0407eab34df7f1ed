export type CliErrorKind = "input" | "no-piped-input" | "file-write" | "clipboard" | "config";

/**
 * Error that ends the run with exit code 1. `hint` lines are printed after the
 * message, dimmed.
 */
export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly hint: readonly string[];

  constructor(kind: CliErrorKind, message: string, hint: readonly string[] = []) {
    super(message);
    this.name = "CliError";
    this.kind = kind;
    this.hint = hint;
  }
}

export const CLIPBOARD_HINT =
  "Hint: install wl-clipboard (wl-copy) or xclip/xsel, or use a terminal that supports OSC 52.";

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
