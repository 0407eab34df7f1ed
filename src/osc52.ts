import { constants } from "node:fs";
import { type FileHandle, open } from "node:fs/promises";
import { errorMessage } from "./errors.js";
import type { FallbackFailure, Result } from "./types.js";

export const CONTROLLING_TTY = "/dev/tty";

/** OSC 52 "set clipboard" (`c` target), BEL-terminated. */
export function buildOsc52Sequence(content: Buffer): string {
  return `\x1b]52;c;${content.toString("base64")}\x07`;
}

/**
 * Copy via the terminal emulator by writing an OSC 52 sequence to the
 * controlling terminal. Stdout is not used since it is usually the pipe.
 */
export async function writeOsc52(
  content: Buffer,
  ttyPath: string = CONTROLLING_TTY,
): Promise<Result<void, FallbackFailure>> {
  let tty: FileHandle;
  try {
    tty = await open(ttyPath, constants.O_WRONLY);
  } catch (err) {
    return {
      ok: false,
      error: { kind: "terminal-unavailable", message: `open ${ttyPath}: ${errorMessage(err)}` },
    };
  }

  let written: Result<void, FallbackFailure>;
  try {
    await tty.write(buildOsc52Sequence(content));
    written = { ok: true, value: undefined };
  } catch (err) {
    written = { ok: false, error: { kind: "write", message: `write OSC52: ${errorMessage(err)}` } };
  }

  try {
    await tty.close();
  } catch (err) {
    // after a failed write, that failure is the one reported
    if (written.ok) {
      return { ok: false, error: { kind: "write", message: `close ${ttyPath}: ${errorMessage(err)}` } };
    }
  }
  return written;
}
