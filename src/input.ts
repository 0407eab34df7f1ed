import { once } from "node:events";
import { fstatSync } from "node:fs";
import type { Writable } from "node:stream";
import { CliError, errorMessage } from "./errors.js";

export const MAX_BUFFER_SIZE = 10 * 1024 * 1024; // 10MB

/** Reject an interactive stdin: the tool only makes sense at the end of a pipe. */
export function assertPipedInput(fd = 0, prog = "pipeclip"): void {
  let isTerminal: boolean;
  try {
    isTerminal = fstatSync(fd).isCharacterDevice();
  } catch (err) {
    throw new CliError("input", `unable to stat stdin: ${errorMessage(err)}`);
  }
  if (isTerminal) {
    throw new CliError("no-piped-input", `No piped input detected. Use: some_command | ${prog}`, [
      "Use -h for help and examples.",
    ]);
  }
}

/**
 * Read `source` until it ends or `limit` bytes have been taken; anything past
 * the limit is dropped. Accepted bytes are copied to `mirror` as they arrive.
 */
export async function readCapped(
  source: AsyncIterable<Buffer | string>,
  limit: number = MAX_BUFFER_SIZE,
  mirror?: Writable,
): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;

  try {
    for await (const chunk of source) {
      const buf = typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk;
      const piece = buf.subarray(0, limit - total);
      if (piece.length > 0) {
        chunks.push(piece);
        total += piece.length;
        if (mirror && !mirror.write(piece)) {
          await once(mirror, "drain");
        }
      }
      // Leaving the loop destroys the source, so the rest is never buffered
      if (total >= limit) break;
    }
  } catch (err) {
    throw new CliError("input", `read error: ${errorMessage(err)}`);
  }

  return Buffer.concat(chunks, total);
}
