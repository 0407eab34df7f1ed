import { writeFile } from "node:fs/promises";
import { CliError, errorMessage } from "./errors.js";

/**
 * Write `content` to `path`, truncating unless `append` is set.
 * Returns the number of bytes written.
 */
export async function writeToFile(path: string, content: Buffer, append: boolean): Promise<number> {
  try {
    await writeFile(path, content, { flag: append ? "a" : "w", mode: 0o644 });
  } catch (err) {
    throw new CliError("file-write", `file write error: ${errorMessage(err)}`);
  }
  return content.length;
}
