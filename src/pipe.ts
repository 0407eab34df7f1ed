import type { Writable } from "node:stream";
import { copyToClipboard, describeFailure, type HelperTierOutcome } from "./deliver.js";
import { CLIPBOARD_HINT, CliError } from "./errors.js";
import { assertPipedInput, MAX_BUFFER_SIZE, readCapped } from "./input.js";
import { type NotificationOptions, sendOsNotification } from "./notify.js";
import { printInfo, printNote, printSuccess, setQuiet } from "./output.js";
import { sanitize } from "./sanitize.js";
import { writeToFile } from "./sink.js";
import type { DeliveryOutcome } from "./types.js";

// ── Types ──

export interface PipeOptions {
  readonly quiet: boolean;
  readonly strip: boolean;
  readonly trim: boolean;
  readonly notify: boolean;
  readonly file?: string | undefined;
  readonly append: boolean;
  readonly clip: boolean;
  readonly notification: NotificationOptions;
}

/** Process-facing collaborators; tests swap them for in-memory ones. */
export interface PipeIO {
  readonly stdin: AsyncIterable<Buffer | string>;
  readonly stdout: Writable;
  readonly checkInput: () => void;
  readonly deliver: (content: Buffer) => Promise<DeliveryOutcome>;
  readonly notify: (opts: NotificationOptions) => Promise<boolean>;
  readonly limit: number;
}

export interface PipeResult {
  readonly bytesRead: number;
  readonly content: Buffer;
  readonly savedBytes: number | null;
  readonly delivery: DeliveryOutcome | null;
  readonly notified: boolean;
}

// ── Helpers ──

function reportFallback(outcome: HelperTierOutcome): void {
  if (outcome.kind === "helper-failed") {
    printNote(`clipboard helper ${outcome.helper} failed: ${outcome.reason.message}; trying OSC 52.`);
  }
}

// process.stdin is created on first access, so only touch it when no override is given
function resolveIO(overrides: Partial<PipeIO>): PipeIO {
  return {
    stdin: overrides.stdin ?? process.stdin,
    stdout: overrides.stdout ?? process.stdout,
    checkInput: overrides.checkInput ?? (() => assertPipedInput()),
    deliver:
      overrides.deliver ?? ((content: Buffer) => copyToClipboard(content, { onFallback: reportFallback })),
    notify: overrides.notify ?? sendOsNotification,
    limit: overrides.limit ?? MAX_BUFFER_SIZE,
  };
}

// ── Run ──

/**
 * Capture stdin, clean it, then save and copy it. Steps run strictly one after
 * another; a failing clipboard step does not undo an already written file.
 *
 * @throws {CliError} on unusable input, file write failure, or when neither a
 * clipboard helper nor OSC 52 could deliver the content
 */
export async function runPipe(opts: PipeOptions, overrides: Partial<PipeIO> = {}): Promise<PipeResult> {
  const io = resolveIO(overrides);
  setQuiet(opts.quiet);

  io.checkInput();

  const captured = await readCapped(io.stdin, io.limit, opts.quiet ? undefined : io.stdout);
  const content = sanitize(captured, { strip: opts.strip, trim: opts.trim });

  const result: PipeResult = {
    bytesRead: captured.length,
    content,
    savedBytes: null,
    delivery: null,
    notified: false,
  };

  if (content.length === 0) {
    printInfo("No content to copy.");
    return result;
  }

  let savedBytes: number | null = null;
  if (opts.file) {
    savedBytes = await writeToFile(opts.file, content, opts.append);
    printInfo(`Saved ${savedBytes} bytes to ${opts.file}`);
  }

  if (!opts.clip) {
    return { ...result, savedBytes };
  }

  const delivery = await io.deliver(content);
  if (delivery.kind !== "success") {
    throw new CliError("clipboard", `clipboard error: ${describeFailure(delivery)}`, [CLIPBOARD_HINT]);
  }
  printSuccess(delivery.via === "osc52" ? "Copied to clipboard via OSC 52." : "Copied to clipboard.");

  const notified = opts.notify ? await io.notify(opts.notification) : false;

  return { ...result, savedBytes, delivery, notified };
}
