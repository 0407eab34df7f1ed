import { getClipboardHelper } from "./clipboard.js";
import { runClipboardHelper } from "./helper.js";
import { writeOsc52 } from "./osc52.js";
import type {
  ClipboardHelper,
  DeliveryOutcome,
  FallbackFailure,
  HelperFailure,
  Result,
} from "./types.js";

export interface DeliveryDeps {
  readonly findHelper: () => ClipboardHelper | null;
  readonly runHelper: (
    helper: ClipboardHelper,
    content: Buffer,
  ) => Promise<Result<void, HelperFailure>>;
  readonly writeFallback: (content: Buffer) => Promise<Result<void, FallbackFailure>>;
  /** Called with the helper-tier outcome before the OSC 52 fallback runs. */
  readonly onFallback?: ((outcome: HelperTierOutcome) => void) | undefined;
}

export type HelperTierOutcome = Extract<
  DeliveryOutcome,
  { kind: "helper-unavailable" | "helper-failed" }
>;

type SuccessOutcome = Extract<DeliveryOutcome, { kind: "success" }>;

const DEFAULT_DEPS: DeliveryDeps = {
  findHelper: () => getClipboardHelper(),
  runHelper: runClipboardHelper,
  writeFallback: (content) => writeOsc52(content),
};

async function tryHelper(
  deps: DeliveryDeps,
  content: Buffer,
): Promise<SuccessOutcome | HelperTierOutcome> {
  const helper = deps.findHelper();
  if (!helper) return { kind: "helper-unavailable" };

  const result = await deps.runHelper(helper, content);
  if (result.ok) return { kind: "success", via: "helper", helper: helper.label };
  return { kind: "helper-failed", helper: helper.label, reason: result.error };
}

/**
 * Copy `content` to the clipboard: external helper first, OSC 52 second.
 * One pass, no retries. Only `success` and `fallback-failed` are returned.
 */
export async function copyToClipboard(
  content: Buffer,
  overrides: Partial<DeliveryDeps> = {},
): Promise<DeliveryOutcome> {
  const deps: DeliveryDeps = { ...DEFAULT_DEPS, ...overrides };

  const first = await tryHelper(deps, content);
  if (first.kind === "success") return first;

  deps.onFallback?.(first);

  const fallback = await deps.writeFallback(content);
  if (fallback.ok) return { kind: "success", via: "osc52" };
  return {
    kind: "fallback-failed",
    reason: fallback.error,
    helperFailure: first.kind === "helper-failed" ? first.reason : undefined,
  };
}

/** One-line description of a failed delivery, for the final error message. */
export function describeFailure(outcome: DeliveryOutcome): string {
  if (outcome.kind !== "fallback-failed") return outcome.kind;
  const base = `no external clipboard helper and OSC52 failed: ${outcome.reason.message}`;
  return outcome.helperFailure ? `${base} (helper: ${outcome.helperFailure.message})` : base;
}
