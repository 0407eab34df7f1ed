// ── Result Type (no throwing in the delivery layer) ──

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

// ── Clipboard Helper ──

export interface ClipboardHelper {
  /** Absolute path of the executable, as resolved on PATH. */
  readonly command: string;
  readonly args: readonly string[];
  /** Helper would otherwise stay alive as a clipboard server (wl-copy). */
  readonly oneShot: boolean;
  readonly label: string;
}

export type HelperFailureKind = "spawn" | "write" | "exit";

export interface HelperFailure {
  readonly kind: HelperFailureKind;
  readonly message: string;
  readonly stderr?: string | undefined;
  readonly exitCode?: number | null | undefined;
}

export type FallbackFailureKind = "terminal-unavailable" | "write";

export interface FallbackFailure {
  readonly kind: FallbackFailureKind;
  readonly message: string;
}

// ── Delivery Outcome ──

export type DeliveryOutcome =
  | { readonly kind: "success"; readonly via: "helper" | "osc52"; readonly helper?: string | undefined }
  | { readonly kind: "helper-unavailable" }
  | { readonly kind: "helper-failed"; readonly helper: string; readonly reason: HelperFailure }
  | {
      readonly kind: "fallback-failed";
      readonly reason: FallbackFailure;
      readonly helperFailure?: HelperFailure | undefined;
    };
