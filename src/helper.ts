import { spawn } from "node:child_process";
import type { ClipboardHelper, HelperFailure, Result } from "./types.js";

/** Makes wl-copy exit after serving the clipboard once instead of forking a server. */
export const PASTE_ONCE_FLAG = "--paste-once";

export function buildHelperArgs(helper: ClipboardHelper): string[] {
  return helper.oneShot ? [PASTE_ONCE_FLAG, ...helper.args] : [...helper.args];
}

function describeStatus(code: number | null, signal: NodeJS.Signals | null): string {
  return code === null ? `signal ${signal ?? "unknown"}` : `exit code ${code}`;
}

/**
 * Pipe `content` into a clipboard helper and wait for it to exit.
 *
 * Resolves with a failure instead of rejecting: a helper that cannot be
 * started, that stops reading its input, or that exits non-zero is a reason to
 * fall back, not to abort. On a write error the child is killed and still
 * awaited, so no process outlives the call.
 *
 * Settles on `exit` rather than `close`: a helper may leave a forked server
 * holding the inherited stderr pipe, and `close` would wait for that server.
 */
export function runClipboardHelper(
  helper: ClipboardHelper,
  content: Buffer,
): Promise<Result<void, HelperFailure>> {
  return new Promise((resolve) => {
    let settled = false;
    let writeError: Error | null = null;
    let stderrOutput = "";

    const settle = (result: Result<void, HelperFailure>): void => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    const child = spawn(helper.command, buildHelperArgs(helper), {
      stdio: ["pipe", "ignore", "pipe"],
      env: process.env,
    });

    child.stderr.on("data", (data: Buffer) => {
      stderrOutput += data.toString();
    });

    child.on("error", (err: NodeJS.ErrnoException) => {
      if (child.pid === undefined) {
        settle({
          ok: false,
          error: { kind: "spawn", message: `${helper.label}: start: ${err.message}` },
        });
        return;
      }
      settle({
        ok: false,
        error: {
          kind: writeError ? "write" : "exit",
          message: `${helper.label}: ${err.message}`,
          stderr: stderrOutput.trim(),
        },
      });
    });

    child.stdin.on("error", (err: Error) => {
      if (writeError || settled) return;
      writeError = err;
      if (child.pid !== undefined) child.kill("SIGKILL");
    });

    child.on("exit", (code, signal) => {
      const stderr = stderrOutput.trim();
      child.stderr.destroy();

      if (code === 0 && !writeError) {
        settle({ ok: true, value: undefined });
        return;
      }
      // A helper that fails before reading its input breaks the pipe; its own
      // exit status and stderr say more than the EPIPE does.
      if (writeError && (code === null || code === 0)) {
        settle({
          ok: false,
          error: {
            kind: "write",
            message: `${helper.label}: write stdin: ${writeError.message}`,
            stderr,
          },
        });
        return;
      }
      const status = describeStatus(code, signal);
      settle({
        ok: false,
        error: {
          kind: "exit",
          message: stderr
            ? `${helper.label} failed: ${status} (${stderr})`
            : `${helper.label} failed: ${status}`,
          stderr,
          exitCode: code,
        },
      });
    });

    // Ending stdin tells the helper the input is complete
    child.stdin.end(content);
  });
}
