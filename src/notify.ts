import { spawn } from "node:child_process";

// ── Types ──

export interface NotificationOptions {
  readonly title: string;
  readonly body: string;
}

// ── OS Notification ──

function notificationCommand(opts: NotificationOptions): [string, string[]] {
  const { title, body } = opts;
  if (process.platform === "darwin") {
    // Bind title/body through JSON.stringify so crafted text cannot inject AppleScript
    return [
      "osascript",
      [
        "-e",
        `set theBody to ${JSON.stringify(body)}`,
        "-e",
        `set theTitle to ${JSON.stringify(title)}`,
        "-e",
        "display notification theBody with title theTitle",
      ],
    ];
  }
  // Title and body as separate argv entries, no shell interpolation
  return ["notify-send", [title, body]];
}

/**
 * Send a native desktop notification (macOS: osascript, Linux: notify-send).
 * Resolves to whether it was delivered; a missing or failing notifier is not an error.
 */
export function sendOsNotification(opts: NotificationOptions): Promise<boolean> {
  const [command, args] = notificationCommand(opts);

  return new Promise((resolve) => {
    const child = spawn(command, args, { stdio: "ignore" });
    child.on("error", () => resolve(false));
    child.on("close", (code) => resolve(code === 0));
  });
}
