import { accessSync, constants, statSync } from "node:fs";
import { delimiter, join, sep } from "node:path";
import type { ClipboardHelper } from "./types.js";

type Env = NodeJS.ProcessEnv;

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve `name` against the PATH in `env`, the way a shell would, without
 * running anything. Names containing a path separator are checked as-is.
 */
export function lookPath(name: string, env: Env = process.env): string | null {
  if (name.includes("/") || name.includes(sep)) {
    return isExecutableFile(name) ? name : null;
  }
  const dirs = (env["PATH"] ?? "").split(delimiter).filter((d) => d.length > 0);
  for (const dir of dirs) {
    const candidate = join(dir, name);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}

function isWaylandSession(env: Env): boolean {
  return !!env["WAYLAND_DISPLAY"] || env["XDG_SESSION_TYPE"] === "wayland";
}

function isX11Session(env: Env): boolean {
  return !!env["DISPLAY"] || env["XDG_SESSION_TYPE"] === "x11";
}

function isWsl(env: Env): boolean {
  // WSL_DISTRO_NAME is unset for root users, WSL_INTEROP is not
  return !!(env["WSL_DISTRO_NAME"] ?? env["WSL_INTEROP"]);
}

function resolveHelper(
  env: Env,
  name: string,
  args: readonly string[],
  oneShot = false,
): ClipboardHelper | null {
  const command = lookPath(name, env);
  if (!command) return null;
  return { command, args, oneShot, label: name };
}

/**
 * Pick the external clipboard helper for the current session, or null if
 * none is installed.
 *
 * Detection order: macOS/Windows → Wayland → X11 (xclip, xsel) → WSL → wl-copy anywhere → null
 */
export function getClipboardHelper(
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
): ClipboardHelper | null {
  if (platform === "darwin") return resolveHelper(env, "pbcopy", []);
  if (platform === "win32") return resolveHelper(env, "clip.exe", []);

  // wl-copy forks a clipboard server that never exits unless told to serve once
  if (isWaylandSession(env)) {
    const helper = resolveHelper(env, "wl-copy", [], true);
    if (helper) return helper;
  }

  if (isX11Session(env)) {
    const helper =
      resolveHelper(env, "xclip", ["-selection", "clipboard"]) ??
      resolveHelper(env, "xsel", ["--clipboard", "--input"]);
    if (helper) return helper;
  }

  if (isWsl(env)) {
    const helper = resolveHelper(env, "clip.exe", []);
    if (helper) return helper;
  }

  // Headless or SSH sessions may lack WAYLAND_DISPLAY while wl-copy still works
  return resolveHelper(env, "wl-copy", [], true);
}
