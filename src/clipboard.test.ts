import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { getClipboardHelper, lookPath } from "./clipboard.js";

let root: string;
let binDir: string;

function installBin(name: string, dir = binDir): string {
  const path = join(dir, name);
  writeFileSync(path, "#!/bin/sh\nexit 0\n", { mode: 0o755 });
  return path;
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "pipeclip-bin-"));
  binDir = join(root, "bin");
  mkdirSync(binDir);
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("lookPath", () => {
  it("finds an executable in the first matching PATH entry", () => {
    const otherDir = join(root, "other");
    mkdirSync(otherDir);
    const first = installBin("xsel", otherDir);
    installBin("xsel");

    expect(lookPath("xsel", { PATH: `${otherDir}:${binDir}` })).toBe(first);
  });

  it("returns null when the name is not on PATH", () => {
    expect(lookPath("wl-copy", { PATH: binDir })).toBeNull();
  });

  it("returns null when PATH is unset", () => {
    installBin("wl-copy");
    expect(lookPath("wl-copy", {})).toBeNull();
  });

  it("skips files without the execute bit", () => {
    writeFileSync(join(binDir, "xclip"), "not a program", { mode: 0o644 });
    expect(lookPath("xclip", { PATH: binDir })).toBeNull();
  });

  it("skips directories with a matching name", () => {
    mkdirSync(join(binDir, "xclip"));
    expect(lookPath("xclip", { PATH: binDir })).toBeNull();
  });

  it("checks names containing a slash directly", () => {
    const path = installBin("pbcopy");
    expect(lookPath(path, { PATH: "" })).toBe(path);
  });
});

describe("getClipboardHelper", () => {
  it("picks wl-copy as one-shot in a Wayland session", () => {
    const wl = installBin("wl-copy");
    installBin("xclip");

    const helper = getClipboardHelper({ PATH: binDir, WAYLAND_DISPLAY: "wayland-0", DISPLAY: ":0" }, "linux");
    expect(helper).toEqual({ command: wl, args: [], oneShot: true, label: "wl-copy" });
  });

  it("detects Wayland from XDG_SESSION_TYPE", () => {
    installBin("wl-copy");
    const helper = getClipboardHelper({ PATH: binDir, XDG_SESSION_TYPE: "wayland" }, "linux");
    expect(helper?.label).toBe("wl-copy");
  });

  it("never selects an X11 helper in a Wayland session that has wl-copy", () => {
    installBin("wl-copy");
    installBin("xclip");
    installBin("xsel");

    const helper = getClipboardHelper(
      { PATH: binDir, WAYLAND_DISPLAY: "wayland-1", DISPLAY: ":1", XDG_SESSION_TYPE: "x11" },
      "linux",
    );
    expect(helper?.label).toBe("wl-copy");
  });

  it("uses xclip with the clipboard selection on X11", () => {
    const xclip = installBin("xclip");
    installBin("xsel");

    const helper = getClipboardHelper({ PATH: binDir, DISPLAY: ":0" }, "linux");
    expect(helper).toEqual({
      command: xclip,
      args: ["-selection", "clipboard"],
      oneShot: false,
      label: "xclip",
    });
  });

  it("falls back to xsel on X11 when xclip is missing", () => {
    const xsel = installBin("xsel");

    const helper = getClipboardHelper({ PATH: binDir, DISPLAY: ":0" }, "linux");
    expect(helper).toEqual({
      command: xsel,
      args: ["--clipboard", "--input"],
      oneShot: false,
      label: "xsel",
    });
  });

  it("moves on to X11 helpers when a Wayland session has no wl-copy", () => {
    installBin("xsel");
    const helper = getClipboardHelper({ PATH: binDir, WAYLAND_DISPLAY: "wayland-0", DISPLAY: ":0" }, "linux");
    expect(helper?.label).toBe("xsel");
  });

  it("uses clip.exe under WSL", () => {
    const clip = installBin("clip.exe");
    const helper = getClipboardHelper({ PATH: binDir, WSL_INTEROP: "/run/WSL/1_interop" }, "linux");
    expect(helper).toEqual({ command: clip, args: [], oneShot: false, label: "clip.exe" });
  });

  it("finds wl-copy anywhere on PATH when no session is detected", () => {
    const wl = installBin("wl-copy");
    installBin("xclip");

    const helper = getClipboardHelper({ PATH: binDir }, "linux");
    expect(helper).toEqual({ command: wl, args: [], oneShot: true, label: "wl-copy" });
  });

  it("ignores X11 helpers when DISPLAY is unset", () => {
    installBin("xclip");
    installBin("xsel");
    expect(getClipboardHelper({ PATH: binDir }, "linux")).toBeNull();
  });

  it("returns null when nothing is installed", () => {
    expect(
      getClipboardHelper({ PATH: binDir, WAYLAND_DISPLAY: "wayland-0", DISPLAY: ":0" }, "linux"),
    ).toBeNull();
  });

  it("returns pbcopy on darwin regardless of session variables", () => {
    const pbcopy = installBin("pbcopy");
    installBin("wl-copy");

    const helper = getClipboardHelper({ PATH: binDir, WAYLAND_DISPLAY: "wayland-0" }, "darwin");
    expect(helper).toEqual({ command: pbcopy, args: [], oneShot: false, label: "pbcopy" });
  });

  it("returns null on darwin without pbcopy", () => {
    installBin("wl-copy");
    expect(getClipboardHelper({ PATH: binDir }, "darwin")).toBeNull();
  });
});
