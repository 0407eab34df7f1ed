import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { getConfigPath, loadConfig, parseConfig } from "./config.js";
import { CliError } from "./errors.js";

const DEFAULTS = {
  strip: true,
  trim: false,
  notify: false,
  quiet: false,
  append: false,
  notification: { title: "pipeclip", body: "Content copied to clipboard" },
};

describe("parseConfig", () => {
  it("fills every default for an empty object", () => {
    expect(parseConfig({})).toEqual(DEFAULTS);
  });

  it("keeps explicit values and fills nested defaults", () => {
    expect(parseConfig({ trim: true, notification: { title: "clip" } })).toEqual({
      ...DEFAULTS,
      trim: true,
      notification: { title: "clip", body: "Content copied to clipboard" },
    });
  });

  it("names the offending field on a type error", () => {
    expect(() => parseConfig({ strip: "yes" }, "cfg.json")).toThrow(
      "Invalid config in cfg.json: strip: Expected boolean, received string",
    );
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig({ stirp: false })).toThrow(CliError);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "pipeclip-cfg-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults when the file does not exist", () => {
    expect(loadConfig(join(dir, "config.json"))).toEqual(DEFAULTS);
  });

  it("reads values from the file", () => {
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify({ quiet: true, append: true }));

    expect(loadConfig(path)).toEqual({ ...DEFAULTS, quiet: true, append: true });
  });

  it("throws a config error for malformed JSON", () => {
    const path = join(dir, "config.json");
    writeFileSync(path, "{ not json");

    let caught: unknown;
    try {
      loadConfig(path);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CliError);
    if (caught instanceof CliError) {
      expect(caught.kind).toBe("config");
      expect(caught.message.startsWith(`Could not read config ${path}: `)).toBe(true);
    }
  });
});

describe("getConfigPath", () => {
  it("uses PIPECLIP_CONFIG when set", () => {
    expect(getConfigPath({ PIPECLIP_CONFIG: "/etc/pipeclip.json" })).toBe("/etc/pipeclip.json");
  });

  it("defaults to ~/.config/pipeclip/config.json", () => {
    expect(getConfigPath({})).toBe(join(homedir(), ".config", "pipeclip", "config.json"));
  });
});
