import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { CliError, errorMessage } from "./errors.js";

export const CONFIG_DIR = join(homedir(), ".config", "pipeclip");
const CONFIG_FILE = join(CONFIG_DIR, "config.json");

// ── Config Schema (Zod) ──

const NOTIFICATION_SCHEMA = z.object({
  title: z.string().min(1).default("pipeclip"),
  body: z.string().default("Content copied to clipboard"),
});

const PIPECLIP_CONFIG_SCHEMA = z
  .object({
    strip: z.boolean().default(true),
    trim: z.boolean().default(false),
    notify: z.boolean().default(false),
    quiet: z.boolean().default(false),
    append: z.boolean().default(false),
    notification: NOTIFICATION_SCHEMA.default({}),
  })
  .strict();

export type PipeclipConfig = z.infer<typeof PIPECLIP_CONFIG_SCHEMA>;

/** Config file path; PIPECLIP_CONFIG overrides the default location. */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env["PIPECLIP_CONFIG"] || CONFIG_FILE;
}

export function parseConfig(raw: unknown, source = "config"): PipeclipConfig {
  const result = PIPECLIP_CONFIG_SCHEMA.safeParse(raw);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
  throw new CliError("config", `Invalid config in ${source}: ${where}: ${issue?.message ?? "invalid"}`);
}

/** Load the config file, falling back to defaults when it does not exist. */
export function loadConfig(path: string = getConfigPath()): PipeclipConfig {
  if (!existsSync(path)) return parseConfig({}, path);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new CliError("config", `Could not read config ${path}: ${errorMessage(err)}`);
  }
  return parseConfig(raw, path);
}
