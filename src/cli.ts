#!/usr/bin/env node
const major = Number(process.versions.node.split(".")[0]);
if (major < 20) {
  console.error(
    `pipeclip requires Node.js >= 20 (current: ${process.version}). Install from https://nodejs.org/`,
  );
  process.exit(1);
}

import { Command } from "commander";
import { loadConfig } from "./config.js";
import { CliError, errorMessage } from "./errors.js";
import { printError, setQuiet } from "./output.js";
import { runPipe } from "./pipe.js";

// -- Typed options --

interface CliOptions {
  quiet?: true;
  strip?: boolean;
  trim?: boolean;
  notify?: true;
  file?: string;
  append?: true;
  clip: boolean;
}

const EXAMPLES = `
Examples:
  ls -la | pipeclip                     # copy stdout to clipboard
  mytool 2>&1 | pipeclip                # copy both stdout and stderr
  some_cmd | pipeclip -f output.log     # save a copy to a file and copy to clipboard
  some_cmd | pipeclip -q --no-clip -f x # don't print to stdout, only save to file

Defaults for every flag can be set in ~/.config/pipeclip/config.json (or $PIPECLIP_CONFIG).`;

// -- Program --

const program = new Command();

program
  .name("pipeclip")
  .usage("[options]  (some_command | pipeclip)")
  .description("Copy piped output to the system clipboard and optionally log it to a file")
  .version("0.3.0")
  .option("-q, --quiet", "don't print piped input to stdout")
  .option("-s, --strip", "strip ANSI control sequences before copying (default)")
  .option("--no-strip", "keep ANSI control sequences")
  .option("-t, --trim", "trim leading/trailing whitespace before copying")
  .option("--no-trim", "keep leading/trailing whitespace")
  .option("-n, --notify", "send a desktop notification after copying")
  .option("-f, --file <path>", "save output to file (overwrites unless -a)")
  .option("-a, --append", "append to file when used with -f")
  .option("--no-clip", "do not copy to clipboard (useful with -f)")
  .addHelpText("after", EXAMPLES)
  .action(async (opts: CliOptions) => {
    const config = loadConfig();
    const quiet = opts.quiet ?? config.quiet;
    setQuiet(quiet);

    await runPipe({
      quiet,
      strip: opts.strip ?? config.strip,
      trim: opts.trim ?? config.trim,
      notify: opts.notify ?? config.notify,
      file: opts.file,
      append: opts.append ?? config.append,
      clip: opts.clip,
      notification: config.notification,
    });
  });

// -- Run --

program.parseAsync().catch((err: unknown) => {
  if (err instanceof CliError) {
    printError(err.message, err.hint);
  } else {
    printError(`Error: ${errorMessage(err)}`);
  }
  process.exit(1);
});
