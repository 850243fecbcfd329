#!/usr/bin/env node
/**
 * keymash CLI
 * A keyboard-mashing game for small children
 */

import { Command } from "commander";

import { createEngine, KeymashApp, loadResources, wallClock } from "./app";
import { configFromOptions } from "./app/config";
import { describeError } from "./errors";
import {
  extensionRoots,
  listExtensions,
  resolveDataDirs,
} from "./resources/discovery";

function collect(value: string, previous: Array<string>): Array<string> {
  return [...previous, value];
}

const program = new Command();

program
  .name("keymash")
  .description("A keyboard mashing game for babies.")
  .version("0.1.0")
  .option("-u, --uppercase", "Whether to show UPPER-CASE letters.")
  .option(
    "-d, --deterministic-sounds",
    "Whether to produce same sounds on same key presses.",
  )
  .option("-D, --dark", "Use a dark background instead of a light one.")
  .option("-m, --mute", "Start muted; type unmute to turn sound on.")
  .option("--no-sound", "Disable sound entirely.")
  .option(
    "--sound-blacklist <glob>",
    "Sound file name pattern to never play (repeatable).",
    collect,
    [],
  )
  .option(
    "--image-blacklist <glob>",
    "Image file name pattern to never show (repeatable).",
    collect,
    [],
  )
  .option(
    "-e, --extension <name>",
    "Use the named extension's rules and sounds.",
  )
  .option("--seed <int>", "Seed for reproducible runs.")
  .option(
    "--data-dir <dir>",
    "Additional data directory (repeatable).",
    collect,
    [],
  )
  .option("--list-extensions", "Print the available extensions and exit.");

async function main(): Promise<number> {
  program.parse();
  const raw = program.opts();
  const config = configFromOptions(raw);

  if (raw["listExtensions"] === true) {
    const roots = extensionRoots(resolveDataDirs(config.dataDirs));
    for (const name of listExtensions(roots)) console.log(name);
    return 0;
  }

  const engine = createEngine(loadResources(config), wallClock);
  const app = new KeymashApp(
    engine,
    { input: process.stdin, output: process.stdout },
    { dark: config.dark },
  );
  return app.run();
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`keymash: ${describeError(error)}`);
    process.exitCode = 1;
  },
);
