#!/usr/bin/env node

import { Command } from "commander";
import { run, type RunCommandOptions } from "./commands/run.js";
import { status } from "./commands/status.js";
import { configShow, configSet } from "./commands/config.js";

const program = new Command();

program
  .name("pricesync")
  .description("Extract, reconcile and publish supplier price lists from a folder of spreadsheets")
  .version("0.1.0");

program
  .command("run [dir]")
  .description("Extract prices from every workbook/CSV in a folder, clean it up and publish the table")
  .option("-n, --dry-run", "Plan deletions without deleting anything")
  .option("--no-publish", "Skip writing the output workbook")
  .option("-r, --retention-days <days>", "Delete input files older than this many days")
  .option("-o, --output <file>", "Output workbook name inside the folder (never read as input)")
  .option("--csv <file>", "Also write the table to a CSV file")
  .option("-c, --code-rule <rule>", "Product code rule (fixed, prefix)")
  .action(async (dir: string | undefined, options: RunCommandOptions) => {
    await run(dir, options);
  });

program
  .command("status")
  .description("Show configuration and the last run")
  .action(async () => {
    await status();
  });

const configCmd = program
  .command("config")
  .description("View and modify configuration");

configCmd
  .command("show")
  .description("Show current configuration")
  .action(async () => {
    await configShow();
  });

configCmd
  .command("set <key> <value>")
  .description("Set a config value (input-dir, output-file, sheet-name, retention-days, code-rule, input-extensions, stray-extensions)")
  .action(async (key: string, value: string) => {
    await configSet(key, value);
  });

// `pricesync config` with no subcommand → show
configCmd.action(async () => {
  await configShow();
});

await program.parseAsync();
