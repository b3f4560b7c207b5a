#!/usr/bin/env node

import { Command, Option } from "commander";
import { runKforge } from "./commands/run.js";
import { LOG_LEVELS, isLogLevel, type LogLevel } from "./utils/logger.js";
import { VERSION } from "./version.js";

type CliOptions = {
  tree?: string;
  dryRun?: boolean;
  logLevel?: string;
  color: boolean;
};

const program = new Command();

// Only long options: fragment toggles such as -hmp or -Vfoo must not be
// read as bundled short flags.
program
  .name("kforge")
  .description("Staged config/build/mkimg/flash driver for Exynos 9820 kernel trees")
  .version(VERSION, "--version")
  .helpOption("--help", "Show help")
  .argument("[stage]", "config | build | mkimg | flash, or :build | :mkimg | :flash")
  .argument("[tokens...]", "model=<model> name=<name> os_patch_level=<YYYY-MM> [+-]<conf>")
  .option("--tree <dir>", "Kernel tree root (default: current directory)")
  .option("--dry-run", "Print the resolved plan as JSON and exit")
  .addOption(new Option("--log-level <level>", "Log level").choices(LOG_LEVELS))
  .option("--no-color", "Disable colored output")
  // -<conf> toggles are unknown options to commander; keep them, in order, as tokens
  .allowUnknownOption()
  .action(async (stage: string | undefined, tokens: string[]) => {
    const opts = program.opts<CliOptions>();
    const logLevel: LogLevel | undefined =
      opts.logLevel !== undefined && isLogLevel(opts.logLevel) ? opts.logLevel : undefined;

    process.exitCode = await runKforge(stage === undefined ? [] : [stage, ...tokens], {
      root: opts.tree,
      dryRun: opts.dryRun,
      logLevel,
      color: opts.color ? undefined : false,
    });
  });

await program.parseAsync();
