import { logger } from "@inkwell/engine";
import { Command } from "commander";
import { buildCommand } from "./commands/build.js";
import { cleanCommand } from "./commands/clean.js";
import { initCommand, type InitOptions } from "./commands/init.js";
import type { GlobalOptions } from "./utils.js";

const DESCRIPTION = `Static blog generator`;

/**
 * Create the CLI program. Commands report their exit code through `onExit`.
 */
export function createProgram(onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name("inkwell")
    .description(DESCRIPTION)
    .version("0.1.0")
    .option("-s, --source <dir>", "Site directory", "source/")
    .option("-o, --dest <dir>", "Output directory", "build/")
    .option("-v, --verbose", "Log build progress")
    .hook("preAction", () => {
      if (program.opts<GlobalOptions>().verbose && !logger.isPinned()) {
        logger.setLevel("info");
      }
    });

  program
    .command("build")
    .description("Build the site")
    .action(async () => {
      onExit(await buildCommand(program.opts<GlobalOptions>()));
    });

  program
    .command("clean")
    .description("Remove the output directory")
    .action(async () => {
      onExit(await cleanCommand(program.opts<GlobalOptions>()));
    });

  program
    .command("init")
    .description("Create a new site")
    .argument("[directory]", "Where to create the site (defaults to --source)")
    .option("-t, --title <title>", "Site title")
    .action(async (directory: string | undefined, options: InitOptions) => {
      onExit(await initCommand(directory, options, program.opts<GlobalOptions>()));
    });

  return program;
}
