import path from "node:path";
import { type BuildError, describeCause, isBuildError } from "@inkwell/engine";
import pc from "picocolors";

/** Options shared by every command */
export type GlobalOptions = {
  source: string;
  dest: string;
  verbose?: boolean;
};

export interface SiteDirs {
  rootDir: string;
  outputDir: string;
}

/**
 * Resolve the source and destination directories against the working directory
 */
export function resolveSiteDirs(options: GlobalOptions, cwd = process.cwd()): SiteDirs {
  return {
    rootDir: path.resolve(cwd, options.source),
    outputDir: path.resolve(cwd, options.dest),
  };
}

/**
 * Print a build error with its kind
 */
export function printBuildError(error: BuildError): void {
  console.error(pc.red(`${pc.bold(error.kind)}: ${error.message}`));
}

/**
 * Print any error caught by a command
 */
export function printError(err: unknown): void {
  if (isBuildError(err)) {
    printBuildError(err);
  } else {
    console.error(pc.red(`Error: ${describeCause(err)}`));
  }
}
