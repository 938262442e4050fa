import path from "node:path";
import { initSite } from "@inkwell/engine";
import pc from "picocolors";
import { type GlobalOptions, printError } from "../utils.js";

export interface InitOptions {
  title?: string;
}

/**
 * Scaffold a site in `directory`, or in the --source directory when omitted
 */
export async function initCommand(
  directory: string | undefined,
  options: InitOptions,
  globals: GlobalOptions,
): Promise<number> {
  const target = path.resolve(process.cwd(), directory ?? globals.source);
  const title = options.title ?? "Blog";

  console.log(pc.blue(`Initializing site: ${pc.bold(title)}`));

  let created: string[];
  try {
    created = initSite({ directory: target, title });
  } catch (err) {
    printError(err);
    return 1;
  }

  for (const file of created) {
    console.log(pc.dim(`  Created ${file}`));
  }

  console.log(pc.green(`\nSite initialized! Next steps:`));
  console.log(pc.dim(`  inkwell -s ${path.relative(process.cwd(), target) || "."} build`));
  return 0;
}
