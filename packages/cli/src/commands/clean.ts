import { clean } from "@inkwell/engine";
import pc from "picocolors";
import { type GlobalOptions, printError, resolveSiteDirs } from "../utils.js";

export async function cleanCommand(options: GlobalOptions): Promise<number> {
  const { outputDir } = resolveSiteDirs(options);

  try {
    await clean(outputDir);
  } catch (err) {
    printError(err);
    return 1;
  }

  console.log(pc.green(`Removed ${outputDir}`));
  return 0;
}
