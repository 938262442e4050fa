import path from "node:path";
import { buildProject } from "@inkwell/engine";
import pc from "picocolors";
import { type GlobalOptions, printBuildError, resolveSiteDirs } from "../utils.js";

export async function buildCommand(options: GlobalOptions): Promise<number> {
  const { rootDir, outputDir } = resolveSiteDirs(options);

  console.log(pc.blue(`Building ${pc.bold(path.basename(rootDir))}...`));

  const result = await buildProject({ rootDir, outputDir });
  if (!result.success) {
    printBuildError(result.error);
    return 1;
  }

  const { report } = result;
  console.log(
    pc.green(
      `Build complete! ${report.pagesWritten} page(s), ${report.assetsCopied} asset(s)${report.feedWritten ? ", feed" : ""}`,
    ),
  );
  console.log(pc.dim(`Output: ${report.outputDir}`));
  return 0;
}
