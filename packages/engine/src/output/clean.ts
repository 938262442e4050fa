import { rm } from "node:fs/promises";
import { IoFailureError } from "../errors.js";
import { logger } from "../logger.js";

/**
 * Remove the output directory. A directory that does not exist is already clean.
 */
export async function clean(outputDir: string): Promise<void> {
  try {
    await rm(outputDir, { recursive: true, force: true });
  } catch (err) {
    throw new IoFailureError(outputDir, err);
  }
  logger.info("clean", `Removed ${outputDir}`);
}
