/**
 * Project Build
 *
 * Builds a site laid out the default way: config in package.json, posts,
 * templates and assets directories next to it.
 */

import { join } from "node:path";
import { loadConfig } from "../config/index.js";
import { defaultTemplates } from "../layouts/defaults.js";
import { loadTemplateDirectory } from "../layouts/directory.js";
import { createTemplateRegistry } from "../layouts/registry.js";
import { logger } from "../logger.js";
import { build, type BuildResult, toFailure } from "./index.js";

export interface BuildProjectOptions {
  /** Project root (the directory holding package.json) */
  rootDir: string;
  outputDir: string;
}

/**
 * Build the project in `rootDir`. Project templates override the built-in
 * layouts of the same name.
 */
export async function buildProject(options: BuildProjectOptions): Promise<BuildResult> {
  const { rootDir, outputDir } = options;

  try {
    const config = loadConfig(rootDir);
    const projectTemplates = await loadTemplateDirectory(join(rootDir, config.paths.templates));
    const templates = createTemplateRegistry({ ...defaultTemplates(), ...projectTemplates });
    logger.info("build", `Layouts: ${templates.names().join(", ")}`);

    return await build({
      contentDir: join(rootDir, config.paths.posts),
      outputDir,
      templates,
      config,
      assetsDir: join(rootDir, config.paths.assets),
    });
  } catch (err) {
    return toFailure(err);
  }
}
