/**
 * Template Directory Loader
 *
 * Loads project layouts from a templates directory. Each `<name>.js` or
 * `<name>.mjs` module registers the layout `<name>`; its default export
 * receives `{ document, site, helpers }` and returns an HTML string or a React element.
 */

import { existsSync } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { isValidElement } from "react";
import { describeCause, InvalidTemplateError, IoFailureError } from "../errors.js";
import { logger } from "../logger.js";
import { renderHtmlDocument } from "./react.js";
import type { LayoutContext, Template } from "./registry.js";

const TEMPLATE_EXTENSIONS = [".mjs", ".js"];

type RenderFunction = (context: LayoutContext) => unknown;

function isRenderFunction(value: unknown): value is RenderFunction {
  return typeof value === "function";
}

function getTemplateName(filename: string): string | null {
  if (filename.startsWith(".")) return null;
  for (const ext of TEMPLATE_EXTENSIONS) {
    if (filename.endsWith(ext) && filename.length > ext.length) {
      return filename.slice(0, -ext.length);
    }
  }
  return null;
}

/**
 * Adapt a module's render function to the Template capability
 */
export function moduleTemplate(render: RenderFunction): Template {
  return (context) => {
    const output = render(context);
    if (typeof output === "string") {
      return output;
    }
    if (isValidElement(output)) {
      return renderHtmlDocument(output);
    }
    throw new Error("template returned neither a string nor a React element");
  };
}

/**
 * Load every template module in a directory. A missing directory has none.
 */
export async function loadTemplateDirectory(dir: string): Promise<Record<string, Template>> {
  if (!existsSync(dir)) {
    return {};
  }

  let filenames: string[];
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    filenames = entries.filter((e) => e.isFile()).map((e) => e.name).sort();
  } catch (err) {
    throw new IoFailureError(dir, err);
  }

  const templates: Record<string, Template> = {};
  for (const filename of filenames) {
    const name = getTemplateName(filename);
    if (!name) continue;

    const fullPath = join(dir, filename);
    if (name in templates) {
      throw new InvalidTemplateError(name, fullPath, "another module already defines this layout");
    }

    let mod: unknown;
    try {
      mod = await import(pathToFileURL(fullPath).href);
    } catch (err) {
      throw new InvalidTemplateError(name, fullPath, describeCause(err));
    }

    const render = typeof mod === "object" && mod !== null && "default" in mod ? mod.default : undefined;
    if (!isRenderFunction(render)) {
      throw new InvalidTemplateError(name, fullPath, "default export must be a function");
    }

    logger.debug("templates", `Loaded layout "${name}" from ${filename}`);
    templates[name] = moduleTemplate(render);
  }

  return templates;
}
