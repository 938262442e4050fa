/**
 * Content Discovery
 *
 * Finds content documents in a site's posts directory and static files in
 * its assets directory. Results are sorted by relative path so every build
 * sees the same order.
 */

import { existsSync } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { IoFailureError } from "../errors.js";
import { logger } from "../logger.js";

export type ContentFormat = "markdown" | "html";

export interface DiscoveredContent {
  /** Relative path with forward slashes (e.g. "2023/the-red-headed-league.md") */
  path: string;
  /** Absolute path on disk */
  absolutePath: string;
  /** File extension */
  ext: string;
  /** How the body is turned into HTML */
  format: ContentFormat;
}

export interface DiscoveredFile {
  path: string;
  absolutePath: string;
}

const CONTENT_EXTENSIONS: ReadonlyArray<[string, ContentFormat]> = [
  [".md", "markdown"],
  [".markdown", "markdown"],
  [".html", "html"],
];

function isHidden(name: string): boolean {
  return name.startsWith(".");
}

/**
 * Recursively list files below a directory, skipping hidden entries
 */
async function scanDir(root: string): Promise<DiscoveredFile[]> {
  const files: DiscoveredFile[] = [];

  async function walk(dir: string, basePath: string): Promise<void> {
    let entries;
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      throw new IoFailureError(dir, err);
    }

    for (const entry of entries) {
      if (isHidden(entry.name)) continue;
      const fullPath = join(dir, entry.name);
      const relativePath = basePath ? `${basePath}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        await walk(fullPath, relativePath);
      } else if (entry.isFile()) {
        files.push({ path: relativePath, absolutePath: fullPath });
      }
    }
  }

  await walk(root, "");
  return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

/**
 * Get the content format for a filename, if it is a content file
 */
function getContentType(filename: string): [string, ContentFormat] | null {
  const lower = filename.toLowerCase();
  for (const entry of CONTENT_EXTENSIONS) {
    if (lower.endsWith(entry[0])) {
      return entry;
    }
  }
  return null;
}

/**
 * Discover content documents in a directory
 */
export async function discoverContent(contentDir: string): Promise<DiscoveredContent[]> {
  if (!existsSync(contentDir)) {
    throw new IoFailureError(contentDir, new Error("content directory does not exist"));
  }

  const content: DiscoveredContent[] = [];
  for (const file of await scanDir(contentDir)) {
    const type = getContentType(file.path);
    if (type) {
      content.push({ ...file, ext: type[0], format: type[1] });
    } else {
      logger.warn("discovery", `Skipping ${file.path}: content files end in .md, .markdown or .html`);
    }
  }
  return content;
}

/**
 * Discover static assets to copy verbatim. A missing directory has no assets.
 */
export async function discoverAssets(assetsDir: string): Promise<DiscoveredFile[]> {
  if (!existsSync(assetsDir)) {
    return [];
  }
  return scanDir(assetsDir);
}
