/**
 * Shared test helpers
 */

import { mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { AuthoredDocument } from "../types.js";

/**
 * Authored document with sensible defaults
 */
export function authored(overrides: Partial<AuthoredDocument> & { slug: string }): AuthoredDocument {
  return {
    sourceKind: "authored",
    source: `${overrides.slug}.md`,
    meta: {},
    title: overrides.slug,
    date: new Date(Date.UTC(2023, 0, 1)),
    layout: "post",
    tags: [],
    bodyHtml: "",
    ...overrides,
  };
}

export function makeTempDir(prefix = "inkwell-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write files below a directory, creating parent directories
 */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [path, contents] of Object.entries(files)) {
    const fullPath = join(root, path);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, contents);
  }
}

/**
 * Read every file below a directory, keyed by relative path
 */
export function readTree(root: string): Record<string, string> {
  const tree: Record<string, string> = {};

  function walk(dir: string, prefix: string): void {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        walk(join(dir, entry.name), relative);
      } else if (entry.isFile()) {
        tree[relative] = readFileSync(join(dir, entry.name), "utf-8");
      }
    }
  }

  walk(root, "");
  return tree;
}

/**
 * Content file with front matter
 */
export function post(frontmatter: Record<string, string>, body = ""): string {
  const lines = Object.entries(frontmatter).map(([key, value]) => `${key}: ${value}`);
  return `---\n${lines.join("\n")}\n---\n${body}`;
}
