/**
 * Output Writer
 *
 * Checks the complete output set for path collisions before touching the
 * output directory, then writes every entry.
 */

import { copyFile, mkdir, writeFile } from "node:fs/promises";
import { dirname, join, posix } from "node:path";
import { fanOut } from "../build/stages.js";
import { isContainedPath } from "../config/index.js";
import { IoFailureError, OutputCollisionError } from "../errors.js";
import { logger } from "../logger.js";

export type OutputEntry =
  | {
      kind: "page" | "feed";
      /** Relative path with forward slashes */
      path: string;
      contents: string;
      /** What produced the entry (slug or source path), for error messages */
      origin: string;
    }
  | {
      kind: "asset";
      path: string;
      /** File copied verbatim */
      sourcePath: string;
      origin: string;
    };

function assertInsideOutput(path: string): void {
  if (!isContainedPath(path)) {
    throw new IoFailureError(path, new Error("output path must be a normalized relative path"));
  }
}

/** Directories an output path needs, nearest first (`a/b/c.html` → `a/b`, `a`) */
function ancestorsOf(path: string): string[] {
  const dirs: string[] = [];
  for (let dir = posix.dirname(path); dir !== "."; dir = posix.dirname(dir)) {
    dirs.push(dir);
  }
  return dirs;
}

/**
 * Collision pre-pass over the whole output set. Two entries collide when
 * they share a path, or when one entry's path is a directory another entry
 * needs (an asset `hello` next to the page `hello/index.html`).
 *
 * @returns The entries ordered by path
 */
export function planOutput(entries: readonly OutputEntry[]): OutputEntry[] {
  const byPath = new Map<string, OutputEntry[]>();

  for (const entry of entries) {
    assertInsideOutput(entry.path);
    const existing = byPath.get(entry.path);
    if (existing) {
      existing.push(entry);
    } else {
      byPath.set(entry.path, [entry]);
    }
  }

  const paths = [...byPath.keys()].sort();
  for (const path of paths) {
    const claimants = byPath.get(path) ?? [];
    if (claimants.length > 1) {
      throw new OutputCollisionError(
        path,
        claimants.map((c) => c.origin),
      );
    }
  }

  // Only unique paths are left: one entry per path
  const planned = paths.flatMap((path) => byPath.get(path) ?? []);

  const directories = new Map<string, OutputEntry>();
  for (const entry of planned) {
    for (const dir of ancestorsOf(entry.path)) {
      if (!directories.has(dir)) directories.set(dir, entry);
    }
  }
  for (const entry of planned) {
    const needer = directories.get(entry.path);
    if (needer) {
      throw new OutputCollisionError(entry.path, [entry.origin, needer.origin]);
    }
  }

  return planned;
}

/**
 * Write a planned output set, creating directories and overwriting files
 *
 * @returns Written paths, relative to the output directory
 */
export async function writeOutput(outputDir: string, entries: readonly OutputEntry[]): Promise<string[]> {
  const planned = planOutput(entries);

  const dirs = new Set<string>([outputDir]);
  for (const entry of planned) {
    dirs.add(dirname(join(outputDir, entry.path)));
  }
  for (const dir of [...dirs].sort()) {
    try {
      await mkdir(dir, { recursive: true });
    } catch (err) {
      throw new IoFailureError(dir, err);
    }
  }

  await fanOut(planned, async (entry) => {
    const destination = join(outputDir, entry.path);
    try {
      if (entry.kind === "asset") {
        await copyFile(entry.sourcePath, destination);
      } else {
        await writeFile(destination, entry.contents, "utf-8");
      }
    } catch (err) {
      throw new IoFailureError(destination, err);
    }
    logger.debug("write", `${entry.kind}: ${entry.path}`);
  });

  return planned.map((entry) => entry.path);
}
