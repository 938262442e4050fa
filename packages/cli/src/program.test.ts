/**
 * CLI Tests
 */

import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { logger } from "@inkwell/engine";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createProgram } from "./program.js";

async function run(args: string[]): Promise<number | undefined> {
  let code: number | undefined;
  await createProgram((exitCode) => {
    code = exitCode;
  }).parseAsync(["node", "inkwell", ...args]);
  return code;
}

describe("inkwell", () => {
  let root: string;
  const initialLevel = logger.getLevel();

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "inkwell-cli-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    logger.setLevel(initialLevel);
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("scaffolds and builds a site", async () => {
    const site = join(root, "site");
    const out = join(root, "out");

    expect(await run(["init", site, "--title", "Casebook"])).toBe(0);
    expect(existsSync(join(site, "posts", "hello-world.md"))).toBe(true);

    expect(await run(["-s", site, "-o", out, "build"])).toBe(0);
    expect(existsSync(join(out, "hello-world", "index.html"))).toBe(true);
    expect(existsSync(join(out, "index.html"))).toBe(true);
  });

  it("scaffolds into the source directory by default", async () => {
    const site = join(root, "source");
    expect(await run(["--source", site, "init"])).toBe(0);
    expect(existsSync(join(site, "package.json"))).toBe(true);
  });

  it("fails init over an existing project", async () => {
    const site = join(root, "site");
    await run(["init", site]);

    expect(await run(["init", site])).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("IoFailure"));
  });

  it("prints build errors with their kind", async () => {
    expect(await run(["-s", root, "-o", join(root, "out"), "build"])).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("IoFailure"));
    expect(existsSync(join(root, "out"))).toBe(false);
  });

  it("removes the output directory", async () => {
    const site = join(root, "site");
    const out = join(root, "out");
    await run(["init", site]);
    await run(["-s", site, "-o", out, "build"]);

    expect(await run(["-s", site, "-o", out, "clean"])).toBe(0);
    expect(existsSync(out)).toBe(false);
  });

  it("raises the log level with --verbose", async () => {
    vi.stubEnv("INKWELL_LOG", "");
    logger.setLevel("warn");

    await run(["-v", "-s", root, "-o", join(root, "out"), "clean"]);
    expect(logger.getLevel()).toBe("info");
  });

  it("keeps a level pinned by INKWELL_LOG", async () => {
    vi.stubEnv("INKWELL_LOG", "error");
    logger.setLevel("error");

    await run(["-v", "-s", root, "-o", join(root, "out"), "clean"]);
    expect(logger.getLevel()).toBe("error");
  });
});
