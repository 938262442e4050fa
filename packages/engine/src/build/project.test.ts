import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { initSite } from "../config/scaffold.js";
import { makeTempDir, readTree, removeDir, writeTree } from "../test/helpers.js";
import { buildProject } from "./project.js";

describe("buildProject", () => {
  let root: string;
  let outputDir: string;

  beforeEach(() => {
    root = makeTempDir();
    outputDir = join(root, "build");
  });

  afterEach(() => {
    removeDir(root);
  });

  it("builds a freshly scaffolded site", async () => {
    const site = join(root, "site");
    initSite({ directory: site, title: "Casebook", date: new Date(Date.UTC(2023, 1, 4)) });

    const result = await buildProject({ rootDir: site, outputDir });
    expect(result.success && result.report.files).toEqual([
      "atom.xml",
      "hello-world/index.html",
      "index.html",
      "style.css",
      "tags/welcome/index.html",
    ]);
    const page = readTree(outputDir)["hello-world/index.html"];
    expect(page).toContain("<title>Hello, world | Casebook</title>");
    expect(page).toContain('<link rel="stylesheet" href="/style.css"/>');
  });

  it("lets project templates replace built-in layouts", async () => {
    writeTree(root, {
      "posts/scandal.md": "---\ntitle: Scandal\ndate: 2023-02-04\nlayout: post\n---\nbody\n",
      "templates/post.mjs": "export default ({ document }) => `custom ${document.slug}`;\n",
    });

    const result = await buildProject({ rootDir: root, outputDir });
    expect(result.success).toBe(true);
    expect(readTree(outputDir)["scandal/index.html"]).toBe("custom scandal");
  });

  it("reads directories and layout names from config", async () => {
    writeTree(root, {
      "package.json": JSON.stringify({ inkwell: { paths: { posts: "content" }, layouts: { index: "home" } } }),
      "content/scandal.md": "---\ntitle: Scandal\ndate: 2023-02-04\nlayout: post\n---\n",
    });

    const result = await buildProject({ rootDir: root, outputDir });
    expect(result.success ? null : result.error).toMatchObject({ kind: "UnknownLayout", name: "home" });
  });

  it("reports invalid config", async () => {
    writeTree(root, { "package.json": JSON.stringify({ inkwell: { output: { flat: "yes" } } }) });

    const result = await buildProject({ rootDir: root, outputDir });
    expect(result.success ? null : result.error.kind).toBe("InvalidConfig");
  });

  it("reports invalid templates", async () => {
    writeTree(root, {
      "posts/scandal.md": "---\ntitle: Scandal\ndate: 2023-02-04\nlayout: post\n---\n",
      "templates/post.mjs": "export const post = 1;\n",
    });

    const result = await buildProject({ rootDir: root, outputDir });
    expect(result.success ? null : result.error.kind).toBe("InvalidTemplate");
  });
});
