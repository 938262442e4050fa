/**
 * Site scaffolding for `inkwell init`
 */

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { IoFailureError } from "../errors.js";
import { slugify, type SiteConfigInput } from "./index.js";

export interface InitSiteOptions {
  directory: string;
  title?: string;
  /** Date of the welcome post, defaults to today */
  date?: Date;
}

const STYLESHEET_TEMPLATE = `body {
  max-width: 65ch;
  margin: 0 auto;
}
`;

function welcomePost(title: string, date: Date): string {
  return `---
title: Hello, world
date: ${date.toISOString().slice(0, 10)}
layout: post
tags: [welcome]
---

Welcome to **${title}**. Edit \`posts/hello-world.md\` or add new posts
next to it, then run \`inkwell build\`.
`;
}

/**
 * Create a new site in a directory
 *
 * @returns Paths of the created files, relative to the directory
 */
export function initSite(options: InitSiteOptions): string[] {
  const { directory, title = "Blog", date = new Date() } = options;
  const pkgPath = join(directory, "package.json");

  if (existsSync(pkgPath)) {
    throw new IoFailureError(pkgPath, new Error("a project already exists here"));
  }

  const config: SiteConfigInput = {
    title,
    baseUrl: "",
    paths: { posts: "posts", templates: "templates", assets: "assets" },
    feed: { enabled: true, path: "atom.xml" },
    stylesheets: ["style.css"],
  };

  const packageJson = {
    name: slugify(title) || "blog",
    version: "0.0.1",
    private: true,
    scripts: {
      build: "inkwell -s . build",
      clean: "inkwell -s . clean",
    },
    inkwell: config,
  };

  const files: Array<[string, string]> = [
    ["package.json", `${JSON.stringify(packageJson, null, 2)}\n`],
    ["posts/hello-world.md", welcomePost(title, date)],
    ["assets/style.css", STYLESHEET_TEMPLATE],
  ];

  try {
    mkdirSync(join(directory, "posts"), { recursive: true });
    mkdirSync(join(directory, "templates"), { recursive: true });
    mkdirSync(join(directory, "assets"), { recursive: true });
    for (const [path, contents] of files) {
      writeFileSync(join(directory, path), contents);
    }
  } catch (err) {
    throw new IoFailureError(directory, err);
  }

  return [...files.map(([path]) => path), "templates/"];
}
