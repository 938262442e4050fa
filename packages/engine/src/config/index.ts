/**
 * Configuration types and validation for site config
 *
 * Config is stored in the project's package.json under the "inkwell" field.
 * Every key has a default, so a project without package.json builds with
 * the defaults.
 */

import { existsSync, readFileSync } from "node:fs";
import { join, posix } from "node:path";
import { z } from "zod";
import { InvalidConfigError, IoFailureError } from "../errors.js";

/**
 * True for a normalized relative path that stays inside its root
 * (`atom.xml`, `css/site.css`; not `./atom.xml`, `../x` or `/x`)
 */
export function isContainedPath(path: string): boolean {
  return (
    path.length > 0 &&
    !posix.isAbsolute(path) &&
    posix.normalize(path) === path &&
    path !== "." &&
    path !== ".." &&
    !path.startsWith("../") &&
    !path.endsWith("/")
  );
}

// A file path relative to the output root
const OutputFilePathSchema = z
  .string()
  .refine(isContainedPath, "must be a relative file path inside the output directory");

// Source directories, relative to the project root
export const PathsConfigSchema = z.object({
  posts: z.string().default("posts"),
  templates: z.string().default("templates"),
  assets: z.string().default("assets"),
});

// Output layout
export const OutputConfigSchema = z.object({
  flat: z.boolean().default(false),
});

// Layout names used for derived listing pages
export const LayoutsConfigSchema = z.object({
  index: z.string().min(1).default("index"),
  tag: z.string().min(1).default("tag"),
});

export const FeedConfigSchema = z.object({
  enabled: z.boolean().default(true),
  path: OutputFilePathSchema.default("atom.xml"),
});

export const MarkdownConfigSchema = z.object({
  gfm: z.boolean().default(false),
});

export const SiteConfigSchema = z.object({
  title: z.string().min(1).default("Blog"),
  baseUrl: z
    .string()
    .default("")
    .transform((url) => url.replace(/\/+$/, "")),
  author: z.string().optional(),
  /** Stylesheets linked from the built-in layouts, relative to the output root */
  stylesheets: z.array(OutputFilePathSchema).default([]),
  paths: PathsConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
  layouts: LayoutsConfigSchema.default({}),
  feed: FeedConfigSchema.default({}),
  markdown: MarkdownConfigSchema.default({}),
});

export type SiteConfig = z.infer<typeof SiteConfigSchema>;
export type SiteConfigInput = z.input<typeof SiteConfigSchema>;
export type PathsConfig = z.infer<typeof PathsConfigSchema>;
export type LayoutsConfig = z.infer<typeof LayoutsConfigSchema>;

/**
 * Validate a raw config value, filling in defaults
 */
export function resolveConfig(input: unknown = {}): SiteConfig {
  const parsed = SiteConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  return parsed.data;
}

/**
 * Load and validate config from package.json "inkwell" field
 */
export function loadConfig(rootDir: string): SiteConfig {
  const pkgPath = join(rootDir, "package.json");

  if (!existsSync(pkgPath)) {
    return resolveConfig({});
  }

  let pkg: unknown;
  try {
    pkg = JSON.parse(readFileSync(pkgPath, "utf-8"));
  } catch (err) {
    throw new IoFailureError(pkgPath, err);
  }

  const field = typeof pkg === "object" && pkg !== null && "inkwell" in pkg ? pkg.inkwell : {};
  return resolveConfig(field);
}

/**
 * Slugify a string for use in an output path. Letters and digits of any
 * script are kept; everything else collapses to single hyphens.
 *
 * @example slugify("Hello, World!") // "hello-world"
 * @example slugify("日記 2023") // "日記-2023"
 */
export function slugify(str: string): string {
  return str
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "");
}
