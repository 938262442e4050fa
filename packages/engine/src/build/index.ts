/**
 * Build System
 *
 * Turns a content directory into a static site:
 *
 *   discover → parse/build documents (fan-out) → aggregate site
 *     → render pages (fan-out) → collision pre-pass → write
 *
 * Every failure is fatal and is returned as a BuildError before the output
 * directory is touched (write-time I/O failures excepted).
 */

import { readFile } from "node:fs/promises";
import { resolveConfig, type SiteConfig, type SiteConfigInput } from "../config/index.js";
import { type BuildError, IoFailureError, isBuildError, RenderFailureError } from "../errors.js";
import { renderAtomFeed } from "../feed/atom.js";
import { renderPage, type TemplateRegistry } from "../layouts/registry.js";
import { logger } from "../logger.js";
import { outputPathFor } from "../output/paths.js";
import { type OutputEntry, planOutput, writeOutput } from "../output/writer.js";
import { type DiscoveredContent, discoverAssets, discoverContent } from "../pages/discovery.js";
import { buildDocument } from "../pages/document.js";
import { parseFrontmatter } from "../pages/frontmatter.js";
import { createMarkdownRenderer, type MarkdownRenderer } from "../pages/markdown.js";
import { aggregateSite, deriveListingPages } from "../site/aggregate.js";
import type { AuthoredDocument, Document } from "../types.js";
import { fanOut } from "./stages.js";

export interface BuildOptions {
  /** Directory holding the content documents */
  contentDir: string;
  outputDir: string;
  templates: TemplateRegistry;
  /** Site config, validated and defaulted */
  config?: SiteConfigInput;
  /** Directory of static files copied to the output root */
  assetsDir?: string;
}

export interface BuildReport {
  outputDir: string;
  pagesWritten: number;
  assetsCopied: number;
  feedWritten: boolean;
  filesWritten: number;
  /** Written paths relative to outputDir, sorted */
  files: string[];
}

export type BuildResult = { success: true; report: BuildReport } | { success: false; error: BuildError };

async function loadDocument(
  file: DiscoveredContent,
  renderMarkdown: MarkdownRenderer,
): Promise<AuthoredDocument> {
  let text: string;
  try {
    text = await readFile(file.absolutePath, "utf-8");
  } catch (err) {
    throw new IoFailureError(file.absolutePath, err);
  }

  const { data, body } = parseFrontmatter(text, file.path);

  let bodyHtml: string;
  try {
    bodyHtml = file.format === "markdown" ? renderMarkdown(body) : body;
  } catch (err) {
    throw new RenderFailureError(file.path, err);
  }

  const document = buildDocument(data, bodyHtml, file.path);
  logger.debug("build", `Parsed ${file.path} → ${document.slug}`);
  return document;
}

/** How a page is named in collision errors */
function pageOrigin(document: Document): string {
  if (document.sourceKind === "authored") return document.source;
  return document.tag === null ? "index page" : `tag "${document.tag}"`;
}

async function runBuild(options: BuildOptions, config: SiteConfig): Promise<BuildReport> {
  const { contentDir, outputDir, templates, assetsDir } = options;

  // Phase 1: discovery
  const sources = await discoverContent(contentDir);
  const assets = assetsDir ? await discoverAssets(assetsDir) : [];
  logger.info("build", `Found ${sources.length} document(s), ${assets.length} asset(s)`);

  // Phase 2: parse and build documents
  const renderMarkdown = createMarkdownRenderer({ gfm: config.markdown.gfm });
  const documents = await fanOut(sources, (file) => loadDocument(file, renderMarkdown));

  // Phase 3: aggregate
  const feedPath = config.feed.enabled ? config.feed.path : null;
  const site = aggregateSite(documents, {
    title: config.title,
    baseUrl: config.baseUrl,
    author: config.author,
    feedPath,
    stylesheets: config.stylesheets,
    flat: config.output.flat,
  });
  const listings = deriveListingPages(site, config.layouts);
  logger.info("build", `Aggregated ${site.documents.length} document(s), ${site.tags.length} tag(s)`);

  // Phase 4: render pages
  const pages = await fanOut([...site.documents, ...listings], (document) =>
    renderPage(document, site, templates),
  );

  // Phase 5: collision pre-pass, then write
  const entries: OutputEntry[] = pages.map(({ document, html }): OutputEntry => ({
    kind: "page",
    path: outputPathFor(document, { flat: config.output.flat }),
    contents: html,
    origin: pageOrigin(document),
  }));
  if (feedPath) {
    entries.push({ kind: "feed", path: feedPath, contents: renderAtomFeed(site), origin: "feed" });
  }
  for (const asset of assets) {
    entries.push({ kind: "asset", path: asset.path, sourcePath: asset.absolutePath, origin: `asset ${asset.path}` });
  }

  planOutput(entries);
  const files = await writeOutput(outputDir, entries);
  logger.info("build", `Wrote ${files.length} file(s) to ${outputDir}`);

  return {
    outputDir,
    pagesWritten: pages.length,
    assetsCopied: assets.length,
    feedWritten: feedPath !== null,
    filesWritten: files.length,
    files,
  };
}

/**
 * Build a site
 *
 * Build errors are returned as `{ success: false, error }`; anything else
 * (a bug) rejects.
 */
export async function build(options: BuildOptions): Promise<BuildResult> {
  try {
    const config = resolveConfig(options.config);
    const report = await runBuild(options, config);
    return { success: true, report };
  } catch (err) {
    return toFailure(err);
  }
}

/**
 * Turn a thrown BuildError into a failed result, rethrowing anything else
 */
export function toFailure(err: unknown): BuildResult {
  if (isBuildError(err)) {
    logger.debug("build", `Build failed: ${err.kind}`);
    return { success: false, error: err };
  }
  throw err;
}
