/**
 * @inkwell/engine
 *
 * Static blog engine: content documents with YAML front matter in, a static
 * HTML site out.
 */

export { build, toFailure, type BuildOptions, type BuildReport, type BuildResult } from "./build/index.js";
export { buildProject, type BuildProjectOptions } from "./build/project.js";
export { fanOut } from "./build/stages.js";
export {
  loadConfig,
  resolveConfig,
  slugify,
  SiteConfigSchema,
  type LayoutsConfig,
  type PathsConfig,
  type SiteConfig,
  type SiteConfigInput,
} from "./config/index.js";
export { initSite, type InitSiteOptions } from "./config/scaffold.js";
export * from "./errors.js";
export { escapeXml, renderAtomFeed } from "./feed/atom.js";
export { formatDate, joinTags, normalizeTag } from "./format.js";
export { defaultTemplates, IndexLayout, PostLayout, TagLayout } from "./layouts/defaults.js";
export { loadTemplateDirectory, moduleTemplate } from "./layouts/directory.js";
export { reactTemplate, renderHtmlDocument, type LayoutComponent } from "./layouts/react.js";
export {
  createTemplateRegistry,
  renderPage,
  resolveLayout,
  type LayoutContext,
  type RenderedPage,
  type Template,
  type TemplateRegistry,
} from "./layouts/registry.js";
export { logger, type LogLevel } from "./logger.js";
export { clean } from "./output/clean.js";
export { outputPathFor, tagUrlFor, urlFor, type PathOptions } from "./output/paths.js";
export { planOutput, writeOutput, type OutputEntry } from "./output/writer.js";
export { discoverAssets, discoverContent, type DiscoveredContent, type DiscoveredFile } from "./pages/discovery.js";
export { buildDocument, filenameSlug, parseIsoDate } from "./pages/document.js";
export { parseFrontmatter, type FrontmatterData, type FrontmatterParseResult } from "./pages/frontmatter.js";
export { createMarkdownRenderer, escapeHtml, type MarkdownOptions, type MarkdownRenderer } from "./pages/markdown.js";
export { aggregateSite, compareDocuments, deriveListingPages, groupByTag, renderListing } from "./site/aggregate.js";
export type * from "./types.js";
