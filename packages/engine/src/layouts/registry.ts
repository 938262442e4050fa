/**
 * Layout Resolution
 *
 * A layout is an opaque named capability that turns a document plus the site
 * aggregate into a complete HTML page. The registry is created once per
 * build and passed explicitly; it is read-only after creation.
 */

import { RenderFailureError, UnknownLayoutError } from "../errors.js";
import { formatDate, joinTags } from "../format.js";
import type { Document, Site } from "../types.js";

/** Display helpers handed to every layout, so template modules need no imports */
export const layoutHelpers = Object.freeze({ formatDate, joinTags });

export type LayoutHelpers = typeof layoutHelpers;

export interface LayoutContext {
  document: Document;
  site: Site;
  helpers: LayoutHelpers;
}

export type Template = (context: LayoutContext) => string;

export interface TemplateRegistry {
  get(name: string): Template | undefined;
  has(name: string): boolean;
  /** Registered names, sorted */
  names(): string[];
}

export interface RenderedPage {
  document: Document;
  html: string;
}

/**
 * Create a read-only template registry
 */
export function createTemplateRegistry(templates: Readonly<Record<string, Template>>): TemplateRegistry {
  const entries = new Map<string, Template>(Object.entries(templates));

  return Object.freeze({
    get: (name: string) => entries.get(name),
    has: (name: string) => entries.has(name),
    names: () => [...entries.keys()].sort(),
  });
}

/**
 * Look up the template named by a document's layout
 */
export function resolveLayout(registry: TemplateRegistry, document: Document): Template {
  const template = registry.get(document.layout);
  if (!template) {
    throw new UnknownLayoutError(document.layout, document.slug);
  }
  return template;
}

/**
 * Render a document through its layout
 */
export function renderPage(document: Document, site: Site, registry: TemplateRegistry): RenderedPage {
  const template = resolveLayout(registry, document);

  let html: unknown;
  try {
    html = template({ document, site, helpers: layoutHelpers });
  } catch (err) {
    throw new RenderFailureError(document.slug, err);
  }

  if (typeof html !== "string") {
    throw new RenderFailureError(document.slug, new Error(`layout "${document.layout}" did not return a string`));
  }

  return { document, html };
}
