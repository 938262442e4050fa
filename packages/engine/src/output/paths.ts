/**
 * Output Paths
 *
 * Maps documents to their destination path in the output tree and to the
 * URL they are served at. Both follow the same rule:
 *
 * - authored: `<slug>/index.html`, or `<slug>.html` when flat
 * - tag page: `tags/<tag-segment>/index.html`
 * - index:    `index.html`
 *
 * URLs percent-encode each path segment.
 */

import { normalizeTag } from "../format.js";
import type { Document } from "../types.js";

export interface PathOptions {
  /** Write authored documents as `<slug>.html` */
  flat?: boolean;
}

export const TAGS_DIR = "tags";

const UNSAFE_SEGMENT_CHARS = /[%/\\\u0000-\u001f\u007f]/g;

/**
 * Directory name of a tag page: the normalized tag with only the characters a
 * path segment cannot hold percent-encoded, so distinct tags never share one
 *
 * @example tagSlug("C++") // "c++"
 * @example tagSlug("and/or") // "and%2For"
 */
export function tagSlug(tag: string): string {
  const segment = normalizeTag(tag).replace(
    UNSAFE_SEGMENT_CHARS,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase().padStart(2, "0")}`,
  );
  if (segment === ".") return "%2E";
  if (segment === "..") return "%2E%2E";
  return segment;
}

/**
 * Relative output path of a document (forward slashes)
 */
export function outputPathFor(document: Document, options: PathOptions = {}): string {
  if (document.sourceKind === "derived") {
    if (document.listing === "index") {
      return "index.html";
    }
    return `${TAGS_DIR}/${tagSlug(document.tag ?? "")}/index.html`;
  }
  return options.flat ? `${document.slug}.html` : `${document.slug}/index.html`;
}

/**
 * URL of a document under the site's base URL
 */
export function urlFor(document: Document, baseUrl: string, options: PathOptions = {}): string {
  if (document.sourceKind === "derived") {
    if (document.listing === "index") {
      return `${baseUrl}/`;
    }
    return tagUrlFor(document.tag ?? "", baseUrl);
  }
  const slug = encodeURIComponent(document.slug);
  return options.flat ? `${baseUrl}/${slug}.html` : `${baseUrl}/${slug}/`;
}

export function tagUrlFor(tag: string, baseUrl: string): string {
  return `${baseUrl}/${TAGS_DIR}/${encodeURIComponent(tagSlug(tag))}/`;
}
