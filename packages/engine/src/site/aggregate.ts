/**
 * Site Aggregation
 *
 * Builds the immutable Site from the complete set of authored documents and
 * derives the listing pages (chronological index, one page per tag).
 */

import type { LayoutsConfig } from "../config/index.js";
import { formatDate, normalizeTag } from "../format.js";
import { escapeHtml } from "../pages/markdown.js";
import { tagSlug, tagUrlFor, urlFor, type PathOptions } from "../output/paths.js";
import type { AuthoredDocument, DerivedDocument, Document, Site, TagGroup } from "../types.js";

export interface AggregateOptions extends PathOptions {
  title: string;
  baseUrl: string;
  author?: string;
  /** Feed path relative to the output root, or null when no feed is generated */
  feedPath?: string | null;
  /** Stylesheet paths relative to the output root */
  stylesheets?: readonly string[];
}

/**
 * Listing order: date descending, then slug ascending
 */
export function compareDocuments(a: Document, b: Document): number {
  const byDate = b.date.getTime() - a.date.getTime();
  if (byDate !== 0) return byDate;
  return a.slug < b.slug ? -1 : a.slug > b.slug ? 1 : 0;
}

/**
 * Group documents by normalized tag. Each document appears once per group,
 * however many spellings of the tag it carries.
 */
export function groupByTag(documents: readonly AuthoredDocument[]): Map<string, AuthoredDocument[]> {
  const groups = new Map<string, AuthoredDocument[]>();

  for (const document of documents) {
    const seen = new Set<string>();
    for (const tag of document.tags) {
      const name = normalizeTag(tag);
      if (seen.has(name)) continue;
      seen.add(name);

      const group = groups.get(name);
      if (group) {
        group.push(document);
      } else {
        groups.set(name, [document]);
      }
    }
  }

  return groups;
}

/**
 * Build the Site aggregate
 */
export function aggregateSite(documents: readonly AuthoredDocument[], options: AggregateOptions): Site {
  const { title, baseUrl, author, feedPath = null, stylesheets = [] } = options;
  const pathOptions: PathOptions = { flat: options.flat };

  const ordered = Object.freeze([...documents].sort(compareDocuments));

  const tags: TagGroup[] = [];
  const groups = groupByTag(ordered);
  for (const name of [...groups.keys()].sort()) {
    tags.push(
      Object.freeze({
        name,
        slug: tagSlug(name),
        documents: Object.freeze(groups.get(name) ?? []),
      }),
    );
  }

  return Object.freeze({
    title,
    baseUrl,
    author,
    documents: ordered,
    tags: Object.freeze(tags),
    feedUrl: feedPath ? `${baseUrl}/${feedPath}` : null,
    stylesheets: Object.freeze(stylesheets.map((path) => `${baseUrl}/${path}`)),
    indexUrl: `${baseUrl}/`,
    urlFor: (document: Document) => urlFor(document, baseUrl, pathOptions),
    tagUrl: (tag: string) => tagUrlFor(normalizeTag(tag), baseUrl),
  });
}

/**
 * Generated listing body for derived pages
 */
export function renderListing(entries: readonly AuthoredDocument[], site: Site): string {
  const items = entries.map((entry) => {
    const href = escapeHtml(site.urlFor(entry));
    const datetime = entry.date.toISOString();
    return `<li><a href="${href}">${escapeHtml(entry.title)}</a> <time datetime="${datetime}">${formatDate(entry.date)}</time></li>`;
  });
  return items.length > 0
    ? `<ul class="post-list">\n${items.join("\n")}\n</ul>`
    : `<ul class="post-list"></ul>`;
}

function newestDate(entries: readonly AuthoredDocument[]): Date {
  return entries.length > 0 ? entries[0].date : new Date(0);
}

/**
 * Derive the chronological index and one page per tag
 */
export function deriveListingPages(site: Site, layouts: LayoutsConfig): DerivedDocument[] {
  const index: DerivedDocument = {
    sourceKind: "derived",
    listing: "index",
    tag: null,
    title: site.title,
    date: newestDate(site.documents),
    layout: layouts.index,
    tags: [],
    slug: "index",
    bodyHtml: renderListing(site.documents, site),
    entries: site.documents,
  };

  const tagPages = site.tags.map(
    (group): DerivedDocument => ({
      sourceKind: "derived",
      listing: "tag",
      tag: group.name,
      title: group.name,
      date: newestDate(group.documents),
      layout: layouts.tag,
      tags: [],
      slug: `tags/${group.slug}`,
      bodyHtml: renderListing(group.documents, site),
      entries: group.documents,
    }),
  );

  return [index, ...tagPages];
}
