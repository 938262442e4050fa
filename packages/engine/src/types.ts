/**
 * Content Model Types
 */

export type SourceKind = "authored" | "derived";

export type ListingKind = "index" | "tag";

interface DocumentFields {
  title: string;
  date: Date;
  layout: string;
  tags: readonly string[];
  slug: string;
  bodyHtml: string;
}

/** A document read from a content file */
export interface AuthoredDocument extends DocumentFields {
  sourceKind: "authored";
  /** Content-relative source path */
  source: string;
  /** Every front matter key, for layouts that read extra fields */
  meta: Readonly<Record<string, unknown>>;
}

/** A listing page synthesized from the authored documents */
export interface DerivedDocument extends DocumentFields {
  sourceKind: "derived";
  listing: ListingKind;
  /** Normalized tag for tag pages, null for the index */
  tag: string | null;
  /** Listed documents, newest first */
  entries: readonly AuthoredDocument[];
}

export type Document = AuthoredDocument | DerivedDocument;

export interface TagGroup {
  /** Normalized tag name */
  name: string;
  /** Path segment used for the tag page */
  slug: string;
  documents: readonly AuthoredDocument[];
}

/** The immutable aggregate every layout renders against */
export interface Site {
  title: string;
  baseUrl: string;
  author: string | undefined;
  /** Authored documents, newest first (ties by slug) */
  documents: readonly AuthoredDocument[];
  /** Tag groups ordered by name */
  tags: readonly TagGroup[];
  /** URL of the Atom feed, when one is generated */
  feedUrl: string | null;
  /** URLs of the stylesheets layouts should link */
  stylesheets: readonly string[];
  indexUrl: string;
  urlFor(document: Document): string;
  tagUrl(tag: string): string;
}
