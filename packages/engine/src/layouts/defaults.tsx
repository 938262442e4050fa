/**
 * Built-in Layouts
 *
 * - post:  a single authored document
 * - tag:   listing of the documents carrying one tag
 * - index: chronological listing of every document
 *
 * Projects can replace any of them with a module of the same name in their
 * templates directory.
 */

import type { ReactNode } from "react";
import { formatDate, normalizeTag } from "../format.js";
import type { Site } from "../types.js";
import { reactTemplate } from "./react.js";
import type { LayoutContext, Template } from "./registry.js";

const STYLES = `
body { font-family: system-ui, -apple-system, sans-serif; line-height: 1.6; color: #1a1a1a; margin: 0; }
.site-header { max-width: 65ch; margin: 0 auto; padding: 1rem 2rem; border-bottom: 1px solid #e5e7eb; }
.site-header a { color: inherit; font-weight: 600; text-decoration: none; }
.prose { max-width: 65ch; margin: 0 auto; padding: 2rem; }
.prose h1 { font-size: 2.25rem; font-weight: 700; margin-bottom: 1rem; }
.prose a { color: #2563eb; }
.prose pre { background: #1f2937; color: #f9fafb; padding: 1rem; border-radius: 0.5rem; overflow-x: auto; }
.prose blockquote { border-left: 4px solid #e5e7eb; padding-left: 1rem; color: #6b7280; }
.meta { color: #6b7280; }
.tags { list-style: none; padding: 0; display: flex; gap: 0.5rem; }
.post-list { list-style: none; padding: 0; }
.post-list time { color: #6b7280; margin-left: 0.5rem; }
`;

function Page({ site, title, children }: { site: Site; title: string; children: ReactNode }) {
  const pageTitle = title === site.title ? title : `${title} | ${site.title}`;

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{pageTitle}</title>
        {site.feedUrl ? (
          <link rel="alternate" type="application/atom+xml" title={site.title} href={site.feedUrl} />
        ) : null}
        <style dangerouslySetInnerHTML={{ __html: STYLES }} />
        {site.stylesheets.map((href) => (
          <link key={href} rel="stylesheet" href={href} />
        ))}
      </head>
      <body>
        <header className="site-header">
          <a href={site.indexUrl}>{site.title}</a>
        </header>
        <main className="prose">{children}</main>
      </body>
    </html>
  );
}

export function PostLayout({ document, site }: LayoutContext) {
  const tags = [...new Set(document.tags.map(normalizeTag))];

  return (
    <Page site={site} title={document.title}>
      <article>
        <h1>{document.title}</h1>
        <p className="meta">
          <time dateTime={document.date.toISOString()}>{formatDate(document.date)}</time>
          {site.author ? <span className="author"> · {site.author}</span> : null}
        </p>
        {tags.length > 0 ? (
          <ul className="tags">
            {tags.map((tag) => (
              <li key={tag}>
                <a href={site.tagUrl(tag)}>{tag}</a>
              </li>
            ))}
          </ul>
        ) : null}
        <div className="content" dangerouslySetInnerHTML={{ __html: document.bodyHtml }} />
      </article>
    </Page>
  );
}

export function TagLayout({ document, site }: LayoutContext) {
  return (
    <Page site={site} title={`Tagged “${document.title}”`}>
      <h1>Tagged “{document.title}”</h1>
      <div className="listing" dangerouslySetInnerHTML={{ __html: document.bodyHtml }} />
    </Page>
  );
}

export function IndexLayout({ document, site }: LayoutContext) {
  return (
    <Page site={site} title={document.title}>
      <h1>{document.title}</h1>
      <div className="listing" dangerouslySetInnerHTML={{ __html: document.bodyHtml }} />
    </Page>
  );
}

/**
 * Built-in templates, keyed by layout name
 */
export function defaultTemplates(): Record<string, Template> {
  return {
    post: reactTemplate(PostLayout),
    tag: reactTemplate(TagLayout),
    index: reactTemplate(IndexLayout),
  };
}
