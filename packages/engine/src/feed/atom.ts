/**
 * Atom Feed
 *
 * Renders an Atom 1.0 feed of every authored document, newest first. The feed
 * timestamp is the newest document date (epoch for an empty site), so two
 * builds of the same content produce the same bytes.
 */

import type { Site } from "../types.js";

const XML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

export function escapeXml(str: string): string {
  return str.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

function feedUpdated(site: Site): Date {
  return site.documents.length > 0 ? site.documents[0].date : new Date(0);
}

export function renderAtomFeed(site: Site): string {
  const lines = [
    `<?xml version="1.0" encoding="utf-8"?>`,
    `<feed xmlns="http://www.w3.org/2005/Atom">`,
    `  <title>${escapeXml(site.title)}</title>`,
    `  <id>${escapeXml(site.indexUrl)}</id>`,
    `  <link href="${escapeXml(site.indexUrl)}"/>`,
  ];
  if (site.feedUrl) {
    lines.push(`  <link rel="self" href="${escapeXml(site.feedUrl)}"/>`);
  }
  lines.push(`  <updated>${feedUpdated(site).toISOString()}</updated>`);
  if (site.author) {
    lines.push(`  <author><name>${escapeXml(site.author)}</name></author>`);
  }

  for (const document of site.documents) {
    const url = escapeXml(site.urlFor(document));
    const date = document.date.toISOString();
    lines.push(
      `  <entry>`,
      `    <title>${escapeXml(document.title)}</title>`,
      `    <id>${url}</id>`,
      `    <link href="${url}"/>`,
      `    <published>${date}</published>`,
      `    <updated>${date}</updated>`,
    );
    for (const tag of document.tags) {
      lines.push(`    <category term="${escapeXml(tag)}"/>`);
    }
    lines.push(`    <content type="html">${escapeXml(document.bodyHtml)}</content>`, `  </entry>`);
  }

  lines.push(`</feed>`);
  return `${lines.join("\n")}\n`;
}
