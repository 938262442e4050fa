/**
 * Markdown Rendering
 *
 * Converts a document body to an HTML fragment with the unified/remark
 * pipeline. Raw HTML in the body passes through untouched.
 */

import rehypeStringify from "rehype-stringify";
import remarkGfm from "remark-gfm";
import remarkParse from "remark-parse";
import remarkRehype from "remark-rehype";
import { unified } from "unified";

export interface MarkdownOptions {
  /** Enable GitHub-flavoured extensions (tables, strikethrough, task lists) */
  gfm?: boolean;
}

export type MarkdownRenderer = (body: string) => string;

/**
 * Create a markdown renderer
 */
export function createMarkdownRenderer(options: MarkdownOptions = {}): MarkdownRenderer {
  const processor = options.gfm
    ? unified()
        .use(remarkParse)
        .use(remarkGfm)
        .use(remarkRehype, { allowDangerousHtml: true })
        .use(rehypeStringify, { allowDangerousHtml: true })
    : unified()
        .use(remarkParse)
        .use(remarkRehype, { allowDangerousHtml: true })
        .use(rehypeStringify, { allowDangerousHtml: true });

  return (body: string) => String(processor.processSync(body));
}

/**
 * Escape HTML special characters
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}
