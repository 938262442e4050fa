/**
 * Front Matter Handling
 *
 * Splits a content file into its YAML front matter and body. Front matter is
 * mandatory: the layout and date have to be known before rendering.
 */

import YAML from "yaml";
import { MalformedFrontMatterError, MissingFrontMatterError } from "../errors.js";

/** Decoded front matter mapping */
export type FrontmatterData = Record<string, unknown>;

/** Result of splitting a content file */
export interface FrontmatterParseResult {
  /** Decoded metadata */
  data: FrontmatterData;
  /** Text after the closing delimiter, unchanged */
  body: string;
}

/** Opening delimiter, at the very start of the file */
const OPENING_REGEX = /^\uFEFF?---[ \t]*(?:\r?\n|$)/;

/** Closing delimiter, on a line of its own */
const CLOSING_REGEX = /^---[ \t]*(?:\r?\n|$)/m;

function isMapping(value: unknown): value is FrontmatterData {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse YAML front matter from a content file
 *
 * @param text - The full file contents
 * @param source - Source identifier used in errors
 */
export function parseFrontmatter(text: string, source: string): FrontmatterParseResult {
  const opening = OPENING_REGEX.exec(text);
  if (!opening) {
    throw new MissingFrontMatterError(source);
  }

  const rest = text.slice(opening[0].length);
  const closing = CLOSING_REGEX.exec(rest);
  if (!closing) {
    throw new MalformedFrontMatterError(source, 'no closing "---" delimiter');
  }

  const yamlContent = rest.slice(0, closing.index);
  const body = rest.slice(closing.index + closing[0].length);

  let parsed: unknown;
  try {
    parsed = YAML.parse(yamlContent);
  } catch (err) {
    const reason = err instanceof Error ? err.message : "failed to parse front matter";
    throw new MalformedFrontMatterError(source, reason);
  }

  if (parsed === null || parsed === undefined) {
    return { data: {}, body };
  }
  if (!isMapping(parsed)) {
    throw new MalformedFrontMatterError(source, "front matter must be a mapping of key: value entries");
  }

  return { data: parsed, body };
}
