/**
 * Content Model Builder
 *
 * Validates decoded front matter into an AuthoredDocument. Fields are
 * checked in a fixed order (title, date, layout, tags, slug) and the first
 * failure is reported; a partial document is never produced.
 */

import { posix } from "node:path";
import { z } from "zod";
import { slugify } from "../config/index.js";
import { InvalidDocumentError } from "../errors.js";
import { normalizeTag } from "../format.js";
import type { AuthoredDocument } from "../types.js";
import type { FrontmatterData } from "./frontmatter.js";

const ISO_DATE_REGEX =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

const FILENAME_DATE_REGEX = /^(\d{4}-\d{2}-\d{2})/;

/**
 * Parse an ISO-8601 date or date-time. Date-times without an offset are
 * read as UTC. Returns null for anything that is not a real calendar date.
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE_REGEX.exec(value.trim());
  if (!match) return null;

  const [, y, m, d, hh, mm, ss, frac, offset] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);

  const calendar = new Date(Date.UTC(year, month - 1, day));
  if (
    calendar.getUTCFullYear() !== year ||
    calendar.getUTCMonth() !== month - 1 ||
    calendar.getUTCDate() !== day
  ) {
    return null;
  }

  if (hh === undefined || mm === undefined) {
    return calendar;
  }
  if (Number(hh) > 23 || Number(mm) > 59 || Number(ss ?? "0") > 59) {
    return null;
  }

  const zone = normalizeOffset(offset);
  const iso = `${y}-${m}-${d}T${hh}:${mm}:${ss ?? "00"}${frac ?? ""}${zone}`;
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? null : date;
}

function normalizeOffset(offset: string | undefined): string {
  if (!offset || offset.toUpperCase() === "Z") return "Z";
  const digits = offset.slice(1).replace(":", "");
  const hours = digits.slice(0, 2);
  const minutes = digits.slice(2, 4) || "00";
  return `${offset[0]}${hours}:${minutes}`;
}

// ============================================================================
// Field Schemas
// ============================================================================

const TitleSchema = z
  .string({ invalid_type_error: "must be a string" })
  .trim()
  .min(1, "must not be empty");

const DateSchema = z
  .union([z.string(), z.date()], {
    errorMap: () => ({ message: "must be an ISO-8601 date or date-time" }),
  })
  .transform((value, ctx) => {
    const date = value instanceof Date ? value : parseIsoDate(value);
    if (!date || Number.isNaN(date.getTime())) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `"${String(value)}" is not a valid ISO-8601 calendar date`,
      });
      return z.NEVER;
    }
    return date;
  });

const LayoutSchema = z
  .string({ invalid_type_error: "must be a string" })
  .trim()
  .min(1, "must not be empty");

const TagsSchema = z
  .array(z.string({ invalid_type_error: "must be a list of strings" }), {
    invalid_type_error: "must be a list of strings",
  })
  .superRefine((tags, ctx) => {
    for (const tag of tags) {
      if (!normalizeTag(tag)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "tags must not be blank",
        });
        return;
      }
    }
  });

const SlugSchema = z
  .string({ invalid_type_error: "must be a string" })
  .transform((value, ctx) => {
    const slug = slugify(value);
    if (!slug) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `"${value}" does not contain any letters or digits`,
      });
      return z.NEVER;
    }
    return slug;
  });

function isAbsent(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

/**
 * Validate one field, throwing InvalidDocument with the first issue
 */
function validateField<T extends z.ZodTypeAny>(
  source: string,
  field: string,
  schema: T,
  value: unknown,
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? "is invalid";
    throw new InvalidDocumentError(source, field, reason);
  }
  return result.data;
}

function requireField<T extends z.ZodTypeAny>(
  source: string,
  field: string,
  schema: T,
  value: unknown,
): z.output<T> {
  if (isAbsent(value)) {
    throw new InvalidDocumentError(source, field, "is required");
  }
  return validateField(source, field, schema, value);
}

/**
 * Slug candidate taken from the source filename (extension stripped)
 */
export function filenameSlug(source: string): string {
  const base = posix.basename(source);
  const ext = posix.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

/**
 * Build a document from front matter and rendered body
 *
 * @param data - Decoded front matter
 * @param bodyHtml - Rendered body
 * @param source - Content-relative source path
 */
export function buildDocument(
  data: FrontmatterData,
  bodyHtml: string,
  source: string,
): AuthoredDocument {
  const title = requireField(source, "title", TitleSchema, data.title);

  // Posts named "YYYY-MM-DD-..." may leave the date out of the front matter
  let rawDate = data.date;
  if (isAbsent(rawDate)) {
    rawDate = FILENAME_DATE_REGEX.exec(posix.basename(source))?.[1];
  }
  const date = requireField(source, "date", DateSchema, rawDate);

  const layout = requireField(source, "layout", LayoutSchema, data.layout);
  const tags = isAbsent(data.tags) ? [] : validateField(source, "tags", TagsSchema, data.tags);
  const slug = validateField(
    source,
    "slug",
    SlugSchema,
    isAbsent(data.slug) ? filenameSlug(source) : data.slug,
  );

  return {
    sourceKind: "authored",
    source,
    title,
    date,
    layout,
    tags: Object.freeze([...tags]),
    slug,
    bodyHtml,
    meta: Object.freeze({ ...data }),
  };
}
