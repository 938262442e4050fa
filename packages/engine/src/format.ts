/**
 * Display helpers shared by listings and layouts
 */

const DATE_FORMAT = new Intl.DateTimeFormat("en-US", {
  year: "numeric",
  month: "long",
  day: "numeric",
  timeZone: "UTC",
});

/**
 * Format a date for display, always in UTC so output does not depend on the
 * machine running the build. `options` replace the default long form.
 *
 * @example formatDate(new Date("2023-02-04T15:38:42Z")) // "February 4, 2023"
 * @example formatDate(date, { month: "short", year: "numeric" }) // "Feb 2023"
 */
export function formatDate(date: Date, options?: Intl.DateTimeFormatOptions): string {
  if (!options) {
    return DATE_FORMAT.format(date);
  }
  return new Intl.DateTimeFormat("en-US", { ...options, timeZone: "UTC" }).format(date);
}

/**
 * Join tags for display
 *
 * @example joinTags(["alpha", "beta"], " + ") // "alpha + beta"
 */
export function joinTags(tags: readonly string[], separator = ", "): string {
  return tags.join(separator);
}

/** Trimmed, lower-cased tag used for grouping */
export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}
