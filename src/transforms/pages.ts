/**
 * Page-range normalization
 *
 * BibTeX typesets "--" as an en dash, so a range is written `12--19`.
 */

const DASH = /[-–—]/;
const SIMPLE_RANGE = /^([A-Za-z0-9]+)\s*(?:--?|–|—)\s*([A-Za-z0-9]+)$/;

export type PageRange =
  | { kind: "range"; value: string }
  | { kind: "single"; value: string }
  | { kind: "irregular"; value: string };

/**
 * Classify a `pages` value and rewrite simple ranges to `start--end`.
 * Anything else containing a dash (lists, triple hyphens, open ranges) is
 * reported as irregular and returned unchanged.
 */
export function normalizePageRange(value: string): PageRange {
  const trimmed = value.trim();
  const range = SIMPLE_RANGE.exec(trimmed);
  if (range) {
    return { kind: "range", value: `${range[1] ?? ""}--${range[2] ?? ""}` };
  }
  if (DASH.test(trimmed)) {
    return { kind: "irregular", value };
  }
  return { kind: "single", value };
}
