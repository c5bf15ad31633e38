/**
 * Stage 5: Emit. Deterministic ordering and BibTeX rendering
 */

import { firstAuthorSortName } from "../../bib/names.js";
import { isPreamble, PREAMBLE_FIELD, type Entry } from "../../bib/types.js";
import type { PolicyConfig } from "../../config/policy.js";
import { findUnbalancedBrace } from "../../transforms/braces.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import type { StageContext } from "../types.js";

const FIELD_INDENT = "  ";

// ============================================================================
// Ordering
// ============================================================================

/**
 * Year as an integer, from its leading digits ("2020a" -> 2020).
 * Undefined when the field is absent or does not start with a digit.
 */
export function sortYear(entry: Entry): number | undefined {
  const match = /^\s*\{?(\d+)/.exec(entry.fields.get("year") ?? "");
  return match?.[1] === undefined ? undefined : Number.parseInt(match[1], 10);
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Year ascending (entries without one last), then folded first-author
 * family name, then citation key, then the rendered entry text so that
 * entries sharing a key still sort the same way on every input order.
 */
export function compareEntries(a: Entry, b: Entry): number {
  const yearA = sortYear(a);
  const yearB = sortYear(b);
  if (yearA !== yearB) {
    if (yearA === undefined) return 1;
    if (yearB === undefined) return -1;
    return yearA - yearB;
  }

  const byAuthor = compareStrings(firstAuthorSortName(a.fields), firstAuthorSortName(b.fields));
  if (byAuthor !== 0) return byAuthor;

  return compareStrings(a.key, b.key) || compareStrings(renderEntry(a), renderEntry(b));
}

/**
 * Preambles first in their original order, then the entries sorted.
 */
export function sortEntries(entries: readonly Entry[]): Entry[] {
  const preambles = entries.filter(isPreamble);
  const rest = entries.filter((entry) => !isPreamble(entry));
  return [...preambles, ...[...rest].sort(compareEntries)];
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Braced unless the value's own braces would break the delimiters, in which
 * case it is quoted.
 */
export function formatValue(value: string): string {
  return findUnbalancedBrace(value) === -1 ? `{${value}}` : `"${value}"`;
}

function orderedFields(entry: Entry, fieldOrder: readonly string[]): Array<[string, string]> {
  const listed: Array<[string, string]> = [];
  for (const field of fieldOrder) {
    const value = entry.fields.get(field);
    if (value !== undefined) listed.push([field, value]);
  }
  const rest = [...entry.fields].filter(([field]) => !fieldOrder.includes(field));
  return [...listed, ...rest];
}

export function renderEntry(entry: Entry, fieldOrder: readonly string[] = []): string {
  if (isPreamble(entry)) {
    return `@preamble{${formatValue(entry.fields.get(PREAMBLE_FIELD) ?? "")}}`;
  }

  const fields = orderedFields(entry, fieldOrder);
  if (fields.length === 0) {
    return `@${entry.type.name}{${entry.key},\n}`;
  }
  const body = fields.map(([field, value]) => `${FIELD_INDENT}${field} = ${formatValue(value)}`).join(",\n");
  return `@${entry.type.name}{${entry.key},\n${body}\n}`;
}

/**
 * Render entries in the given order, separated by a blank line.
 */
export function renderBibliography(entries: readonly Entry[], fieldOrder: readonly string[] = []): string {
  if (entries.length === 0) return "";
  return `${entries.map((entry) => renderEntry(entry, fieldOrder)).join("\n\n")}\n`;
}

/**
 * Order (unless sorting is disabled) and render the final entry set.
 */
export function sortAndRender(entries: readonly Entry[], config: PolicyConfig): { entries: Entry[]; output: string } {
  const ordered = config.sort
    ? sortEntries(entries)
    : [...entries.filter(isPreamble), ...entries.filter((entry) => !isPreamble(entry))];
  return { entries: ordered, output: renderBibliography(ordered, config.fieldOrder) };
}

/**
 * Stage 5: produce the output text.
 */
export function runStageEmit(ctx: StageContext): void {
  const start = Date.now();
  const { entries, output } = sortAndRender(ctx.entries, ctx.config);
  ctx.entries = entries;
  ctx.output = output;

  log.debug({ stage: "emit", entries: entries.length }, "Emit stage finished");
  emit(TelemetryEvents.StageEmitCompleted, {
    entries: entries.length,
    bytes: Buffer.byteLength(output, "utf-8"),
    sorted: ctx.config.sort,
    duration_ms: Date.now() - start,
  });
}
