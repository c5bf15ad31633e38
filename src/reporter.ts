/**
 * Reporter. Turns run results into terminal text or JSON.
 *
 * Returns strings only; the CLI decides where they go.
 */

import { relative } from "node:path";
import type { Diagnostic, Severity } from "./pipeline/types.js";
import type { AuxRunResult, AuxStatus } from "./runner.js";

const SEVERITY_ICONS: Record<Severity, string> = {
  info: "ℹ️",
  warning: "⚠️",
  error: "💥",
};

const STATUS_LINES: Record<AuxStatus, string> = {
  skipped: "❓ Skipped",
  unchanged: "😀 No changes to",
  changed: "💾 Please check the new or corrected file:",
  broken: "💥 Broken bibliography:",
};

export interface ReportOptions {
  /** Only errors and the status line. */
  quiet?: boolean;
  /** Paths are shown relative to this directory. */
  cwd?: string;
}

function location(diagnostic: Diagnostic): string {
  if (diagnostic.key === undefined) return "";
  return diagnostic.field === undefined ? ` ${diagnostic.key}` : ` ${diagnostic.key}.${diagnostic.field}`;
}

/**
 * `<icon> <severity> [<code>] <key>.<field>: <message>`
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${SEVERITY_ICONS[diagnostic.severity]} ${diagnostic.severity} [${diagnostic.code}]${location(diagnostic)}: ${diagnostic.message}`;
}

export function countBySeverity(diagnostics: readonly Diagnostic[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { info: 0, warning: 0, error: 0 };
  for (const d of diagnostics) counts[d.severity]++;
  return counts;
}

export function formatSummary(diagnostics: readonly Diagnostic[]): string {
  const counts = countBySeverity(diagnostics);
  const plural = (n: number, word: string): string => `${n} ${word}${n === 1 ? "" : "s"}`;
  return `   ${plural(counts.error, "error")}, ${plural(counts.warning, "warning")}, ${counts.info} info`;
}

/**
 * Text report for one aux file.
 */
export function renderResult(result: AuxRunResult, options: ReportOptions = {}): string[] {
  const cwd = options.cwd ?? process.cwd();
  const show = (path: string): string => relative(cwd, path) || path;
  const lines: string[] = [];

  if (!options.quiet) lines.push(`📂 ${show(result.aux)}`);

  if (result.error) {
    lines.push(`💥 ${result.error.code}: ${result.error.message}`);
    const issues = result.error.details?.["issues"];
    if (Array.isArray(issues)) {
      for (const issue of issues) lines.push(`   - ${String(issue)}`);
    }
    return lines;
  }

  if (result.status === "skipped") {
    if (!options.quiet) lines.push(`${STATUS_LINES.skipped} (${result.reason ?? "nothing to do"})`);
    return lines;
  }

  const visible = options.quiet ? result.diagnostics.filter((d) => d.severity === "error") : result.diagnostics;
  for (const diagnostic of visible) lines.push(formatDiagnostic(diagnostic));

  if (!options.quiet) {
    if (result.stats) {
      const { input, afterPolicy, afterDedupe, afterUsage } = result.stats;
      lines.push(`   ${input} entries read, ${afterPolicy} after policy, ${afterDedupe} after dedupe, ${afterUsage} cited`);
    }
    lines.push(formatSummary(result.diagnostics));
  }

  const output = result.output === undefined ? "" : ` ${show(result.output)}`;
  if (result.status !== "unchanged" || !options.quiet) {
    lines.push(`${STATUS_LINES[result.status]}${output}`);
  }

  return lines;
}

/**
 * Text report for a whole run, one blank line between aux files.
 */
export function renderReport(results: readonly AuxRunResult[], options: ReportOptions = {}): string {
  return results
    .map((result) => renderResult(result, options))
    .filter((lines) => lines.length > 0)
    .map((lines) => lines.join("\n"))
    .join("\n\n");
}

/**
 * Machine-readable report for `--json`.
 */
export function renderJson(results: readonly AuxRunResult[]): string {
  return JSON.stringify(
    results.map((result) => ({
      aux: result.aux,
      status: result.status,
      output: result.output ?? null,
      changed: result.changed,
      written: result.written,
      stats: result.stats ?? null,
      error: result.error ?? null,
      diagnostics: result.diagnostics,
    })),
    null,
    2
  );
}
