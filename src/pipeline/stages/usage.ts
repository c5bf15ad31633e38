/**
 * Stage 3: Usage. Keeps only what the document cites
 */

import { CITE_ALL } from "../../bib/aux.js";
import { isPreamble, type Entry } from "../../bib/types.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import type { Diagnostic, StageContext } from "../types.js";

export interface UsageOutcome {
  entries: Entry[];
  diagnostics: Diagnostic[];
}

/**
 * Drop entries the document does not cite and report cited keys that have
 * no entry. `\nocite{*}` keeps every entry. Preambles are always kept.
 *
 * @param mergedInto merged-away keys, so a citation of one can point at the survivor
 */
export function filterByUsage(
  entries: readonly Entry[],
  usedKeys: ReadonlySet<string>,
  mergedInto: ReadonlyMap<string, string> = new Map()
): UsageOutcome {
  const diagnostics: Diagnostic[] = [];
  const citeAll = usedKeys.has(CITE_ALL);
  const kept: Entry[] = [];
  const available = new Set<string>();

  for (const entry of entries) {
    if (isPreamble(entry)) {
      kept.push(entry);
      continue;
    }
    available.add(entry.key);
    if (citeAll || usedKeys.has(entry.key)) {
      kept.push(entry);
    } else {
      diagnostics.push({
        severity: "info",
        code: "unused_entry",
        message: `${entry.key} is not cited; dropped`,
        key: entry.key,
      });
    }
  }

  for (const key of usedKeys) {
    if (key === CITE_ALL || available.has(key)) continue;
    const survivor = mergedInto.get(key);
    diagnostics.push({
      severity: "error",
      code: "missing_entry",
      message:
        survivor === undefined
          ? `${key} is cited but has no entry`
          : `${key} is cited but was merged into ${survivor}; cite ${survivor} instead`,
      key,
    });
  }

  return { entries: kept, diagnostics };
}

/**
 * Stage 3: apply the usage filter. Without cited keys the set passes through.
 */
export function runStageUsage(ctx: StageContext): void {
  const start = Date.now();
  const before = ctx.entries.length;

  if (ctx.usedKeys === undefined) {
    ctx.stats.afterUsage = before;
    log.debug({ stage: "usage" }, "No cited keys supplied, usage filter skipped");
    return;
  }

  const outcome = filterByUsage(ctx.entries, ctx.usedKeys, ctx.mergedInto);
  ctx.entries = outcome.entries;
  ctx.collector.addAll(outcome.diagnostics);
  ctx.stats.afterUsage = outcome.entries.length;

  log.debug({ stage: "usage", before, after: outcome.entries.length }, "Usage stage finished");
  emit(TelemetryEvents.StageUsageCompleted, {
    entries_in: before,
    entries_out: outcome.entries.length,
    cited: ctx.usedKeys.size,
    missing: outcome.diagnostics.filter((d) => d.code === "missing_entry").length,
    duration_ms: Date.now() - start,
  });
}
