/**
 * Stage 4: Journals. Abbreviates the journal names of the entries that will be written
 *
 * Runs after the usage filter so that only cited entries, including fields
 * merged in from uncited duplicates, are looked up.
 */

import { isPreamble, type Entry } from "../../bib/types.js";
import type { PolicyConfig } from "../../config/policy.js";
import { abbreviateJournal } from "../../transforms/field-normalisation.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import type { Diagnostic, JournalLookup, StageContext } from "../types.js";

/**
 * Abbreviate the `journal` field of every entry in place.
 */
export function abbreviateJournals(
  entries: readonly Entry[],
  config: PolicyConfig,
  journalLookup: JournalLookup
): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const entry of entries) {
    if (isPreamble(entry)) continue;
    const journal = entry.fields.get("journal");
    if (journal === undefined) continue;

    const outcome = abbreviateJournal(journal, config, { key: entry.key, journalLookup });
    entry.fields.set("journal", outcome.value);
    diagnostics.push(...outcome.diagnostics);
  }

  return diagnostics;
}

/**
 * Stage 4: apply the journal lookup. Without a lookup, or with abbreviation
 * turned off, the set passes through.
 */
export function runStageJournals(ctx: StageContext): void {
  const start = Date.now();

  if (ctx.journalLookup === undefined || !ctx.config.abbreviateJournals) {
    log.debug({ stage: "journals" }, "Journal abbreviation off, stage skipped");
    return;
  }

  const before = ctx.entries.map((entry) => entry.fields.get("journal"));
  const diagnostics = abbreviateJournals(ctx.entries, ctx.config, ctx.journalLookup);
  ctx.collector.addAll(diagnostics);

  const abbreviated = ctx.entries.filter((entry, i) => entry.fields.get("journal") !== before[i]).length;

  log.debug({ stage: "journals", abbreviated, failed: diagnostics.length }, "Journals stage finished");
  emit(TelemetryEvents.StageJournalsCompleted, {
    entries: ctx.entries.length,
    abbreviated,
    failed: diagnostics.length,
    duration_ms: Date.now() - start,
  });
}
