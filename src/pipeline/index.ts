/**
 * Sanitization Pipeline Orchestrator
 *
 * Runs the five stages in a fixed order over one entry set:
 *  1. Policy: type admission, cruft removal, required fields, field cleanup
 *  2. Dedupe: DOI / key merges and key-collision reports
 *  3. Usage: drop uncited entries, report cited keys without an entry
 *  4. Journals: abbreviate the journal names of what is left
 *  5. Emit: deterministic order and BibTeX text
 *
 * Every stage runs even when an earlier one reported errors, so a single
 * run surfaces every problem. The caller's entries are not modified.
 */

import { cloneEntry, type Entry } from "../bib/types.js";
import { createDiagnosticCollector } from "./diagnostics.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import type { PipelineInput, PipelineResult, StageContext } from "./types.js";

import { applyPolicies, runStagePolicy } from "./stages/policy.js";
import { resolveDuplicates, runStageDedupe } from "./stages/dedupe.js";
import { filterByUsage, runStageUsage } from "./stages/usage.js";
import { runStageJournals } from "./stages/journals.js";
import { runStageEmit } from "./stages/emit.js";

function buildInitialContext(input: PipelineInput): StageContext {
  const entries = input.entries.map(cloneEntry);
  return {
    // Inputs
    config: input.config,
    usedKeys: input.usedKeys,
    journalLookup: input.journalLookup,

    entries,

    // Stage 2 outputs
    mergedInto: new Map(),

    // Stage 5 outputs
    output: "",

    // Cross-cutting
    collector: createDiagnosticCollector(),
    stats: {
      input: entries.length,
      afterPolicy: entries.length,
      afterDedupe: entries.length,
      afterUsage: entries.length,
    },
  };
}

export function runSanitizePipeline(input: PipelineInput): PipelineResult {
  const start = Date.now();
  const ctx = buildInitialContext(input);

  ctx.collector.enterStage("policy");
  runStagePolicy(ctx);

  ctx.collector.enterStage("dedupe");
  runStageDedupe(ctx);

  ctx.collector.enterStage("usage");
  runStageUsage(ctx);

  ctx.collector.enterStage("journals");
  runStageJournals(ctx);

  ctx.collector.enterStage("emit");
  runStageEmit(ctx);

  const failed = ctx.collector.hasErrors();
  const summary = ctx.collector.getSummary();

  log.info({ stats: ctx.stats, failed }, "Sanitization pipeline finished");
  emit(TelemetryEvents.PipelineCompleted, {
    ...ctx.stats,
    failed,
    diagnostics: summary.by_severity,
    duration_ms: Date.now() - start,
  });

  return {
    entries: ctx.entries,
    output: ctx.output,
    diagnostics: ctx.collector.getDiagnostics(),
    failed,
    stats: { ...ctx.stats },
  };
}

/**
 * The entries a run would write, before journal abbreviation and ordering.
 * Runs the first three stages on copies without diagnostics or telemetry,
 * so the caller can tell which journal names the run will look up.
 */
export function selectOutputEntries(input: PipelineInput): Entry[] {
  const cleaned: Entry[] = [];
  for (const entry of input.entries) {
    const outcome = applyPolicies(cloneEntry(entry), input.config);
    if (outcome.entry) cleaned.push(outcome.entry);
  }

  const deduped = resolveDuplicates(cleaned, input.config);
  if (input.usedKeys === undefined) return deduped.entries;
  return filterByUsage(deduped.entries, input.usedKeys, deduped.mergedInto).entries;
}

export { createDiagnosticCollector, hasErrors } from "./diagnostics.js";
export type { DiagnosticCollector, DiagnosticsSummary } from "./diagnostics.js";
export type {
  AbbreviationResult,
  Diagnostic,
  DiagnosticCode,
  JournalLookup,
  PipelineInput,
  PipelineResult,
  PipelineStats,
  Severity,
  StageName,
} from "./types.js";
