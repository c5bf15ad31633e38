/**
 * bibgate library entry point.
 *
 * The sanitization core (`runSanitizePipeline` and the per-stage functions)
 * is synchronous and free of I/O; `processAux` adds aux/bib loading, journal
 * prefetching and the output write on top.
 */

// Pipeline
export { runSanitizePipeline, selectOutputEntries, createDiagnosticCollector, hasErrors } from "./pipeline/index.js";
export type {
  AbbreviationResult,
  Diagnostic,
  DiagnosticCode,
  DiagnosticCollector,
  DiagnosticsSummary,
  JournalLookup,
  PipelineInput,
  PipelineResult,
  PipelineStats,
  Severity,
  StageName,
} from "./pipeline/index.js";
export { applyPolicies, applicableCruftRules, policyTags } from "./pipeline/stages/policy.js";
export { resolveDuplicates, mergeEntries, chooseMergedKey, findConflicts } from "./pipeline/stages/dedupe.js";
export { filterByUsage } from "./pipeline/stages/usage.js";
export { abbreviateJournals } from "./pipeline/stages/journals.js";
export { sortAndRender, sortEntries, renderBibliography, renderEntry, compareEntries } from "./pipeline/stages/emit.js";

// Field normalization
export { abbreviateJournal, normalizeField } from "./transforms/field-normalisation.js";
export { normalizeDoi } from "./transforms/doi.js";
export { normalizePageRange } from "./transforms/pages.js";

// BibTeX model and readers
export { makeEntry, cloneEntry, classifyEntryType, isPreamble, RECOGNIZED_ENTRY_TYPES } from "./bib/types.js";
export type { Entry, EntryType, RecognizedEntryType } from "./bib/types.js";
export { parseBibtex } from "./bib/parser.js";
export type { ParseOptions, ParsedBibliography } from "./bib/parser.js";
export { parseAux, CITE_ALL } from "./bib/aux.js";
export type { AuxContents } from "./bib/aux.js";

// Configuration
export { loadPolicyConfig, parsePolicyConfig, defaultPolicyConfig } from "./config/policy.js";
export type { CruftRule, PolicyConfig } from "./config/policy.js";

// Journal abbreviations
export { JournalCache, prefetchAbbreviations, fetchAbbreviation, createAbbreviationClient } from "./journal/index.js";
export type { AbbreviationFetcher, PrefetchResult } from "./journal/index.js";

// Runner
export { processAux, processAll, overallExitCode, EXIT_OK, EXIT_CHANGED, EXIT_BROKEN } from "./runner.js";
export type { AuxRunResult, AuxStatus, RunOptions } from "./runner.js";

// Errors
export { PolicyConfigError, BibSyntaxError, AuxFileError, JournalLookupError, toErrorV1 } from "./utils/errors.js";
export type { ErrorCode, ErrorV1 } from "./utils/errors.js";

export { BIBGATE_VERSION } from "./version.js";
