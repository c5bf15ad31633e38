/**
 * Sanitization Pipeline Types
 *
 * StageContext is the single context object passed through the five
 * stages. Each stage owns `entries` while it runs and hands the result on.
 */

import type { Entry } from "../bib/types.js";
import type { PolicyConfig } from "../config/policy.js";
import type { DiagnosticCollector } from "./diagnostics.js";

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export type Severity = "info" | "warning" | "error";

export type DiagnosticCode =
  // Field normalizer
  | "unbalanced_braces"
  | "invalid_doi"
  | "irregular_pages"
  | "journal_lookup_failed"
  // Policy engine
  | "preamble_not_allowed"
  | "type_not_allowed"
  | "unrecognized_type"
  | "field_removed"
  | "missing_required_field"
  // Duplicate resolver
  | "entries_merged"
  | "merge_conflict"
  | "key_collision"
  // Usage filter
  | "unused_entry"
  | "missing_entry";

export type StageName = "policy" | "dedupe" | "usage" | "journals" | "emit";

export interface Diagnostic {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  /** Citation key of the entry concerned, when there is one. */
  key?: string;
  field?: string;
  stage?: StageName;
}

// ---------------------------------------------------------------------------
// Journal abbreviation lookup
// ---------------------------------------------------------------------------

export type AbbreviationResult =
  | { ok: true; abbreviation: string }
  | { ok: false; reason: string };

/**
 * Synchronous view of the abbreviation service. Implementations may also
 * throw; the journals stage treats a throw like `{ ok: false }`.
 */
export type JournalLookup = (journal: string) => AbbreviationResult;

// ---------------------------------------------------------------------------
// Pipeline input / output
// ---------------------------------------------------------------------------

export interface PipelineInput {
  entries: Entry[];
  /** Keys cited by the document. Undefined skips the usage filter. */
  usedKeys?: ReadonlySet<string>;
  config: PolicyConfig;
  journalLookup?: JournalLookup;
}

export interface PipelineResult {
  entries: Entry[];
  output: string;
  diagnostics: Diagnostic[];
  /** True when any diagnostic has error severity. */
  failed: boolean;
  stats: PipelineStats;
}

export interface PipelineStats {
  input: number;
  afterPolicy: number;
  afterDedupe: number;
  afterUsage: number;
}

// ---------------------------------------------------------------------------
// Stage Context
// ---------------------------------------------------------------------------

export interface StageContext {
  // ── Inputs (immutable after init) ──────────────────────────────────────
  readonly config: PolicyConfig;
  readonly usedKeys: ReadonlySet<string> | undefined;
  readonly journalLookup: JournalLookup | undefined;

  // ── Entry set, handed from stage to stage ──────────────────────────────
  entries: Entry[];

  // ── Dedupe outputs ─────────────────────────────────────────────────────
  /** Merged-away key -> key of the surviving merged entry. */
  mergedInto: Map<string, string>;

  // ── Emit outputs ───────────────────────────────────────────────────────
  output: string;

  // ── Cross-cutting ──────────────────────────────────────────────────────
  collector: DiagnosticCollector;
  stats: PipelineStats;
}
