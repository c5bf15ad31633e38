/**
 * Field Normalizer
 *
 * Cleans a single field value. Pure apart from the journal lookup, which is
 * injected and may fail without affecting anything else.
 */

import type { PolicyConfig } from "../config/policy.js";
import type { AbbreviationResult, Diagnostic, JournalLookup } from "../pipeline/types.js";
import { findUnbalancedBrace, stripEnclosingBraces } from "./braces.js";
import { normalizeDoi } from "./doi.js";
import { normalizePageRange } from "./pages.js";

export interface FieldContext {
  /** Key of the entry the field belongs to, for diagnostics. */
  key?: string;
  journalLookup?: JournalLookup;
}

export interface NormalizedField {
  value: string;
  diagnostics: Diagnostic[];
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Journal names containing a period are taken to be abbreviated already.
 */
export function isAbbreviated(journal: string): boolean {
  return journal.includes(".");
}

function lookupJournal(journal: string, lookup: JournalLookup): AbbreviationResult {
  try {
    return lookup(journal);
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Normalize one field value.
 *
 * Order: brace balance check, whitespace collapse, enclosing-brace strip
 * (skipped for brace exceptions), then the field-specific DOI, page-range
 * and journal rules. An unbalanced value is returned untouched.
 */
export function normalizeField(
  field: string,
  value: string,
  config: PolicyConfig,
  context: FieldContext = {}
): NormalizedField {
  const diagnostics: Diagnostic[] = [];
  const { key } = context;

  const unbalanced = findUnbalancedBrace(value);
  if (unbalanced !== -1) {
    diagnostics.push({
      severity: "error",
      code: "unbalanced_braces",
      message: `unbalanced brace at offset ${unbalanced}; value left unchanged`,
      key,
      field,
    });
    return { value, diagnostics };
  }

  let result = config.normalizeWhitespace ? collapseWhitespace(value) : value;

  if (!config.braceExceptions.has(field)) {
    result = stripEnclosingBraces(result);
  }

  if (field === "doi" && config.normalizeDoi) {
    const doi = normalizeDoi(result);
    if (doi.valid) {
      result = doi.value;
    } else {
      diagnostics.push({
        severity: "warning",
        code: "invalid_doi",
        message: `"${result}" is not a DOI of the form 10.<registrant>/<suffix>`,
        key,
        field,
      });
    }
  }

  if (field === "pages" && config.normalizePages) {
    const pages = normalizePageRange(result);
    if (pages.kind === "irregular") {
      diagnostics.push({
        severity: "warning",
        code: "irregular_pages",
        message: `page range "${result}" has irregular separators; left unchanged`,
        key,
        field,
      });
    } else {
      result = pages.value;
    }
  }

  if (field === "journal") {
    const journal = abbreviateJournal(result, config, context);
    result = journal.value;
    diagnostics.push(...journal.diagnostics);
  }

  return { value: result, diagnostics };
}

/**
 * Replace a cleaned journal name with its abbreviation. Empty, unbalanced
 * and already abbreviated names come back as they are, as does every name
 * when abbreviation is off or no lookup is given.
 */
export function abbreviateJournal(value: string, config: PolicyConfig, context: FieldContext = {}): NormalizedField {
  const { key, journalLookup } = context;
  if (
    !config.abbreviateJournals ||
    journalLookup === undefined ||
    value.length === 0 ||
    isAbbreviated(value) ||
    findUnbalancedBrace(value) !== -1
  ) {
    return { value, diagnostics: [] };
  }

  const lookup = lookupJournal(value, journalLookup);
  if (lookup.ok) {
    return { value: lookup.abbreviation, diagnostics: [] };
  }
  return {
    value,
    diagnostics: [
      {
        severity: "warning",
        code: "journal_lookup_failed",
        message: `could not abbreviate "${value}" (${lookup.reason}); keeping full name`,
        key,
        field: "journal",
      },
    ],
  };
}

/**
 * The name the journal lookup will be asked about for a raw or cleaned
 * `journal` value, or undefined when no lookup would happen.
 */
export function journalLookupName(value: string, config: PolicyConfig): string | undefined {
  if (!config.abbreviateJournals) return undefined;
  const { value: name, diagnostics } = normalizeField("journal", value, config);
  if (diagnostics.length > 0 || name.length === 0 || isAbbreviated(name)) return undefined;
  return name;
}
