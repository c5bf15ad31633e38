/**
 * Stage 1: Policy. Entry-local admission, cruft removal and field cleanup
 *
 * Runs once per entry. Dropped entries leave the pipeline here and are not
 * seen by later stages.
 */

import { isPreamble, type Entry } from "../../bib/types.js";
import { WILDCARD_TYPE, type CruftRule, type PolicyConfig } from "../../config/policy.js";
import { normalizeField } from "../../transforms/field-normalisation.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import type { Diagnostic, StageContext } from "../types.js";

export interface PolicyOutcome {
  /** The cleaned entry, or undefined when policy drops it. */
  entry: Entry | undefined;
  diagnostics: Diagnostic[];
}

/**
 * Policy tags listed in the marker field, e.g. "misc.url, nodoi".
 */
export function policyTags(entry: Entry, markerField: string): Set<string> {
  const raw = entry.fields.get(markerField);
  if (raw === undefined) return new Set();
  return new Set(
    raw
      .replace(/[{}]/g, "")
      .split(/[\s,;]+/)
      .filter((tag) => tag.length > 0)
  );
}

function ruleApplies(rule: CruftRule, entry: Entry, tags: ReadonlySet<string>): boolean {
  const typeMatches = rule.type === WILDCARD_TYPE || (entry.type.kind === "recognized" && entry.type.name === rule.type);
  if (!typeMatches) return false;
  return rule.policy === undefined || tags.has(rule.policy);
}

/**
 * Cruft rules that apply to an entry: type (or wildcard) must match, and a
 * tag-qualified rule additionally needs its tag in the entry's marker field.
 */
export function applicableCruftRules(entry: Entry, config: PolicyConfig): CruftRule[] {
  const tags = policyTags(entry, config.markerField);
  return config.cruft.filter((rule) => ruleApplies(rule, entry, tags));
}

function admit(entry: Entry, config: PolicyConfig, diagnostics: Diagnostic[]): boolean {
  const { type, key } = entry;

  if (type.kind === "unrecognized") {
    if (config.allowedTypes !== undefined) {
      diagnostics.push({
        severity: "error",
        code: "unrecognized_type",
        message: `unrecognized entry type @${type.name}; entry dropped`,
        key,
      });
      return false;
    }
    diagnostics.push({
      severity: "warning",
      code: "unrecognized_type",
      message: `unrecognized entry type @${type.name}`,
      key,
    });
    return true;
  }

  if (config.allowedTypes !== undefined && !config.allowedTypes.has(type.name)) {
    diagnostics.push({
      severity: "info",
      code: "type_not_allowed",
      message: `@${type.name} is not an allowed type; entry dropped`,
      key,
    });
    return false;
  }

  return true;
}

/**
 * Apply the configured policies to one entry, mutating its fields.
 */
export function applyPolicies(entry: Entry, config: PolicyConfig): PolicyOutcome {
  const diagnostics: Diagnostic[] = [];

  if (isPreamble(entry)) {
    if (config.allowPreamble) {
      return { entry, diagnostics };
    }
    diagnostics.push({
      severity: "error",
      code: "preamble_not_allowed",
      message: "@preamble is not allowed; block dropped",
    });
    return { entry: undefined, diagnostics };
  }

  if (!admit(entry, config, diagnostics)) {
    return { entry: undefined, diagnostics };
  }

  const { key } = entry;

  for (const rule of applicableCruftRules(entry, config)) {
    for (const field of rule.fields) {
      if (field !== config.markerField && entry.fields.delete(field)) {
        const scope = rule.policy === undefined ? `@${rule.type}` : `@${rule.type} [${rule.policy}]`;
        diagnostics.push({
          severity: "info",
          code: "field_removed",
          message: `removed ${field} (cruft for ${scope})`,
          key,
          field,
        });
      }
    }
  }
  entry.fields.delete(config.markerField);

  if (entry.type.kind === "recognized") {
    for (const field of config.requiredFields.get(entry.type.name) ?? []) {
      if (!entry.fields.has(field)) {
        diagnostics.push({
          severity: "error",
          code: "missing_required_field",
          message: `@${entry.type.name} requires field ${field}`,
          key,
          field,
        });
      }
    }
  }

  for (const [field, value] of entry.fields) {
    const normalized = normalizeField(field, value, config, { key });
    entry.fields.set(field, normalized.value);
    diagnostics.push(...normalized.diagnostics);
  }

  return { entry, diagnostics };
}

/**
 * Stage 1: run the policy engine over every entry.
 */
export function runStagePolicy(ctx: StageContext): void {
  const start = Date.now();
  const before = ctx.entries.length;
  const kept: Entry[] = [];

  for (const entry of ctx.entries) {
    const outcome = applyPolicies(entry, ctx.config);
    ctx.collector.addAll(outcome.diagnostics);
    if (outcome.entry) kept.push(outcome.entry);
  }

  ctx.entries = kept;
  ctx.stats.afterPolicy = kept.length;

  log.debug({ stage: "policy", before, after: kept.length }, "Policy stage finished");
  emit(TelemetryEvents.StagePolicyCompleted, {
    entries_in: before,
    entries_out: kept.length,
    dropped: before - kept.length,
    duration_ms: Date.now() - start,
  });
}
