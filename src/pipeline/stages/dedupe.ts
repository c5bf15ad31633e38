/**
 * Stage 2: Dedupe. Merges entries that describe the same work
 *
 * Entries sharing a DOI (and, with merge_on_key, entries sharing a key
 * exactly) are merged when their common fields agree. Keys that differ only
 * in letter case are never merged and always reported.
 */

import { isPreamble, type Entry } from "../../bib/types.js";
import type { PolicyConfig } from "../../config/policy.js";
import { normalizeDoi } from "../../transforms/doi.js";
import { collapseWhitespace } from "../../transforms/field-normalisation.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import type { Diagnostic, StageContext } from "../types.js";

export interface DedupeOutcome {
  entries: Entry[];
  diagnostics: Diagnostic[];
  /** Merged-away key -> surviving key. */
  mergedInto: Map<string, string>;
}

/** Pseudo-field reported when group members disagree on the entry type. */
export const ENTRY_TYPE_CONFLICT = "entry type";

// ============================================================================
// Helpers
// ============================================================================

function comparableValue(field: string, value: string): string {
  return field === "doi" ? normalizeDoi(value).value : collapseWhitespace(value);
}

/**
 * Normalized DOI of an entry, or undefined when it has none or it is not a
 * DOI at all (placeholders such as "n/a" never group entries).
 */
export function entryDoi(entry: Entry): string | undefined {
  const raw = entry.fields.get("doi");
  if (raw === undefined) return undefined;
  const doi = normalizeDoi(raw);
  return doi.valid ? doi.value : undefined;
}

/**
 * Fields on which at least two group members hold different values.
 * A type mismatch is reported as {@link ENTRY_TYPE_CONFLICT}.
 */
export function findConflicts(members: readonly Entry[]): string[] {
  const conflicts: string[] = [];

  const types = new Set(members.map((m) => m.type.name));
  if (types.size > 1) conflicts.push(ENTRY_TYPE_CONFLICT);

  const seen = new Map<string, string>();
  for (const member of members) {
    for (const [field, value] of member.fields) {
      const comparable = comparableValue(field, value);
      const previous = seen.get(field);
      if (previous === undefined) {
        seen.set(field, comparable);
      } else if (previous !== comparable && !conflicts.includes(field)) {
        conflicts.push(field);
      }
    }
  }

  return conflicts;
}

/**
 * Shortest key wins; ties go to the lexicographically smallest.
 */
export function chooseMergedKey(keys: readonly string[]): string {
  let best = keys[0] ?? "";
  for (const key of keys.slice(1)) {
    if (key.length < best.length || (key.length === best.length && key < best)) {
      best = key;
    }
  }
  return best;
}

function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function fieldText(entry: Entry): string {
  return [...entry.fields].map(([field, value]) => `${field}=${value}`).join("\n");
}

/**
 * Input-independent member order: most fields first, then by key, then by
 * field text.
 */
function compareMembers(a: Entry, b: Entry): number {
  return (
    b.fields.size - a.fields.size || compareCodeUnits(a.key, b.key) || compareCodeUnits(fieldText(a), fieldText(b))
  );
}

/**
 * Merge compatible entries. Fields are the union over the members taken in
 * {@link compareMembers} order, so the result does not depend on which
 * member the input listed first.
 */
export function mergeEntries(members: readonly Entry[]): Entry {
  const ordered = [...members].sort(compareMembers);
  const [first] = ordered;
  if (first === undefined) {
    throw new Error("mergeEntries requires at least one entry");
  }
  const fields = new Map<string, string>();
  for (const member of ordered) {
    for (const [field, value] of member.fields) {
      if (!fields.has(field)) fields.set(field, value);
    }
  }
  return {
    type: { ...first.type },
    key: chooseMergedKey(members.map((m) => m.key)),
    fields,
  };
}

function uniqueKeys(members: readonly Entry[]): string[] {
  return [...new Set(members.map((m) => m.key))];
}

function groupBy<K>(slots: ReadonlyArray<Entry | undefined>, keyOf: (entry: Entry) => K | undefined): Map<K, number[]> {
  const groups = new Map<K, number[]>();
  slots.forEach((entry, index) => {
    if (entry === undefined || isPreamble(entry)) return;
    const groupKey = keyOf(entry);
    if (groupKey === undefined) return;
    const group = groups.get(groupKey);
    if (group) group.push(index);
    else groups.set(groupKey, [index]);
  });
  return groups;
}

// ============================================================================
// Resolver
// ============================================================================

interface MergePass {
  reason: (shared: string) => string;
  keyOf: (entry: Entry) => string | undefined;
}

/** Slot index -> id of the conflicting group it was reported in. */
type ConflictGroups = Map<number, number>;

function reportedTogether(indices: readonly number[], conflicts: ConflictGroups): boolean {
  const [head, ...rest] = indices;
  const group = head === undefined ? undefined : conflicts.get(head);
  return group !== undefined && rest.every((index) => conflicts.get(index) === group);
}

/**
 * Merge every group of a pass in place. The merged entry takes the slot of
 * the group's first member; the other slots are emptied. Groups whose
 * members were all reported in one conflict by an earlier pass are skipped.
 *
 * @returns the conflicting groups of this pass
 */
function runMergePass(
  slots: Array<Entry | undefined>,
  pass: MergePass,
  diagnostics: Diagnostic[],
  mergedInto: Map<string, string>,
  earlier: ConflictGroups = new Map()
): ConflictGroups {
  const conflicting: ConflictGroups = new Map();
  let groupId = 0;

  for (const [shared, indices] of groupBy(slots, pass.keyOf)) {
    if (indices.length < 2 || reportedTogether(indices, earlier)) continue;

    const members = indices.map((i) => slots[i]).filter((e): e is Entry => e !== undefined);
    const keys = uniqueKeys(members);
    const conflicts = findConflicts(members);

    if (conflicts.length > 0) {
      for (const field of conflicts) {
        diagnostics.push({
          severity: "error",
          code: "merge_conflict",
          message: `cannot merge ${keys.join(", ")} (${pass.reason(shared)}): they disagree on ${field}`,
          key: chooseMergedKey(keys),
          field: field === ENTRY_TYPE_CONFLICT ? undefined : field,
        });
      }
      for (const index of indices) conflicting.set(index, groupId);
      groupId += 1;
      continue;
    }

    const merged = mergeEntries(members);
    for (const key of keys) {
      if (key !== merged.key) mergedInto.set(key, merged.key);
    }
    const [head, ...rest] = indices;
    if (head !== undefined) slots[head] = merged;
    for (const index of rest) slots[index] = undefined;

    diagnostics.push({
      severity: "info",
      code: "entries_merged",
      message:
        keys.length > 1
          ? `merged ${keys.join(", ")} into ${merged.key} (${pass.reason(shared)})`
          : `merged ${members.length} copies of ${merged.key} (${pass.reason(shared)})`,
      key: merged.key,
    });
  }

  return conflicting;
}

/**
 * Report every pair of entries whose keys differ only in case (and, when
 * merging on key is off, every pair whose keys are identical).
 */
function reportKeyCollisions(entries: readonly Entry[], config: PolicyConfig, diagnostics: Diagnostic[]): void {
  const byFoldedKey = groupBy(entries, (entry) => entry.key.toLowerCase());

  for (const indices of byFoldedKey.values()) {
    const group = indices.map((i) => entries[i]).filter((e): e is Entry => e !== undefined);
    for (const [i, a] of group.entries()) {
      for (const b of group.slice(i + 1)) {
        if (a.key === b.key) {
          // Identical keys that could not merge were reported as a conflict.
          if (config.mergeOnKey) continue;
          diagnostics.push({
            severity: "error",
            code: "key_collision",
            message: `duplicate key ${a.key}`,
            key: a.key,
          });
        } else {
          diagnostics.push({
            severity: "error",
            code: "key_collision",
            message: `keys ${a.key} and ${b.key} differ only in letter case`,
            key: a.key,
          });
        }
      }
    }
  }
}

/**
 * Merge duplicate entries and report key collisions. Order is preserved;
 * a merged entry appears where its first member was.
 */
export function resolveDuplicates(entries: readonly Entry[], config: PolicyConfig): DedupeOutcome {
  const diagnostics: Diagnostic[] = [];
  const mergedInto = new Map<string, string>();
  const slots: Array<Entry | undefined> = [...entries];

  const doiConflicts = config.mergeOnDoi
    ? runMergePass(slots, { keyOf: entryDoi, reason: (doi) => `same DOI ${doi}` }, diagnostics, mergedInto)
    : new Map<number, number>();
  if (config.mergeOnKey) {
    runMergePass(
      slots,
      { keyOf: (entry) => entry.key, reason: () => "same key" },
      diagnostics,
      mergedInto,
      doiConflicts
    );
  }

  const resolved = slots.filter((entry): entry is Entry => entry !== undefined);
  reportKeyCollisions(resolved, config, diagnostics);

  return { entries: resolved, diagnostics, mergedInto };
}

/**
 * Stage 2: resolve duplicates across the policy-cleaned set.
 */
export function runStageDedupe(ctx: StageContext): void {
  const start = Date.now();
  const before = ctx.entries.length;
  const outcome = resolveDuplicates(ctx.entries, ctx.config);

  ctx.entries = outcome.entries;
  ctx.collector.addAll(outcome.diagnostics);
  for (const [from, to] of outcome.mergedInto) ctx.mergedInto.set(from, to);
  ctx.stats.afterDedupe = outcome.entries.length;

  log.debug({ stage: "dedupe", before, after: outcome.entries.length }, "Dedupe stage finished");
  emit(TelemetryEvents.StageDedupeCompleted, {
    entries_in: before,
    entries_out: outcome.entries.length,
    merged_keys: outcome.mergedInto.size,
    conflicts: outcome.diagnostics.filter((d) => d.code === "merge_conflict").length,
    collisions: outcome.diagnostics.filter((d) => d.code === "key_collision").length,
    duration_ms: Date.now() - start,
  });
}
