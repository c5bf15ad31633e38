import { describe, it, expect } from "vitest";
import { makeEntry, type Entry } from "../../src/bib/types.js";
import { defaultPolicyConfig, parsePolicyConfig } from "../../src/config/policy.js";
import {
  chooseMergedKey,
  ENTRY_TYPE_CONFLICT,
  findConflicts,
  mergeEntries,
  resolveDuplicates,
} from "../../src/pipeline/stages/dedupe.js";

const defaults = defaultPolicyConfig();

function keysOf(entries: readonly Entry[]): string[] {
  return entries.map((e) => e.key);
}

describe("chooseMergedKey", () => {
  it("prefers the shortest key, then the lexicographically smallest", () => {
    expect(chooseMergedKey(["smith2020nature", "Smith20", "smith20x"])).toBe("Smith20");
    expect(chooseMergedKey(["b2020", "a2020"])).toBe("a2020");
  });
});

describe("findConflicts", () => {
  it("compares values after whitespace collapse and DOI normalization", () => {
    const a = makeEntry("article", "a", [["title", "Deep  learning"], ["doi", "10.1000/ABC"]]);
    const b = makeEntry("article", "b", [["title", "Deep learning"], ["doi", "https://doi.org/10.1000/abc"]]);
    expect(findConflicts([a, b])).toEqual([]);
  });

  it("names every disagreeing field and type mismatches", () => {
    const a = makeEntry("article", "a", [["year", "2020"], ["volume", "3"]]);
    const b = makeEntry("inproceedings", "b", [["year", "2021"], ["volume", "4"]]);
    expect(findConflicts([a, b])).toEqual([ENTRY_TYPE_CONFLICT, "year", "volume"]);
  });
});

describe("mergeEntries", () => {
  it("unions fields with equal-size members taken in key order", () => {
    const merged = mergeEntries([
      makeEntry("article", "long-key", [["title", "T"], ["doi", "10.1/x"]]),
      makeEntry("article", "k", [["doi", "10.1/x"], ["pages", "1--2"]]),
    ]);
    expect(merged.key).toBe("k");
    expect([...merged.fields]).toEqual([
      ["doi", "10.1/x"],
      ["pages", "1--2"],
      ["title", "T"],
    ]);
  });

  it("starts from the member with the most fields", () => {
    const merged = mergeEntries([
      makeEntry("article", "a", [["doi", "10.1/x"]]),
      makeEntry("article", "b", [["year", "2020"], ["doi", "10.1/x"]]),
    ]);
    expect(merged.key).toBe("a");
    expect([...merged.fields]).toEqual([
      ["year", "2020"],
      ["doi", "10.1/x"],
    ]);
  });

  it("gives the same result whatever the member order", () => {
    const one = makeEntry("article", "k", [["doi", "10.1/x"], ["journal", "Nature"]]);
    const two = makeEntry("article", "k", [["doi", "10.1/x"], ["author", "Doe, J."]]);

    const forward = mergeEntries([one, two]);
    const backward = mergeEntries([two, one]);

    expect([...backward.fields]).toEqual([...forward.fields]);
    expect([...forward.fields]).toEqual([
      ["doi", "10.1/x"],
      ["author", "Doe, J."],
      ["journal", "Nature"],
    ]);
  });
});

describe("resolveDuplicates", () => {
  it("merges entries sharing a DOI into one with the union of fields", () => {
    const entries = [
      makeEntry("article", "smith2020", [["doi", "10.1000/abc"], ["journal", "Nature"]]),
      makeEntry("article", "other", [["title", "Unrelated"]]),
      makeEntry("article", "Smith20", [["doi", "10.1000/abc"], ["year", "2020"]]),
    ];

    const result = resolveDuplicates(entries, defaults);

    expect(keysOf(result.entries)).toEqual(["Smith20", "other"]);
    expect([...(result.entries[0]?.fields ?? [])]).toEqual([
      ["doi", "10.1000/abc"],
      ["year", "2020"],
      ["journal", "Nature"],
    ]);
    expect(result.mergedInto).toEqual(new Map([["smith2020", "Smith20"]]));
    expect(result.diagnostics).toEqual([
      {
        severity: "info",
        code: "entries_merged",
        message: "merged smith2020, Smith20 into Smith20 (same DOI 10.1000/abc)",
        key: "Smith20",
      },
    ]);
  });

  it("reports a conflict and keeps both entries when a shared DOI disagrees on a field", () => {
    const entries = [
      makeEntry("article", "x1", [["doi", "10.1000/abc"], ["year", "2019"]]),
      makeEntry("article", "x2", [["doi", "10.1000/abc"], ["year", "2020"]]),
    ];

    const result = resolveDuplicates(entries, defaults);

    expect(keysOf(result.entries)).toEqual(["x1", "x2"]);
    expect(result.mergedInto.size).toBe(0);
    expect(result.diagnostics).toEqual([
      {
        severity: "error",
        code: "merge_conflict",
        message: "cannot merge x1, x2 (same DOI 10.1000/abc): they disagree on year",
        key: "x1",
        field: "year",
      },
    ]);
  });

  it("keeps keys that differ only in case and reports one collision", () => {
    const entries = [
      makeEntry("article", "Doe20", [["year", "2020"], ["author", "Doe, J."]]),
      makeEntry("article", "doe20", [["year", "2020"], ["doi", "10.1/X"]]),
    ];

    const result = resolveDuplicates(entries, defaults);

    expect(keysOf(result.entries)).toEqual(["Doe20", "doe20"]);
    expect(result.diagnostics).toEqual([
      {
        severity: "error",
        code: "key_collision",
        message: "keys Doe20 and doe20 differ only in letter case",
        key: "Doe20",
      },
    ]);
  });

  it("merges identical keys when merge_on_key is set", () => {
    const entries = [
      makeEntry("book", "knuth84", [["title", "The TeXbook"]]),
      makeEntry("book", "knuth84", [["title", "The  TeXbook"], ["publisher", "Addison-Wesley"]]),
    ];

    const result = resolveDuplicates(entries, defaults);

    expect(result.entries).toHaveLength(1);
    expect([...(result.entries[0]?.fields ?? [])]).toEqual([
      ["title", "The  TeXbook"],
      ["publisher", "Addison-Wesley"],
    ]);
    expect(result.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["entries_merged", "merged 2 copies of knuth84 (same key)"],
    ]);
    expect(result.mergedInto.size).toBe(0);
  });

  it("reports identical keys as collisions when merge_on_key is off", () => {
    const config = parsePolicyConfig({ merge_on_key: false });
    const entries = [makeEntry("book", "k", [["title", "A"]]), makeEntry("book", "k", [["title", "A"]])];

    const result = resolveDuplicates(entries, config);

    expect(result.entries).toHaveLength(2);
    expect(result.diagnostics).toEqual([
      { severity: "error", code: "key_collision", message: "duplicate key k", key: "k" },
    ]);
  });

  it("does not merge on DOI when merge_on_doi is off", () => {
    const config = parsePolicyConfig({ merge_on_doi: false });
    const entries = [
      makeEntry("article", "a", [["doi", "10.1/x"]]),
      makeEntry("article", "b", [["doi", "10.1/x"]]),
    ];
    const result = resolveDuplicates(entries, config);
    expect(keysOf(result.entries)).toEqual(["a", "b"]);
    expect(result.diagnostics).toEqual([]);
  });

  it("reports a type mismatch as a conflict on the entry type", () => {
    const entries = [
      makeEntry("article", "p1", [["doi", "10.1/x"]]),
      makeEntry("inproceedings", "p2", [["doi", "10.1/x"]]),
    ];
    const [diagnostic] = resolveDuplicates(entries, defaults).diagnostics;
    expect(diagnostic?.code).toBe("merge_conflict");
    expect(diagnostic?.field).toBeUndefined();
    expect(diagnostic?.message).toBe("cannot merge p1, p2 (same DOI 10.1/x): they disagree on entry type");
  });

  it("reports a shared-DOI conflict once when the keys are identical too", () => {
    const entries = [
      makeEntry("article", "X", [["doi", "10.1/x"], ["journal", "Nature"]]),
      makeEntry("article", "X", [["doi", "10.1/x"], ["journal", "Science"]]),
    ];

    const result = resolveDuplicates(entries, defaults);

    expect(result.entries).toHaveLength(2);
    expect(result.diagnostics).toEqual([
      {
        severity: "error",
        code: "merge_conflict",
        message: "cannot merge X (same DOI 10.1/x): they disagree on journal",
        key: "X",
        field: "journal",
      },
    ]);
  });

  it("still merges on key when only part of a DOI conflict shares the key", () => {
    const entries = [
      makeEntry("article", "X", [["doi", "10.1/x"], ["year", "2019"]]),
      makeEntry("article", "Y", [["doi", "10.1/x"], ["year", "2020"]]),
      makeEntry("article", "X", [["title", "Extra"]]),
    ];

    const result = resolveDuplicates(entries, defaults);

    expect(result.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["merge_conflict", "cannot merge X, Y (same DOI 10.1/x): they disagree on year"],
      ["entries_merged", "merged 2 copies of X (same key)"],
    ]);
    expect(keysOf(result.entries)).toEqual(["X", "Y"]);
  });

  it("does not group entries whose DOI is not a DOI", () => {
    const entries = [
      makeEntry("article", "P", [["doi", "n/a"], ["title", "One"]]),
      makeEntry("article", "Q", [["doi", "n/a"], ["title", "Two"]]),
    ];

    const result = resolveDuplicates(entries, defaults);

    expect(keysOf(result.entries)).toEqual(["P", "Q"]);
    expect(result.diagnostics).toEqual([]);
  });

  it("leaves preambles alone", () => {
    const entries = [
      makeEntry("preamble", "preamble-1", [["preamble", "\\foo"]]),
      makeEntry("preamble", "preamble-1", [["preamble", "\\bar"]]),
    ];
    const result = resolveDuplicates(entries, defaults);
    expect(result.entries).toHaveLength(2);
    expect(result.diagnostics).toEqual([]);
  });
});
