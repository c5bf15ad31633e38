import { describe, it, expect } from "vitest";
import { makeEntry } from "../../src/bib/types.js";
import { filterByUsage } from "../../src/pipeline/stages/usage.js";

describe("filterByUsage", () => {
  it("keeps cited entries and reports cited keys without an entry", () => {
    const entries = [makeEntry("article", "A", [["title", "Cited"]])];

    const { entries: kept, diagnostics } = filterByUsage(entries, new Set(["A", "B"]));

    expect(kept.map((e) => e.key)).toEqual(["A"]);
    expect(diagnostics).toEqual([
      { severity: "error", code: "missing_entry", message: "B is cited but has no entry", key: "B" },
    ]);
  });

  it("drops uncited entries with an info diagnostic", () => {
    const entries = [makeEntry("article", "A"), makeEntry("book", "C")];

    const { entries: kept, diagnostics } = filterByUsage(entries, new Set(["A"]));

    expect(kept.map((e) => e.key)).toEqual(["A"]);
    expect(diagnostics).toEqual([
      { severity: "info", code: "unused_entry", message: "C is not cited; dropped", key: "C" },
    ]);
  });

  it("matches keys exactly, including case", () => {
    const { entries: kept, diagnostics } = filterByUsage([makeEntry("misc", "Key")], new Set(["key"]));
    expect(kept).toEqual([]);
    expect(diagnostics.map((d) => d.code)).toEqual(["unused_entry", "missing_entry"]);
  });

  it("points a citation of a merged-away key at the surviving entry", () => {
    const { diagnostics } = filterByUsage(
      [makeEntry("article", "Smith20")],
      new Set(["Smith20", "smith2020"]),
      new Map([["smith2020", "Smith20"]])
    );
    expect(diagnostics).toEqual([
      {
        severity: "error",
        code: "missing_entry",
        message: "smith2020 is cited but was merged into Smith20; cite Smith20 instead",
        key: "smith2020",
      },
    ]);
  });

  it("keeps everything for \\nocite{*}", () => {
    const entries = [makeEntry("article", "A"), makeEntry("book", "C")];
    const { entries: kept, diagnostics } = filterByUsage(entries, new Set(["*"]));
    expect(kept.map((e) => e.key)).toEqual(["A", "C"]);
    expect(diagnostics).toEqual([]);
  });

  it("always keeps preambles", () => {
    const entries = [makeEntry("preamble", "preamble-1", [["preamble", "\\foo"]]), makeEntry("misc", "x")];
    const { entries: kept } = filterByUsage(entries, new Set<string>());
    expect(kept.map((e) => e.key)).toEqual(["preamble-1"]);
  });
});
