import { describe, it, expect } from "vitest";
import { formatDiagnostic, formatSummary, renderJson, renderReport, renderResult } from "../../src/reporter.js";
import type { AuxRunResult } from "../../src/runner.js";

const cwd = "/work";

function brokenResult(): AuxRunResult {
  return {
    aux: "/work/paper.aux",
    status: "broken",
    output: "/work/references.bib",
    changed: true,
    written: true,
    diagnostics: [
      { severity: "error", code: "missing_entry", message: "B is cited but has no entry", key: "B", stage: "usage" },
      { severity: "info", code: "unused_entry", message: "C is not cited; dropped", key: "C", stage: "usage" },
    ],
    stats: { input: 5, afterPolicy: 5, afterDedupe: 4, afterUsage: 3 },
  };
}

describe("formatDiagnostic", () => {
  it("locates the diagnostic by key and field", () => {
    expect(
      formatDiagnostic({ severity: "warning", code: "invalid_doi", message: '"x" is not a DOI', key: "k1", field: "doi" })
    ).toBe('⚠️ warning [invalid_doi] k1.doi: "x" is not a DOI');
    expect(formatDiagnostic({ severity: "error", code: "preamble_not_allowed", message: "dropped" })).toBe(
      "💥 error [preamble_not_allowed]: dropped"
    );
  });
});

describe("formatSummary", () => {
  it("counts diagnostics per severity", () => {
    expect(formatSummary(brokenResult().diagnostics)).toBe("   1 error, 0 warnings, 1 info");
  });
});

describe("renderResult", () => {
  it("lists every diagnostic, the counts and the outcome", () => {
    expect(renderResult(brokenResult(), { cwd })).toEqual([
      "📂 paper.aux",
      "💥 error [missing_entry] B: B is cited but has no entry",
      "ℹ️ info [unused_entry] C: C is not cited; dropped",
      "   5 entries read, 5 after policy, 4 after dedupe, 3 cited",
      "   1 error, 0 warnings, 1 info",
      "💥 Broken bibliography: references.bib",
    ]);
  });

  it("shows only errors and the outcome when quiet", () => {
    expect(renderResult(brokenResult(), { cwd, quiet: true })).toEqual([
      "💥 error [missing_entry] B: B is cited but has no entry",
      "💥 Broken bibliography: references.bib",
    ]);
  });

  it("prints structural errors with their issues", () => {
    const result: AuxRunResult = {
      aux: "/work/paper.aux",
      status: "broken",
      changed: false,
      written: false,
      diagnostics: [],
      error: { schema: "error.v1", code: "BIB_SYNTAX", message: 'refs.bib:3: expected "="' },
    };
    expect(renderResult(result, { cwd })).toEqual(["📂 paper.aux", '💥 BIB_SYNTAX: refs.bib:3: expected "="']);
  });
});

describe("renderReport", () => {
  it("separates files with a blank line and hides quiet skips", () => {
    const skipped: AuxRunResult = {
      aux: "/work/notes.aux",
      status: "skipped",
      changed: false,
      written: false,
      diagnostics: [],
      reason: "no citations",
    };
    const unchanged: AuxRunResult = {
      aux: "/work/thesis.aux",
      status: "unchanged",
      output: "/work/references.bib",
      changed: false,
      written: false,
      diagnostics: [],
      stats: { input: 1, afterPolicy: 1, afterDedupe: 1, afterUsage: 1 },
    };

    expect(renderReport([skipped, unchanged], { cwd })).toBe(
      [
        "📂 notes.aux",
        "❓ Skipped (no citations)",
        "",
        "📂 thesis.aux",
        "   1 entries read, 1 after policy, 1 after dedupe, 1 cited",
        "   0 errors, 0 warnings, 0 info",
        "😀 No changes to references.bib",
      ].join("\n")
    );
    expect(renderReport([skipped, unchanged], { cwd, quiet: true })).toBe("");
  });
});

describe("renderJson", () => {
  it("serialises results with explicit nulls", () => {
    const parsed: unknown = JSON.parse(renderJson([brokenResult()]));
    expect(parsed).toEqual([
      {
        aux: "/work/paper.aux",
        status: "broken",
        output: "/work/references.bib",
        changed: true,
        written: true,
        stats: { input: 5, afterPolicy: 5, afterDedupe: 4, afterUsage: 3 },
        error: null,
        diagnostics: brokenResult().diagnostics,
      },
    ]);
  });
});
