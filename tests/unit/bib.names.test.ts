import { describe, it, expect } from "vitest";
import { asciiFold, familyName, firstAuthorSortName, splitNames } from "../../src/bib/names.js";

describe("splitNames", () => {
  it("splits on 'and' outside braces only", () => {
    expect(splitNames("Doe, Jane and {Smith and Sons} AND Roe, R.")).toEqual([
      "Doe, Jane",
      "{Smith and Sons}",
      "Roe, R.",
    ]);
  });
});

describe("familyName", () => {
  it("handles the comma form", () => {
    expect(familyName("van der Berg, Anna")).toBe("van der Berg");
  });

  it("handles the first-last form with and without a von particle", () => {
    expect(familyName("Jane Doe")).toBe("Doe");
    expect(familyName("Ludwig van Beethoven")).toBe("van Beethoven");
  });

  it("keeps a braced corporate name whole", () => {
    expect(familyName("{ACME Corp.}")).toBe("{ACME Corp.}");
  });
});

describe("asciiFold", () => {
  it("removes LaTeX accents, Unicode accents and braces", () => {
    expect(asciiFold("M{\\\"u}ller")).toBe("muller");
    expect(asciiFold("Müller")).toBe("muller");
    expect(asciiFold("{\\O}stergaard")).toBe("ostergaard");
    expect(asciiFold("Gauß")).toBe("gauss");
  });
});

describe("firstAuthorSortName", () => {
  it("uses the first author, falling back to the first editor", () => {
    expect(firstAuthorSortName(new Map([["author", "{\\'E}mile Zola and Doe, J."]]))).toBe("zola");
    expect(firstAuthorSortName(new Map([["editor", "Roe, Richard"]]))).toBe("roe");
    expect(firstAuthorSortName(new Map([["title", "Anonymous"]]))).toBe("");
  });
});
