/**
 * LaTeX aux scanner
 *
 * Extracts the citation keys and bibliography databases that a compiled
 * document refers to. Only the lines BibTeX itself reads are considered.
 */

const CITATION_LINE = /^\\citation\{([^}]*)\}\s*$/;
const BIBDATA_LINE = /^\\bibdata\{([^}]*)\}\s*$/;
const INPUT_LINE = /^\\@input\{([^}]*)\}\s*$/;

/** `\nocite{*}` shows up as this citation key. */
export const CITE_ALL = "*";

export interface AuxContents {
  /** Unique citation keys in first-seen order. */
  citations: string[];
  /** Database names as written, without a `.bib` suffix added. */
  bibdata: string[];
  /** Nested aux files pulled in with `\@input` (from `\include`). */
  inputs: string[];
}

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseAux(text: string): AuxContents {
  const citations = new Set<string>();
  const bibdata: string[] = [];
  const inputs: string[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();

    const citation = CITATION_LINE.exec(line);
    if (citation) {
      for (const key of splitList(citation[1] ?? "")) citations.add(key);
      continue;
    }

    const data = BIBDATA_LINE.exec(line);
    if (data) {
      bibdata.push(...splitList(data[1] ?? ""));
      continue;
    }

    const input = INPUT_LINE.exec(line);
    if (input?.[1]) {
      inputs.push(input[1].trim());
    }
  }

  return { citations: [...citations], bibdata, inputs };
}

/**
 * Append `.bib` to a `\bibdata` name unless it is already there.
 */
export function bibFileName(name: string): string {
  return name.endsWith(".bib") ? name : `${name}.bib`;
}
