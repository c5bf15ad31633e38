/**
 * Bibliography entry model shared by the reader, the sanitization pipeline
 * and the renderer.
 */

/**
 * Entry types bibgate recognises (BibTeX standard types plus the biblatex
 * types commonly found in exported libraries).
 */
export const RECOGNIZED_ENTRY_TYPES = [
  "article",
  "book",
  "booklet",
  "conference",
  "inbook",
  "incollection",
  "inproceedings",
  "manual",
  "mastersthesis",
  "misc",
  "phdthesis",
  "proceedings",
  "techreport",
  "unpublished",
  // biblatex
  "collection",
  "dataset",
  "online",
  "patent",
  "report",
  "software",
  "thesis",
  // pseudo-entry carrying an @preamble block
  "preamble",
] as const;

export type RecognizedEntryType = (typeof RECOGNIZED_ENTRY_TYPES)[number];

export type EntryType =
  | { kind: "recognized"; name: RecognizedEntryType }
  | { kind: "unrecognized"; name: string };

/** Field holding the body of an @preamble pseudo-entry. */
export const PREAMBLE_FIELD = "preamble";

/**
 * One bibliographic record. `fields` preserves insertion order; field names
 * are lowercase.
 */
export interface Entry {
  type: EntryType;
  key: string;
  fields: Map<string, string>;
}

const RECOGNIZED_SET: ReadonlySet<string> = new Set(RECOGNIZED_ENTRY_TYPES);

export function isRecognizedEntryType(name: string): name is RecognizedEntryType {
  return RECOGNIZED_SET.has(name);
}

/**
 * Classify a raw `@type` tag (case-insensitive).
 */
export function classifyEntryType(raw: string): EntryType {
  const name = raw.trim().toLowerCase();
  return isRecognizedEntryType(name) ? { kind: "recognized", name } : { kind: "unrecognized", name };
}

export function isPreamble(entry: Entry): boolean {
  return entry.type.kind === "recognized" && entry.type.name === "preamble";
}

export function makeEntry(type: string, key: string, fields: Iterable<[string, string]> = []): Entry {
  return { type: classifyEntryType(type), key, fields: new Map(fields) };
}

export function cloneEntry(entry: Entry): Entry {
  return { type: { ...entry.type }, key: entry.key, fields: new Map(entry.fields) };
}
