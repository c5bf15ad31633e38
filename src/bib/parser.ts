/**
 * BibTeX reader
 *
 * Turns `.bib` source text into Entry records. Handles braced, quoted,
 * numeric and macro values, `#` concatenation, `@string` definitions,
 * `@comment` blocks and `@preamble` blocks. Text between entries is ignored,
 * as BibTeX itself does.
 */

import { BibSyntaxError } from "../utils/errors.js";
import { PREAMBLE_FIELD, makeEntry, type Entry } from "./types.js";

const MONTH_MACROS: ReadonlyArray<[string, string]> = [
  ["jan", "January"],
  ["feb", "February"],
  ["mar", "March"],
  ["apr", "April"],
  ["may", "May"],
  ["jun", "June"],
  ["jul", "July"],
  ["aug", "August"],
  ["sep", "September"],
  ["oct", "October"],
  ["nov", "November"],
  ["dec", "December"],
];

const IDENT_CHAR = /[^\s"#%'(),={}]/;
const ENTRY_START = /@\s*([A-Za-z][A-Za-z0-9_-]*)\s*[{(]/y;

export interface ParseOptions {
  /** Source name used in error messages. */
  file?: string;
  /** Macros defined by earlier files (shared across a multi-file load). */
  macros?: Map<string, string>;
}

export interface ParsedBibliography {
  entries: Entry[];
  macros: Map<string, string>;
}

class Scanner {
  pos = 0;

  constructor(
    readonly text: string,
    readonly file: string | undefined
  ) {}

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.pos);
  }

  line(at: number = this.pos): number {
    let line = 1;
    for (let i = 0; i < at && i < this.text.length; i++) {
      if (this.text.charCodeAt(i) === 10) line++;
    }
    return line;
  }

  fail(message: string, at: number = this.pos): never {
    throw new BibSyntaxError(this.file, this.line(at), message);
  }

  skipWhitespace(): void {
    while (!this.done && /\s/.test(this.peek())) this.pos++;
  }

  expect(char: string): void {
    this.skipWhitespace();
    if (this.peek() !== char) {
      this.fail(`expected "${char}" but found ${this.done ? "end of input" : `"${this.peek()}"`}`);
    }
    this.pos++;
  }

  identifier(what: string): string {
    this.skipWhitespace();
    const start = this.pos;
    while (!this.done && IDENT_CHAR.test(this.peek())) this.pos++;
    if (this.pos === start) this.fail(`expected ${what}`);
    return this.text.slice(start, this.pos);
  }

  /** Reads `{...}` and returns the content between the outer braces. */
  braced(): string {
    const open = this.pos;
    this.pos++;
    let depth = 1;
    while (!this.done) {
      const ch = this.peek();
      if (ch === "{") depth++;
      else if (ch === "}") {
        depth--;
        if (depth === 0) {
          this.pos++;
          return this.text.slice(open + 1, this.pos - 1);
        }
      }
      this.pos++;
    }
    return this.fail("unterminated braced value", open);
  }

  /** Reads `"..."`; quotes inside braces do not terminate the value. */
  quoted(): string {
    const open = this.pos;
    this.pos++;
    let depth = 0;
    while (!this.done) {
      const ch = this.peek();
      if (ch === "{") depth++;
      else if (ch === "}") depth--;
      else if (ch === '"' && depth === 0) {
        this.pos++;
        return this.text.slice(open + 1, this.pos - 1);
      }
      this.pos++;
    }
    return this.fail("unterminated quoted value", open);
  }
}

function readValue(scanner: Scanner, macros: Map<string, string>): string {
  const parts: string[] = [];
  for (;;) {
    scanner.skipWhitespace();
    const ch = scanner.peek();
    if (ch === "{") {
      parts.push(scanner.braced());
    } else if (ch === '"') {
      parts.push(scanner.quoted());
    } else if (/[0-9]/.test(ch)) {
      const start = scanner.pos;
      while (!scanner.done && /[0-9]/.test(scanner.peek())) scanner.pos++;
      parts.push(scanner.text.slice(start, scanner.pos));
    } else {
      const name = scanner.identifier("field value");
      parts.push(macros.get(name.toLowerCase()) ?? name);
    }
    scanner.skipWhitespace();
    if (scanner.peek() !== "#") break;
    scanner.pos++;
  }
  return parts.join("");
}

function closingFor(open: string): string {
  return open === "(" ? ")" : "}";
}

function readOpening(scanner: Scanner): string {
  scanner.skipWhitespace();
  const open = scanner.peek();
  if (open !== "{" && open !== "(") {
    scanner.fail(`expected "{" or "(" after entry type`);
  }
  scanner.pos++;
  return closingFor(open);
}

function readFields(scanner: Scanner, close: string, macros: Map<string, string>): Array<[string, string]> {
  const fields: Array<[string, string]> = [];
  for (;;) {
    scanner.skipWhitespace();
    if (scanner.peek() === close) {
      scanner.pos++;
      return fields;
    }
    const name = scanner.identifier("field name").toLowerCase();
    scanner.expect("=");
    fields.push([name, readValue(scanner, macros)]);
    scanner.skipWhitespace();
    if (scanner.peek() === ",") {
      scanner.pos++;
    } else if (scanner.peek() !== close) {
      scanner.fail(`expected "," or "${close}" after field "${name}"`);
    }
  }
}

/**
 * Parse BibTeX source text into entries.
 *
 * @throws BibSyntaxError on malformed input
 */
export function parseBibtex(text: string, options: ParseOptions = {}): ParsedBibliography {
  const scanner = new Scanner(text, options.file);
  const macros = new Map<string, string>(options.macros ?? MONTH_MACROS);
  const entries: Entry[] = [];
  let preambles = 0;

  while (!scanner.done) {
    const at = text.indexOf("@", scanner.pos);
    if (at === -1) break;

    // An "@" not followed by `type{` or `type(` is free text (e.g. an e-mail address)
    ENTRY_START.lastIndex = at;
    const start = ENTRY_START.exec(text);
    if (!start) {
      scanner.pos = at + 1;
      continue;
    }
    const type = (start[1] ?? "").toLowerCase();
    scanner.pos = at + start[0].length - 1;

    if (type === "comment") {
      if (scanner.peek() === "{") scanner.braced();
      else scanner.pos++;
      continue;
    }

    const close = readOpening(scanner);

    if (type === "string") {
      for (const [name, value] of readFields(scanner, close, macros)) {
        macros.set(name, value);
      }
      continue;
    }

    if (type === "preamble") {
      const value = readValue(scanner, macros);
      scanner.expect(close);
      preambles++;
      entries.push(makeEntry("preamble", `preamble-${preambles}`, [[PREAMBLE_FIELD, value]]));
      continue;
    }

    const keyStart = scanner.pos;
    scanner.skipWhitespace();
    const key = scanner.identifier("citation key");
    scanner.skipWhitespace();
    if (scanner.peek() === ",") {
      scanner.pos++;
    } else if (scanner.peek() !== close) {
      scanner.fail(`expected "," after citation key "${key}"`, keyStart);
    }

    const fields = readFields(scanner, close, macros);
    entries.push(makeEntry(type, key, fields));
  }

  return { entries, macros };
}
