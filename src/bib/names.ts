/**
 * BibTeX name-list helpers used for sorting.
 */

const SPECIAL_LETTERS: Record<string, string> = {
  ß: "ss",
  ø: "o",
  Ø: "O",
  æ: "ae",
  Æ: "AE",
  œ: "oe",
  Œ: "OE",
  ł: "l",
  Ł: "L",
  đ: "d",
  Đ: "D",
  ı: "i",
  þ: "th",
};

const LATEX_LETTERS: Record<string, string> = {
  ss: "ss",
  o: "o",
  O: "O",
  ae: "ae",
  AE: "AE",
  oe: "oe",
  OE: "OE",
  aa: "a",
  AA: "A",
  l: "l",
  L: "L",
  i: "i",
  j: "j",
};

/**
 * Split a string on a separator pattern, ignoring matches inside braces.
 */
function splitTopLevel(value: string, separator: RegExp): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  let i = 0;
  while (i < value.length) {
    const ch = value.charAt(i);
    if (ch === "{") depth++;
    else if (ch === "}") depth = Math.max(0, depth - 1);
    else if (depth === 0) {
      separator.lastIndex = i;
      const match = separator.exec(value);
      if (match && match[0].length > 0) {
        parts.push(value.slice(start, i));
        i += match[0].length;
        start = i;
        continue;
      }
    }
    i++;
  }
  parts.push(value.slice(start));
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

/**
 * Split an author/editor field into individual names.
 */
export function splitNames(value: string): string[] {
  return splitTopLevel(value, /\s+and\s+/iy);
}

/**
 * Family name of a single BibTeX name, including any "von" particle.
 *
 * "Doe, Jane" -> "Doe"; "Jane van Doe" -> "van Doe"; "{ACME Corp.}" -> "{ACME Corp.}"
 */
export function familyName(name: string): string {
  const commaParts = splitTopLevel(name, /,/y);
  if (commaParts.length > 1) {
    return commaParts[0] ?? "";
  }

  const words = splitTopLevel(name, /\s+/y);
  if (words.length <= 1) {
    return words[0] ?? "";
  }

  const vonStart = words.slice(0, -1).findIndex((word, index) => index > 0 && /^[a-z]/.test(word));
  const from = vonStart === -1 ? words.length - 1 : vonStart;
  return words.slice(from).join(" ");
}

/**
 * Locale-independent ASCII folding of a LaTeX-encoded string:
 * accents and braces are removed, special letters are transliterated,
 * and the result is lowercased.
 */
export function asciiFold(value: string): string {
  return value
    .replace(/\\(ss|ae|AE|oe|OE|aa|AA|o|O|l|L|i|j)(?![a-zA-Z])\s*/g, (_match, letter: string) => LATEX_LETTERS[letter] ?? "")
    .replace(/\\[^a-zA-Z\s]/g, "")
    .replace(/\\[a-zA-Z]+\s*/g, "")
    .replace(/[{}]/g, "")
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^\x00-\x7f]/g, (ch) => SPECIAL_LETTERS[ch] ?? "")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

/**
 * Folded family name of the first author, falling back to the first editor.
 * Empty when neither field is present.
 */
export function firstAuthorSortName(fields: ReadonlyMap<string, string>): string {
  const names = fields.get("author") ?? fields.get("editor");
  if (names === undefined) return "";
  const first = splitNames(names)[0];
  return first === undefined ? "" : asciiFold(familyName(first));
}
