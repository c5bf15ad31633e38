/**
 * Brace handling for BibTeX field values.
 */

/**
 * Index of the first unbalanced brace, or -1 when braces are balanced.
 * A stray "}" reports its own index; an unclosed "{" reports the index of
 * the outermost one still open at the end.
 */
export function findUnbalancedBrace(value: string): number {
  const open: number[] = [];
  for (let i = 0; i < value.length; i++) {
    const ch = value.charAt(i);
    if (ch === "{") {
      open.push(i);
    } else if (ch === "}") {
      if (open.length === 0) return i;
      open.pop();
    }
  }
  return open.length > 0 ? (open[0] ?? 0) : -1;
}

/**
 * Index of the "}" matching the "{" at `start`, or -1.
 */
function matchingClose(value: string, start: number): number {
  let depth = 0;
  for (let i = start; i < value.length; i++) {
    const ch = value.charAt(i);
    if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Remove brace pairs that enclose the whole (trimmed) value, one layer at
 * a time. Inner groups such as "{DNA} repair" are kept: they protect case.
 * Returns the input untouched when nothing encloses it.
 */
export function stripEnclosingBraces(value: string): string {
  let current = value.trim();
  let stripped = false;
  while (current.startsWith("{") && matchingClose(current, 0) === current.length - 1) {
    current = current.slice(1, -1).trim();
    stripped = true;
  }
  return stripped ? current : value;
}
