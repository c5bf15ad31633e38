/**
 * Field value transforms used by the policy stage.
 */

export { findUnbalancedBrace, stripEnclosingBraces } from "./braces.js";
export { normalizeDoi, type NormalizedDoi } from "./doi.js";
export { normalizePageRange, type PageRange } from "./pages.js";
export {
  normalizeField,
  abbreviateJournal,
  collapseWhitespace,
  isAbbreviated,
  journalLookupName,
  type FieldContext,
  type NormalizedField,
} from "./field-normalisation.js";
