/**
 * Policy configuration
 *
 * Loads the YAML policy file that decides what the sanitization pipeline
 * admits, strips, merges and prunes. The result is a deeply immutable value
 * built once at startup and shared by reference with every stage.
 */

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { z } from "zod";
import { RECOGNIZED_ENTRY_TYPES, type RecognizedEntryType } from "../bib/types.js";
import { PolicyConfigError, formatZodIssues } from "../utils/errors.js";

/** Fields that are never brace-stripped, whatever the configuration says. */
export const DEFAULT_BRACE_EXCEPTIONS = ["author", "editor", "title", "note"] as const;

export const WILDCARD_TYPE = "*";

export const DEFAULT_MARKER_FIELD = "bibgate";

export const DEFAULT_OUTPUT = "references.bib";

export interface CruftRule {
  readonly type: RecognizedEntryType | typeof WILDCARD_TYPE;
  /** Policy tag that must appear in the entry's marker field. */
  readonly policy?: string;
  readonly fields: readonly string[];
}

export interface PolicyConfig {
  /** Undefined means every recognised type is admitted. */
  readonly allowedTypes?: ReadonlySet<RecognizedEntryType>;
  readonly cruft: readonly CruftRule[];
  readonly requiredFields: ReadonlyMap<RecognizedEntryType, readonly string[]>;
  readonly braceExceptions: ReadonlySet<string>;
  readonly markerField: string;
  readonly mergeOnDoi: boolean;
  readonly mergeOnKey: boolean;
  readonly allowPreamble: boolean;
  readonly normalizeWhitespace: boolean;
  readonly normalizeDoi: boolean;
  readonly normalizePages: boolean;
  readonly abbreviateJournals: boolean;
  /** Absolute path of the JSON abbreviation cache, if any. */
  readonly journalCache?: string;
  readonly sort: boolean;
  /** Canonical field order for rendering; unlisted fields keep first-seen order. */
  readonly fieldOrder: readonly string[];
  /** Output file name, relative to the aux file's directory. */
  readonly output: string;
}

const FieldName = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9_:.-]*$/, "not a valid BibTeX field name")
  .transform((name) => name.toLowerCase());

const EntryTypeName = z
  .string()
  .transform((name) => name.trim().toLowerCase())
  .pipe(z.enum(RECOGNIZED_ENTRY_TYPES));

const PolicyTag = z.string().regex(/^[A-Za-z0-9_.:-]+$/, "policy tags may not contain spaces or commas");

const CruftRuleSchema = z
  .object({
    type: z.union([z.literal(WILDCARD_TYPE), EntryTypeName]),
    policy: PolicyTag.optional(),
    fields: z.array(FieldName).min(1),
  })
  .strict();

const PolicyFileSchema = z
  .object({
    allowed_types: z.array(EntryTypeName).min(1).optional(),
    cruft: z.array(CruftRuleSchema).default([]),
    required_fields: z.record(z.string(), z.array(FieldName)).default({}),
    brace_exceptions: z.array(FieldName).default([]),
    marker_field: FieldName.default(DEFAULT_MARKER_FIELD),
    merge_on_doi: z.boolean().default(true),
    merge_on_key: z.boolean().default(true),
    allow_preamble: z.boolean().default(true),
    normalize_whitespace: z.boolean().default(true),
    normalize_doi: z.boolean().default(true),
    normalize_pages: z.boolean().default(true),
    abbreviate_journals: z.boolean().default(false),
    journal_cache: z.string().min(1).optional(),
    sort: z.boolean().default(true),
    field_order: z.array(FieldName).default([]),
    output: z.string().min(1).default(DEFAULT_OUTPUT),
  })
  .strict()
  .superRefine((data, ctx) => {
    for (const type of Object.keys(data.required_fields)) {
      if (!EntryTypeName.safeParse(type).success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["required_fields", type],
          message: `unknown entry type "${type}"`,
        });
      }
    }
    if (data.abbreviate_journals === false && data.journal_cache !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["journal_cache"],
        message: "journal_cache requires abbreviate_journals: true",
      });
    }
  });

export type PolicyFile = z.input<typeof PolicyFileSchema>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Validate parsed YAML data and build the immutable policy.
 *
 * @param baseDir directory that relative paths in the file are resolved against
 * @throws PolicyConfigError listing every invalid option
 */
export function parsePolicyConfig(data: unknown, file?: string, baseDir: string = process.cwd()): PolicyConfig {
  const result = PolicyFileSchema.safeParse(data ?? {});
  if (!result.success) {
    throw new PolicyConfigError(file, "invalid policy configuration", formatZodIssues(result.error));
  }
  const raw = result.data;

  const requiredFields = new Map<RecognizedEntryType, readonly string[]>();
  for (const [type, fields] of Object.entries(raw.required_fields)) {
    const parsed = EntryTypeName.safeParse(type);
    if (parsed.success) requiredFields.set(parsed.data, fields);
  }

  const policy: PolicyConfig = {
    allowedTypes: raw.allowed_types ? new Set(raw.allowed_types) : undefined,
    cruft: raw.cruft.map((rule) => ({ ...rule })),
    requiredFields,
    braceExceptions: new Set([...DEFAULT_BRACE_EXCEPTIONS, ...raw.brace_exceptions]),
    markerField: raw.marker_field,
    mergeOnDoi: raw.merge_on_doi,
    mergeOnKey: raw.merge_on_key,
    allowPreamble: raw.allow_preamble,
    normalizeWhitespace: raw.normalize_whitespace,
    normalizeDoi: raw.normalize_doi,
    normalizePages: raw.normalize_pages,
    abbreviateJournals: raw.abbreviate_journals,
    journalCache: raw.journal_cache === undefined ? undefined : resolve(baseDir, raw.journal_cache),
    sort: raw.sort,
    fieldOrder: raw.field_order,
    output: raw.output,
  };
  // Sets and Maps stay mutable under Object.freeze; callers only see the readonly views.
  return deepFreeze(policy);
}

/** Policy used when no configuration file is given. */
export function defaultPolicyConfig(): PolicyConfig {
  return parsePolicyConfig({});
}

/**
 * Read and validate a YAML policy file. Without a path the defaults apply.
 *
 * @throws PolicyConfigError when the file is unreadable, not YAML, or invalid
 */
export async function loadPolicyConfig(path?: string): Promise<PolicyConfig> {
  if (path === undefined) {
    return defaultPolicyConfig();
  }

  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PolicyConfigError(path, `cannot read policy file (${reason})`);
  }

  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new PolicyConfigError(path, `YAML syntax error: ${error.message}`);
    }
    throw error;
  }

  return parsePolicyConfig(data, path, dirname(resolve(path)));
}
