/**
 * Runner. Processes one LaTeX aux file end to end.
 *
 * Loads the cited keys and bibliography databases, prefetches journal
 * abbreviations, runs the sanitization pipeline and writes the result next
 * to the aux file. Does not print; the CLI reports the returned result.
 */

import { dirname, relative, resolve } from "node:path";
import { bibFileName } from "./bib/aux.js";
import { parseBibtex } from "./bib/parser.js";
import type { Entry } from "./bib/types.js";
import type { PolicyConfig } from "./config/policy.js";
import { hashContent, readAuxTree, readTextIfExists, writeIfChanged } from "./io.js";
import { createAbbreviationClient, JournalCache, prefetchAbbreviations, type AbbreviationFetcher } from "./journal/index.js";
import { runSanitizePipeline, selectOutputEntries } from "./pipeline/index.js";
import type { Diagnostic, JournalLookup, PipelineStats } from "./pipeline/types.js";
import { AuxFileError, toErrorV1, type ErrorV1 } from "./utils/errors.js";
import { emit, log, TelemetryEvents } from "./utils/telemetry.js";

// =============================================================================
// Exit codes
// =============================================================================

export const EXIT_OK = 0;
export const EXIT_CHANGED = 1;
export const EXIT_BROKEN = 2;

// =============================================================================
// Runner input / output types
// =============================================================================

/**
 * - skipped: nothing cited or no `\bibdata`; nothing written
 * - unchanged: output already up to date
 * - changed: output (re)written, or would be with --dry-run
 * - broken: error diagnostics or a structural error
 */
export type AuxStatus = "skipped" | "unchanged" | "changed" | "broken";

export interface RunOptions {
  config: PolicyConfig;
  /** Compute everything but write nothing. */
  dryRun?: boolean;
  /** Abbreviation service; defaults to the undici client. */
  fetcher?: AbbreviationFetcher;
}

export interface AuxRunResult {
  aux: string;
  status: AuxStatus;
  /** Absolute path of the rendered bibliography. */
  output?: string;
  /** True when the output differs from what is on disk. */
  changed: boolean;
  written: boolean;
  diagnostics: Diagnostic[];
  stats?: PipelineStats;
  /** Structural error that stopped the run before rendering. */
  error?: ErrorV1;
  /** Why the file was skipped. */
  reason?: string;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Parse every database named by `\bibdata`, resolved against the aux
 * file's directory. `@string` macros carry over from one file to the next.
 */
export async function loadBibliographies(auxPath: string, bibdata: readonly string[]): Promise<Entry[]> {
  const dir = dirname(resolve(auxPath));
  const entries: Entry[] = [];
  let macros: Map<string, string> | undefined;

  for (const name of bibdata) {
    const path = resolve(dir, bibFileName(name));
    const text = await readTextIfExists(path);
    if (text === undefined) {
      throw new AuxFileError(auxPath, `bibliography database ${bibFileName(name)} not found`);
    }
    const parsed = parseBibtex(text, { file: relative(process.cwd(), path) || path, macros });
    macros = parsed.macros;
    entries.push(...parsed.entries);
  }

  return entries;
}

/**
 * Prefetch abbreviations for the journals of the entries the run will
 * write. Uncited entries are never looked up.
 */
async function resolveJournals(
  entries: Entry[],
  usedKeys: ReadonlySet<string>,
  options: RunOptions
): Promise<{ lookup: JournalLookup | undefined; cache: JournalCache | undefined }> {
  const { config } = options;
  if (!config.abbreviateJournals) {
    return { lookup: undefined, cache: undefined };
  }
  const cache = await JournalCache.load(config.journalCache);
  const written = selectOutputEntries({ entries, usedKeys, config });
  const prefetch = await prefetchAbbreviations(written, config, {
    fetcher: options.fetcher ?? createAbbreviationClient(),
    cache,
  });
  log.info(
    { fetched: prefetch.fetched, cache_hits: prefetch.cacheHits, failed: prefetch.failed },
    "Journal abbreviations resolved"
  );
  return { lookup: prefetch.lookup, cache };
}

// =============================================================================
// Processing
// =============================================================================

export async function processAux(auxPath: string, options: RunOptions): Promise<AuxRunResult> {
  const aux = resolve(auxPath);
  const { config } = options;

  try {
    const contents = await readAuxTree(aux);

    if (contents.citations.length === 0) {
      return { aux, status: "skipped", changed: false, written: false, diagnostics: [], reason: "no citations" };
    }
    if (contents.bibdata.length === 0) {
      return { aux, status: "skipped", changed: false, written: false, diagnostics: [], reason: "no \\bibdata" };
    }

    const entries = await loadBibliographies(aux, contents.bibdata);
    const usedKeys = new Set(contents.citations);
    const journals = await resolveJournals(entries, usedKeys, options);

    const result = runSanitizePipeline({
      entries,
      usedKeys,
      config,
      journalLookup: journals.lookup,
    });

    const output = resolve(dirname(aux), config.output);
    let changed: boolean;
    let written = false;

    if (options.dryRun) {
      const existing = await readTextIfExists(output);
      changed = existing === undefined || hashContent(existing) !== hashContent(result.output);
    } else {
      written = await writeIfChanged(output, result.output);
      changed = written;
      await journals.cache?.save();
    }

    emit(written ? TelemetryEvents.OutputWritten : TelemetryEvents.OutputUnchanged, {
      output,
      entries: result.entries.length,
      changed,
      dry_run: options.dryRun ?? false,
    });

    return {
      aux,
      status: result.failed ? "broken" : changed ? "changed" : "unchanged",
      output,
      changed,
      written,
      diagnostics: result.diagnostics,
      stats: result.stats,
    };
  } catch (error) {
    const report = toErrorV1(error);
    if (report.code === "INTERNAL") {
      log.error({ error, aux }, "Unexpected error while processing aux file");
    }
    return { aux, status: "broken", changed: false, written: false, diagnostics: [], error: report };
  }
}

/**
 * Process aux files one after another, in the given order.
 */
export async function processAll(auxPaths: readonly string[], options: RunOptions): Promise<AuxRunResult[]> {
  const results: AuxRunResult[] = [];
  for (const auxPath of auxPaths) {
    results.push(await processAux(auxPath, options));
  }
  return results;
}

export function exitCodeFor(result: AuxRunResult, check: boolean): number {
  if (result.status === "broken") return EXIT_BROKEN;
  if (result.status === "changed" && check) return EXIT_CHANGED;
  return EXIT_OK;
}

/**
 * Highest exit code across all processed files.
 */
export function overallExitCode(results: readonly AuxRunResult[], check: boolean): number {
  return results.reduce((code, result) => Math.max(code, exitCodeFor(result, check)), EXIT_OK);
}
