/**
 * Journal abbreviation prefetch
 *
 * The pipeline is synchronous, so every journal title it will ask about is
 * resolved up front (cache first, then the abbreviation service) and the
 * answers are handed to it as a plain lookup function.
 */

import { isPreamble, type Entry } from "../bib/types.js";
import type { PolicyConfig } from "../config/policy.js";
import type { AbbreviationResult, JournalLookup } from "../pipeline/types.js";
import { journalLookupName } from "../transforms/field-normalisation.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import type { JournalCache } from "./cache.js";
import type { AbbreviationFetcher } from "./client.js";

export interface PrefetchOptions {
  fetcher: AbbreviationFetcher;
  cache?: JournalCache;
}

export interface PrefetchResult {
  lookup: JournalLookup;
  fetched: number;
  cacheHits: number;
  failed: number;
}

/**
 * Distinct journal titles the normalizer will look up, in first-seen order.
 */
export function journalTitles(entries: readonly Entry[], config: PolicyConfig): string[] {
  const titles = new Set<string>();
  for (const entry of entries) {
    if (isPreamble(entry)) continue;
    const raw = entry.fields.get("journal");
    if (raw === undefined) continue;
    const title = journalLookupName(raw, config);
    if (title !== undefined) titles.add(title);
  }
  return [...titles];
}

/**
 * Wrap a finished set of answers as a synchronous lookup.
 */
export function lookupFromResults(results: ReadonlyMap<string, AbbreviationResult>): JournalLookup {
  return (journal) => results.get(journal) ?? { ok: false, reason: "title was not prefetched" };
}

/**
 * Resolve every journal title in `entries`. Lookups run one at a time and a
 * failure only affects its own title.
 */
export async function prefetchAbbreviations(
  entries: readonly Entry[],
  config: PolicyConfig,
  options: PrefetchOptions
): Promise<PrefetchResult> {
  const results = new Map<string, AbbreviationResult>();
  let fetched = 0;
  let cacheHits = 0;
  let failed = 0;

  if (!config.abbreviateJournals) {
    return { lookup: lookupFromResults(results), fetched, cacheHits, failed };
  }

  for (const title of journalTitles(entries, config)) {
    const cached = options.cache?.get(title);
    if (cached !== undefined) {
      cacheHits++;
      results.set(title, { ok: true, abbreviation: cached });
      emit(TelemetryEvents.AbbreviationCacheHit, { journal: title });
      continue;
    }

    try {
      const abbreviation = await options.fetcher(title);
      fetched++;
      results.set(title, { ok: true, abbreviation });
      options.cache?.set(title, abbreviation);
      emit(TelemetryEvents.AbbreviationFetched, { journal: title, abbreviation });
    } catch (error) {
      failed++;
      const reason = error instanceof Error ? error.message : String(error);
      results.set(title, { ok: false, reason });
      log.warn({ journal: title, reason }, "Journal abbreviation lookup failed");
      emit(TelemetryEvents.AbbreviationFailed, { journal: title, reason });
    }
  }

  return { lookup: lookupFromResults(results), fetched, cacheHits, failed };
}

export { JournalCache } from "./cache.js";
export { abbreviationUrl, createAbbreviationClient, fetchAbbreviation } from "./client.js";
export type { AbbreviationClientOptions, AbbreviationFetcher } from "./client.js";
