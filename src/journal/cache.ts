import { z } from "zod";
import { readTextIfExists, writeFileAtomic } from "../io.js";
import { log } from "../utils/telemetry.js";

const CacheFileSchema = z.record(z.string(), z.string().min(1));

/**
 * Persistent journal title -> abbreviation map, stored as a JSON object.
 * Only successful lookups are cached.
 */
export class JournalCache {
  private readonly entries: Map<string, string>;
  private dirty = false;

  constructor(
    readonly path: string | undefined,
    initial: Iterable<[string, string]> = []
  ) {
    this.entries = new Map(initial);
  }

  /**
   * Load the cache file. A missing file yields an empty cache; an unreadable
   * or malformed one is logged and ignored, and overwritten on the next save.
   */
  static async load(path: string | undefined): Promise<JournalCache> {
    if (path === undefined) return new JournalCache(undefined);

    const text = await readTextIfExists(path);
    if (text === undefined) return new JournalCache(path);

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      log.warn({ path, error: error instanceof Error ? error.message : String(error) }, "Journal cache is not valid JSON, starting empty");
      return new JournalCache(path);
    }

    const parsed = CacheFileSchema.safeParse(data);
    if (!parsed.success) {
      log.warn({ path }, "Journal cache is not a title -> abbreviation object, starting empty");
      return new JournalCache(path);
    }
    return new JournalCache(path, Object.entries(parsed.data));
  }

  get(journal: string): string | undefined {
    return this.entries.get(journal);
  }

  set(journal: string, abbreviation: string): void {
    if (this.entries.get(journal) === abbreviation) return;
    this.entries.set(journal, abbreviation);
    this.dirty = true;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Persist new lookups. Keys are written sorted so the file diffs cleanly.
   */
  async save(): Promise<boolean> {
    if (!this.dirty || this.path === undefined) return false;
    const sorted = Object.fromEntries([...this.entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
    await writeFileAtomic(this.path, `${JSON.stringify(sorted, null, 2)}\n`);
    this.dirty = false;
    return true;
  }
}
