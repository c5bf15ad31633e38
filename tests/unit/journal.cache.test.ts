import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { JournalCache } from "../../src/journal/cache.js";

describe("JournalCache", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "bibgate-cache-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("starts empty when the file does not exist", async () => {
    const cache = await JournalCache.load(join(dir, "abbrev.json"));
    expect(cache.size).toBe(0);
  });

  it("loads existing entries", async () => {
    const path = join(dir, "abbrev.json");
    await writeFile(path, JSON.stringify({ "Journal of Testing": "J. Test." }));

    const cache = await JournalCache.load(path);
    expect(cache.get("Journal of Testing")).toBe("J. Test.");
  });

  it("ignores a malformed file", async () => {
    const path = join(dir, "abbrev.json");
    await writeFile(path, "[1, 2, 3]");
    expect((await JournalCache.load(path)).size).toBe(0);

    await writeFile(path, "{ not json");
    expect((await JournalCache.load(path)).size).toBe(0);
  });

  it("saves sorted entries only when something changed", async () => {
    const path = join(dir, "nested", "abbrev.json");
    const cache = await JournalCache.load(path);

    expect(await cache.save()).toBe(false);

    cache.set("Zoology Letters", "Zool. Lett.");
    cache.set("Acta Testica", "Acta Test.");
    expect(await cache.save()).toBe(true);
    expect(await readFile(path, "utf-8")).toBe(
      '{\n  "Acta Testica": "Acta Test.",\n  "Zoology Letters": "Zool. Lett."\n}\n'
    );

    cache.set("Acta Testica", "Acta Test.");
    expect(await cache.save()).toBe(false);
  });

  it("never writes without a path", async () => {
    const cache = await JournalCache.load(undefined);
    cache.set("Nature", "Nature");
    expect(await cache.save()).toBe(false);
  });
});
