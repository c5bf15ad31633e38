import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageJson = z.object({ version: z.string().default('0.0.0') });

function readVersion(relativePath: string): string {
  const pkgPath = new URL(relativePath, import.meta.url);
  return PackageJson.parse(JSON.parse(readFileSync(fileURLToPath(pkgPath), 'utf-8'))).version;
}

/**
 * bibgate version (single source of truth)
 *
 * Reads from package.json by default, with optional env override.
 *
 * Uses import.meta.url for path resolution to work correctly in both:
 * - Dev mode: tsx src/cli.ts (executes .ts from src/)
 * - Built: node dist/src/cli.js (executes .js from dist/src/)
 */
export const BIBGATE_VERSION =
  process.env.BIBGATE_VERSION ??
  ((): string => {
    try {
      // From src/version.ts: ../ goes to root (where package.json lives)
      return readVersion('../package.json');
    } catch {
      // One more level up for dist/src/version.js
      try {
        return readVersion('../../package.json');
      } catch {
        return '0.0.0';
      }
    }
  })();
