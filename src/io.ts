/**
 * File I/O for the bibgate runner.
 *
 * All file system access is isolated here so that the pipeline, runner
 * logic and reporter stay pure and can be imported as a library.
 */

import { createHash } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { glob, hasMagic } from "glob";
import { parseAux, type AuxContents } from "./bib/aux.js";
import { AuxFileError } from "./utils/errors.js";

// =============================================================================
// Hashing
// =============================================================================

/** SHA-256 hex digest of a string. */
export function hashContent(content: string): string {
  return "sha256:" + createHash("sha256").update(content).digest("hex");
}

// =============================================================================
// Reading
// =============================================================================

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** File contents, or undefined when the file does not exist. */
export async function readTextIfExists(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw error;
  }
}

/**
 * Read an aux file and every aux file it pulls in with `\@input`,
 * resolved against the top-level file's directory as LaTeX does.
 *
 * @throws AuxFileError when the top-level file or an input is missing
 */
export async function readAuxTree(auxPath: string): Promise<AuxContents> {
  const root = dirname(resolve(auxPath));
  const citations = new Set<string>();
  const bibdata: string[] = [];
  const visited = new Set<string>();

  async function visit(path: string): Promise<void> {
    const absolute = resolve(root, path);
    if (visited.has(absolute)) return;
    visited.add(absolute);

    const text = await readTextIfExists(absolute);
    if (text === undefined) {
      throw new AuxFileError(auxPath, absolute === resolve(auxPath) ? "file not found" : `\\@input file ${path} not found`);
    }

    const contents = parseAux(text);
    for (const key of contents.citations) citations.add(key);
    bibdata.push(...contents.bibdata);
    for (const input of contents.inputs) await visit(input);
  }

  await visit(resolve(auxPath));
  return { citations: [...citations], bibdata, inputs: [...visited].slice(1) };
}

/**
 * Expand aux paths and glob patterns. With none, every `*.aux` below `cwd`
 * that sits next to a `.tex` file of the same name.
 */
export async function findAuxFiles(patterns: readonly string[], cwd: string = process.cwd()): Promise<string[]> {
  if (patterns.length > 0) {
    const found = new Set<string>();
    for (const pattern of patterns) {
      // Plain paths are kept even when missing so the run can report them
      const matches = hasMagic(pattern)
        ? await glob(pattern, { cwd, absolute: true, nodir: true })
        : [resolve(cwd, pattern)];
      for (const match of matches) found.add(match);
    }
    return [...found].sort();
  }

  const [auxFiles, texFiles] = await Promise.all([
    glob("**/*.aux", { cwd, absolute: true, nodir: true, ignore: ["**/node_modules/**"] }),
    glob("**/*.tex", { cwd, absolute: true, nodir: true, ignore: ["**/node_modules/**"] }),
  ]);
  const tex = new Set(texFiles);
  return auxFiles.filter((aux) => tex.has(`${aux.slice(0, -".aux".length)}.tex`)).sort();
}

// =============================================================================
// Writing
// =============================================================================

/**
 * Write through a temporary file in the same directory and rename it into
 * place, so readers never see a partial file.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true });
  const temp = join(dir, `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await writeFile(temp, content, "utf-8");
    await rename(temp, path);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}

/**
 * Write `content` unless the file already holds exactly that text.
 *
 * @returns true when the file was written
 */
export async function writeIfChanged(path: string, content: string): Promise<boolean> {
  const existing = await readTextIfExists(path);
  if (existing !== undefined && hashContent(existing) === hashContent(content)) {
    return false;
  }
  await writeFileAtomic(path, content);
  return true;
}
