#!/usr/bin/env node
/**
 * CLI entry point for bibgate.
 *
 * Parses CLI arguments, loads the policy, runs every aux file and reports.
 * Usable as a pre-commit hook: exit 1 means a bibliography was rewritten
 * (with --check), exit 2 means it is broken.
 *
 * Usage:
 *   bibgate                         # every aux file next to a .tex file
 *   bibgate paper.aux -c bibgate.yaml
 *   bibgate --check --dry-run
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { Command, CommanderError } from "commander";
import { config as loadDotenv } from "dotenv";

import { config } from "./config/index.js";
import { loadPolicyConfig, type PolicyConfig } from "./config/policy.js";
import { findAuxFiles } from "./io.js";
import { renderJson, renderReport } from "./reporter.js";
import { EXIT_BROKEN, EXIT_OK, overallExitCode, processAll } from "./runner.js";
import { toErrorV1 } from "./utils/errors.js";
import { log } from "./utils/telemetry.js";
import { BIBGATE_VERSION } from "./version.js";

export interface CliOptions {
  config?: string;
  quiet: boolean;
  verbose: boolean;
  json: boolean;
  check: boolean;
  dryRun: boolean;
}

export function buildProgram(): Command {
  return new Command()
    .name("bibgate")
    .description("Sanitize, deduplicate and prune the BibTeX bibliography of a LaTeX document")
    .version(BIBGATE_VERSION)
    .argument("[aux...]", "LaTeX aux files or glob patterns (default: every **/*.aux with a matching .tex)")
    .option("-c, --config <file>", "YAML policy file (default: $BIBGATE_CONFIG, else built-in defaults)")
    .option("-q, --quiet", "Only print errors and rewritten files", false)
    .option("--verbose", "Log pipeline progress to stderr", false)
    .option("--json", "Print the report as JSON", false)
    .option("--check", "Exit with 1 when an output file changed", false)
    .option("--dry-run", "Run everything but write no files", false)
    .exitOverride();
}

// =============================================================================
// Main
// =============================================================================

/**
 * Run the CLI and return the process exit code.
 */
export async function main(argv: readonly string[] = process.argv): Promise<number> {
  loadDotenv();

  const program = buildProgram();
  try {
    program.parse([...argv]);
  } catch (error) {
    // commander has already printed help, the version or the usage error
    if (error instanceof CommanderError) return error.exitCode === 0 ? EXIT_OK : EXIT_BROKEN;
    throw error;
  }

  const opts = program.opts<CliOptions>();
  if (opts.verbose) {
    log.level = "info";
  }

  // ── Load policy ────────────────────────────────────────────────────────────
  let policy: PolicyConfig;
  try {
    policy = await loadPolicyConfig(opts.config ?? config.policy.defaultPath);
  } catch (error) {
    const report = toErrorV1(error);
    if (opts.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.error(`💥 ${report.code}: ${report.message}`);
      const issues = report.details?.["issues"];
      if (Array.isArray(issues)) {
        for (const issue of issues) console.error(`   - ${String(issue)}`);
      }
    }
    return EXIT_BROKEN;
  }

  // ── Find aux files ─────────────────────────────────────────────────────────
  const auxFiles = await findAuxFiles(program.args);
  if (auxFiles.length === 0) {
    if (opts.json) console.log("[]");
    else if (!opts.quiet) console.log("❓ No aux files found. Compile the document first.");
    return EXIT_OK;
  }

  // ── Run and report ─────────────────────────────────────────────────────────
  const results = await processAll(auxFiles, { config: policy, dryRun: opts.dryRun });

  if (opts.json) {
    console.log(renderJson(results));
  } else {
    const report = renderReport(results, { quiet: opts.quiet });
    if (report.length > 0) console.log(report);
  }

  return overallExitCode(results, opts.check);
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch (error) {
    log.debug({ error, script }, "Could not resolve entry script");
    return false;
  }
}

if (isEntryPoint()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(JSON.stringify(toErrorV1(error), null, 2));
      process.exitCode = EXIT_BROKEN;
    }
  );
}
