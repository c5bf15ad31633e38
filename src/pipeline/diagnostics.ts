/**
 * Diagnostic collection
 *
 * Accumulates the observations every stage makes. Diagnostics never touch
 * entries; the run fails when at least one has error severity.
 */

import type { Diagnostic, DiagnosticCode, Severity, StageName } from "./types.js";

export interface DiagnosticsSummary {
  total: number;
  by_severity: Record<Severity, number>;
  by_code: Partial<Record<DiagnosticCode, number>>;
}

export interface DiagnosticCollector {
  /**
   * Add a diagnostic, tagging it with the current stage
   */
  add(diagnostic: Diagnostic): void;

  /**
   * Add several diagnostics, e.g. those returned by a pure helper
   */
  addAll(diagnostics: Iterable<Diagnostic>): void;

  /**
   * Stage recorded on diagnostics added from now on
   */
  enterStage(stage: StageName): void;

  getDiagnostics(): Diagnostic[];

  getSummary(): DiagnosticsSummary;

  hasErrors(): boolean;

  count(): number;
}

export function createDiagnosticCollector(): DiagnosticCollector {
  const diagnostics: Diagnostic[] = [];
  let currentStage: StageName | undefined;

  const collector: DiagnosticCollector = {
    add(diagnostic: Diagnostic): void {
      const stage = diagnostic.stage ?? currentStage;
      diagnostics.push(stage === undefined ? { ...diagnostic } : { ...diagnostic, stage });
    },

    addAll(items: Iterable<Diagnostic>): void {
      for (const item of items) collector.add(item);
    },

    enterStage(stage: StageName): void {
      currentStage = stage;
    },

    getDiagnostics(): Diagnostic[] {
      return [...diagnostics];
    },

    getSummary(): DiagnosticsSummary {
      const bySeverity: Record<Severity, number> = { info: 0, warning: 0, error: 0 };
      const byCode: Partial<Record<DiagnosticCode, number>> = {};
      for (const d of diagnostics) {
        bySeverity[d.severity]++;
        byCode[d.code] = (byCode[d.code] ?? 0) + 1;
      }
      return { total: diagnostics.length, by_severity: bySeverity, by_code: byCode };
    },

    hasErrors(): boolean {
      return diagnostics.some((d) => d.severity === "error");
    },

    count(): number {
      return diagnostics.length;
    },
  };

  return collector;
}

/**
 * True when any diagnostic has error severity.
 */
export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === "error");
}
