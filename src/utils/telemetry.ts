import { env } from "node:process";
import pino from "pino";
import { config } from "../config/index.js";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with credential redaction
 *
 * The level comes from the validated `logging.level` setting ("warn" unless
 * LOG_LEVEL says otherwise). Logs go to stderr so structured logs stay out
 * of the terminal report and `--json` output; `--verbose` lowers the level.
 */
export const log = pino(createLoggerConfig(config.logging.level), pino.destination(2));

/**
 * Test sink for capturing telemetry events in tests.
 * Only installable when NODE_ENV=test or VITEST=true.
 */
let testSink: ((eventName: string, data: TelemetryShape) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: TelemetryShape) => void) | null): void {
  // Direct env check: config/index.ts may not be initialised yet
  const isTestEnv = env.NODE_ENV === "test" || env.VITEST === "true" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 */
export const TelemetryEvents = {
  // Pipeline stages
  StagePolicyCompleted: "bibgate.stage.policy.completed",
  StageDedupeCompleted: "bibgate.stage.dedupe.completed",
  StageUsageCompleted: "bibgate.stage.usage.completed",
  StageJournalsCompleted: "bibgate.stage.journals.completed",
  StageEmitCompleted: "bibgate.stage.emit.completed",
  PipelineCompleted: "bibgate.pipeline.completed",

  // Journal abbreviation lookups
  AbbreviationCacheHit: "bibgate.abbreviation.cache_hit",
  AbbreviationFetched: "bibgate.abbreviation.fetched",
  AbbreviationFailed: "bibgate.abbreviation.failed",

  // Output
  OutputWritten: "bibgate.output.written",
  OutputUnchanged: "bibgate.output.unchanged",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

export type TelemetryLeaf = string | number | boolean | null;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;

function sanitizeTelemetryValue(
  value: unknown
): TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape> | undefined {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (value instanceof Set || value instanceof Map) {
    return value.size;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

/**
 * Emit a named telemetry event. Events always go to pino at info level.
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }
  log.info({ event, ...eventData });
}
