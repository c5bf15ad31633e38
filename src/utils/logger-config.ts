/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger options. Header and credential
 * paths are redacted from every log line.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.headers.authorization",
  "*.headers.cookie",
  "*.headers.proxy-authorization",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig(): { paths: string[]; censor: string } {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string): {
  name: string;
  level: string;
  redact: { paths: string[]; censor: string };
} {
  return {
    name: "bibgate",
    level,
    redact: createRedactConfig(),
  };
}
