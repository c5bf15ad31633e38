/**
 * Environment Configuration
 *
 * Type-safe, validated access to the environment variables bibgate reads.
 * Policy options (what to clean, merge and prune) live in the YAML policy
 * file instead; see ./policy.ts.
 */

import { z } from "zod";

/**
 * Log Level enum (pino levels plus "silent")
 */
const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Optional string that treats empty values as undefined
 */
const optionalPath = z
  .union([z.string(), z.undefined()])
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val));

const ConfigSchema = z.object({
  logging: z.object({
    level: LogLevel.default("warn"),
  }),

  abbreviation: z.object({
    baseUrl: z.string().url().default("https://abbreviso.toolforge.org/abbreviso/a/"),
    timeoutMs: z.coerce.number().int().positive().default(10_000),
  }),

  policy: z.object({
    defaultPath: optionalPath,
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    logging: {
      level: env.LOG_LEVEL || undefined,
    },
    abbreviation: {
      baseUrl: env.BIBGATE_ABBREV_BASE_URL || undefined,
      timeoutMs: env.BIBGATE_LOOKUP_TIMEOUT_MS || undefined,
    },
    policy: {
      defaultPath: env.BIBGATE_CONFIG,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Lazy-initialized configuration using Proxy pattern
 *
 * Defers parsing until first property access so that tests can stub
 * environment variables before the config is read.
 */
let _cachedConfig: Config | null = null;

function ensureConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(ensureConfig(), prop);
  },

  ownKeys(_target) {
    return Reflect.ownKeys(ensureConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(ensureConfig(), prop);
  },

  has(_target, prop) {
    return prop in ensureConfig();
  },
});

/**
 * Reset the cached configuration (test only)
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
