/**
 * Configuration Module Tests
 *
 * Environment variables are read lazily through the config proxy, so
 * stubbing them before the first access is enough.
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { _resetConfigCache, config } from "../../src/config/index.js";

describe("Configuration Module", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    _resetConfigCache();
  });

  describe("Default Configuration", () => {
    it("uses the public abbreviation service and a 10 second timeout", () => {
      vi.stubEnv("BIBGATE_ABBREV_BASE_URL", "");
      vi.stubEnv("BIBGATE_LOOKUP_TIMEOUT_MS", "");
      vi.stubEnv("BIBGATE_CONFIG", "");

      expect(config.abbreviation).toEqual({
        baseUrl: "https://abbreviso.toolforge.org/abbreviso/a/",
        timeoutMs: 10_000,
      });
      expect(config.policy.defaultPath).toBeUndefined();
    });
  });

  describe("Environment overrides", () => {
    it("reads the service settings and default policy path", () => {
      vi.stubEnv("BIBGATE_ABBREV_BASE_URL", "http://localhost:8080/a/");
      vi.stubEnv("BIBGATE_LOOKUP_TIMEOUT_MS", "2500");
      vi.stubEnv("BIBGATE_CONFIG", "bibgate.yaml");

      expect(config.abbreviation.baseUrl).toBe("http://localhost:8080/a/");
      expect(config.abbreviation.timeoutMs).toBe(2500);
      expect(config.policy.defaultPath).toBe("bibgate.yaml");
    });

    it("treats a blank policy path as unset", () => {
      vi.stubEnv("BIBGATE_CONFIG", "   ");
      expect(config.policy.defaultPath).toBeUndefined();
    });

    it("rejects invalid values", () => {
      vi.stubEnv("BIBGATE_LOOKUP_TIMEOUT_MS", "-5");
      expect(() => config.abbreviation).toThrow(/^Invalid environment configuration: abbreviation\.timeoutMs/);
    });

    it("caches until reset", () => {
      vi.stubEnv("LOG_LEVEL", "debug");
      expect(config.logging.level).toBe("debug");

      vi.stubEnv("LOG_LEVEL", "error");
      expect(config.logging.level).toBe("debug");

      _resetConfigCache();
      expect(config.logging.level).toBe("error");
    });
  });
});
