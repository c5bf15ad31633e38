/**
 * Vitest Global Setup
 *
 * Resets the environment config cache before every test so that
 * vi.stubEnv() calls are picked up by the config module.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

// Keep pino quiet unless a test opts in.
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? "silent";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
