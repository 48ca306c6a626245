/**
 * Global test setup for unit tests
 *
 * Keeps the environment variables the library reads in a known state so
 * tests do not depend on the shell they run from.
 *
 */

import { beforeEach } from "vitest";

beforeEach(() => {
  delete process.env.HUMAN_UNITS_PERMISSION_STYLE;
  delete process.env.LOG_LEVEL;

  process.env.NODE_ENV = "test";
});
