import { test, expect, afterEach } from "vitest";

import { configure, getConfig, resetConfig, DEFAULT_TEE_HIGH_WATER_MARK } from "../config.ts";

afterEach(() => {
  resetConfig();
});

test("defaults log to the console", () => {
  expect(getConfig().logger).toBe(console);
  expect(getConfig().teeHighWaterMark).toBe(DEFAULT_TEE_HIGH_WATER_MARK);
});

test("configure merges overrides and returns the result", () => {
  const updated = configure({ teeHighWaterMark: 5 });

  expect(updated.teeHighWaterMark).toBe(5);
  expect(updated.logger).toBe(console);
  expect(getConfig()).toBe(updated);
});

test("configure ignores settings passed as undefined", () => {
  const logger = { debug: () => {}, warn: () => {}, error: () => {} };
  configure({ logger, teeHighWaterMark: 3 });

  const updated = configure({ logger: undefined, teeHighWaterMark: undefined });
  expect(updated.logger).toBe(logger);
  expect(updated.teeHighWaterMark).toBe(3);
});

test("resetConfig restores the defaults", () => {
  configure({ teeHighWaterMark: 1 });
  resetConfig();

  expect(getConfig().teeHighWaterMark).toBe(10_000);
});
