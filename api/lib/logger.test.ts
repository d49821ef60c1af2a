import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import * as core from "@actions/core";
import { createLogger } from "./logger.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  warning: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  startGroup: vi.fn(),
  endGroup: vi.fn(),
}));

/**
 * Tests for the logging abstraction in both environments:
 * - GitHub Actions (scheduled report) through @actions/core
 * - Server and local runs through the console
 */

describe("logger", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    vi.clearAllMocks();
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe("in GitHub Actions", () => {
    beforeEach(() => {
      process.env.GITHUB_ACTIONS = "true";
    });

    it("routes levels to @actions/core", () => {
      const logger = createLogger();
      logger.info("info message");
      logger.warn("warning message");
      logger.debug("debug message");
      logger.group("group name");
      logger.groupEnd();

      expect(core.info).toHaveBeenCalledWith("info message");
      expect(core.warning).toHaveBeenCalledWith("warning message");
      expect(core.debug).toHaveBeenCalledWith("debug message");
      expect(core.startGroup).toHaveBeenCalledWith("group name");
      expect(core.endGroup).toHaveBeenCalled();
    });

    it("appends the error message and logs the stack at debug", () => {
      const error = new Error("store down");
      error.stack = "stack trace";

      createLogger().error("Reconciliation failed", error);

      expect(core.error).toHaveBeenCalledWith("Reconciliation failed: store down");
      expect(core.debug).toHaveBeenCalledWith("stack trace");
    });

    it("stringifies non-Error values", () => {
      createLogger().error("Request failed", 503);

      expect(core.error).toHaveBeenCalledWith("Request failed: 503");
      expect(core.debug).not.toHaveBeenCalled();
    });

    it("logs a bare message without an error", () => {
      createLogger().error("plain");

      expect(core.error).toHaveBeenCalledWith("plain");
    });
  });

  describe("on the console", () => {
    let log: MockInstance<typeof console.log>;
    let warn: MockInstance<typeof console.warn>;
    let error: MockInstance<typeof console.error>;

    beforeEach(() => {
      delete process.env.GITHUB_ACTIONS;
      log = vi.spyOn(console, "log").mockImplementation(() => {});
      warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      error = vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("prefixes warnings and errors", () => {
      const logger = createLogger();
      const failure = new Error("boom");

      logger.info("info message");
      logger.warn("warning message");
      logger.error("error message");
      logger.error("with cause", failure);

      expect(log).toHaveBeenCalledWith("info message");
      expect(warn).toHaveBeenCalledWith("⚠️  warning message");
      expect(error).toHaveBeenCalledWith("❌ error message");
      expect(error).toHaveBeenCalledWith("❌ with cause:", failure);
    });

    it("prints debug output only under DEBUG", () => {
      delete process.env.DEBUG;
      createLogger().debug("hidden");
      expect(log).not.toHaveBeenCalled();

      process.env.DEBUG = "1";
      createLogger().debug("shown");
      expect(log).toHaveBeenCalledWith("🔍 shown");
    });

    it("does not touch @actions/core", () => {
      createLogger().info("info message");
      expect(core.info).not.toHaveBeenCalled();
    });
  });
});
