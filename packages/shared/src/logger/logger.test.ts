import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createLogger } from "./index.js";

function silenceStderr() {
  return vi.spyOn(console, "error").mockImplementation(() => {});
}

describe("Logger", () => {
  let consoleErrorSpy: ReturnType<typeof silenceStderr>;
  const originalEnv = process.env;

  beforeEach(() => {
    consoleErrorSpy = silenceStderr();
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    process.env = originalEnv;
  });

  function lastLine(): string {
    const calls = consoleErrorSpy.mock.calls;
    return String(calls[calls.length - 1][0]);
  }

  describe("level filtering", () => {
    it("drops debug entries at the default level", () => {
      delete process.env.LOG_LEVEL;
      const logger = createLogger("test");

      logger.debug("hidden");

      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it("honours LOG_LEVEL", () => {
      process.env.LOG_LEVEL = "warn";
      const logger = createLogger("test");

      logger.info("hidden");
      logger.warn("shown");

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(lastLine()).toContain("[WARN] [test] shown");
    });

    it("falls back to info for an unknown LOG_LEVEL", () => {
      process.env.LOG_LEVEL = "chatty";
      const logger = createLogger("test");

      logger.debug("hidden");
      logger.info("shown");

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    it("appends data as JSON in text mode", () => {
      delete process.env.LOG_FORMAT;
      delete process.env.LOG_LEVEL;
      const logger = createLogger("test");

      logger.info("parsed", { tokens: 3 });

      expect(lastLine()).toMatch(/\[INFO\] \[test\] parsed \{"tokens":3\}$/);
    });
  });

  describe("context", () => {
    it("app and command appear in JSON output", () => {
      process.env.LOG_FORMAT = "json";
      const logger = createLogger("test");

      logger.setContext({ app: "demo", command: "add" });
      logger.info("running");

      const parsed = JSON.parse(lastLine());
      expect(parsed.app).toBe("demo");
      expect(parsed.command).toBe("add");
      expect(parsed.module).toBe("test");
      expect(parsed.message).toBe("running");
    });

    it("later context fields merge with earlier ones", () => {
      process.env.LOG_FORMAT = "json";
      const logger = createLogger("test");

      logger.setContext({ app: "demo" });
      logger.setContext({ command: "echo" });
      logger.info("running");

      const parsed = JSON.parse(lastLine());
      expect(parsed.app).toBe("demo");
      expect(parsed.command).toBe("echo");
    });

    it("exposes only the level methods and setContext", () => {
      expect(Object.keys(createLogger("test"))).toEqual(["debug", "info", "warn", "error", "setContext"]);
    });
  });
});
