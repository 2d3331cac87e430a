import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";
import { createLogger, flattenForLog } from "./index.js";

describe("Logger", () => {
  let consoleErrorSpy: MockInstance<typeof console.error>;
  const originalEnv = process.env;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.env = { ...originalEnv };
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_FORMAT;
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    process.env = originalEnv;
  });

  describe("levels", () => {
    it("drops debug messages at the default level", () => {
      const logger = createLogger("test");
      logger.debug("hidden");
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it("honours LOG_LEVEL", () => {
      process.env.LOG_LEVEL = "error";
      const logger = createLogger("test");
      logger.warn("hidden");
      logger.error("shown");
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    it("ignores an unknown LOG_LEVEL", () => {
      process.env.LOG_LEVEL = "chatty";
      const logger = createLogger("test");
      logger.info("shown");
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("text format", () => {
    it("prefixes level, module and room", () => {
      const logger = createLogger("ContextBuilder");
      logger.setContext({ roomId: "!abc:test" });
      logger.info("assembled", { messages: 2 });

      const line = String(consoleErrorSpy.mock.calls[0][0]);
      expect(line).toMatch(/^\[[^\]]+\] \[INFO\] \[ContextBuilder\] \[!abc:test\] assembled \{"messages":2\}$/);
    });
  });

  describe("time()", () => {
    it("returns a numeric duration >= 0", async () => {
      process.env.LOG_LEVEL = "debug";
      const logger = createLogger("test");
      const stop = logger.time("test-operation");

      await new Promise((resolve) => setTimeout(resolve, 10));
      const duration = stop();

      expect(typeof duration).toBe("number");
      expect(duration).toBeGreaterThanOrEqual(0);
    });

    it("stop function logs at debug level", () => {
      process.env.LOG_LEVEL = "debug";
      const logger = createLogger("test");
      const stop = logger.time("test-operation");

      consoleErrorSpy.mockClear();
      stop();

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      const call = String(consoleErrorSpy.mock.calls[0][0]);
      expect(call).toContain("[DEBUG]");
      expect(call).toContain("test-operation completed");
    });

    it("time() works in JSON format mode", () => {
      process.env.LOG_LEVEL = "debug";
      process.env.LOG_FORMAT = "json";
      const logger = createLogger("test");
      const stop = logger.time("json-test");

      consoleErrorSpy.mockClear();
      const duration = stop();

      const parsed = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
      expect(parsed.level).toBe("debug");
      expect(parsed.message).toBe("json-test completed");
      expect(parsed.label).toBe("json-test");
      expect(parsed.durationMs).toBe(duration);
    });
  });

  describe("room context", () => {
    it("room and sender appear in JSON output", () => {
      process.env.LOG_FORMAT = "json";
      const logger = createLogger("test");

      logger.setContext({ roomId: "!r:test", sender: "@alice:test" });
      logger.info("request");

      const parsed = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
      expect(parsed.room_id).toBe("!r:test");
      expect(parsed.sender).toBe("@alice:test");
      expect(parsed.message).toBe("request");
    });

    it("context propagates to child logger", () => {
      process.env.LOG_FORMAT = "json";
      const logger = createLogger("parent");

      logger.setContext({ roomId: "!r:test" });
      const child = logger.child("child");
      child.info("child message");

      const parsed = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
      expect(parsed.room_id).toBe("!r:test");
      expect(parsed.module).toBe("parent:child");
    });

    it("withContext scopes a logger without touching the original", () => {
      process.env.LOG_FORMAT = "json";
      const logger = createLogger("Bot");

      logger.withContext({ roomId: "!r:test", sender: "@alice:test" }).info("scoped");
      logger.info("plain");

      const scoped = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
      const plain = JSON.parse(String(consoleErrorSpy.mock.calls[1][0]));
      expect(scoped.module).toBe("Bot");
      expect(scoped.room_id).toBe("!r:test");
      expect(scoped.sender).toBe("@alice:test");
      expect(plain.room_id).toBeUndefined();
    });

    it("text lines show the room of a scoped logger", () => {
      const logger = createLogger("Bot").withContext({ roomId: "!r:test" });
      logger.info("hello");

      expect(String(consoleErrorSpy.mock.calls[0][0])).toMatch(/\] \[INFO\] \[Bot\] \[!r:test\] hello$/);
    });
  });
});

describe("flattenForLog", () => {
  it("replaces newlines with spaces", () => {
    expect(flattenForLog("a\nb\n")).toBe("a b ");
  });
});
