import { describe, it, expect } from "vitest";
import { createLogger, silentLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  it("creates a logger with custom level", () => {
    const logger = createLogger({ level: "debug", json: true });
    expect(logger.level).toBe("debug");
  });

  it("defaults to info", () => {
    const logger = createLogger({ level: "info", json: true });
    expect(logger.level).toBe("info");
  });

  it("creates a child logger that keeps the level", () => {
    const logger = createLogger({ level: "warn", json: true });
    const child = logger.child({ entityId: "a" });
    expect(child.level).toBe("warn");
  });
});

describe("silentLogger", () => {
  it("has every level disabled", () => {
    expect(silentLogger.level).toBe("silent");
    expect(silentLogger.isLevelEnabled("error")).toBe(false);
  });
});
