import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createLogger, generateTransactionId, isLogLevel, silentLogger } from "../index";

function spyConsole() {
  return {
    debug: vi.spyOn(console, "debug").mockImplementation(() => {}),
    info: vi.spyOn(console, "info").mockImplementation(() => {}),
    warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
    error: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}

describe("createLogger", () => {
  let mockConsole: ReturnType<typeof spyConsole>;

  beforeEach(() => {
    mockConsole = spyConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const lastEntry = (spy: { mock: { calls: unknown[][] } }) => {
    const output = spy.mock.calls[spy.mock.calls.length - 1]?.[0];
    return JSON.parse(String(output));
  };

  it("logs info messages with transaction id and meta", () => {
    const logger = createLogger({ transactionId: "txn-1" });
    logger.info("Applying change-set", { networks: 2 });

    expect(mockConsole.info).toHaveBeenCalledTimes(1);
    const parsed = lastEntry(mockConsole.info);

    expect(parsed.level).toBe("info");
    expect(parsed.transactionId).toBe("txn-1");
    expect(parsed.message).toBe("Applying change-set");
    expect(parsed.networks).toBe(2);
    expect(parsed.timestamp).toBeDefined();
  });

  it("routes each level to the matching console method", () => {
    const logger = createLogger({}, { level: "debug" });
    logger.debug("d");
    logger.warn("w");
    logger.error("e", { device: "eth0" });

    expect(lastEntry(mockConsole.debug).level).toBe("debug");
    expect(lastEntry(mockConsole.warn).level).toBe("warn");
    const error = lastEntry(mockConsole.error);
    expect(error.level).toBe("error");
    expect(error.device).toBe("eth0");
  });

  it("drops entries below the configured level", () => {
    const logger = createLogger({ component: "link" }, { level: "warn" });
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(mockConsole.debug).not.toHaveBeenCalled();
    expect(mockConsole.info).not.toHaveBeenCalled();
    expect(mockConsole.warn).toHaveBeenCalledTimes(1);
  });

  it("defaults to info level", () => {
    const logger = createLogger();
    logger.debug("hidden");
    logger.info("shown");

    expect(mockConsole.debug).not.toHaveBeenCalled();
    expect(mockConsole.info).toHaveBeenCalledTimes(1);
  });

  describe("child logger", () => {
    it("merges context and keeps the level threshold", () => {
      const parent = createLogger({ transactionId: "txn-2" }, { level: "warn" });
      const child = parent.child({ component: "source-route" });

      child.info("hidden");
      child.warn("Rules not found", { device: "net1" });

      expect(mockConsole.info).not.toHaveBeenCalled();
      const parsed = lastEntry(mockConsole.warn);
      expect(parsed.transactionId).toBe("txn-2");
      expect(parsed.component).toBe("source-route");
      expect(parsed.device).toBe("net1");
    });

    it("allows overriding parent context", () => {
      const parent = createLogger({ transactionId: "txn-3", component: "topology" });
      parent.child({ component: "link" }).info("Override test");

      expect(lastEntry(mockConsole.info).component).toBe("link");
    });
  });
});

describe("silentLogger", () => {
  it("writes nothing", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    silentLogger.child({ component: "x" }).info("nothing");
    expect(info).not.toHaveBeenCalled();
    info.mockRestore();
  });
});

describe("isLogLevel", () => {
  it("accepts known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
  });
});

describe("generateTransactionId", () => {
  it("generates unique IDs", () => {
    const ids = new Set<string>();
    for (let i = 0; i < 100; i++) {
      ids.add(generateTransactionId());
    }
    expect(ids.size).toBe(100);
  });

  it("generates IDs with expected format", () => {
    const parts = generateTransactionId().split("_");
    expect(parts.length).toBe(3);
    expect(parts[0]).toBe("txn");
    expect(parts[1].length).toBeGreaterThan(0);
    expect(parts[2].length).toBeGreaterThan(0);
  });
});
