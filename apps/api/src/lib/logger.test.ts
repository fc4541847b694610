import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createLogger, logger } from "./logger";
import { BackendQueryError } from "./warehouse/errors";

type ConsoleSpy = { mock: { calls: unknown[][] } };

const lineAt = (spy: ConsoleSpy, index = 0): string => String(spy.mock.calls[index]?.[0]);

const entryAt = (spy: ConsoleSpy, index = 0): Record<string, unknown> => {
  const parsed: unknown = JSON.parse(lineAt(spy, index));
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error("log line is not a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
};

const nested = (value: unknown, key: string): unknown => {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
};

const useEnv = (nodeEnv: string, logLevel: string): void => {
  vi.stubEnv("NODE_ENV", nodeEnv);
  vi.stubEnv("LOG_LEVEL", logLevel);
};

describe("logger", () => {
  const spies = {
    log: vi.spyOn(console, "log"),
    debug: vi.spyOn(console, "debug"),
    info: vi.spyOn(console, "info"),
    warn: vi.spyOn(console, "warn"),
    error: vi.spyOn(console, "error")
  };

  beforeEach(() => {
    Object.values(spies).forEach((spy) => spy.mockImplementation(() => undefined));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    Object.values(spies).forEach((spy) => spy.mockClear());
  });

  it("prints production info entries as JSON on stdout", () => {
    useEnv("production", "debug");

    logger.info({ template: "overview.total_clicks" }, "plan executed");

    expect(spies.log).toHaveBeenCalledTimes(1);
    expect(spies.info).not.toHaveBeenCalled();
    const entry = entryAt(spies.log);
    expect(entry.level).toBe("info");
    expect(entry.message).toBe("plan executed");
    expect(entry.template).toBe("overview.total_clicks");
    expect(typeof entry.timestamp).toBe("string");
  });

  it("prints nothing under NODE_ENV=test when LOG_LEVEL is blank", () => {
    useEnv("test", "");

    logger.error({}, "hidden");

    expect(spies.error).not.toHaveBeenCalled();
  });

  it("drops entries below the configured level", () => {
    useEnv("production", "WARN");

    logger.debug({}, "dropped debug");
    logger.info({}, "dropped info");
    logger.warn({}, "kept warn");
    logger.error({}, "kept error");

    expect(spies.log).not.toHaveBeenCalled();
    expect(entryAt(spies.warn).message).toBe("kept warn");
    expect(entryAt(spies.error).message).toBe("kept error");
  });

  it("lets call context override bindings inherited through child loggers", () => {
    useEnv("production", "debug");

    createLogger({ component: "direct_executor", template: "base" })
      .child({ requestId: "req-1" })
      .warn({ template: "links.total_clicks" }, "slow query");

    expect(entryAt(spies.warn)).toMatchObject({
      component: "direct_executor",
      requestId: "req-1",
      template: "links.total_clicks"
    });
  });

  it("expands warehouse errors with their backend fields and cause", () => {
    useEnv("production", "debug");

    const error = new BackendQueryError('Direct query "total_clicks" timed out', {
      backend: "direct",
      code: "timeout",
      cause: new Error("deadline exceeded")
    });
    logger.error({ error }, "backend failed");

    const serialized = entryAt(spies.error).error;
    expect(nested(serialized, "name")).toBe("BackendQueryError");
    expect(nested(serialized, "code")).toBe("timeout");
    expect(nested(serialized, "status")).toBe(504);
    expect(nested(serialized, "backend")).toBe("direct");
    expect(nested(nested(serialized, "cause"), "message")).toBe("deadline exceeded");
    expect(typeof nested(serialized, "stack")).toBe("string");
  });

  it("marks cycles and stringifies bigints", () => {
    useEnv("production", "debug");

    const row: { self?: unknown; link?: unknown; total: bigint } = { total: 42n };
    row.self = row;
    row.link = { owner: row };

    logger.error({ row }, "cyclic row");

    const serialized = entryAt(spies.error).row;
    expect(nested(serialized, "self")).toBe("[Circular]");
    expect(nested(nested(serialized, "link"), "owner")).toBe("[Circular]");
    expect(nested(serialized, "total")).toBe("42");
  });

  it("prints colored lines through the matching console method in development", () => {
    useEnv("development", "debug");

    logger.debug({ rows: 3 }, "fetched");
    logger.info({}, "ready");

    expect(spies.debug).toHaveBeenCalledTimes(1);
    expect(lineAt(spies.debug)).toContain("\u001b[36mDEBUG\u001b[0m");
    expect(lineAt(spies.debug).endsWith('fetched {"rows":3}')).toBe(true);
    expect(lineAt(spies.info).endsWith("\u001b[0m ready")).toBe(true);
  });
});
