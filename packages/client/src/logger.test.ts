import { describe, expect, test } from "vitest";
import { createChildLogger, createRootLogger, resolveLogConfig } from "./logger.js";

describe("resolveLogConfig", () => {
  test("defaults to info and pretty output", () => {
    expect(resolveLogConfig(undefined, {})).toEqual({ level: "info", format: "pretty" });
  });

  test("environment fills what the input leaves out", () => {
    expect(
      resolveLogConfig({ format: "json" }, { WAVELINK_LOG: "warn", WAVELINK_LOG_FORMAT: "pretty" })
    ).toEqual({ level: "warn", format: "json" });
  });

  test("ignores unknown environment values", () => {
    expect(resolveLogConfig(undefined, { WAVELINK_LOG: "loud", WAVELINK_LOG_FORMAT: "xml" })).toEqual({
      level: "info",
      format: "pretty",
    });
  });
});

describe("createRootLogger", () => {
  test("json format logs at the configured level", () => {
    const logger = createRootLogger({ level: "warn", format: "json" });
    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
  });

  test("child loggers carry their module", () => {
    const root = createRootLogger({ level: "silent", format: "json" });
    const child = createChildLogger(root, "correlator");
    expect(child.bindings()).toMatchObject({ module: "correlator" });
  });
});
