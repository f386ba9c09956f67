import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ENV_VARS, resolveConfig } from "./config";
import { getLogger, setLogger, type Logger } from "./logger";

describe("resolveConfig", () => {
  let previous: Logger;
  let warnings: string[];

  beforeEach(() => {
    previous = getLogger();
    warnings = [];
    setLogger({
      debug: () => {},
      info: () => {},
      warn: (message) => warnings.push(message),
      error: () => {},
    });
  });

  afterEach(() => {
    setLogger(previous);
  });

  it("uses defaults when nothing is configured", () => {
    expect(resolveConfig(undefined, {})).toEqual({
      requestTimeoutMs: 1500,
      maxSimilarConcurrentWork: 2,
      maxConcurrentWork: os.availableParallelism(),
      typeDataPath: undefined,
      logLevel: "info",
    });
  });

  it("puts the type data under the workspace root by default", () => {
    const root = path.join(os.tmpdir(), "workspace");
    expect(resolveConfig({}, {}, root).typeDataPath).toBe(
      path.join(root, ".miniyaml", "type-data.json"),
    );
  });

  it("reads environment variables", () => {
    const config = resolveConfig(
      {},
      {
        [ENV_VARS.requestTimeoutMs]: "250",
        [ENV_VARS.maxSimilarConcurrentWork]: "3",
        [ENV_VARS.maxConcurrentWork]: "8",
        [ENV_VARS.typeDataPath]: "/data/types.json",
        [ENV_VARS.logLevel]: "debug",
      },
      "/ignored",
    );
    expect(config).toEqual({
      requestTimeoutMs: 250,
      maxSimilarConcurrentWork: 3,
      maxConcurrentWork: 8,
      typeDataPath: "/data/types.json",
      logLevel: "debug",
    });
  });

  it("prefers initialization options over the environment", () => {
    const config = resolveConfig(
      { requestTimeoutMs: 900, logLevel: "warn" },
      { [ENV_VARS.requestTimeoutMs]: "250", [ENV_VARS.logLevel]: "debug" },
    );
    expect(config.requestTimeoutMs).toBe(900);
    expect(config.logLevel).toBe("warn");
  });

  it("skips invalid values with a warning", () => {
    const config = resolveConfig(
      { requestTimeoutMs: -5 },
      { [ENV_VARS.requestTimeoutMs]: "300", [ENV_VARS.maxConcurrentWork]: "lots" },
    );
    expect(config.requestTimeoutMs).toBe(300);
    expect(config.maxConcurrentWork).toBe(os.availableParallelism());
    expect(warnings).toHaveLength(2);
    expect(warnings[0]).toMatch(/^Ignoring initialization option requestTimeoutMs=-5: /);
    expect(warnings[1]).toMatch(/^Ignoring MINIYAML_LS_MAX_WORK="lots": /);
  });

  it("ignores initialization options that are not an object", () => {
    expect(resolveConfig("nonsense", {}).requestTimeoutMs).toBe(1500);
  });
});
