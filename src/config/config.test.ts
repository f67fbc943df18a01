import { describe, test, expect, beforeAll, afterAll } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  DEFAULT_AWS_BIN,
  DEFAULT_FIXTURES_DIR,
  parseConfigFile,
  resolveConfig,
  resolveFormat,
} from "./index.ts";
import { UserError } from "../core/errors.ts";

let dir: string;
let withFile: string;
let withBadFile: string;
let withJsonFormat: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "opskit-config-"));
  withFile = join(dir, "good");
  withBadFile = join(dir, "bad");
  mkdirSync(withFile);
  mkdirSync(withBadFile);
  withJsonFormat = join(dir, "json");
  mkdirSync(withJsonFormat);
  writeFileSync(join(withJsonFormat, "opskit.json"), JSON.stringify({ format: "json" }));
  writeFileSync(
    join(withFile, "opskit.json"),
    JSON.stringify({ mode: "live", region: "eu-central-1", aws_bin: "/opt/aws/bin/aws" }),
  );
  writeFileSync(join(withBadFile, "opskit.json"), JSON.stringify({ mode: "sometimes" }));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

const emptyEnv = () => ({ XDG_CONFIG_HOME: join(dir, "missing") });

describe("resolveConfig", () => {
  test("defaults to mock mode and table output", () => {
    const cfg = resolveConfig({ verbose: false }, emptyEnv());
    expect(cfg).toMatchObject({
      mode: "mock",
      format: "table",
      verbose: false,
      awsBin: DEFAULT_AWS_BIN,
      fixturesDir: DEFAULT_FIXTURES_DIR,
    });
    expect(cfg.profile).toBeUndefined();
    expect(cfg.region).toBeUndefined();
  });

  test("result is frozen", () => {
    const cfg = resolveConfig({ verbose: false }, emptyEnv());
    expect(Object.isFrozen(cfg)).toBe(true);
  });

  test("--real selects live mode", () => {
    expect(resolveConfig({ real: true, verbose: false }, emptyEnv()).mode).toBe("live");
  });

  test("--mock and --real are mutually exclusive", () => {
    expect(() => resolveConfig({ mock: true, real: true, verbose: false }, emptyEnv())).toThrow(UserError);
  });

  test("structured is json", () => {
    expect(resolveConfig({ format: "structured", verbose: false }, emptyEnv()).format).toBe("json");
  });

  test("config file supplies defaults", () => {
    const cfg = resolveConfig({ verbose: false }, { XDG_CONFIG_HOME: withFile });
    expect(cfg).toMatchObject({
      mode: "live",
      region: "eu-central-1",
      awsBin: "/opt/aws/bin/aws",
      configPath: join(withFile, "opskit.json"),
    });
  });

  test("flags beat environment beats config file", () => {
    const cfg = resolveConfig(
      { mock: true, region: "us-west-2", verbose: true },
      { XDG_CONFIG_HOME: withFile, OPSKIT_AWS_BIN: "/usr/local/bin/aws" },
    );
    expect(cfg).toMatchObject({
      mode: "mock",
      region: "us-west-2",
      awsBin: "/usr/local/bin/aws",
      verbose: true,
    });
  });
});

describe("resolveFormat", () => {
  test("takes the format from the config file", () => {
    expect(resolveFormat({}, { XDG_CONFIG_HOME: withJsonFormat })).toBe("json");
  });

  test("the flag wins over the config file", () => {
    expect(resolveFormat({ format: "table" }, { XDG_CONFIG_HOME: withJsonFormat })).toBe("table");
  });

  test("structured maps to json", () => {
    expect(resolveFormat({ format: "structured" }, emptyEnv())).toBe("json");
  });

  test("an invalid config file falls back to table", () => {
    expect(resolveFormat({}, { XDG_CONFIG_HOME: withBadFile })).toBe("table");
  });
});

describe("parseConfigFile", () => {
  test("reports schema violations", () => {
    const result = parseConfigFile(join(withBadFile, "opskit.json"));
    expect(result.ok).toBe(false);
  });

  test("reports unreadable files", () => {
    expect(parseConfigFile(join(dir, "missing.json")).ok).toBe(false);
  });
});
