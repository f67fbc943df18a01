import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { ConfigFileSchema, type ConfigFile } from "./schema.ts";
import { findConfigFile } from "./paths.ts";
import { logger } from "../core/logger.ts";
import { UserError } from "../core/errors.ts";
import type { GlobalArgs, GlobalOptions, Mode, OutputFormat } from "../core/types.ts";

export const DEFAULT_AWS_BIN = "aws";
export const DEFAULT_FIXTURES_DIR = fileURLToPath(new URL("../../fixtures", import.meta.url));

export interface ResolvedConfig extends GlobalOptions {
  /** AWS CLI executable: a bare name looked up on PATH, or a path. */
  readonly awsBin: string;
  readonly fixturesDir: string;
  /** Config file the defaults were read from, if any. */
  readonly configPath: string | null;
}

/**
 * Build the immutable configuration for one invocation.
 *
 * Precedence: command-line flags, then `OPSKIT_*` environment variables,
 * then the config file, then built-in defaults.
 */
export function resolveConfig(
  args: GlobalArgs,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  if (args.mock && args.real) {
    throw new UserError("--mock and --real are mutually exclusive.");
  }

  const configPath = findConfigFile(env);
  const file: ConfigFile = (configPath ? loadConfigFile(configPath) : null) ?? {};

  const mode: Mode = args.real ? "live" : args.mock ? "mock" : (file.mode ?? "mock");

  const config: ResolvedConfig = {
    mode,
    format: normalizeFormat(args.format) ?? file.format ?? "table",
    profile: args.profile || file.profile,
    region: args.region || file.region,
    verbose: args.verbose,
    awsBin: env.OPSKIT_AWS_BIN || file.aws_bin || DEFAULT_AWS_BIN,
    fixturesDir: env.OPSKIT_FIXTURES_DIR || file.fixtures_dir || DEFAULT_FIXTURES_DIR,
    configPath,
  };
  return Object.freeze(config);
}

/**
 * Output format alone, for reporting errors before (or instead of) a full
 * {@link resolveConfig}. Follows the same flag > config file > default order.
 */
export function resolveFormat(
  args: Pick<GlobalArgs, "format">,
  env: NodeJS.ProcessEnv = process.env,
): OutputFormat {
  const flag = normalizeFormat(args.format);
  if (flag) return flag;
  const configPath = findConfigFile(env);
  const parsed = configPath ? parseConfigFile(configPath) : null;
  return (parsed?.ok ? parsed.config.format : undefined) ?? "table";
}

/** `structured` is accepted on the command line as another name for `json`. */
export function normalizeFormat(format: GlobalArgs["format"]): OutputFormat | undefined {
  if (format === "structured") return "json";
  return format;
}

/** Parse and validate a config file. Returns `null` (with a warning) when it is unusable. */
export function loadConfigFile(path: string): ConfigFile | null {
  const result = parseConfigFile(path);
  if (!result.ok) {
    logger.warn(`Failed to parse config file: ${path}`);
    return null;
  }
  return result.config;
}

export type ParsedConfig =
  | { ok: true; config: ConfigFile }
  | { ok: false; error: string };

export function parseConfigFile(path: string): ParsedConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err: unknown) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") };
  }
  return { ok: true, config: parsed.data };
}
