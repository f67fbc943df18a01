import { existsSync } from "node:fs";
import { join } from "node:path";
import chalk from "chalk";
import { defineCommand } from "../core/define-command.ts";
import { parseConfigFile, resolveConfig, type ResolvedConfig } from "../config/index.ts";
import { FIXTURE_FILES } from "../sources/index.ts";
import { findExecutable } from "../utils/exec.ts";
import { EXIT_USAGE } from "../core/errors.ts";
import { logger } from "../core/logger.ts";
import { formatTable } from "../core/format.ts";

const MIN_NODE_MAJOR = 20;

export type CheckStatus = "ok" | "warn" | "fail";

export interface DoctorCheck {
  name: string;
  status: CheckStatus;
  detail: string;
}

const STATUS_STYLE: Record<CheckStatus, (s: string) => string> = {
  ok: chalk.green,
  warn: chalk.yellow,
  fail: chalk.red,
};

/** Inspect the local environment. Only `fail` results make the toolkit unusable. */
export function runChecks(
  config: ResolvedConfig,
  env: NodeJS.ProcessEnv = process.env,
  nodeVersion: string = process.versions.node,
): DoctorCheck[] {
  const checks: DoctorCheck[] = [];

  const major = Number(nodeVersion.split(".")[0]);
  checks.push({
    name: "Node.js",
    status: major >= MIN_NODE_MAJOR ? "ok" : "fail",
    detail: major >= MIN_NODE_MAJOR ? `v${nodeVersion}` : `v${nodeVersion} (need ${MIN_NODE_MAJOR} or newer)`,
  });

  if (config.configPath === null) {
    checks.push({ name: "Config file", status: "ok", detail: "none (using defaults)" });
  } else {
    const parsed = parseConfigFile(config.configPath);
    checks.push(
      parsed.ok
        ? { name: "Config file", status: "ok", detail: config.configPath }
        : { name: "Config file", status: "fail", detail: `${config.configPath}: ${parsed.error}` },
    );
  }

  const aws = findExecutable(config.awsBin, env);
  checks.push(
    aws
      ? { name: "AWS CLI", status: "ok", detail: aws }
      : { name: "AWS CLI", status: "warn", detail: `${config.awsBin} not found; --real unavailable` },
  );

  for (const file of Object.values(FIXTURE_FILES)) {
    const path = join(config.fixturesDir, file);
    checks.push({
      name: `Fixture ${file}`,
      status: existsSync(path) ? "ok" : "fail",
      detail: existsSync(path) ? path : `missing: ${path}`,
    });
  }

  return checks;
}

/**
 * Check that the toolkit can run here: Node.js version, config file,
 * AWS CLI availability and fixture files. Exits 2 when a required
 * check fails; a missing AWS CLI only disables live mode.
 *
 * @example
 * ```bash
 * opskit doctor
 * ```
 */
export const doctorCommand = defineCommand({
  command: "doctor",
  describe: "Check that the environment can run the toolkit.",

  handler: async (args) => {
    const config = resolveConfig(args);
    const checks = runChecks(config);
    const ok = checks.every((c) => c.status !== "fail");

    if (config.format === "json") {
      logger.log(JSON.stringify({ ok, checks }, null, 2));
    } else {
      logger.log(
        formatTable(
          ["Check", "Status", "Detail"],
          checks.map((c) => [c.name, STATUS_STYLE[c.status](c.status), c.detail]),
        ),
      );
      if (ok) logger.success("Environment looks good.");
      else logger.error("Some required checks failed.");
    }

    if (!ok) process.exitCode = EXIT_USAGE;
  },
});
