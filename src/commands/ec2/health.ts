import chalk from "chalk";
import { defineCommand } from "../../core/define-command.ts";
import { resolveConfig } from "../../config/index.ts";
import { openDataSource } from "../../sources/index.ts";
import { checkInstances, type HealthStatus } from "../../analyzers/ec2.ts";
import { spinner } from "../../core/ui.ts";
import { logger } from "../../core/logger.ts";
import { formatTable } from "../../core/format.ts";

const COMMAND = "health";
const DESCRIPTION = "Check EC2 instances for stopped state and risky settings.";

const STATUS_STYLE: Record<HealthStatus, (s: string) => string> = {
  ok: chalk.green,
  warn: chalk.yellow,
  critical: chalk.red,
};

/**
 * Report a health status per instance. `critical` covers stopped and
 * terminated instances; `warn` covers transitional states, a missing
 * `Name` tag, public IPs, IMDSv1 and disabled detailed monitoring.
 *
 * @example
 * ```bash
 * opskit ec2 health
 * opskit ec2 health --real --region us-east-1 --format json
 * ```
 */
export const ec2HealthCommand = defineCommand({
  command: COMMAND,
  describe: DESCRIPTION,

  handler: async (args) => {
    const config = resolveConfig(args);
    const source = openDataSource(config, "instances");

    const spin = spinner("Fetching instances...");
    spin.start();
    let doc: unknown;
    try {
      doc = await source.describeInstances();
    } finally {
      spin.stop();
    }

    const reports = checkInstances(doc);

    if (config.format === "json") {
      logger.log(JSON.stringify(reports, null, 2));
      return;
    }

    if (reports.length === 0) {
      logger.info("No instances found.");
      return;
    }

    logger.log(
      formatTable(
        ["Instance ID", "Name", "State", "Health", "Issues"],
        reports.map((r) => [
          r.id,
          r.name,
          r.state,
          STATUS_STYLE[r.status](r.status),
          r.issues.join("; ") || "-",
        ]),
      ),
    );

    const count = (status: HealthStatus) => reports.filter((r) => r.status === status).length;
    logger.dim(
      `${reports.length} instance(s): ${count("ok")} ok, ${count("warn")} warn, ${count("critical")} critical`,
    );
  },
});
