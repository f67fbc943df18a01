import { defineCommand } from "../../core/define-command.ts";
import { resolveConfig } from "../../config/index.ts";
import { openDataSource } from "../../sources/index.ts";
import { summarizeInstances } from "../../analyzers/ec2.ts";
import { spinner } from "../../core/ui.ts";
import { logger } from "../../core/logger.ts";
import { formatTable } from "../../core/format.ts";

const COMMAND = "list";
const ALIASES = ["ls"] as const;
const DESCRIPTION = "List EC2 instances.";

/**
 * List every instance from `ec2 describe-instances`, sorted by instance ID
 * and rendered as a table (ID, Name, Type, State, AZ, IPs, launch time).
 *
 * @example
 * ```bash
 * # Fixture data
 * opskit ec2 list
 *
 * # Live account, JSON for scripting
 * opskit ec2 list --real --profile ops --region eu-west-1 --format json
 * ```
 */
export const ec2ListCommand = defineCommand({
  command: COMMAND,
  aliases: ALIASES,
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

    const instances = summarizeInstances(doc);

    if (config.format === "json") {
      logger.log(JSON.stringify(instances, null, 2));
      return;
    }

    if (instances.length === 0) {
      logger.info("No instances found.");
      return;
    }

    logger.log(
      formatTable(
        ["Instance ID", "Name", "Type", "State", "AZ", "Private IP", "Public IP", "Launched"],
        instances.map((i) => [
          i.id,
          i.name,
          i.type,
          i.state,
          i.zone,
          i.privateIp,
          i.publicIp,
          i.launchTime,
        ]),
      ),
    );
  },
});
