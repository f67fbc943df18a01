import { defineCommand } from "../../core/define-command.ts";
import { resolveConfig } from "../../config/index.ts";
import { logger } from "../../core/logger.ts";
import { formatKeyValue } from "../../core/format.ts";

export const configShowCommand = defineCommand({
  command: "show",
  describe: "Show the resolved configuration.",

  handler: async (args) => {
    const cfg = resolveConfig(args);

    if (cfg.format === "json") {
      logger.log(JSON.stringify(cfg, null, 2));
      return;
    }

    logger.log(
      formatKeyValue([
        { key: "Mode", value: cfg.mode },
        { key: "Format", value: cfg.format },
        { key: "Profile", value: cfg.profile ?? "(AWS CLI default)" },
        { key: "Region", value: cfg.region ?? "(AWS CLI default)" },
        { key: "AWS CLI", value: cfg.awsBin },
        { key: "Fixtures", value: cfg.fixturesDir },
        { key: "Config file", value: cfg.configPath ?? "(none)" },
      ]),
    );
  },
});
