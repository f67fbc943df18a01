import { statSync } from "node:fs";
import { defineCommand } from "../../core/define-command.ts";
import { resolveConfig } from "../../config/index.ts";
import { analyzeLogFile } from "../../analyzers/logs.ts";
import { UserError } from "../../core/errors.ts";
import { logger } from "../../core/logger.ts";
import { formatTable } from "../../core/format.ts";

const ARG_PATH = "path";
const ARG_SINCE_MIN = "since-min";
const ARG_TOP = "top";

const DEFAULT_TOP = 10;
const MAX_SINCE_MINUTES = 36_500 * 24 * 60;

interface AnalyzeArgs {
  [ARG_PATH]: string;
  [ARG_SINCE_MIN]: number;
  [ARG_TOP]: number;
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Rank the most frequent and most severe events in a local log file.
 * Variable parts of messages (ids, numbers, addresses) are folded so
 * repeats group together. Reads the file directly; `--mock`/`--real` do
 * not apply.
 *
 * @example
 * ```bash
 * opskit logs analyze /var/log/app.log
 * opskit logs analyze app.log --since-min 60 --top 5 --format json
 * ```
 */
export const logsAnalyzeCommand = defineCommand<AnalyzeArgs>({
  command: `analyze <${ARG_PATH}>`,
  describe: "Summarize a log file by level and recurring message.",

  builder: (yargs) =>
    yargs
      .positional(ARG_PATH, {
        type: "string",
        demandOption: true,
        describe: "Log file to read",
      })
      .option(ARG_SINCE_MIN, {
        type: "number",
        default: 0,
        describe: "Only entries from the last N minutes (0 = all)",
      })
      .option(ARG_TOP, {
        type: "number",
        default: DEFAULT_TOP,
        describe: "Number of groups to show",
      }),

  preRun: async ({ [ARG_PATH]: path, [ARG_SINCE_MIN]: sinceMin, [ARG_TOP]: top }) => {
    if (!Number.isInteger(sinceMin) || sinceMin < 0 || sinceMin > MAX_SINCE_MINUTES) {
      throw new UserError(
        `--since-min must be a whole number of minutes from 0 to ${MAX_SINCE_MINUTES}.`,
      );
    }
    if (!Number.isInteger(top) || top < 1) {
      throw new UserError("--top must be a whole number, 1 or more.");
    }
    if (!isFile(path)) {
      throw new UserError(`Log file not found: ${path}`);
    }
  },

  handler: async (args) => {
    const config = resolveConfig(args);
    const { [ARG_PATH]: path, [ARG_SINCE_MIN]: sinceMinutes, [ARG_TOP]: top } = args;

    logger.debug(`path=${path} since-min=${sinceMinutes} top=${top}`, config.verbose);
    const report = await analyzeLogFile(path, { sinceMinutes, top });

    if (config.format === "json") {
      logger.log(JSON.stringify(report, null, 2));
      return;
    }

    if (report.top.length === 0) {
      logger.info(`No matching log entries (${report.scanned} line(s) scanned).`);
      return;
    }

    logger.log(
      formatTable(
        ["Level", "Count", "Last Seen", "Pattern"],
        report.top.map((g) => [g.level, String(g.count), g.lastSeen ?? "-", g.pattern]),
      ),
    );

    const levels = Object.entries(report.levels)
      .map(([level, n]) => `${level} ${n}`)
      .join(", ");
    logger.dim(`${report.matched} of ${report.scanned} line(s) matched: ${levels}`);
  },
});
