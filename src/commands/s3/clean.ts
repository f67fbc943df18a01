import { defineCommand } from "../../core/define-command.ts";
import { resolveConfig } from "../../config/index.ts";
import { openDataSource, type DeleteOutcome } from "../../sources/index.ts";
import { planCleanup, type CleanupPlan } from "../../analyzers/s3.ts";
import { EXIT_FAILURE, UserError } from "../../core/errors.ts";
import { confirm, spinner } from "../../core/ui.ts";
import { logger } from "../../core/logger.ts";
import { formatBytes, formatTable } from "../../core/format.ts";
import {
  ARG_APPLY,
  ARG_BUCKET,
  ARG_DRY_RUN,
  ARG_OLDER_THAN,
  ARG_YES,
  ARG_YES_ALIAS,
  MAX_OLDER_THAN_DAYS,
} from "./constants.ts";

const COMMAND = `clean <${ARG_BUCKET}>`;
const DESCRIPTION = "Find (and optionally delete) objects older than a number of days.";

interface CleanArgs {
  [ARG_BUCKET]: string;
  [ARG_OLDER_THAN]: number;
  [ARG_APPLY]?: boolean;
  [ARG_DRY_RUN]?: boolean;
  [ARG_YES]?: boolean;
}

/**
 * Report objects in a bucket whose last modification is older than
 * `--older-than` days. Nothing is deleted unless `--apply` is passed;
 * on a terminal, `--apply` still asks for confirmation unless `--yes`.
 *
 * In mock mode deletions are simulated and the fixture is left untouched.
 *
 * @example
 * ```bash
 * # Dry run (default)
 * opskit s3 clean my-bucket --older-than 30
 *
 * # Delete for real, no prompt
 * opskit s3 clean my-bucket --older-than 30 --apply --yes --real --profile ops
 * ```
 */
export const s3CleanCommand = defineCommand<CleanArgs>({
  command: COMMAND,
  describe: DESCRIPTION,

  builder: (yargs) =>
    yargs
      .positional(ARG_BUCKET, {
        type: "string",
        demandOption: true,
        describe: "Bucket name",
      })
      .option(ARG_OLDER_THAN, {
        type: "number",
        demandOption: "Missing --older-than DAYS",
        describe: "Minimum age in days",
      })
      .option(ARG_DRY_RUN, {
        type: "boolean",
        describe: "Only report what would be deleted (default)",
      })
      .option(ARG_APPLY, {
        type: "boolean",
        describe: "Delete the matching objects",
      })
      .option(ARG_YES, {
        alias: ARG_YES_ALIAS,
        type: "boolean",
        describe: "Skip the confirmation prompt for --apply",
      })
      .conflicts(ARG_APPLY, ARG_DRY_RUN),

  preRun: async ({ [ARG_BUCKET]: bucket, [ARG_OLDER_THAN]: olderThan }) => {
    if (!bucket.trim()) {
      throw new UserError("Missing bucket.", "Example: opskit s3 clean my-bucket --older-than 30");
    }
    if (!Number.isInteger(olderThan) || olderThan < 0 || olderThan > MAX_OLDER_THAN_DAYS) {
      throw new UserError(
        `--older-than must be a whole number of days from 0 to ${MAX_OLDER_THAN_DAYS}.`,
      );
    }
  },

  handler: async (args) => {
    const { [ARG_BUCKET]: bucket, [ARG_OLDER_THAN]: olderThanDays, [ARG_YES]: yes } = args;
    const apply = args[ARG_APPLY] === true;
    const config = resolveConfig(args);
    const source = openDataSource(config, "objects");

    const spin = spinner(`Listing objects in ${bucket}...`);
    spin.start();
    let doc: unknown;
    try {
      doc = await source.listObjects(bucket);
    } finally {
      spin.stop();
    }

    const plan = planCleanup(doc, { bucket, olderThanDays, apply });
    let outcome: DeleteOutcome | undefined;

    if (apply && plan.candidates.length > 0) {
      const confirmed =
        source.mode === "mock" ||
        (await confirm(
          `Permanently delete ${plan.candidates.length} object(s) from ${bucket}?`,
          { force: yes },
        ));
      if (!confirmed) {
        logger.info("Cancelled. Nothing was deleted.");
        if (config.format === "json") printResult(plan, undefined, true, true);
        return;
      }

      const deleteSpin = spinner(`Deleting ${plan.candidates.length} object(s)...`);
      deleteSpin.start();
      try {
        outcome = await source.deleteObjects(bucket, plan.candidates.map((c) => c.key));
      } finally {
        deleteSpin.stop();
      }
    }

    printResult(plan, outcome, config.format === "json");

    if (outcome && outcome.errors.length > 0) {
      process.exitCode = EXIT_FAILURE;
    }
  },
});

function printResult(
  plan: CleanupPlan,
  outcome: DeleteOutcome | undefined,
  json: boolean,
  cancelled = false,
) {
  if (json) {
    logger.log(
      JSON.stringify(
        {
          ...plan,
          dryRun: !plan.apply,
          deleted: outcome?.deleted ?? [],
          errors: outcome?.errors ?? [],
          simulated: outcome?.simulated ?? false,
          cancelled,
        },
        null,
        2,
      ),
    );
    return;
  }

  if (plan.candidates.length === 0) {
    logger.info(
      `No objects older than ${plan.olderThanDays} day(s) in ${plan.bucket} (${plan.scanned} scanned).`,
    );
    return;
  }

  logger.log(
    formatTable(
      ["Key", "Size", "Last Modified", "Age (days)"],
      plan.candidates.map((c) => [c.key, formatBytes(c.size), c.lastModified, String(c.ageDays)]),
    ),
  );

  const summary = `${plan.candidates.length} object(s), ${formatBytes(plan.totalBytes)}`;

  if (!outcome) {
    logger.info(`Dry run: ${summary} would be deleted from ${plan.bucket}.`);
    logger.dim("Re-run with --apply to delete.");
    return;
  }

  if (outcome.simulated) {
    logger.success(`[mock] Simulated deletion of ${outcome.deleted.length} object(s) from ${plan.bucket}.`);
    return;
  }

  if (outcome.deleted.length > 0) {
    logger.success(`Deleted ${outcome.deleted.length} object(s) from ${plan.bucket}.`);
  }
  for (const e of outcome.errors) {
    logger.error(`${e.key}: ${e.message}`);
  }
}
