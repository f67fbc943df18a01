import yargs from "yargs";
import { configNamespace } from "./commands/config/index.ts";
import { doctorCommand } from "./commands/doctor.ts";
import { ec2Namespace } from "./commands/ec2/index.ts";
import { logsNamespace } from "./commands/logs/index.ts";
import { s3Namespace } from "./commands/s3/index.ts";
import { UsageError, exitCodeFor } from "./core/errors.ts";
import { logger } from "./core/logger.ts";
import { VERSION } from "./core/version.ts";

/**
 * Build the command tree for one invocation.
 *
 * Global flags are accepted anywhere on the line, before or after the
 * subcommand and its positionals.
 */
export function createCli(argv: readonly string[]) {
  const cli = yargs([...argv]);
  return cli
    .scriptName("opskit")
    .version(VERSION)
    .usage("$0 <command> [options]")

    .option("mock", {
      type: "boolean",
      describe: "Use fixture data (default)",
      global: true,
    })
    .option("real", {
      alias: "live",
      type: "boolean",
      describe: "Call the installed AWS CLI",
      global: true,
    })
    .option("format", {
      type: "string",
      choices: ["table", "json", "structured"] as const,
      describe: "Output format (structured is an alias of json)",
      global: true,
    })
    .option("profile", {
      type: "string",
      describe: "AWS credentials profile",
      global: true,
    })
    .option("region", {
      type: "string",
      describe: "AWS region",
      global: true,
    })
    .option("verbose", {
      alias: "v",
      type: "boolean",
      default: false,
      describe: "Enable verbose output",
      global: true,
    })

    .command(doctorCommand)
    .command(ec2Namespace)
    .command(s3Namespace)
    .command(logsNamespace)
    .command(configNamespace)
    .command("help", "Show help", {}, () => {
      cli.showHelp("log");
    })

    .demandCommand(1, "Missing command. Run `opskit --help` to see available commands.")
    .recommendCommands()
    .strict()
    .exitProcess(false)
    .fail((msg, err, y) => {
      if (err) throw err;
      logger.error(msg);
      console.error();
      y.showHelp();
      throw new UsageError(msg);
    })
    .help()
    .alias("help", "h")
    .wrap(Math.min(120, process.stdout.columns ?? 80));
}

/**
 * Parse `argv`, run the matching command, and return the exit code.
 * Usage errors have already been printed by the time they reach here.
 */
export async function run(argv: readonly string[]): Promise<number> {
  try {
    await createCli(argv).parseAsync();
  } catch (err: unknown) {
    if (!(err instanceof UsageError)) {
      logger.error(err instanceof Error ? err.message : String(err));
    }
    process.exitCode = exitCodeFor(err);
  }
  return Number(process.exitCode ?? 0);
}
