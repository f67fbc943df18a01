import type { CommandModule } from "yargs";

/**
 * Groups subcommands under a parent namespace. Running the namespace
 * without a subcommand is a usage error (enforced via `demandCommand(1)`).
 *
 * @example
 * ```ts
 * export const ec2Namespace = defineNamespace(
 *   "ec2",
 *   "Inspect EC2 instances.",
 *   [ec2ListCommand, ec2HealthCommand],
 * );
 * ```
 */
export function defineNamespace(
  command: string,
  describe: string,
  subcommands: CommandModule[],
): CommandModule {
  return {
    command,
    describe,
    builder: (yargs) => {
      for (const sub of subcommands) yargs.command(sub);
      return yargs.demandCommand(1, `Missing ${command} subcommand. Run \`opskit ${command} --help\` for usage.`);
    },
    handler: () => {},
  };
}
