import type { CommandModule, Argv } from "yargs";
import type { GlobalArgs } from "./types.ts";
import { DownstreamError, UserError, exitCodeFor } from "./errors.ts";
import { logger } from "./logger.ts";
import { resolveFormat } from "../config/index.ts";

interface CommandDef<A = {}> {
  command: string;
  aliases?: readonly string[];
  describe: string;
  /** Define command-specific flags and positional arguments. */
  builder?: (yargs: Argv) => Argv<A>;
  /**
   * Runs before the handler. Use for validation that should prevent execution.
   * Throw {@link UserError} to abort with a clean message.
   */
  preRun?: (args: A & GlobalArgs) => Promise<void>;
  /** Main command handler. Global flags (`mock`, `real`, `format`, `profile`, `region`, `verbose`) are always available on `args`. */
  handler: (args: A & GlobalArgs) => Promise<void>;
}

/**
 * Command factory for leaf commands. Wraps the handler with consistent
 * error handling and lifecycle hooks (`preRun` → `handler`).
 *
 * Errors are caught and formatted based on `--format` (or the config file's `format`):
 * - **table** — Human-readable messages via `logger`, with optional hints.
 * - **json** — Structured `{ error, hint?, exitCode? }` to stdout.
 *
 * Exit codes: `2` for user errors, the child's status for a failed AWS CLI
 * call, `1` for unexpected errors. The code is set on `process.exitCode`
 * so the process ends on its own once output is flushed.
 *
 * @example
 * ```ts
 * export const myCommand = defineCommand<{ bucket: string }>({
 *   command: "inspect <bucket>",
 *   describe: "Inspect a bucket.",
 *   handler: async (args) => {
 *     const config = resolveConfig(args);
 *     // ...
 *   },
 * });
 * ```
 */
export function defineCommand<A = {}>(def: CommandDef<A>): CommandModule {
  return {
    command: def.command,
    aliases: def.aliases,
    describe: def.describe,
    builder: def.builder as unknown as CommandModule["builder"],
    handler: async (argv) => {
      const args = argv as unknown as A & GlobalArgs;
      try {
        if (def.preRun) await def.preRun(args);
        await def.handler(args);
      } catch (err: unknown) {
        process.exitCode = reportError(err, args);
      }
    },
  };
}

function reportError(err: unknown, args: GlobalArgs): number {
  const code = exitCodeFor(err);
  const structured = resolveFormat(args) === "json";

  if (structured) {
    const payload: Record<string, unknown> = {
      error: err instanceof Error ? err.message : "An unexpected error occurred.",
    };
    if (err instanceof UserError && err.hint) payload.hint = err.hint;
    if (err instanceof DownstreamError) payload.exitCode = err.exitCode;
    logger.log(JSON.stringify(payload));
    return code;
  }

  if (err instanceof UserError) {
    logger.error(err.message);
    if (err.hint) logger.dim(err.hint);
    return code;
  }

  if (err instanceof DownstreamError) {
    logger.error(err.message);
    if (err.stderr) logger.dim(err.stderr);
    return code;
  }

  logger.error("An unexpected error occurred.");
  if (args.verbose) console.error(err);
  return code;
}
