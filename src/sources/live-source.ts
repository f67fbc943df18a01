import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { DownstreamError, ToolNotFoundError } from "../core/errors.ts";
import { logger } from "../core/logger.ts";
import {
  findExecutable,
  runChecked,
  runCommand,
  watchInterrupts,
  type CommandRunner,
} from "../utils/exec.ts";
import type { DataSource, DeleteOutcome, ResourceKind } from "./types.ts";

/** `delete-objects` accepts at most this many keys per request. */
export const DELETE_BATCH_SIZE = 1000;

const DeleteObjectsOutputSchema = z.object({
  Deleted: z.array(z.object({ Key: z.string() })).optional(),
  Errors: z
    .array(
      z.object({
        Key: z.string(),
        Code: z.string().optional(),
        Message: z.string().optional(),
      }),
    )
    .optional(),
});

export interface LiveSourceOptions {
  awsBin: string;
  profile?: string;
  region?: string;
  verbose: boolean;
}

/**
 * Shells out to the AWS CLI and hands back its JSON output.
 *
 * Each call spawns one `aws` process and waits for it to exit; a non-zero
 * status surfaces as {@link DownstreamError} with the CLI's own exit code.
 * SIGINT or SIGTERM during a call kills the child before the error propagates.
 */
export class LiveSource implements DataSource {
  readonly mode = "live";
  private resolvedBin: string | null = null;

  constructor(
    private readonly opts: LiveSourceOptions,
    private readonly runner: CommandRunner = runCommand,
  ) {}

  ensureAvailable(_kind: ResourceKind): void {
    this.bin();
  }

  origin(kind: ResourceKind): string {
    const sub = kind === "instances" ? "ec2 describe-instances" : "s3api list-objects-v2";
    return `${this.opts.awsBin} ${sub}`;
  }

  describeInstances(): Promise<unknown> {
    return this.aws(["ec2", "describe-instances"]);
  }

  listObjects(bucket: string): Promise<unknown> {
    return this.aws(["s3api", "list-objects-v2", "--bucket", bucket]);
  }

  async deleteObjects(bucket: string, keys: readonly string[]): Promise<DeleteOutcome> {
    const outcome: DeleteOutcome = { deleted: [], errors: [], simulated: false };
    // A 1000-key payload can exceed the per-argument limit of execve, so it goes through a file.
    const scratch = mkdtempSync(join(tmpdir(), "opskit-delete-"));
    const payloadPath = join(scratch, "delete.json");

    try {
      for (let i = 0; i < keys.length; i += DELETE_BATCH_SIZE) {
        const batch = keys.slice(i, i + DELETE_BATCH_SIZE);
        writeFileSync(
          payloadPath,
          JSON.stringify({ Objects: batch.map((Key) => ({ Key })), Quiet: true }),
        );
        const output = DeleteObjectsOutputSchema.safeParse(
          await this.aws([
            "s3api",
            "delete-objects",
            "--bucket",
            bucket,
            "--delete",
            `file://${payloadPath}`,
          ]),
        );
        if (!output.success) {
          throw new DownstreamError("Unexpected output from aws s3api delete-objects.", 1);
        }

        const failed = new Set<string>();
        for (const e of output.data.Errors ?? []) {
          failed.add(e.Key);
          outcome.errors.push({ key: e.Key, message: e.Message ?? e.Code ?? "unknown error" });
        }
        outcome.deleted.push(...batch.filter((k) => !failed.has(k)));
      }
    } finally {
      rmSync(scratch, { recursive: true, force: true });
    }

    return outcome;
  }

  /** Global flags appended to every AWS CLI call. */
  baseArgs(): string[] {
    const args: string[] = [];
    if (this.opts.profile) args.push("--profile", this.opts.profile);
    if (this.opts.region) args.push("--region", this.opts.region);
    args.push("--output", "json");
    return args;
  }

  private bin(): string {
    if (this.resolvedBin) return this.resolvedBin;
    const found = findExecutable(this.opts.awsBin);
    if (!found) {
      throw new ToolNotFoundError(
        "AWS CLI",
        "Install awscli, set OPSKIT_AWS_BIN, or run with --mock.",
      );
    }
    this.resolvedBin = found;
    return found;
  }

  private async aws(args: string[]): Promise<unknown> {
    const bin = this.bin();
    const full = [...args, ...this.baseArgs()];
    logger.debug(`aws ${full.join(" ")}`, this.opts.verbose);

    const interrupts = watchInterrupts();
    let stdout: string;
    try {
      stdout = await runChecked(this.runner, bin, full, { signal: interrupts.signal });
    } finally {
      interrupts.release();
    }
    // `--output json` prints nothing at all for some empty results.
    if (stdout.trim() === "") return {};
    try {
      return JSON.parse(stdout);
    } catch {
      throw new DownstreamError(`aws ${args.slice(0, 2).join(" ")} returned output that is not JSON.`, 1);
    }
  }
}
