import { spawn } from "node:child_process";
import { accessSync, constants, statSync } from "node:fs";
import { delimiter, isAbsolute, join, resolve } from "node:path";
import { DownstreamError, ToolNotFoundError } from "../core/errors.ts";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  /** Aborting kills the child; the returned promise still waits for it to exit. */
  signal?: AbortSignal;
}

/** Runs an external program to completion. Swappable in tests. */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  opts?: RunOptions,
) => Promise<CommandResult>;

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate an executable. Names containing a path separator are checked
 * as-is; bare names are searched on `PATH`.
 *
 * Returns the absolute path, or `null` when nothing executable is found.
 */
export function findExecutable(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  if (isAbsolute(name) || name.includes("/")) {
    const full = resolve(name);
    return isExecutableFile(full) ? full : null;
  }

  const dirs = (env.PATH ?? "").split(delimiter).filter((d) => d.length > 0);
  const exts = process.platform === "win32"
    ? (env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";")
    : [""];

  for (const dir of dirs) {
    for (const ext of exts) {
      const candidate = join(dir, name + ext);
      if (isExecutableFile(candidate)) return candidate;
    }
  }
  return null;
}

/**
 * Spawn a program, capture its output, and resolve once it has exited.
 *
 * The promise settles only after the child is gone: a spawn failure
 * rejects with {@link ToolNotFoundError}, an abort kills the child and
 * rejects after it has been reaped. A non-zero exit is not an error here;
 * see {@link runChecked}.
 */
export const runCommand: CommandRunner = (command, args, opts = {}) =>
  new Promise<CommandResult>((resolvePromise, reject) => {
    const child = spawn(command, [...args], {
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let spawnError: Error | undefined;

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    const onAbort = () => {
      child.kill("SIGTERM");
    };
    if (opts.signal?.aborted) onAbort();
    opts.signal?.addEventListener("abort", onAbort, { once: true });

    child.on("error", (err: NodeJS.ErrnoException) => {
      spawnError = err.code === "ENOENT" ? new ToolNotFoundError(command) : err;
      // An ENOENT child never starts, so "close" may not follow.
      if (child.pid === undefined) finish(null, null);
    });

    child.on("close", (code, signal) => finish(code, signal));

    let settled = false;
    function finish(code: number | null, signal: NodeJS.Signals | null) {
      if (settled) return;
      settled = true;
      opts.signal?.removeEventListener("abort", onAbort);

      if (spawnError) {
        reject(spawnError);
        return;
      }
      if (opts.signal?.aborted) {
        reject(new DownstreamError(`${command} was cancelled.`, 130));
        return;
      }
      resolvePromise({
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
        // Killed by a signal: report the shell convention 128 + n.
        exitCode: code ?? (signal ? 128 + signalNumber(signal) : 1),
      });
    }
  });

function signalNumber(signal: NodeJS.Signals): number {
  const numbers: Partial<Record<NodeJS.Signals, number>> = {
    SIGHUP: 1,
    SIGINT: 2,
    SIGKILL: 9,
    SIGTERM: 15,
  };
  return numbers[signal] ?? 0;
}

/**
 * An abort signal that fires when the process receives SIGINT or SIGTERM.
 * Call `release` once the guarded work is done to restore default handling.
 */
export function watchInterrupts(
  target: NodeJS.EventEmitter = process,
): { signal: AbortSignal; release: () => void } {
  const controller = new AbortController();
  const abort = () => controller.abort();
  target.once("SIGINT", abort);
  target.once("SIGTERM", abort);
  return {
    signal: controller.signal,
    release: () => {
      target.off("SIGINT", abort);
      target.off("SIGTERM", abort);
    },
  };
}

/** Run a program and throw {@link DownstreamError} when it exits non-zero. */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  opts?: RunOptions,
): Promise<string> {
  const result = await runner(command, args, opts);
  if (result.exitCode !== 0) {
    throw new DownstreamError(
      `${[command, ...args.slice(0, 2)].join(" ")} exited with status ${result.exitCode}.`,
      result.exitCode,
      result.stderr.trim(),
    );
  }
  return result.stdout;
}
