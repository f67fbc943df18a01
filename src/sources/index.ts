import type { ResolvedConfig } from "../config/index.ts";
import type { CommandRunner } from "../utils/exec.ts";
import { FixtureSource } from "./fixture-source.ts";
import { LiveSource } from "./live-source.ts";
import type { DataSource, ResourceKind } from "./types.ts";
import { logger } from "../core/logger.ts";

export type { DataSource, DeleteOutcome, ResourceKind } from "./types.ts";
export { FixtureSource, FIXTURE_FILES } from "./fixture-source.ts";
export { LiveSource, DELETE_BATCH_SIZE } from "./live-source.ts";

/** Pick the data source for the configured mode. */
export function createDataSource(config: ResolvedConfig, runner?: CommandRunner): DataSource {
  if (config.mode === "live") {
    return new LiveSource(
      {
        awsBin: config.awsBin,
        profile: config.profile,
        region: config.region,
        verbose: config.verbose,
      },
      runner,
    );
  }
  return new FixtureSource(config.fixturesDir);
}

/**
 * Create the source for `config.mode` and check it can serve `kind`.
 * Fails before anything is read or spawned.
 */
export function openDataSource(
  config: ResolvedConfig,
  kind: ResourceKind,
  runner?: CommandRunner,
): DataSource {
  const source = createDataSource(config, runner);
  source.ensureAvailable(kind);
  logger.debug(`mode=${config.mode} source=${source.origin(kind)}`, config.verbose);
  return source;
}
