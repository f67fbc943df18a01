import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { UserError } from "../core/errors.ts";
import type { DataSource, DeleteOutcome, ResourceKind } from "./types.ts";

export const FIXTURE_FILES: Record<ResourceKind, string> = {
  instances: "ec2_describe_instances.json",
  objects: "s3_list_objects.json",
};

/**
 * Serves canned AWS CLI responses from a fixtures directory.
 *
 * Fixtures are read-only: `deleteObjects` reports what would have been
 * removed and leaves the files untouched.
 */
export class FixtureSource implements DataSource {
  readonly mode = "mock";

  constructor(private readonly dir: string) {}

  fixturePath(kind: ResourceKind): string {
    return join(this.dir, FIXTURE_FILES[kind]);
  }

  ensureAvailable(kind: ResourceKind): void {
    const path = this.fixturePath(kind);
    if (!existsSync(path)) {
      throw new UserError(
        `Mock file not found: ${path}`,
        "Set OPSKIT_FIXTURES_DIR or run with --real.",
      );
    }
  }

  origin(kind: ResourceKind): string {
    return this.fixturePath(kind);
  }

  describeInstances(): Promise<unknown> {
    return this.read("instances");
  }

  // Every bucket is served from the same fixture.
  listObjects(_bucket: string): Promise<unknown> {
    return this.read("objects");
  }

  async deleteObjects(_bucket: string, keys: readonly string[]): Promise<DeleteOutcome> {
    return { deleted: [...keys], errors: [], simulated: true };
  }

  private async read(kind: ResourceKind): Promise<unknown> {
    this.ensureAvailable(kind);
    const path = this.fixturePath(kind);
    const raw = await readFile(path, "utf-8");
    try {
      return JSON.parse(raw);
    } catch {
      throw new UserError(`Mock file is not valid JSON: ${path}`);
    }
  }
}
