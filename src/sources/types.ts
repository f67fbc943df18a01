import type { Mode } from "../core/types.ts";

/** The record sets a command can ask for. */
export type ResourceKind = "instances" | "objects";

export interface DeleteOutcome {
  deleted: string[];
  errors: { key: string; message: string }[];
  /** True when nothing was actually removed (mock mode). */
  simulated: boolean;
}

/**
 * Produces cloud-provider documents for a resource query. Implementations
 * differ only in where the data comes from; the documents are the JSON the
 * AWS CLI would print, returned unvalidated.
 */
export interface DataSource {
  readonly mode: Mode;
  /**
   * Fail fast when the source cannot serve `kind` (missing fixture,
   * missing AWS CLI). Called before any other work.
   */
  ensureAvailable(kind: ResourceKind): void;
  /** Short description of where `kind` is read from, for verbose output. */
  origin(kind: ResourceKind): string;
  describeInstances(): Promise<unknown>;
  listObjects(bucket: string): Promise<unknown>;
  deleteObjects(bucket: string, keys: readonly string[]): Promise<DeleteOutcome>;
}
