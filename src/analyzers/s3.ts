import { z } from "zod";
import { UserError } from "../core/errors.ts";

const DAY_MS = 24 * 60 * 60 * 1000;

const ObjectSchema = z.object({
  Key: z.string(),
  LastModified: z.string(),
  Size: z.number().nonnegative().default(0),
  StorageClass: z.string().optional(),
});

export const ListObjectsSchema = z.object({
  Contents: z.array(ObjectSchema).default([]),
});

export interface CleanupCandidate {
  key: string;
  size: number;
  lastModified: string;
  ageDays: number;
}

export interface CleanupPlan {
  bucket: string;
  olderThanDays: number;
  /** Objects modified before this instant are candidates. */
  cutoff: string;
  apply: boolean;
  scanned: number;
  candidates: CleanupCandidate[];
  totalBytes: number;
}

export interface PlanOptions {
  bucket: string;
  olderThanDays: number;
  apply: boolean;
  now?: Date;
}

/**
 * Select objects from an `s3api list-objects-v2` document whose
 * `LastModified` is strictly before `now - olderThanDays`.
 *
 * Candidates come back oldest first; the plan itself never deletes anything.
 */
export function planCleanup(doc: unknown, opts: PlanOptions): CleanupPlan {
  const parsed = ListObjectsSchema.safeParse(doc);
  if (!parsed.success) {
    throw new UserError(
      "Object data is not an s3api list-objects-v2 document.",
      parsed.error.issues[0]?.message,
    );
  }

  const now = opts.now ?? new Date();
  const cutoff = now.getTime() - opts.olderThanDays * DAY_MS;
  if (Number.isNaN(new Date(cutoff).getTime())) {
    throw new UserError(`An age of ${opts.olderThanDays} day(s) is out of range.`);
  }
  const candidates: CleanupCandidate[] = [];

  for (const obj of parsed.data.Contents) {
    const modified = Date.parse(obj.LastModified);
    if (Number.isNaN(modified)) {
      throw new UserError(`Object ${obj.Key} has an unreadable LastModified: ${obj.LastModified}`);
    }
    if (modified < cutoff) {
      candidates.push({
        key: obj.Key,
        size: obj.Size,
        lastModified: new Date(modified).toISOString(),
        ageDays: Math.floor((now.getTime() - modified) / DAY_MS),
      });
    }
  }

  candidates.sort(
    (a, b) => a.lastModified.localeCompare(b.lastModified) || a.key.localeCompare(b.key),
  );

  return {
    bucket: opts.bucket,
    olderThanDays: opts.olderThanDays,
    cutoff: new Date(cutoff).toISOString(),
    apply: opts.apply,
    scanned: parsed.data.Contents.length,
    candidates,
    totalBytes: candidates.reduce((sum, c) => sum + c.size, 0),
  };
}
