import { describe, test, expect } from "vitest";
import { readFileSync } from "node:fs";
import { planCleanup } from "./s3.ts";
import { UserError } from "../core/errors.ts";

const fixture: unknown = JSON.parse(
  readFileSync(new URL("../../fixtures/s3_list_objects.json", import.meta.url), "utf-8"),
);

const NOW = new Date("2026-01-16T00:00:00Z");

describe("planCleanup", () => {
  test("selects objects older than the threshold, oldest first", () => {
    const plan = planCleanup(fixture, { bucket: "b", olderThanDays: 30, apply: false, now: NOW });
    expect(plan.cutoff).toBe("2025-12-17T00:00:00.000Z");
    expect(plan.scanned).toBe(5);
    expect(plan.candidates.map((c) => c.key)).toEqual([
      "backups/db-2025-01-05.sql.gz",
      "backups/db-2025-06-05.sql.gz",
    ]);
    expect(plan.totalBytes).toBe(104857600 + 110100480);
  });

  test("computes whole-day ages", () => {
    const plan = planCleanup(fixture, { bucket: "b", olderThanDays: 30, apply: false, now: NOW });
    expect(plan.candidates[0]).toEqual({
      key: "backups/db-2025-01-05.sql.gz",
      size: 104857600,
      lastModified: "2025-01-05T03:00:12.000Z",
      ageDays: 375,
    });
  });

  test("zero days selects everything modified before now", () => {
    const plan = planCleanup(fixture, { bucket: "b", olderThanDays: 0, apply: false, now: NOW });
    expect(plan.candidates).toHaveLength(5);
  });

  test("threshold is strict", () => {
    const doc = { Contents: [{ Key: "edge", LastModified: "2026-01-15T00:00:00Z", Size: 1 }] };
    expect(planCleanup(doc, { bucket: "b", olderThanDays: 1, apply: false, now: NOW }).candidates).toEqual([]);
  });

  test("carries the apply flag through unchanged", () => {
    expect(planCleanup({}, { bucket: "b", olderThanDays: 1, apply: true, now: NOW }).apply).toBe(true);
    expect(planCleanup({}, { bucket: "b", olderThanDays: 1, apply: false, now: NOW }).apply).toBe(false);
  });

  test("empty listing yields an empty plan", () => {
    const plan = planCleanup({}, { bucket: "b", olderThanDays: 7, apply: false, now: NOW });
    expect(plan).toMatchObject({ scanned: 0, candidates: [], totalBytes: 0 });
  });

  test("rejects unreadable timestamps", () => {
    const doc = { Contents: [{ Key: "x", LastModified: "yesterday", Size: 1 }] };
    expect(() => planCleanup(doc, { bucket: "b", olderThanDays: 1, apply: false, now: NOW })).toThrow(
      UserError,
    );
  });

  test("an age past the range of dates is a user error", () => {
    expect(() =>
      planCleanup(fixture, { bucket: "b", olderThanDays: 1_000_000_000, apply: false, now: NOW }),
    ).toThrow("An age of 1000000000 day(s) is out of range.");
  });

  test("a century is still within range", () => {
    const plan = planCleanup(fixture, { bucket: "b", olderThanDays: 36_500, apply: false, now: NOW });
    expect(plan.candidates).toEqual([]);
  });
});
