import { describe, test, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { analyzeLines, analyzeLogFile, normalizeMessage, parseLine } from "./logs.ts";
import { UserError } from "../core/errors.ts";

const FIXTURE = fileURLToPath(new URL("../../fixtures/logs/app.log", import.meta.url));
const NOW = new Date("2026-01-15T10:15:00Z");

describe("parseLine", () => {
  test("ISO timestamp and level", () => {
    expect(parseLine("2026-01-15T10:00:01Z INFO  server started")).toEqual({
      timestamp: Date.parse("2026-01-15T10:00:01Z"),
      level: "INFO",
      message: "server started",
    });
  });

  test("space-separated timestamp with millis and bracketed level", () => {
    expect(parseLine("2026-01-15 10:00:01,250 [WARNING] disk at 91%")).toEqual({
      timestamp: Date.parse("2026-01-15T10:00:01.250Z"),
      level: "WARN",
      message: "disk at 91%",
    });
  });

  test("numeric offset without colon", () => {
    expect(parseLine("2026-01-15T12:00:00+0200 error boom")?.timestamp).toBe(
      Date.parse("2026-01-15T10:00:00Z"),
    );
  });

  test("CRITICAL maps to FATAL", () => {
    expect(parseLine("CRITICAL: out of memory")).toEqual({
      timestamp: null,
      level: "FATAL",
      message: "out of memory",
    });
  });

  test("line without timestamp or level", () => {
    expect(parseLine("  just text ")).toEqual({ timestamp: null, level: "OTHER", message: "just text" });
  });

  test("blank line", () => {
    expect(parseLine("   ")).toBeNull();
  });
});

describe("normalizeMessage", () => {
  test("replaces variable parts", () => {
    expect(
      normalizeMessage('user "bob" from 192.168.0.7:443 got 404 for 4f1c2a9e-0b3d-4c1e-9a7f-2d6b8e3c1f00'),
    ).toBe("user <str> from <ip> got <n> for <uuid>");
  });

  test("hex ids and units", () => {
    expect(normalizeMessage("commit 0xdeadbeef took 12.5ms")).toBe("commit <hex> took <n>ms");
  });

  test("leaves identifiers with embedded digits alone", () => {
    expect(normalizeMessage("m5 instance  ready")).toBe("m5 instance ready");
  });
});

describe("analyzeLines", () => {
  test("ranks by severity, then count, then pattern", async () => {
    const report = await analyzeLogFile(FIXTURE, { sinceMinutes: 0, top: 10, now: NOW });
    expect(report.scanned).toBe(11);
    expect(report.matched).toBe(11);
    expect(report.cutoff).toBeNull();
    expect(report.levels).toEqual({ INFO: 4, WARN: 2, ERROR: 4, DEBUG: 1 });
    expect(report.top.map((g) => [g.level, g.pattern, g.count])).toEqual([
      ["ERROR", "request <uuid> failed: upstream timeout after <n>s", 3],
      ["ERROR", "payment provider returned <n>", 1],
      ["WARN", "slow query took <n>ms", 2],
      ["INFO", "health check ok", 2],
      ["INFO", "connected to db at <ip>", 1],
      ["INFO", "server started on port <n>", 1],
      ["DEBUG", "cache hit ratio <n>", 1],
    ]);
  });

  test("groups keep the newest timestamp and first sample", async () => {
    const report = await analyzeLogFile(FIXTURE, { sinceMinutes: 0, top: 1, now: NOW });
    expect(report.top).toEqual([
      {
        level: "ERROR",
        pattern: "request <uuid> failed: upstream timeout after <n>s",
        count: 3,
        lastSeen: "2026-01-15T10:12:44.000Z",
        sample: "request 4f1c2a9e-0b3d-4c1e-9a7f-2d6b8e3c1f00 failed: upstream timeout after 30s",
      },
    ]);
  });

  test("window keeps only recent timestamped entries", async () => {
    const report = await analyzeLogFile(FIXTURE, { sinceMinutes: 10, top: 10, now: NOW });
    expect(report.cutoff).toBe("2026-01-15T10:05:00.000Z");
    expect(report.matched).toBe(6);
    expect(report.top.map((g) => [g.level, g.pattern, g.count])).toEqual([
      ["ERROR", "payment provider returned <n>", 1],
      ["ERROR", "request <uuid> failed: upstream timeout after <n>s", 1],
      ["WARN", "slow query took <n>ms", 1],
      ["INFO", "health check ok", 2],
      ["DEBUG", "cache hit ratio <n>", 1],
    ]);
  });

  test("window drops lines without a timestamp", () => {
    const report = analyzeLines(["ERROR no time here"], { sinceMinutes: 5, top: 10, now: NOW });
    expect(report.matched).toBe(0);
    expect(report.top).toEqual([]);
  });

  test("no window ignores the clock", () => {
    const lines = ["1999-01-01T00:00:00Z ERROR ancient", "ERROR undated"];
    const a = analyzeLines(lines, { sinceMinutes: 0, top: 5, now: NOW });
    const b = analyzeLines(lines, { sinceMinutes: 0, top: 5, now: new Date("2030-01-01T00:00:00Z") });
    expect(a).toEqual(b);
    expect(a.matched).toBe(2);
  });

  test("top truncates the ranking", () => {
    const report = analyzeLines(["INFO a", "INFO b", "INFO c"], { sinceMinutes: 0, top: 2 });
    expect(report.top.map((g) => g.pattern)).toEqual(["a", "b"]);
  });

  test("a window past the range of dates is a user error", () => {
    expect(() =>
      analyzeLines(["ERROR boom"], { sinceMinutes: 1_000_000_000_000, top: 10, now: NOW }),
    ).toThrow(UserError);
  });
});
