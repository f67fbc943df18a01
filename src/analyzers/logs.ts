import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import { UserError } from "../core/errors.ts";

export type LogLevel = "FATAL" | "ERROR" | "WARN" | "INFO" | "DEBUG" | "TRACE" | "OTHER";

const SEVERITY: Record<LogLevel, number> = {
  FATAL: 6,
  ERROR: 5,
  WARN: 4,
  INFO: 3,
  DEBUG: 2,
  TRACE: 1,
  OTHER: 0,
};

const LEVEL_ALIASES: Record<string, LogLevel> = {
  FATAL: "FATAL",
  CRITICAL: "FATAL",
  ERROR: "ERROR",
  WARN: "WARN",
  WARNING: "WARN",
  INFO: "INFO",
  DEBUG: "DEBUG",
  TRACE: "TRACE",
};

const TIMESTAMP_RE =
  /^\[?(\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:[.,]\d+)?(?:Z|[+-]\d{2}:?\d{2})?)\]?\s*/;
const LEVEL_RE = /^\[?(FATAL|CRITICAL|ERROR|WARNING|WARN|INFO|DEBUG|TRACE)\]?:?(?:\s+|$)/i;

const NORMALIZERS: [RegExp, string][] = [
  [/"[^"]*"|'[^']*'/g, "<str>"],
  [/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, "<uuid>"],
  [/\b\d{1,3}(?:\.\d{1,3}){3}(?::\d+)?\b/g, "<ip>"],
  [/\b0x[0-9a-f]+\b|\b(?=[0-9a-f]*\d)[0-9a-f]{12,}\b/gi, "<hex>"],
  [/\b\d+(?:\.\d+)?/g, "<n>"],
];

export interface LogEntry {
  timestamp: number | null;
  level: LogLevel;
  message: string;
}

export interface LogGroup {
  level: LogLevel;
  pattern: string;
  count: number;
  /** ISO time of the newest entry in the group, when any entry carried a timestamp. */
  lastSeen: string | null;
  sample: string;
}

export interface LogReport {
  sinceMinutes: number;
  cutoff: string | null;
  scanned: number;
  matched: number;
  levels: Partial<Record<LogLevel, number>>;
  top: LogGroup[];
}

export interface AnalyzeOptions {
  /** Only keep entries from the last N minutes. 0 keeps everything. */
  sinceMinutes: number;
  top: number;
  now?: Date;
}

function parseTimestamp(raw: string): number | null {
  let iso = raw.replace(" ", "T").replace(",", ".");
  iso = iso.replace(/([+-]\d{2})(\d{2})$/, "$1:$2");
  if (!/(Z|[+-]\d{2}:\d{2})$/.test(iso)) iso += "Z";
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? null : ms;
}

/** Split a raw log line into timestamp, level and message. Blank lines yield `null`. */
export function parseLine(line: string): LogEntry | null {
  let rest = line.trim();
  if (!rest) return null;

  let timestamp: number | null = null;
  const ts = TIMESTAMP_RE.exec(rest);
  if (ts?.[1]) {
    timestamp = parseTimestamp(ts[1]);
    rest = rest.slice(ts[0].length);
  }

  let level: LogLevel = "OTHER";
  const lv = LEVEL_RE.exec(rest);
  if (lv?.[1]) {
    level = LEVEL_ALIASES[lv[1].toUpperCase()] ?? "OTHER";
    rest = rest.slice(lv[0].length);
  }

  return { timestamp, level, message: rest.trim() };
}

/** Replace the variable parts of a message so repeats of the same event group together. */
export function normalizeMessage(message: string): string {
  let out = message;
  for (const [re, token] of NORMALIZERS) out = out.replace(re, token);
  return out.replace(/\s+/g, " ").trim();
}

/**
 * Group entries by level and message pattern and rank them: most severe
 * first, then most frequent, then alphabetically by pattern.
 *
 * With `sinceMinutes` 0 no entry is dropped; otherwise entries without a
 * timestamp or older than the window are skipped.
 */
export function analyzeLines(lines: Iterable<string>, opts: AnalyzeOptions): LogReport {
  const now = (opts.now ?? new Date()).getTime();
  const cutoff = opts.sinceMinutes > 0 ? now - opts.sinceMinutes * 60_000 : null;
  if (cutoff !== null && Number.isNaN(new Date(cutoff).getTime())) {
    throw new UserError(`A window of ${opts.sinceMinutes} minute(s) is out of range.`);
  }

  const groups = new Map<string, LogGroup & { newest: number | null }>();
  const levels: Partial<Record<LogLevel, number>> = {};
  let scanned = 0;
  let matched = 0;

  for (const line of lines) {
    const entry = parseLine(line);
    if (!entry) continue;
    scanned++;

    if (cutoff !== null && (entry.timestamp === null || entry.timestamp < cutoff)) continue;
    matched++;
    levels[entry.level] = (levels[entry.level] ?? 0) + 1;

    const pattern = normalizeMessage(entry.message);
    const key = `${entry.level}\u0000${pattern}`;
    const group = groups.get(key);
    if (group) {
      group.count++;
      if (entry.timestamp !== null && (group.newest === null || entry.timestamp > group.newest)) {
        group.newest = entry.timestamp;
      }
    } else {
      groups.set(key, {
        level: entry.level,
        pattern,
        count: 1,
        lastSeen: null,
        sample: entry.message,
        newest: entry.timestamp,
      });
    }
  }

  const ranked = [...groups.values()]
    .sort(
      (a, b) =>
        SEVERITY[b.level] - SEVERITY[a.level] ||
        b.count - a.count ||
        a.pattern.localeCompare(b.pattern),
    )
    .slice(0, opts.top)
    .map(({ newest, ...g }) => ({
      ...g,
      lastSeen: newest === null ? null : new Date(newest).toISOString(),
    }));

  return {
    sinceMinutes: opts.sinceMinutes,
    cutoff: cutoff === null ? null : new Date(cutoff).toISOString(),
    scanned,
    matched,
    levels,
    top: ranked,
  };
}

/** Read a log file line by line and analyze it. */
export async function analyzeLogFile(path: string, opts: AnalyzeOptions): Promise<LogReport> {
  const lines: string[] = [];
  const rl = createInterface({ input: createReadStream(path, "utf-8"), crlfDelay: Infinity });
  for await (const line of rl) lines.push(line);
  return analyzeLines(lines, opts);
}
