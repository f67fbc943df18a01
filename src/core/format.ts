import chalk from "chalk";
import Table from "cli-table3";

/**
 * Render tabular data (headers + rows) as a bordered table.
 *
 * Does not handle `json` — each command serialises its own JSON.
 */
export function formatTable(headers: string[], rows: string[][]): string {
  // cli-table3 applies its own ANSI colors to headers and borders.
  // Disable those when NO_COLOR is set (chalk already handles itself).
  const noColorStyle = chalk.level === 0 ? { head: [], border: [] } : {};

  const table = new Table({ head: headers, style: noColorStyle });
  for (const row of rows) {
    table.push(row.map((v) => v ?? ""));
  }
  return table.toString();
}

/** Render key-value pairs as a two-column table. */
export function formatKeyValue(entries: { key: string; value: string }[]): string {
  return formatTable(
    ["Key", "Value"],
    entries.map((e) => [e.key, e.value]),
  );
}

/** Human-readable byte count, binary units. */
export function formatBytes(bytes: number): string {
  const units = ["B", "KiB", "MiB", "GiB", "TiB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${units[unit]}`;
}
