/**
 * Markdown rendering helpers for chat responses.
 */

/** Escape a value for use inside a markdown table cell. */
export function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

/**
 * Left-aligned markdown table. Every line, including the last, ends with "\n".
 */
export function markdownTable(headers: readonly string[], rows: ReadonlyArray<readonly string[]>): string {
  const line = (cells: readonly string[]) => `| ${cells.map(escapeCell).join(" | ")} |\n`;
  return line(headers) + line(headers.map(() => ":---")) + rows.map(line).join("");
}

export function bulletList(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

/** "key vault" -> "Key Vault" */
export function titleCase(text: string): string {
  return text
    .split(" ")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB"];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (Math.abs(value) >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${Math.round(value * 100) / 100} ${BYTE_UNITS[unit]}`;
}

/**
 * Render one metric reading using the unit Azure Monitor reports for it.
 */
export function formatMetricValue(value: number, unit: string): string {
  switch (unit) {
    case "Percent":
      return `${value}%`;
    case "Bytes":
      return formatBytes(value);
    case "BytesPerSecond":
      return `${formatBytes(value)}/s`;
    case "Milliseconds":
      return `${value} ms`;
    case "Seconds":
      return `${value} s`;
    default:
      return String(value);
  }
}
