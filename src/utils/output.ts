import * as yaml from "js-yaml";
import type { OutputFormat } from "../config/schema.js";

export type OutputValue = string | number | boolean | null | readonly string[];
export type OutputRecord = Record<string, OutputValue>;

function formatCell(value: OutputValue): string {
  if (value === null) {
    return "-";
  }
  if (typeof value === "object") {
    return value.length > 0 ? value.join(", ") : "-";
  }
  return String(value);
}

function renderTable(record: OutputRecord): string {
  const entries = Object.entries(record);
  const width = Math.max(0, ...entries.map(([key]) => key.length));
  return entries.map(([key, value]) => `${key.padEnd(width)}  ${formatCell(value)}`).join("\n");
}

/**
 * Render a flat record in the configured output format
 */
export function renderOutput(record: OutputRecord, format: OutputFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(record, null, 2);
    case "yaml":
      return yaml.dump(record).trimEnd();
    case "table":
      return renderTable(record);
  }
}
