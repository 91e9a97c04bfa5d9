import path from "node:path";

const VERSION_MARKER = /_v\d{4}-\d{2}-\d{2}/;

export type SplitFilename = { name: string; ext: string };

/**
 * Splits "report.final.pdf" into { name: "report.final", ext: ".pdf" }.
 * A leading dot does not start an extension (".env" has none).
 */
export function splitFilename(filename: string): SplitFilename {
  const ext = path.extname(filename);
  return { name: filename.slice(0, filename.length - ext.length), ext };
}

export function hasVersionMarker(filename: string): boolean {
  return VERSION_MARKER.test(filename);
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** Local calendar date as YYYY-MM-DD. */
export function formatDateStamp(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function buildVersionedFilename(
  baseFilename: string,
  dateStamp: string,
  counter?: number
): string {
  const { name, ext } = splitFilename(baseFilename);
  const suffix = counter === undefined ? "" : `_${counter}`;
  return `${name}_v${dateStamp}${suffix}${ext}`;
}
