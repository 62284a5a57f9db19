import * as fs from "node:fs";
import * as path from "node:path";
import csv from "csv-parser";
import type { TableLayout } from "./types.js";

export type OutputFormat = "csv" | "json";

/** One row read from an input file. CSV values are always strings. */
export type InputRecord = Record<string, unknown>;

export interface OutputTarget {
  path: string;
  format: OutputFormat;
}

function isJsonPath(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ".json";
}

/**
 * Decide where and how to write. A ".json" path selects JSON; the json flag
 * also selects it, switching a ".csv" extension to ".json".
 */
export function resolveOutput(outfile: string, json = false): OutputTarget {
  if (isJsonPath(outfile)) {
    return { path: outfile, format: "json" };
  }
  if (json) {
    const ext = path.extname(outfile);
    const swapped =
      ext.toLowerCase() === ".csv"
        ? outfile.slice(0, -ext.length) + ".json"
        : outfile;
    return { path: swapped, format: "json" };
  }
  return { path: outfile, format: "csv" };
}

/** Text of one CSV cell before quoting. */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

function quoteCell(text: string): string {
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function toCsv<T extends object>(
  columns: readonly (keyof T & string)[],
  rows: readonly T[]
): string {
  const lines = [columns.map(quoteCell).join(",")];
  for (const row of rows) {
    lines.push(columns.map((c) => quoteCell(formatCell(row[c]))).join(","));
  }
  return lines.join("\n") + "\n";
}

/** JSON array whose objects carry exactly the layout's columns, in order. */
export function toJson<T extends object>(
  columns: readonly (keyof T & string)[],
  rows: readonly T[]
): string {
  const ordered = rows.map((row) => {
    const out: Record<string, unknown> = {};
    for (const c of columns) out[c] = row[c];
    return out;
  });
  return JSON.stringify(ordered, null, 2) + "\n";
}

export function writeRows<T extends object>(
  target: OutputTarget,
  layout: TableLayout<T>,
  rows: readonly T[]
): void {
  const dir = path.dirname(target.path);
  fs.mkdirSync(dir, { recursive: true });
  const content =
    target.format === "json"
      ? toJson(layout.columns, rows)
      : toCsv(layout.columns, rows);
  fs.writeFileSync(target.path, content, "utf-8");
}

/** Wrap bare identifiers from a JSON list so they resolve under the "id" alias. */
function normalizeJsonRecords(data: unknown, filePath: string): InputRecord[] {
  if (!Array.isArray(data)) {
    throw new Error(`Expected a JSON array in ${filePath}`);
  }
  const records: InputRecord[] = [];
  for (const item of data) {
    if (item !== null && typeof item === "object" && !Array.isArray(item)) {
      records.push({ ...item });
    } else if (typeof item === "string" || typeof item === "number") {
      records.push({ id: String(item) });
    }
  }
  return records;
}

function readCsvRecords(filePath: string): Promise<InputRecord[]> {
  return new Promise((resolve, reject) => {
    const out: InputRecord[] = [];
    fs.createReadStream(filePath)
      .on("error", reject)
      .pipe(csv({ mapHeaders: ({ header }) => header.replace(/^\uFEFF/, "").trim() }))
      .on("data", (data: InputRecord) => out.push(data))
      .on("end", () => resolve(out))
      .on("error", reject);
  });
}

/**
 * Read a CSV or JSON input file. Resolves to undefined when the file does not
 * exist, so callers can fall back to a synthetic pool.
 */
export async function readRecords(
  filePath: string
): Promise<InputRecord[] | undefined> {
  if (!fs.existsSync(filePath)) return undefined;
  if (isJsonPath(filePath)) {
    const text = fs.readFileSync(filePath, "utf-8");
    if (!text.trim()) return [];
    return normalizeJsonRecords(JSON.parse(text), filePath);
  }
  return readCsvRecords(filePath);
}

/** First path in the list that exists on disk. */
export function firstExisting(paths: readonly string[]): string | undefined {
  return paths.find((p) => fs.existsSync(p));
}
