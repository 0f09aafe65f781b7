import { writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import Papa from "papaparse";

export async function saveJson<T>(rows: T[], filename: string, dir = "data/out") {
  await mkdir(dir, { recursive: true });
  const path = join(dir, filename);
  await writeFile(path, JSON.stringify(rows, null, 2), "utf-8");
  return path;
}

/** Nested values (such as the info map) become one JSON-encoded cell. */
function flatten(row: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(row).map(([key, value]) => [key, typeof value === "object" && value !== null ? JSON.stringify(value) : value])
  );
}

export function toCsv<T extends Record<string, unknown>>(rows: T[]): string {
  return Papa.unparse(rows.map(flatten), {
    quotes: true,
    header: true,
    skipEmptyLines: true,
  });
}

export async function saveCsv<T extends Record<string, unknown>>(rows: T[], filename: string, dir = "data/out") {
  await mkdir(dir, { recursive: true });
  const path = join(dir, filename);
  await writeFile(path, toCsv(rows), "utf-8");
  return path;
}
