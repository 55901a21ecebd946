import { mkdirSync } from "fs";
import { readFile } from "fs/promises";
import { join } from "path";
import { stringify } from "csv-stringify/sync";
import writeFileAtomic from "write-file-atomic";
import type { CsvRecord } from "../adapter.types.js";

export function ensureDir(p: string) {
  mkdirSync(p, { recursive: true });
}

/** Header row plus one line per record, columns in the given order. */
export function toCSV(columns: readonly string[], rows: readonly CsvRecord[]): string {
  return stringify(
    rows.map(r => columns.map(c => r[c] ?? "")),
    { header: true, columns: [...columns] },
  );
}

export async function emitCSV(outdir: string, name: string, columns: readonly string[], rows: readonly CsvRecord[]) {
  ensureDir(outdir);
  const path = join(outdir, name);
  await writeFileAtomic(path, toCSV(columns, rows), "utf8");
  return path;
}

/**
 * Replace `dest` with the bytes of `src`. The new content lands in a temp file
 * beside `dest` and is renamed over it, so readers see the old or the new file.
 */
export async function promoteFile(src: string, dest: string) {
  const bytes = await readFile(src);
  await writeFileAtomic(dest, bytes);
}
