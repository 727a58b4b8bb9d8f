import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import Papa from "papaparse";
import type { Logger } from "./types.js";
import { ExportError, describeError } from "./errors.js";

/** Header row plus one line per row, cells in `columns` order; missing keys become "". */
export function toCsv(columns: readonly string[], rows: ReadonlyArray<Readonly<Record<string, string>>>): string {
  const data = rows.map((r) => columns.map((c) => r[c] ?? ""));
  // Header travels as the first data row: unparse({ fields, data: [] }) emits a blank record.
  return Papa.unparse([[...columns], ...data], { newline: "\r\n" });
}

/**
 * Writes the CSV beside its destination and renames it into place, so an
 * existing export survives a failed write untouched.
 */
export async function writeCsvReport(
  file: string,
  columns: readonly string[],
  rows: ReadonlyArray<Readonly<Record<string, string>>>,
  logger?: Logger
): Promise<{ path: string; bytes: number }> {
  const target = path.resolve(file);
  const tmp = path.join(path.dirname(target), `.${path.basename(target)}.${randomUUID()}.tmp`);
  const body = toCsv(columns, rows);

  try {
    await fs.writeFile(tmp, body, "utf8");
    await fs.rename(tmp, target);
  } catch (e) {
    await fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
      logger?.warn(`could not remove temp file ${tmp}: ${describeError(rmErr)}`);
    });
    throw new ExportError(target, `cannot write ${target}: ${describeError(e)}`, { cause: e });
  }

  return { path: target, bytes: Buffer.byteLength(body, "utf8") };
}
