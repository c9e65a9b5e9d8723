/**
 * CSV writer for the consolidated output table.
 *
 * Uses atomic writes (write to .tmp, then rename) so a failed run never
 * leaves a half-written destination behind.
 */

import fs from "node:fs";

import { stringify } from "csv-stringify/sync";

import { OutputWriteError, errorMessage } from "@rowsift/core";

/**
 * Serialize a header row followed by data rows. A table without columns
 * serializes to the empty string rather than a lone blank line.
 */
export function formatCsv(header: readonly string[], rows: readonly string[][]): string {
  if (header.length === 0) return "";
  return stringify([[...header], ...rows]);
}

/**
 * Write the table to `file`. The header is written even when there are
 * no rows.
 */
export function writeCsv(
  file: string,
  header: readonly string[],
  rows: readonly string[][],
): void {
  const content = formatCsv(header, rows);
  const tmpPath = `${file}.tmp`;

  try {
    fs.writeFileSync(tmpPath, content, "utf8");
    fs.renameSync(tmpPath, file);
  } catch (err: unknown) {
    fs.rmSync(tmpPath, { force: true });
    throw new OutputWriteError(file, errorMessage(err), { cause: err });
  }
}
