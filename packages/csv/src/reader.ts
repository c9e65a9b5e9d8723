/**
 * CSV reader: turns one file into a lazy, single-pass sequence of rows.
 *
 * The first record is the header; every later record becomes an InputRow
 * keyed by header names, with the physical line it ended on. Rows are
 * pulled from the csv-parse stream one at a time, so a consumer that
 * stops early never parses the rest of the file.
 *
 * The parser hands back raw bytes per field; each field is decoded as
 * strict UTF-8 so that a bad byte sequence fails with its line instead of
 * decoding to replacement characters. A leading byte order mark is removed
 * before parsing, since csv-parse switches to string output when it strips
 * one itself.
 */

import fs from "node:fs";
import { Transform } from "node:stream";
import type { TransformCallback } from "node:stream";
import { TextDecoder } from "node:util";

import { CsvError, parse } from "csv-parse";

import { InputReadError, errorMessage } from "@rowsift/core";
import type { InputRow } from "@rowsift/core";
import { silentLogger } from "@rowsift/logger";
import type { Logger } from "@rowsift/logger";

export interface ReadCsvOptions {
  /** Field delimiter. Default: ",". */
  delimiter?: string;
  logger?: Logger;
}

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

/** Pass bytes through, dropping a UTF-8 byte order mark at the very start. */
function stripByteOrderMark(): Transform {
  let pending: Buffer | null = Buffer.alloc(0);

  return new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      if (pending === null) {
        callback(null, chunk);
        return;
      }
      const head: Buffer = Buffer.concat([pending, chunk]);
      if (head.length < UTF8_BOM.length && UTF8_BOM.subarray(0, head.length).equals(head)) {
        pending = head;
        callback();
        return;
      }
      pending = null;
      const hasBom = head.subarray(0, UTF8_BOM.length).equals(UTF8_BOM);
      callback(null, hasBom ? head.subarray(UTF8_BOM.length) : head);
    },
    flush(callback: TransformCallback) {
      if (pending !== null && pending.length > 0) {
        callback(null, pending);
        return;
      }
      callback();
    },
  });
}

function isBufferArray(value: unknown): value is Buffer[] {
  return Array.isArray(value) && value.every((v) => Buffer.isBuffer(v));
}

/** Unpack a csv-parse `{ record, info }` pair (the `info: true` output shape). */
function unpackRecord(value: unknown): { record: Buffer[]; line: number } | null {
  if (typeof value !== "object" || value === null) return null;
  if (!("record" in value) || !("info" in value)) return null;
  const { record, info } = value;
  if (!isBufferArray(record)) return null;
  if (typeof info !== "object" || info === null || !("lines" in info)) return null;
  if (typeof info.lines !== "number") return null;
  return { record, line: info.lines };
}

function decodeRecord(
  file: string,
  record: Buffer[],
  line: number,
  decoder: TextDecoder,
): string[] {
  try {
    return record.map((field) => decoder.decode(field));
  } catch (err: unknown) {
    throw new InputReadError(file, "invalid UTF-8", line, { cause: err });
  }
}

function validateHeader(file: string, header: string[], line: number, logger: Logger): string[] {
  const empty = header.findIndex((name) => name.length === 0);
  if (empty !== -1) {
    throw new InputReadError(file, `header column ${empty + 1} has no name`, line);
  }

  const seen = new Set<string>();
  for (const name of header) {
    if (seen.has(name)) {
      logger.warn(`Duplicate column "${name}" in '${file}'; the last one wins`);
    }
    seen.add(name);
  }
  return header;
}

/**
 * Read `file` as CSV and yield its data rows.
 *
 * A file with no header yields nothing and logs a warning. Anything else
 * that goes wrong (missing file, ragged row, broken quoting) throws
 * InputReadError with the file and, where known, the line.
 */
export async function* readCsvRows(
  file: string,
  options: ReadCsvOptions = {},
): AsyncGenerator<InputRow> {
  const logger = options.logger ?? silentLogger();
  const decoder = new TextDecoder("utf-8", { fatal: true });
  const parser = parse({
    encoding: null,
    delimiter: options.delimiter ?? ",",
    skip_empty_lines: true,
    info: true,
  });
  const input = fs.createReadStream(file);
  const bytes = stripByteOrderMark();
  input.on("error", (err) => parser.destroy(err));
  input.pipe(bytes).pipe(parser);

  let header: string[] | null = null;

  try {
    for await (const value of parser) {
      const unpacked = unpackRecord(value);
      if (unpacked === null) {
        throw new InputReadError(file, "parser produced an unexpected record");
      }
      const { line } = unpacked;
      const record = decodeRecord(file, unpacked.record, line, decoder);

      if (header === null) {
        header = validateHeader(file, record, line, logger);
        logger.debug(`Header of '${file}': ${header.join(", ")}`);
        continue;
      }

      const fields = new Map<string, string>();
      header.forEach((name, i) => fields.set(name, record[i]));
      yield { fields, source: { file, line } };
    }
  } catch (err: unknown) {
    if (err instanceof InputReadError) throw err;
    const line = err instanceof CsvError && typeof err.lines === "number" ? err.lines : null;
    throw new InputReadError(file, errorMessage(err), line, { cause: err });
  } finally {
    input.destroy();
    bytes.destroy();
  }

  if (header === null) {
    logger.warn(`Skipping file '${file}' - no headers found.`);
  }
}
