/**
 * Input enumeration: expand the paths given on the command line into the
 * ordered list of CSV files to process.
 */

import fs from "node:fs";
import { join } from "node:path";

import { InputReadError, errorMessage } from "@rowsift/core";

export interface InputListing {
  /** Files in processing order. */
  files: string[];
  /** Directories that held no `.csv` files. */
  emptyDirectories: string[];
}

/**
 * List the `.csv` files directly inside a directory, sorted
 * lexicographically so traversal order does not depend on the filesystem.
 */
export function listCsvFiles(dir: string): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    throw new InputReadError(dir, errorMessage(err), null, { cause: err });
  }
  return entries
    .filter((e) => e.isFile() && e.name.endsWith(".csv"))
    .map((e) => e.name)
    .sort()
    .map((name) => join(dir, name));
}

/**
 * Expand inputs in the order given. A file is taken as is; a directory
 * contributes its CSV files. A path that does not exist is an error.
 */
export function listInputFiles(inputs: readonly string[]): InputListing {
  const files: string[] = [];
  const emptyDirectories: string[] = [];

  for (const input of inputs) {
    let stat: fs.Stats;
    try {
      stat = fs.statSync(input);
    } catch (err: unknown) {
      throw new InputReadError(input, errorMessage(err), null, { cause: err });
    }

    if (!stat.isDirectory()) {
      files.push(input);
      continue;
    }

    const found = listCsvFiles(input);
    if (found.length === 0) emptyDirectories.push(input);
    files.push(...found);
  }

  return { files, emptyDirectories };
}
