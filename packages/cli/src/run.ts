/**
 * Extract run: load rules, stream every input file through the matcher,
 * then write the consolidated table once the schema is final.
 *
 * Files are processed one at a time in listing order and rows in file
 * order. The first error aborts the run; the destination is only written
 * after all input has been read, so an aborted run leaves it untouched.
 */

import { resolve } from "node:path";

import { InvalidRuleError } from "@rowsift/core";
import type { RuleSet } from "@rowsift/core";
import { listInputFiles, readCsvRows, writeCsv } from "@rowsift/csv";
import type { Logger } from "@rowsift/logger";
import { Aggregator, extractRows, loadRuleSetFile } from "@rowsift/rules";

import type { RunConfig } from "./config.js";

export interface RunSummary {
  files: number;
  rows: number;
  matchedRows: number;
  /** Input rows discarded by a drop-row rule. */
  droppedRows: number;
  /** Output rows written, excluding the header. */
  records: number;
  columns: string[];
}

/** Provenance columns are written by the aggregator; a rule may not claim them. */
function assertNoProvenanceClash(ruleSet: RuleSet, config: RunConfig): void {
  ruleSet.rules.forEach((rule, index) => {
    if (rule.name === config.ruleField || rule.name === config.fileField) {
      throw new InvalidRuleError(
        index,
        rule.name,
        "name collides with a provenance column (--rule-field / --file-field)",
      );
    }
  });
}

export async function runExtract(config: RunConfig, logger: Logger): Promise<RunSummary> {
  const ruleSet = loadRuleSetFile(config.rulesFile, {
    defaultMergePolicy: config.mergePolicy,
    defaultCaseSensitive: config.caseSensitive,
  });
  logger.debug(`Loaded ${ruleSet.rules.length} rule(s) from ${config.rulesFile}`);
  assertNoProvenanceClash(ruleSet, config);

  const listing = listInputFiles(config.inputs);
  for (const dir of listing.emptyDirectories) {
    logger.warn(`No CSV files found in directory '${dir}'.`);
  }

  // Re-running into a directory that is also an input must not read the previous output.
  const outputPath = resolve(config.output);
  const files = listing.files.filter((file) => {
    if (resolve(file) !== outputPath) return true;
    logger.warn(`Skipping '${file}' - it is the output file.`);
    return false;
  });

  const aggregator = new Aggregator({
    ruleField: config.ruleField ?? undefined,
    fileField: config.fileField ?? undefined,
    fields: config.fields ?? undefined,
  });
  const csvLogger = logger.child("csv");
  const summary: RunSummary = {
    files: 0,
    rows: 0,
    matchedRows: 0,
    droppedRows: 0,
    records: 0,
    columns: [],
  };

  for (const file of files) {
    logger.info(`Processing file: ${file}`);
    const stats = await extractRows(
      readCsvRows(file, { delimiter: config.delimiter, logger: csvLogger }),
      ruleSet,
      aggregator,
      {
        onRow: (row) => {
          if (logger.enabled("trace")) {
            logger.trace(`Processing row at line ${row.source.line} in '${file}'`);
          }
        },
        onMatch: (row, records) => {
          if (!logger.enabled("debug")) return;
          const names = records.flatMap((r) => r.rules).join(", ");
          logger.debug(`Match ${names} in ${file} at line ${row.source.line}`);
        },
        onDrop: (row, ruleName) => {
          logger.debug(`Dropping row at line ${row.source.line} in ${file} due to rule '${ruleName}'`);
        },
      },
    );
    summary.files++;
    summary.rows += stats.rows;
    summary.matchedRows += stats.matchedRows;
    summary.droppedRows += stats.droppedRows;
    summary.records += stats.records;
  }

  summary.columns = aggregator.header();
  writeCsv(config.output, summary.columns, aggregator.rows());
  logger.info(
    `Wrote ${summary.records} row(s) from ${summary.matchedRows} of ${summary.rows} input row(s) in ${summary.files} file(s) to ${config.output}`,
  );

  return summary;
}
