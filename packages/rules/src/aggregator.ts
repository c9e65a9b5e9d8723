/**
 * Aggregator: collects output records for a whole run and projects them
 * onto the reconciled schema.
 *
 * One instance per run, owned by whoever drives the pipeline. Records
 * keep their arrival order and are never merged or sorted here; merging
 * is the matcher's decision.
 */

import { basename } from "node:path";

import type { OutputRecord } from "@rowsift/core";

import { OutputSchema } from "./schema.js";

/** Separator between rule names in the rule provenance column. */
export const RULE_NAME_SEPARATOR = ";";

export interface AggregatorOptions {
  /** Leading column holding the name(s) of the rule(s) that fired. */
  ruleField?: string;
  /** Column holding the basename of the source file. Follows `ruleField`. */
  fileField?: string;
  /** Fixed output columns instead of the first-seen union. */
  fields?: string[];
}

export class Aggregator {
  private readonly records: OutputRecord[] = [];
  private readonly schema: OutputSchema;
  private readonly ruleField: string | null;
  private readonly fileField: string | null;

  constructor(options: AggregatorOptions = {}) {
    this.ruleField = options.ruleField ?? null;
    this.fileField = options.fileField ?? null;

    const leading: string[] = [];
    if (this.ruleField !== null) leading.push(this.ruleField);
    if (this.fileField !== null) leading.push(this.fileField);
    this.schema = new OutputSchema({ leading, fixed: options.fields });
  }

  /** Append records in arrival order, growing the schema as needed. */
  add(records: Iterable<OutputRecord>): void {
    for (const record of records) {
      this.records.push(record);
      this.schema.observe(record);
    }
  }

  get size(): number {
    return this.records.length;
  }

  /** Current output header. Final once all input has been added. */
  header(): string[] {
    return [...this.schema.fields];
  }

  private valueFor(record: OutputRecord, field: string): string {
    if (field === this.ruleField) return record.rules.join(RULE_NAME_SEPARATOR);
    if (field === this.fileField) return basename(record.source.file);
    return record.values.get(field) ?? "";
  }

  /** One flat row per record, one value per header column ("" when absent). */
  rows(): string[][] {
    const header = this.schema.fields;
    return this.records.map((record) =>
      header.map((field) => this.valueFor(record, field)),
    );
  }
}
