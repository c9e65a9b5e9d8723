/**
 * Output schema reconciliation.
 *
 * Rules may target different fields in different files, so the output
 * header is the union of every field name seen, in first-seen order.
 * Names are only ever appended, so column order is decided entirely by
 * processing order (files, then rows, then rules).
 */

import type { OutputRecord } from "@rowsift/core";

export interface OutputSchemaOptions {
  /** Columns placed first, in this order, before any observed field. */
  leading?: string[];
  /**
   * Fixed output columns. When set, observed names are ignored and the
   * schema is exactly `leading` followed by these.
   */
  fixed?: string[];
}

export class OutputSchema {
  private readonly names: string[] = [];
  private readonly seen = new Set<string>();
  private readonly frozen: boolean;

  constructor(options: OutputSchemaOptions = {}) {
    for (const name of options.leading ?? []) this.append(name);
    for (const name of options.fixed ?? []) this.append(name);
    this.frozen = options.fixed !== undefined;
  }

  private append(name: string): void {
    if (this.seen.has(name)) return;
    this.seen.add(name);
    this.names.push(name);
  }

  /** Append any field names of `record` not seen before. */
  observe(record: OutputRecord): void {
    if (this.frozen) return;
    for (const name of record.values.keys()) this.append(name);
  }

  has(name: string): boolean {
    return this.seen.has(name);
  }

  get fields(): readonly string[] {
    return this.names;
  }

  get size(): number {
    return this.names.length;
  }
}
