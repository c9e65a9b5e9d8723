/**
 * Pipeline step: feed a single-pass sequence of rows through the matcher
 * into an aggregator.
 */

import type { InputRow, OutputRecord, RuleSet } from "@rowsift/core";

import type { Aggregator } from "./aggregator.js";
import { evaluateRow } from "./matcher.js";

export interface ExtractHooks {
  /** Called for every row before it is matched. */
  onRow?: (row: InputRow) => void;
  /** Called for every row that produced at least one record. */
  onMatch?: (row: InputRow, records: OutputRecord[]) => void;
  /** Called for every row a drop-row rule discarded. */
  onDrop?: (row: InputRow, ruleName: string) => void;
}

export interface ExtractStats {
  /** Rows consumed. */
  rows: number;
  /** Rows that produced at least one record. */
  matchedRows: number;
  /** Records handed to the aggregator. */
  records: number;
  /** Rows discarded by a drop-row rule. */
  droppedRows: number;
}

export function createExtractStats(): ExtractStats {
  return { rows: 0, matchedRows: 0, records: 0, droppedRows: 0 };
}

/**
 * Consume `rows` once, in order. Each row is fully matched and aggregated
 * before the next one is pulled.
 */
export async function extractRows(
  rows: AsyncIterable<InputRow> | Iterable<InputRow>,
  ruleSet: RuleSet,
  aggregator: Aggregator,
  hooks: ExtractHooks = {},
): Promise<ExtractStats> {
  const stats = createExtractStats();

  for await (const row of rows) {
    stats.rows++;
    hooks.onRow?.(row);

    const { records, droppedBy } = evaluateRow(row, ruleSet);
    if (droppedBy !== null) {
      stats.droppedRows++;
      hooks.onDrop?.(row, droppedBy);
      continue;
    }
    if (records.length === 0) continue;

    stats.matchedRows++;
    stats.records += records.length;
    hooks.onMatch?.(row, records);
    aggregator.add(records);
  }

  return stats;
}
