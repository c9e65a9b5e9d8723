/**
 * Row matcher.
 *
 * Evaluates every rule of a RuleSet against one input row, in rule order,
 * and turns the firings into output records. Pure: no logging, no state
 * carried between rows.
 */

import type {
  InputRow,
  OutputRecord,
  Rule,
  RuleCondition,
  RuleSet,
} from "@rowsift/core";

export interface RowEvaluation {
  records: OutputRecord[];
  /** Name of the drop-row rule that suppressed the row, if any. */
  droppedBy: string | null;
}

/** Value a firing rule emits from a successful `exec`. */
function extractValue(match: RegExpExecArray, rule: Rule): string {
  if (rule.capture === "group" && match.length > 1) {
    // A group that did not take part in the match is undefined at runtime.
    return match[1] ?? "";
  }
  return match[0];
}

/**
 * Search the condition's columns in order and return the first match.
 * A column missing from the row is skipped.
 */
function searchRow(row: InputRow, condition: RuleCondition): RegExpExecArray | null {
  if (condition.source.kind === "any") {
    for (const value of row.fields.values()) {
      const match = condition.pattern.exec(value);
      if (match) return match;
    }
    return null;
  }

  for (const name of condition.source.names) {
    const value = row.fields.get(name);
    if (value === undefined) continue;
    const match = condition.pattern.exec(value);
    if (match) return match;
  }
  return null;
}

/**
 * Test one rule against one row with search semantics (the pattern may
 * match a substring). Returns the emitted value, or null when the rule
 * does not fire. The rule fires only when its own pattern and every
 * extra condition match; a source column missing from the row means no
 * firing.
 */
export function matchRule(row: InputRow, rule: Rule): string | null {
  const match = searchRow(row, rule);
  if (match === null) return null;
  for (const condition of rule.conditions) {
    if (searchRow(row, condition) === null) return null;
  }
  return extractValue(match, rule);
}

/**
 * Evaluate all rules against a row.
 *
 * Each firing "separate" rule yields its own record. All firing
 * "combined" rules share one record, placed where the first of them
 * fired. A firing drop-row rule discards every record of the row,
 * whichever rules produced them.
 */
export function evaluateRow(row: InputRow, ruleSet: RuleSet): RowEvaluation {
  const records: OutputRecord[] = [];
  let combined: { values: Map<string, string>; rules: string[] } | null = null;

  for (const rule of ruleSet.rules) {
    const value = matchRule(row, rule);
    if (value === null) continue;

    if (rule.action === "drop-row") {
      return { records: [], droppedBy: rule.name };
    }

    if (rule.mergePolicy === "combined") {
      if (combined === null) {
        combined = { values: new Map(), rules: [] };
        records.push({ values: combined.values, rules: combined.rules, source: row.source });
      }
      combined.values.set(rule.name, value);
      combined.rules.push(rule.name);
      continue;
    }

    records.push({
      values: new Map([[rule.name, value]]),
      rules: [rule.name],
      source: row.source,
    });
  }

  return { records, droppedBy: null };
}

/** Records for a row; empty when nothing fires or the row is dropped. */
export function matchRow(row: InputRow, ruleSet: RuleSet): OutputRecord[] {
  return evaluateRow(row, ruleSet).records;
}
