/**
 * Check command: compile a rules document and list what it defines.
 */

import type { RuleCondition, RuleSet } from "@rowsift/core";
import { loadRuleSetFile } from "@rowsift/rules";

import type { CheckArgs } from "./args.js";

function describeCondition(condition: RuleCondition): string {
  const source = condition.source.kind === "any" ? "*" : condition.source.names.join("|");
  return `${source}\t${String(condition.pattern)}`;
}

/**
 * One line per rule: name, source column(s), pattern, any extra
 * conditions, then policy and capture mode (or "drop-row").
 */
export function formatRuleSummary(ruleSet: RuleSet): string[] {
  return ruleSet.rules.map((rule) => {
    const cells = [rule.name, describeCondition(rule)];
    for (const condition of rule.conditions) cells.push(`and ${describeCondition(condition)}`);
    if (rule.action === "drop-row") cells.push("drop-row");
    else cells.push(rule.mergePolicy, rule.capture);
    return cells.join("\t");
  });
}

/**
 * Load the rules document named in `args` and print its rules.
 *
 * @returns Exit code (0 when the document compiles). Load errors are thrown.
 */
export async function runCheck(args: CheckArgs): Promise<number> {
  const ruleSet = loadRuleSetFile(args.config, {
    defaultMergePolicy: args.mergePolicy ?? undefined,
    defaultCaseSensitive: args.caseSensitive,
  });

  for (const line of formatRuleSummary(ruleSet)) console.log(line);
  console.log(`${ruleSet.rules.length} rule(s) OK`);
  return 0;
}
