/**
 * @rowsift/rules - The rule-matching engine.
 *
 * Loads a rules document into a compiled RuleSet, evaluates it against
 * input rows, and aggregates the matches into one table whose header is
 * the union of every matched field in first-seen order.
 *
 * ```typescript
 * import { Aggregator, extractRows, parseRuleSet } from '@rowsift/rules';
 *
 * const ruleSet = parseRuleSet('{"email": {"field": "contact", "pattern": "[\\\\w.]+@[\\\\w.]+"}}');
 * const aggregator = new Aggregator();
 * await extractRows(rows, ruleSet, aggregator);
 * aggregator.header(); // ["email"]
 * ```
 */

export type {
  CompileOptions,
  NamedRuleDefinitionJson,
  RuleConditionJson,
  RuleDefinitionJson,
  RulesDocument,
} from "./loader.js";
export { compileRuleSet, loadRuleSetFile, parseRuleSet } from "./loader.js";
export type { RowEvaluation } from "./matcher.js";
export { evaluateRow, matchRow, matchRule } from "./matcher.js";
export type { OutputSchemaOptions } from "./schema.js";
export { OutputSchema } from "./schema.js";
export type { AggregatorOptions } from "./aggregator.js";
export { Aggregator, RULE_NAME_SEPARATOR } from "./aggregator.js";
export type { ExtractHooks, ExtractStats } from "./extract.js";
export { createExtractStats, extractRows } from "./extract.js";
