/**
 * Core types for the rowsift extraction pipeline.
 *
 * These are the public types that the rules engine, the CSV
 * collaborator, and the CLI all depend on. Zero external dependencies.
 */

// --- Policies ---

/**
 * How the matches of several rules on one input row become output records.
 *
 * "separate" rules each emit their own record. All "combined" rules that
 * fire on a row write into one shared record for that row.
 */
export type MergePolicy = "separate" | "combined";

export const MERGE_POLICIES: readonly MergePolicy[] = ["separate", "combined"];

/**
 * What a firing rule emits as its value.
 *
 * "group" emits the first capture group when the pattern defines one,
 * falling back to the full match. "match" always emits the full match.
 */
export type CaptureMode = "group" | "match";

export const CAPTURE_MODES: readonly CaptureMode[] = ["group", "match"];

/**
 * What a firing rule does with its row.
 *
 * "extract" emits the rule's value as an output field. "drop-row" emits
 * nothing and suppresses every record the row would otherwise produce.
 */
export type RuleAction = "extract" | "drop-row";

export const RULE_ACTIONS: readonly RuleAction[] = ["extract", "drop-row"];

export function isRuleAction(value: unknown): value is RuleAction {
  return value === "extract" || value === "drop-row";
}

export function isMergePolicy(value: unknown): value is MergePolicy {
  return value === "separate" || value === "combined";
}

export function isCaptureMode(value: unknown): value is CaptureMode {
  return value === "group" || value === "match";
}

// --- Rules ---

/**
 * Which input column(s) a rule is tested against.
 *
 * "named" columns are tried in the listed order; "any" tries every column
 * of the row in header order. Either way the first matching column wins.
 */
export type SourceField =
  | { kind: "named"; names: readonly string[] }
  | { kind: "any" };

/** Sentinel used in rule documents for {@link SourceField} "any". */
export const ANY_FIELD = "*";

/** A column selector and the pattern one of its columns must contain. */
export interface RuleCondition {
  source: SourceField;
  /** Compiled without the global flag, so `exec` carries no state. */
  pattern: RegExp;
}

export interface Rule extends RuleCondition {
  /** Output field identifier. Unique within a RuleSet. */
  name: string;
  /** Further conditions that must all hold for the rule to fire. Never emitted. */
  conditions: readonly RuleCondition[];
  action: RuleAction;
  capture: CaptureMode;
  mergePolicy: MergePolicy;
}

/** Ordered, frozen collection of compiled rules for one run. */
export interface RuleSet {
  readonly rules: readonly Rule[];
}

// --- Rows and records ---

/** Where a row came from, for diagnostics and provenance columns. */
export interface RowSource {
  /** File path as given to the reader. */
  file: string;
  /** 1-based physical line on which the record ended. */
  line: number;
}

/**
 * One decoded record from a source file.
 *
 * `fields` keeps header order. A Map is used because plain objects move
 * integer-like keys (a column named "2024") to the front.
 */
export interface InputRow {
  fields: ReadonlyMap<string, string>;
  source: RowSource;
}

/** The contribution of one or more rules firing against one InputRow. */
export interface OutputRecord {
  /** Output field name to extracted value, in firing order. */
  values: ReadonlyMap<string, string>;
  /** Names of the rules that contributed, in firing order. */
  rules: readonly string[];
  source: RowSource;
}
