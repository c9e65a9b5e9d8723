/**
 * RuleSet loader.
 *
 * A rules document maps output field names to the column and pattern
 * that produce them:
 * {
 *   "email": { "field": "contact", "pattern": "[\\w.]+@[\\w.]+" },
 *   "phone": {
 *     "field": ["phone", "contact"],     // first listed column that matches wins
 *     "pattern": "(\\+?\\d[\\d -]{6,}\\d)",
 *     "capture": "group",               // "group" (default) | "match"
 *     "mergePolicy": "combined",        // "separate" (default) | "combined"
 *     "caseSensitive": false            // default false
 *   },
 *   "anything": { "field": "*", "pattern": "(?i)urgent" },
 *   "uk_phone": {
 *     "field": "phone", "pattern": "\\d{5} \\d{6}",
 *     "match": [{ "field": "country", "pattern": "^uk$" }]  // must hold too
 *   },
 *   "test_rows": { "field": "*", "pattern": "@example\\.test", "action": "drop-row" }
 * }
 *
 * The same rules may also be given as a list, `[{ "name": "email", ... }]`.
 * Only the list form can carry a repeated name through JSON parsing, so
 * that is where DuplicateRuleName surfaces.
 *
 * Every pattern is compiled here, once. Any problem rejects the whole
 * document; there are no partial RuleSets.
 */

import fs from "node:fs";

import {
  ANY_FIELD,
  CAPTURE_MODES,
  DOCUMENT_LEVEL,
  DuplicateRuleNameError,
  InvalidRuleError,
  MERGE_POLICIES,
  RULE_ACTIONS,
  errorMessage,
  isCaptureMode,
  isMergePolicy,
  isRuleAction,
} from "@rowsift/core";
import type {
  CaptureMode,
  MergePolicy,
  Rule,
  RuleAction,
  RuleCondition,
  RuleSet,
  SourceField,
} from "@rowsift/core";

// --- Document schema types ---

export interface RuleConditionJson {
  /** Input column, list of columns, or "*" for any column. */
  field: string | string[];
  /** Regex source. A leading (?i) forces case-insensitive matching. */
  pattern: string;
}

export interface RuleDefinitionJson extends RuleConditionJson {
  /** Extra conditions; the rule fires only when all of them hold. */
  match?: RuleConditionJson[];
  action?: RuleAction;
  mergePolicy?: MergePolicy;
  capture?: CaptureMode;
  caseSensitive?: boolean;
}

export interface NamedRuleDefinitionJson extends RuleDefinitionJson {
  name: string;
}

export type RulesDocument =
  | Record<string, RuleDefinitionJson>
  | NamedRuleDefinitionJson[];

export interface CompileOptions {
  /** Policy for rules that set no `mergePolicy`. Default: "separate". */
  defaultMergePolicy?: MergePolicy;
  /** Case sensitivity for rules that set no `caseSensitive`. Default: false. */
  defaultCaseSensitive?: boolean;
}

const CONDITION_KEYS = new Set(["field", "pattern"]);

const DEFINITION_KEYS = new Set([
  "field",
  "pattern",
  "match",
  "action",
  "mergePolicy",
  "capture",
  "caseSensitive",
]);

const NAMED_DEFINITION_KEYS = new Set([...DEFINITION_KEYS, "name"]);

// --- Compilation ---

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Copy `text`, letting `onCode` rewrite characters outside string
 * literals. Patterns are full of commas, brackets and slashes, so the
 * JSONC clean-up below must never touch string contents.
 */
function rewriteOutsideStrings(
  text: string,
  onCode: (text: string, i: number) => { emit: string; next: number },
): string {
  let out = "";
  let inString = false;
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (inString) {
      if (ch === "\\") {
        out += text.slice(i, i + 2);
        i += 2;
        continue;
      }
      if (ch === '"') inString = false;
      out += ch;
      i++;
      continue;
    }
    if (ch === '"') {
      inString = true;
      out += ch;
      i++;
      continue;
    }
    const { emit, next } = onCode(text, i);
    out += emit;
    i = next;
  }
  return out;
}

/**
 * Strip // comments and trailing commas from JSON-with-comments.
 * Good enough for config files; not a full JSONC parser.
 */
function stripJsonComments(text: string): string {
  const withoutComments = rewriteOutsideStrings(text, (t, i) => {
    if (t[i] === "/" && t[i + 1] === "/") {
      const end = t.indexOf("\n", i);
      return end === -1 ? { emit: "", next: t.length } : { emit: "", next: end };
    }
    return { emit: t[i], next: i + 1 };
  });

  return rewriteOutsideStrings(withoutComments, (t, i) => {
    if (t[i] === ",") {
      let j = i + 1;
      while (j < t.length && /\s/.test(t[j])) j++;
      if (t[j] === "]" || t[j] === "}") return { emit: "", next: i + 1 };
    }
    return { emit: t[i], next: i + 1 };
  });
}

function parseSourceField(
  index: number,
  name: string,
  value: unknown,
  at = "",
): SourceField {
  if (value === ANY_FIELD) return { kind: "any" };

  if (typeof value === "string") {
    if (value.length === 0) {
      throw new InvalidRuleError(index, name, `${at}"field" must not be empty`);
    }
    return { kind: "named", names: [value] };
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      throw new InvalidRuleError(index, name, `${at}"field" list must not be empty`);
    }
    const names: string[] = [];
    for (const entry of value) {
      if (typeof entry !== "string" || entry.length === 0) {
        throw new InvalidRuleError(
          index,
          name,
          `${at}"field" list entries must be non-empty strings`,
        );
      }
      if (entry === ANY_FIELD) {
        throw new InvalidRuleError(
          index,
          name,
          `${at}"${ANY_FIELD}" cannot be combined with named fields`,
        );
      }
      names.push(entry);
    }
    return { kind: "named", names: Object.freeze(names) };
  }

  throw new InvalidRuleError(
    index,
    name,
    `${at}"field" is required and must be a string or a list of strings`,
  );
}

/**
 * Compile a pattern string. A leading (?i) is turned into the "i" flag
 * since JS has no inline flags. The global flag is never set.
 */
function compilePattern(
  index: number,
  name: string,
  value: unknown,
  caseSensitive: boolean,
  at = "",
): RegExp {
  if (typeof value !== "string") {
    throw new InvalidRuleError(index, name, `${at}"pattern" is required and must be a string`);
  }

  let source = value;
  let flags = caseSensitive ? "" : "i";
  if (source.startsWith("(?i)")) {
    flags = "i";
    source = source.slice(4);
  }

  if (source.length === 0) {
    throw new InvalidRuleError(index, name, `${at}"pattern" must not be empty`);
  }

  try {
    return new RegExp(source, flags);
  } catch (err: unknown) {
    throw new InvalidRuleError(
      index,
      name,
      `${at}pattern does not compile: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}

/** Compile the optional "match" list. Entries are labelled match[i] in errors. */
function parseConditions(
  index: number,
  name: string,
  value: unknown,
  caseSensitive: boolean,
): RuleCondition[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new InvalidRuleError(index, name, `"match" must be a list of { field, pattern } objects`);
  }

  return value.map((entry: unknown, i) => {
    const at = `match[${i}]: `;
    if (!isPlainObject(entry)) {
      throw new InvalidRuleError(index, name, `${at}expected an object with "field" and "pattern"`);
    }
    for (const key of Object.keys(entry)) {
      if (!CONDITION_KEYS.has(key)) {
        throw new InvalidRuleError(index, name, `${at}unknown key "${key}"`);
      }
    }
    return Object.freeze({
      source: parseSourceField(index, name, entry.field, at),
      pattern: compilePattern(index, name, entry.pattern, caseSensitive, at),
    });
  });
}

function compileRule(
  index: number,
  name: string,
  def: Record<string, unknown>,
  allowedKeys: Set<string>,
  options: CompileOptions,
): Rule {
  for (const key of Object.keys(def)) {
    if (!allowedKeys.has(key)) {
      throw new InvalidRuleError(index, name, `unknown key "${key}"`);
    }
  }

  const source = parseSourceField(index, name, def.field);

  let caseSensitive = options.defaultCaseSensitive ?? false;
  if (def.caseSensitive !== undefined) {
    if (typeof def.caseSensitive !== "boolean") {
      throw new InvalidRuleError(index, name, `"caseSensitive" must be a boolean`);
    }
    caseSensitive = def.caseSensitive;
  }

  const pattern = compilePattern(index, name, def.pattern, caseSensitive);
  const conditions = parseConditions(index, name, def.match, caseSensitive);

  let action: RuleAction = "extract";
  if (def.action !== undefined) {
    if (!isRuleAction(def.action)) {
      throw new InvalidRuleError(
        index,
        name,
        `"action" must be one of: ${RULE_ACTIONS.join(", ")}`,
      );
    }
    action = def.action;
  }

  if (action === "drop-row") {
    for (const key of ["mergePolicy", "capture"]) {
      if (def[key] !== undefined) {
        throw new InvalidRuleError(index, name, `"${key}" does not apply to drop-row rules`);
      }
    }
  }

  let mergePolicy: MergePolicy = options.defaultMergePolicy ?? "separate";
  if (def.mergePolicy !== undefined) {
    if (!isMergePolicy(def.mergePolicy)) {
      throw new InvalidRuleError(
        index,
        name,
        `"mergePolicy" must be one of: ${MERGE_POLICIES.join(", ")}`,
      );
    }
    mergePolicy = def.mergePolicy;
  }

  let capture: CaptureMode = "group";
  if (def.capture !== undefined) {
    if (!isCaptureMode(def.capture)) {
      throw new InvalidRuleError(
        index,
        name,
        `"capture" must be one of: ${CAPTURE_MODES.join(", ")}`,
      );
    }
    capture = def.capture;
  }

  return Object.freeze({
    name,
    source,
    pattern,
    conditions: Object.freeze(conditions),
    action,
    capture,
    mergePolicy,
  });
}

/** Flatten either document form into (name, definition) pairs in document order. */
function documentEntries(
  doc: unknown,
): { entries: [unknown, unknown][]; allowedKeys: Set<string> } {
  if (Array.isArray(doc)) {
    return {
      entries: doc.map((item): [unknown, unknown] => [
        isPlainObject(item) ? item.name : undefined,
        item,
      ]),
      allowedKeys: NAMED_DEFINITION_KEYS,
    };
  }

  if (isPlainObject(doc)) {
    return { entries: Object.entries(doc), allowedKeys: DEFINITION_KEYS };
  }

  throw new InvalidRuleError(
    DOCUMENT_LEVEL,
    null,
    "expected an object mapping rule names to definitions, or a list of rules",
  );
}

/**
 * Validate a parsed rules document and compile it into a RuleSet.
 * Rule indexes in errors are 0-based positions in document order.
 */
export function compileRuleSet(
  doc: unknown,
  options: CompileOptions = {},
): RuleSet {
  const { entries, allowedKeys } = documentEntries(doc);

  if (entries.length === 0) {
    throw new InvalidRuleError(DOCUMENT_LEVEL, null, "no rules defined");
  }

  const seen = new Map<string, number>();
  const rules: Rule[] = [];

  entries.forEach(([name, def], index) => {
    if (typeof name !== "string" || name.length === 0) {
      throw new InvalidRuleError(index, null, "rule name must be a non-empty string");
    }

    const firstIndex = seen.get(name);
    if (firstIndex !== undefined) {
      throw new DuplicateRuleNameError(index, name, firstIndex);
    }
    seen.set(name, index);

    if (!isPlainObject(def)) {
      throw new InvalidRuleError(index, name, "rule definition must be an object");
    }

    rules.push(compileRule(index, name, def, allowedKeys, options));
  });

  return Object.freeze({ rules: Object.freeze(rules) });
}

/**
 * Parse rules document text. Supports // comments and trailing commas.
 */
export function parseRuleSet(
  text: string,
  options: CompileOptions = {},
): RuleSet {
  let doc: unknown;
  try {
    doc = JSON.parse(stripJsonComments(text));
  } catch (err: unknown) {
    throw new InvalidRuleError(
      DOCUMENT_LEVEL,
      null,
      `not valid JSON: ${errorMessage(err)}`,
      { cause: err },
    );
  }
  return compileRuleSet(doc, options);
}

/**
 * Load a rules document from a JSON file path.
 */
export function loadRuleSetFile(
  filePath: string,
  options: CompileOptions = {},
): RuleSet {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err: unknown) {
    throw new InvalidRuleError(
      DOCUMENT_LEVEL,
      null,
      `cannot read ${filePath}: ${errorMessage(err)}`,
      { cause: err },
    );
  }
  return parseRuleSet(raw, options);
}
