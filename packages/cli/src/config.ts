/**
 * Run configuration resolution.
 *
 * Merges parsed CLI arguments with environment variables and applies
 * defaults. Everything the extract run needs is resolved here, before
 * any file is touched.
 */

import { MERGE_POLICIES, isMergePolicy } from "@rowsift/core";
import type { MergePolicy } from "@rowsift/core";
import { MAX_VERBOSITY, MIN_VERBOSITY } from "@rowsift/logger";

import type { ExtractArgs, ParseError } from "./args.js";

/**
 * Fully resolved config with all defaults applied.
 */
export interface RunConfig {
  inputs: string[];
  output: string;
  rulesFile: string;
  verbosity: number;
  mergePolicy: MergePolicy;
  caseSensitive: boolean;
  ruleField: string | null;
  fileField: string | null;
  fields: string[] | null;
  delimiter: string;
}

export type Env = Record<string, string | undefined>;

/** Environment value, with empty strings treated as unset. */
function envValue(env: Env, name: string): string | null {
  const value = env[name];
  return value === undefined || value === "" ? null : value;
}

/** "\t" and "tab" both mean a tab, since a literal tab is awkward to pass. */
function normalizeDelimiter(value: string): string {
  return value === "\\t" || value === "tab" ? "\t" : value;
}

/**
 * Resolve final run config from CLI arguments and environment variables.
 *
 * Priority: CLI arguments > environment variables > defaults.
 *
 * Environment variables:
 * - `ROWSIFT_VERBOSITY` integer from -1 (errors only) to 3 (default: 0)
 * - `ROWSIFT_MERGE_POLICY` "separate" or "combined" (default: "separate")
 * - `ROWSIFT_DELIMITER` input field delimiter (default: ",")
 * - `ROWSIFT_RULE_FIELD` name of the rule provenance column (default: none)
 * - `ROWSIFT_FILE_FIELD` name of the file provenance column (default: none)
 */
export function resolveRunConfig(
  args: ExtractArgs,
  env: Env = process.env,
): RunConfig | ParseError {
  if (args.inputs.length === 0) return { error: "Missing --input" };
  if (args.output === null) return { error: "Missing --output" };
  if (args.config === null) return { error: "Missing --config" };

  let verbosity = 0;
  if (args.quiet) {
    verbosity = MIN_VERBOSITY;
  } else if (args.verbose > 0) {
    verbosity = Math.min(args.verbose, MAX_VERBOSITY);
  } else {
    const raw = envValue(env, "ROWSIFT_VERBOSITY");
    if (raw !== null) {
      const n = Number(raw);
      if (!Number.isInteger(n) || n < MIN_VERBOSITY || n > MAX_VERBOSITY) {
        return {
          error: `Invalid ROWSIFT_VERBOSITY: ${raw}. Must be an integer from ${MIN_VERBOSITY} to ${MAX_VERBOSITY}`,
        };
      }
      verbosity = n;
    }
  }

  let mergePolicy: MergePolicy = "separate";
  if (args.mergePolicy !== null) {
    mergePolicy = args.mergePolicy;
  } else {
    const raw = envValue(env, "ROWSIFT_MERGE_POLICY");
    if (raw !== null) {
      if (!isMergePolicy(raw)) {
        return {
          error: `Invalid ROWSIFT_MERGE_POLICY: ${raw}. Must be one of: ${MERGE_POLICIES.join(", ")}`,
        };
      }
      mergePolicy = raw;
    }
  }

  const delimiter = normalizeDelimiter(
    args.delimiter ?? envValue(env, "ROWSIFT_DELIMITER") ?? ",",
  );
  const ruleField = args.ruleField ?? envValue(env, "ROWSIFT_RULE_FIELD");
  const fileField = args.fileField ?? envValue(env, "ROWSIFT_FILE_FIELD");

  if (ruleField !== null && ruleField === fileField) {
    return { error: `--rule-field and --file-field must differ (both are "${ruleField}")` };
  }

  return {
    inputs: [...args.inputs],
    output: args.output,
    rulesFile: args.config,
    verbosity,
    mergePolicy,
    caseSensitive: args.caseSensitive,
    ruleField,
    fileField,
    fields: args.fields,
    delimiter,
  };
}
