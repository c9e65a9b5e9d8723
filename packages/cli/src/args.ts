/**
 * Argument parser for the rowsift CLI.
 *
 * Hand-rolled, like the rest of the CLI plumbing.
 * Supports subcommands, repeatable options, boolean flags and -v counting.
 */

import { MERGE_POLICIES, isMergePolicy } from "@rowsift/core";
import type { MergePolicy } from "@rowsift/core";

export interface ExtractArgs {
  command: "extract";
  /** Files or directories, in the order given. */
  inputs: string[];
  output: string | null;
  config: string | null;
  /** Default merge policy for rules that set none. Null: not given. */
  mergePolicy: MergePolicy | null;
  caseSensitive: boolean;
  ruleField: string | null;
  fileField: string | null;
  /** Fixed output columns. Null: use the first-seen union. */
  fields: string[] | null;
  delimiter: string | null;
  /** Number of -v given. */
  verbose: number;
  quiet: boolean;
}

export interface CheckArgs {
  command: "check";
  config: string;
  mergePolicy: MergePolicy | null;
  caseSensitive: boolean;
}

export interface HelpArgs {
  command: "help";
  topic: string | null;
}

export interface VersionArgs {
  command: "version";
}

export type ParsedArgs = ExtractArgs | CheckArgs | HelpArgs | VersionArgs;

export interface ParseError {
  error: string;
}

export type ParseResult = ParsedArgs | ParseError;

export function isError<T extends object>(result: T | ParseError): result is ParseError {
  return "error" in result;
}

const EXTRACT_HELP = `
rowsift extract -i <path> [-i <path>...] -o <file> -c <rules.json> [options]

Read CSV files, apply the regex rules from the rules document, and write
every match into one consolidated CSV. The output header is the union of
all matched fields in first-seen order.

Options:
  -i, --input <path>     CSV file or directory of CSV files (repeatable)
  -o, --output <file>    Destination CSV
  -c, --config <file>    Rules document (JSON, // comments allowed)
  --merge <policy>       Default merge policy: separate, combined (env: ROWSIFT_MERGE_POLICY)
  --case-sensitive       Make rules case-sensitive unless they say otherwise
  --rule-field <name>    Add a leading column naming the rule(s) that fired (env: ROWSIFT_RULE_FIELD)
  --file-field <name>    Add a column with the source file name (env: ROWSIFT_FILE_FIELD)
  --fields <a,b,...>     Fixed output columns instead of the first-seen union
  --delimiter <char>     Input field delimiter (default: ",", env: ROWSIFT_DELIMITER)
  -v, --verbose          More output; repeat for more (-v, -vv, -vvv)
  -q, --quiet            Only print errors
  -h, --help             Show this help

Examples:
  rowsift extract -i data/ -o matches.csv -c rules.json
  rowsift -i a.csv -i b.csv -o out.csv -c rules.json -vv
  rowsift extract -i data/ -o out.csv -c rules.json --merge combined --file-field _file
`.trim();

const CHECK_HELP = `
rowsift check -c <rules.json> [options]

Load and compile a rules document without touching any CSV file, then
list the compiled rules.

Options:
  -c, --config <file>    Rules document
  --merge <policy>       Default merge policy: separate, combined
  --case-sensitive       Make rules case-sensitive unless they say otherwise
  -h, --help             Show this help
`.trim();

const MAIN_HELP = `
rowsift - extract regex matches from CSV files into one CSV

Usage:
  rowsift <command> [options]
  rowsift -i <path> -o <file> -c <rules.json> [options]

Commands:
  extract    Apply rules to CSV files and write the matches (default)
  check      Validate a rules document
  version    Show version
  help       Show help for a command

Run 'rowsift help <command>' for details on a specific command.
`.trim();

export function getHelp(topic: string | null): string {
  if (topic === "extract") return EXTRACT_HELP;
  if (topic === "check") return CHECK_HELP;
  return MAIN_HELP;
}

export function parseArgs(argv: string[]): ParseResult {
  // Strip node and script path
  const args = argv.slice(2);

  if (args.length === 0) {
    return { command: "help", topic: null };
  }

  const sub = args[0];

  if (sub === "--version" || sub === "version") {
    return { command: "version" };
  }

  if (sub === "--help" || sub === "-h" || sub === "help") {
    return { command: "help", topic: args[1] ?? null };
  }

  if (sub === "extract") {
    return parseExtractArgs(args.slice(1));
  }

  if (sub === "check") {
    return parseCheckArgs(args.slice(1));
  }

  // Bare options mean extract: `rowsift -i data -o out.csv -c rules.json`
  if (sub.startsWith("-")) {
    return parseExtractArgs(args);
  }

  return { error: `Unknown command: ${sub}\n\n${MAIN_HELP}` };
}

/** Count the v's in -v, -vv, -vvv. Returns 0 for anything else. */
function verboseCount(arg: string): number {
  if (arg === "--verbose") return 1;
  return /^-v+$/.test(arg) ? arg.length - 1 : 0;
}

function parseMergePolicy(value: string): MergePolicy | ParseError {
  if (!isMergePolicy(value)) {
    return { error: `Invalid merge policy: ${value}. Must be one of: ${MERGE_POLICIES.join(", ")}` };
  }
  return value;
}

function parseExtractArgs(args: string[]): ParseResult {
  const result: ExtractArgs = {
    command: "extract",
    inputs: [],
    output: null,
    config: null,
    mergePolicy: null,
    caseSensitive: false,
    ruleField: null,
    fileField: null,
    fields: null,
    delimiter: null,
    verbose: 0,
    quiet: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      return { command: "help", topic: "extract" };
    }

    const v = verboseCount(arg);
    if (v > 0) {
      result.verbose += v;
      i++;
      continue;
    }

    if (arg === "--input" || arg === "-i") {
      i++;
      if (i >= args.length) return { error: `${arg} requires a value` };
      result.inputs.push(args[i]);
    } else if (arg === "--output" || arg === "-o") {
      i++;
      if (i >= args.length) return { error: `${arg} requires a value` };
      result.output = args[i];
    } else if (arg === "--config" || arg === "-c") {
      i++;
      if (i >= args.length) return { error: `${arg} requires a value` };
      result.config = args[i];
    } else if (arg === "--merge") {
      i++;
      if (i >= args.length) return { error: "--merge requires a value" };
      const policy = parseMergePolicy(args[i]);
      if (typeof policy !== "string") return policy;
      result.mergePolicy = policy;
    } else if (arg === "--case-sensitive") {
      result.caseSensitive = true;
    } else if (arg === "--rule-field") {
      i++;
      if (i >= args.length || args[i] === "") return { error: "--rule-field requires a value" };
      result.ruleField = args[i];
    } else if (arg === "--file-field") {
      i++;
      if (i >= args.length || args[i] === "") return { error: "--file-field requires a value" };
      result.fileField = args[i];
    } else if (arg === "--fields") {
      i++;
      if (i >= args.length) return { error: "--fields requires a value" };
      const fields = args[i].split(",").map((f) => f.trim()).filter(Boolean);
      if (fields.length === 0) return { error: "--fields requires at least one column name" };
      result.fields = fields;
    } else if (arg === "--delimiter") {
      i++;
      if (i >= args.length || args[i] === "") return { error: "--delimiter requires a value" };
      result.delimiter = args[i];
    } else if (arg === "--quiet" || arg === "-q") {
      result.quiet = true;
    } else if (arg.startsWith("-")) {
      return { error: `Unknown option: ${arg}\n\n${EXTRACT_HELP}` };
    } else {
      return { error: `Unexpected argument: ${arg}\n\n${EXTRACT_HELP}` };
    }

    i++;
  }

  if (result.inputs.length === 0) return { error: `Missing --input\n\n${EXTRACT_HELP}` };
  if (result.output === null) return { error: `Missing --output\n\n${EXTRACT_HELP}` };
  if (result.config === null) return { error: `Missing --config\n\n${EXTRACT_HELP}` };

  return result;
}

function parseCheckArgs(args: string[]): ParseResult {
  let config: string | null = null;
  let mergePolicy: MergePolicy | null = null;
  let caseSensitive = false;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      return { command: "help", topic: "check" };
    }

    if (arg === "--config" || arg === "-c") {
      i++;
      if (i >= args.length) return { error: `${arg} requires a value` };
      config = args[i];
    } else if (arg === "--merge") {
      i++;
      if (i >= args.length) return { error: "--merge requires a value" };
      const policy = parseMergePolicy(args[i]);
      if (typeof policy !== "string") return policy;
      mergePolicy = policy;
    } else if (arg === "--case-sensitive") {
      caseSensitive = true;
    } else if (arg.startsWith("-")) {
      return { error: `Unknown option: ${arg}\n\n${CHECK_HELP}` };
    } else if (config === null) {
      // `rowsift check rules.json` reads naturally too
      config = arg;
    } else {
      return { error: `Unexpected argument: ${arg}\n\n${CHECK_HELP}` };
    }

    i++;
  }

  if (config === null) return { error: `Missing --config\n\n${CHECK_HELP}` };

  return { command: "check", config, mergePolicy, caseSensitive };
}
