/**
 * Error taxonomy for rowsift.
 *
 * Every error the pipeline raises on purpose is a {@link RowsiftError}
 * with a `kind` discriminant. All of them are fatal: the run stops at the
 * first one and the CLI exits non-zero.
 */

export type ErrorKind =
  | "InvalidRule"
  | "DuplicateRuleName"
  | "InputReadError"
  | "OutputWriteError";

/** Rule index used for problems with the document as a whole. */
export const DOCUMENT_LEVEL = -1;

/**
 * Base class for all rowsift errors.
 */
export class RowsiftError extends Error {
  /** Error kind for programmatic handling */
  public readonly kind: ErrorKind;

  /** Additional error context */
  public readonly context: Record<string, unknown>;

  constructor(
    kind: ErrorKind,
    message: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RowsiftError";
    this.kind = kind;
    this.context = context;
  }
}

/**
 * A rule definition is malformed or its pattern does not compile.
 * `ruleIndex` is {@link DOCUMENT_LEVEL} when the whole document is at fault.
 */
export class InvalidRuleError extends RowsiftError {
  public readonly ruleIndex: number;
  public readonly ruleName: string | null;
  public readonly reason: string;

  constructor(
    ruleIndex: number,
    ruleName: string | null,
    reason: string,
    options?: { cause?: unknown },
  ) {
    const where =
      ruleIndex === DOCUMENT_LEVEL
        ? "rules document"
        : `rule #${ruleIndex}${ruleName !== null ? ` "${ruleName}"` : ""}`;
    super("InvalidRule", `Invalid ${where}: ${reason}`, { ruleIndex, ruleName }, options);
    this.name = "InvalidRuleError";
    this.ruleIndex = ruleIndex;
    this.ruleName = ruleName;
    this.reason = reason;
  }
}

export class DuplicateRuleNameError extends RowsiftError {
  public readonly ruleIndex: number;
  public readonly ruleName: string;
  /** Index of the rule that first used the name. */
  public readonly firstIndex: number;

  constructor(ruleIndex: number, ruleName: string, firstIndex: number) {
    super(
      "DuplicateRuleName",
      `Duplicate rule name "${ruleName}" at rule #${ruleIndex} (first defined at rule #${firstIndex})`,
      { ruleIndex, ruleName, firstIndex },
    );
    this.name = "DuplicateRuleNameError";
    this.ruleIndex = ruleIndex;
    this.ruleName = ruleName;
    this.firstIndex = firstIndex;
  }
}

/**
 * An input file is missing, unreadable, or not well-formed CSV.
 * `line` is set when the failure can be pinned to a physical line.
 */
export class InputReadError extends RowsiftError {
  public readonly file: string;
  public readonly line: number | null;

  constructor(
    file: string,
    reason: string,
    line: number | null = null,
    options?: { cause?: unknown },
  ) {
    const where = line !== null ? `${file}:${line}` : file;
    super("InputReadError", `Unable to read ${where}: ${reason}`, { file, line }, options);
    this.name = "InputReadError";
    this.file = file;
    this.line = line;
  }
}

export class OutputWriteError extends RowsiftError {
  public readonly file: string;

  constructor(file: string, reason: string, options?: { cause?: unknown }) {
    super("OutputWriteError", `Unable to write ${file}: ${reason}`, { file }, options);
    this.name = "OutputWriteError";
    this.file = file;
  }
}

export function isRowsiftError(err: unknown): err is RowsiftError {
  return err instanceof RowsiftError;
}

/** Message of any thrown value, for causes that are not ours. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * One-line diagnostic for the user. Our own errors already carry their
 * location in the message; anything else is reported as unexpected.
 */
export function describeError(err: unknown): string {
  if (isRowsiftError(err)) return `${err.kind}: ${err.message}`;
  return `Unexpected error: ${errorMessage(err)}`;
}
