/**
 * @rowsift/core
 *
 * Shared types and the error taxonomy for the rowsift ecosystem.
 * This is the contract layer: every other `@rowsift/*` package depends on it.
 *
 * Zero npm dependencies. No I/O. Just types and small pure helpers.
 *
 * @packageDocumentation
 */

export {
  ANY_FIELD,
  CAPTURE_MODES,
  MERGE_POLICIES,
  RULE_ACTIONS,
  isCaptureMode,
  isMergePolicy,
  isRuleAction,
} from "./types.js";

export type {
  CaptureMode,
  InputRow,
  MergePolicy,
  OutputRecord,
  RowSource,
  Rule,
  RuleAction,
  RuleCondition,
  RuleSet,
  SourceField,
} from "./types.js";

// Errors: one class per kind, all fatal
export {
  DOCUMENT_LEVEL,
  DuplicateRuleNameError,
  InputReadError,
  InvalidRuleError,
  OutputWriteError,
  RowsiftError,
  describeError,
  errorMessage,
  isRowsiftError,
} from "./errors.js";

export type { ErrorKind } from "./errors.js";
