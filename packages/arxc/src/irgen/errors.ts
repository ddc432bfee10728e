/**
 * Errors raised while lowering the AST to IR
 */

import { ArxcError } from "#errors";
import type { SourceLocation } from "#ast";
import { Severity } from "#result";

export enum ErrorCode {
  UNDEFINED_VARIABLE = "IR001",
  UNKNOWN_FUNCTION = "IR002",
  EXTERN_NOT_FOUND = "IR003",
  NO_MATCHING_OVERLOAD = "IR004",
  TYPE_MISMATCH = "IR005",
  UNSUPPORTED_TYPE = "IR006",
  INVALID_RETURN = "IR007",
  MISSING_RETURN = "IR008",
  OUTSIDE_LOOP = "IR009",
  UNTERMINATED_BLOCK = "IR010",
  UNIMPLEMENTED_OPERATOR = "IR011",
  DUPLICATE_FUNCTION = "IR012",
  UNREACHABLE_CODE = "IR100",
}

export const ErrorMessages = {
  [ErrorCode.UNDEFINED_VARIABLE]: "Undefined variable",
  [ErrorCode.UNKNOWN_FUNCTION]: "Unknown function",
  [ErrorCode.EXTERN_NOT_FOUND]: "Extern function not found",
  [ErrorCode.NO_MATCHING_OVERLOAD]: "No matching overload",
  [ErrorCode.TYPE_MISMATCH]: "Type mismatch",
  [ErrorCode.UNSUPPORTED_TYPE]: "Unsupported type",
  [ErrorCode.INVALID_RETURN]: "Invalid return",
  [ErrorCode.MISSING_RETURN]: "Function falls off the end without returning",
  [ErrorCode.OUTSIDE_LOOP]: "Loop control outside of a loop",
  [ErrorCode.UNTERMINATED_BLOCK]: "Reachable block has no terminator",
  [ErrorCode.UNIMPLEMENTED_OPERATOR]: "Unimplemented operator",
  [ErrorCode.DUPLICATE_FUNCTION]: "Function defined more than once",
  [ErrorCode.UNREACHABLE_CODE]: "Unreachable code",
};

export class Error extends ArxcError {
  constructor(
    code: ErrorCode,
    message?: string,
    location?: SourceLocation,
    severity: Severity = Severity.Error,
  ) {
    const baseMessage = ErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code, location, severity);
  }
}

export function assertExhausted(_: never): never {
  throw new globalThis.Error(`Unexpected code path; expected exhaustive`);
}
