import { ArxcError } from "#errors";
import type { SourceLocation } from "#ast";
import { Severity } from "#result";

export enum ErrorCode {
  INVALID_IR = "VAL001",
}

export const ErrorMessages = {
  [ErrorCode.INVALID_IR]: "Invalid IR",
};

/**
 * Inconsistency found in a generated module
 */
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
