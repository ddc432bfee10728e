/**
 * Base error type shared by every compiler phase
 */

import type { SourceLocation } from "#ast";
import { Severity } from "#result";

export class ArxcError extends Error {
  public readonly code: string;
  public readonly location?: SourceLocation;
  public readonly severity: Severity;

  constructor(
    message: string,
    code: string,
    location?: SourceLocation,
    severity: Severity = Severity.Error,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.location = location;
    this.severity = severity;
  }
}

/**
 * Errors raised while reading compiler input (AST documents)
 */
export enum InputErrorCode {
  MALFORMED_AST = "AST001",
}

export class InputError extends ArxcError {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(`${message} at ${path}`, InputErrorCode.MALFORMED_AST);
    this.path = path;
  }
}
