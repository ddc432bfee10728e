/**
 * Errors raised while loading extern descriptor files
 */

import { ArxcError } from "#errors";
import { Severity } from "#result";

export enum ErrorCode {
  MALFORMED_ENTRY = "LINK001",
  MISSING_METADATA = "LINK002",
  UNREADABLE_FILE = "LINK003",
  UNKNOWN_SECTION = "LINK004",
  OVERLOAD_REPLACED = "LINK100",
}

export const ErrorMessages = {
  [ErrorCode.MALFORMED_ENTRY]: "Malformed descriptor entry",
  [ErrorCode.MISSING_METADATA]: "Descriptor is missing module metadata",
  [ErrorCode.UNREADABLE_FILE]: "Cannot read descriptor",
  [ErrorCode.UNKNOWN_SECTION]: "Unknown descriptor section",
  [ErrorCode.OVERLOAD_REPLACED]: "Extern overload replaced",
};

/**
 * Descriptor errors point at a file (and line, where there is one) rather
 * than at program source
 */
export class Error extends ArxcError {
  public readonly file: string;
  public readonly line?: number;

  constructor(
    code: ErrorCode,
    file: string,
    message?: string,
    line?: number,
    severity: Severity = Severity.Error,
  ) {
    const baseMessage = ErrorMessages[code];
    const where = line === undefined ? file : `${file}:${line}`;
    const fullMessage = message
      ? `${baseMessage}: ${message} (${where})`
      : `${baseMessage} (${where})`;
    super(fullMessage, code, undefined, severity);
    this.file = file;
    this.line = line;
  }
}
