/**
 * Errors raised while turning LLVM IR into an executable
 */

import { ArxcError } from "#errors";

export enum ErrorCode {
  MISSING_TOOL = "ENV001",
  PROCESS_FAILED = "PROC001",
}

export const ErrorMessages = {
  [ErrorCode.MISSING_TOOL]: "Required tool not found",
  [ErrorCode.PROCESS_FAILED]: "Command failed",
};

/**
 * A toolchain binary is not installed or not on `PATH`
 */
export class EnvironmentError extends ArxcError {
  public readonly tool: string;

  constructor(tool: string) {
    super(
      `${ErrorMessages[ErrorCode.MISSING_TOOL]}: make sure (${tool}) is installed and on your PATH`,
      ErrorCode.MISSING_TOOL,
    );
    this.tool = tool;
  }
}

/**
 * A child process exited with a non-zero status
 */
export class ProcessError extends ArxcError {
  public readonly command: readonly string[];
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(
    command: readonly string[],
    exitCode: number | null,
    stderr: string,
  ) {
    const status = exitCode === null ? "was killed" : `exited with ${exitCode}`;
    const detail = stderr.trim();
    super(
      `${ErrorMessages[ErrorCode.PROCESS_FAILED]}: ${command.join(" ")} ${status}${detail ? `\n${detail}` : ""}`,
      ErrorCode.PROCESS_FAILED,
    );
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export type Error = EnvironmentError | ProcessError;
