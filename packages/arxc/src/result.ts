import type { ArxcError } from "#errors";

/**
 * Message severity levels
 */
export enum Severity {
  Error = "error",
  Warning = "warning",
}

/**
 * Messages produced by an operation, grouped by severity
 */
export type Messages<E extends ArxcError = ArxcError> = {
  [S in Severity]?: E[];
};

/**
 * Outcome of a compiler operation that may produce diagnostics
 */
export type Result<T, E extends ArxcError = ArxcError> =
  | { success: true; value: T; messages: Messages<E> }
  | { success: false; messages: Messages<E> };

export namespace Result {
  export function ok<T, E extends ArxcError = ArxcError>(value: T): Result<T, E> {
    return { success: true, value, messages: {} };
  }

  export function okWith<T, E extends ArxcError = ArxcError>(
    value: T,
    messages: E[],
  ): Result<T, E> {
    return { success: true, value, messages: group(messages) };
  }

  export function err<T, E extends ArxcError = ArxcError>(
    error: E | E[],
  ): Result<T, E> {
    const errors = Array.isArray(error) ? error : [error];
    return { success: false, messages: group(errors) };
  }

  /**
   * Transform the value of a successful result, keeping its messages
   */
  export function map<T, U, E extends ArxcError>(
    result: Result<T, E>,
    fn: (value: T) => U,
  ): Result<U, E> {
    if (!result.success) {
      return result;
    }
    return { success: true, value: fn(result.value), messages: result.messages };
  }

  export function errors<T, E extends ArxcError>(result: Result<T, E>): E[] {
    return result.messages[Severity.Error] ?? [];
  }

  export function warnings<T, E extends ArxcError>(result: Result<T, E>): E[] {
    return result.messages[Severity.Warning] ?? [];
  }

  /**
   * All messages of a result in severity order (errors first)
   */
  export function all<T, E extends ArxcError>(result: Result<T, E>): E[] {
    return [...errors(result), ...warnings(result)];
  }

  /**
   * Combine message groups, preserving order within each severity
   */
  export function mergeMessages<E extends ArxcError>(
    ...groups: Messages<E>[]
  ): Messages<E> {
    const merged: Messages<E> = {};
    for (const messages of groups) {
      for (const severity of [Severity.Error, Severity.Warning]) {
        const list = messages[severity];
        if (list && list.length > 0) {
          merged[severity] = [...(merged[severity] ?? []), ...list];
        }
      }
    }
    return merged;
  }

  function group<E extends ArxcError>(messages: E[]): Messages<E> {
    const grouped: Messages<E> = {};
    for (const message of messages) {
      grouped[message.severity] = [
        ...(grouped[message.severity] ?? []),
        message,
      ];
    }
    return grouped;
  }
}
