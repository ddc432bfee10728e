/**
 * Shared builders for tests that start from an AST
 */

import { Declaration, type Program, type Statement, Type, program } from "#ast";
import type { ArxcError } from "#errors";
import { Result } from "#result";

/**
 * A program holding a single parameterless `main`
 */
export function mainProgram(
  body: Statement[],
  returnType: Type = Type.int(),
): Program {
  return program("test", [Declaration.function_("main", [], returnType, body)]);
}

/**
 * Unwrap a successful result, failing the test with its errors otherwise
 */
export function expectSuccess<T, E extends ArxcError>(
  result: Result<T, E>,
): T {
  if (!result.success) {
    const messages = Result.errors(result).map(
      (error) => `${error.code}: ${error.message}`,
    );
    throw new Error(`Expected success, got:\n${messages.join("\n")}`);
  }
  return result.value;
}

/**
 * The single error of a failed result
 */
export function expectFailure<T, E extends ArxcError>(result: Result<T, E>): E {
  if (result.success) {
    throw new Error("Expected failure, but the operation succeeded");
  }
  const errors = Result.errors(result);
  if (errors.length !== 1) {
    throw new Error(`Expected one error, got ${errors.length}`);
  }
  return errors[0];
}
