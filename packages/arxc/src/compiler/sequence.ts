import { Result } from "#result";
import type { ArxcError } from "#errors";

import type { Pass } from "./pass.js";

/**
 * Ordered composition of passes.
 *
 * Each pass sees everything its predecessors produced, and its own output
 * is merged over that. The sequence stops at the first failing pass;
 * messages from every pass that ran are kept.
 */
export class Sequence<Input, Output, E extends ArxcError> {
  private constructor(
    /** Names of the passes in the order they run */
    readonly passes: readonly string[],
    private readonly runner: (input: Input) => Promise<Result<Output, E>>,
  ) {}

  static start<Input>(): Sequence<Input, Input, never> {
    return new Sequence<Input, Input, never>([], async (input) =>
      Result.ok(input),
    );
  }

  /**
   * Append a pass; it may need anything this sequence provides so far
   */
  then<Adds, E2 extends ArxcError>(
    pass: Pass<{ needs: Output; adds: Adds; error: E2 }>,
  ): Sequence<Input, Output & Adds, E | E2> {
    const run = async (input: Output): Promise<Result<Adds, E2>> => {
      try {
        return await pass.run(input);
      } catch (error) {
        throw new Error(`${pass.name} pass crashed`, { cause: error });
      }
    };

    return new Sequence<Input, Output & Adds, E | E2>(
      [...this.passes, pass.name],
      async (input) => {
        const previous = await this.runner(input);
        if (!previous.success) {
          return previous;
        }

        const next = await run(previous.value);
        const messages = Result.mergeMessages<E | E2>(
          previous.messages,
          next.messages,
        );
        if (!next.success) {
          return { success: false, messages };
        }

        return {
          success: true,
          value: { ...previous.value, ...next.value },
          messages,
        };
      },
    );
  }

  run(input: Input): Promise<Result<Output, E>> {
    return this.runner(input);
  }
}
