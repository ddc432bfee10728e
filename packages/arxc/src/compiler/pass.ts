import type { Result } from "#result";
import type { ArxcError } from "#errors";

/**
 * What a pass reads from the sequence so far, what it contributes, and the
 * errors it can report
 */
export type PassConfig = {
  needs: unknown;
  adds: unknown;
  error: ArxcError;
};

export type Needs<C extends PassConfig> = C["needs"];
export type Adds<C extends PassConfig> = C["adds"];
export type PassError<C extends PassConfig> = C["error"];

/**
 * One stage of compilation (`linkage`, `irgen`, `validate`, `llvm`)
 *
 * Expected failures are returned as a failed `Result`; anything a pass
 * throws is a compiler bug and is rethrown by the sequence with the pass
 * name attached.
 */
export interface Pass<C extends PassConfig = PassConfig> {
  name: string;
  run(input: Needs<C>): Promise<Result<Adds<C>, PassError<C>>>;
}
