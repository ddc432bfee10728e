import type { Pass } from "#compiler";
import { Result, Severity } from "#result";

import type * as Ir from "./spec/index.js";
import { Error, ErrorCode } from "./errors.js";
import { Validator } from "./analysis/index.js";

/**
 * Validation pass - rejects a module the validator finds inconsistent
 */
const pass: Pass<{
  needs: {
    ir: Ir.Module;
  };
  adds: Record<never, never>;
  error: Error;
}> = {
  name: "validate",
  async run({ ir }) {
    const { errors, warnings } = new Validator().validate(ir);

    const messages = [
      ...errors.map((message) => new Error(ErrorCode.INVALID_IR, message)),
      ...warnings.map(
        (message) =>
          new Error(ErrorCode.INVALID_IR, message, undefined, Severity.Warning),
      ),
    ];

    return errors.length > 0
      ? Result.err(messages)
      : Result.okWith({}, messages);
  },
};

export default pass;
