import type * as Ir from "#ir";
import { Result } from "#result";
import type { Pass } from "#compiler";

import { Emitter } from "./emitter.js";

/**
 * LLVM emission pass - renders a validated module as textual LLVM IR
 */
const pass: Pass<{
  needs: {
    ir: Ir.Module;
  };
  adds: {
    llvm: string;
  };
  error: never;
}> = {
  name: "llvm",
  async run({ ir }) {
    return Result.ok<{ llvm: string }, never>({
      llvm: new Emitter().emit(ir),
    });
  },
};

export default pass;
