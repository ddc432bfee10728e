/**
 * IR Validator - checks IR consistency and correctness
 */

import * as Ir from "../spec/index.js";

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

interface Signature {
  parameters: Ir.Type[];
  returnType: Ir.Type;
}

export class Validator {
  private errors: string[] = [];
  private warnings: string[] = [];
  private tempDefs: Set<string> = new Set();
  private localDefs: Map<string, Ir.Type> = new Map();
  private blockIds: Set<string> = new Set();
  private signatures: Map<string, Signature> = new Map();
  private globals: Set<string> = new Set();

  validate(module: Ir.Module): ValidationResult {
    this.errors = [];
    this.warnings = [];
    this.signatures = new Map();
    this.globals = new Set(module.globals.keys());

    this.validateModule(module);

    return {
      isValid: this.errors.length === 0,
      errors: this.errors,
      warnings: this.warnings,
    };
  }

  private validateModule(module: Ir.Module): void {
    if (!module.name) {
      this.error("Module must have a name");
    }

    for (const decl of module.declarations.values()) {
      this.signatures.set(decl.symbol, decl);
    }

    for (const func of module.functions.values()) {
      if (this.signatures.has(func.name)) {
        this.error(`Function '${func.name}' is also declared as external`);
      }
      if (this.globals.has(func.name)) {
        this.error(`Function '${func.name}' collides with a global`);
      }
      this.signatures.set(func.name, {
        parameters: func.parameters.map(({ type }) => type),
        returnType: func.returnType,
      });
    }

    for (const func of module.functions.values()) {
      this.validateFunction(func);
    }
  }

  private validateFunction(func: Ir.Function): void {
    this.tempDefs = new Set(func.parameters.map(({ tempId }) => tempId));
    this.localDefs = new Map();
    this.blockIds = new Set(func.blocks.keys());

    if (!func.blocks.has(func.entry)) {
      this.error(`Entry block '${func.entry}' not found in function`);
    }

    for (const local of func.locals) {
      if (this.localDefs.has(local.id)) {
        this.error(`Duplicate local '${local.id}' in ${func.name}`);
      }
      if (local.type.kind === "void") {
        this.error(`Local '${local.id}' has void type`);
      }
      this.localDefs.set(local.id, local.type);
    }

    // Blocks are checked in control flow order so that temps are defined
    // before use along every straight-line path
    for (const blockId of this.reachableOrder(func)) {
      const block = func.blocks.get(blockId);
      if (block) {
        this.validateBlock(blockId, block, func);
      }
    }

    this.checkUnreachableBlocks(func);
    this.checkPredecessorConsistency(func);
  }

  private validateBlock(
    blockId: string,
    block: Ir.Block,
    func: Ir.Function,
  ): void {
    for (const inst of block.instructions) {
      this.validateInstruction(inst);
    }

    this.validateTerminator(block.terminator, func);

    for (const target of Ir.Block.successors(block.terminator)) {
      if (!this.blockIds.has(target)) {
        this.error(
          `Block '${blockId}' jumps to non-existent block '${target}'`,
        );
      }
    }
  }

  private validateInstruction(inst: Ir.Instruction): void {
    switch (inst.kind) {
      case "read":
        if (inst.location === "local") {
          this.validateLocal(inst.name);
        } else {
          this.validatePointer(inst.pointer);
        }
        this.define(inst.dest);
        break;

      case "write":
        this.validateValue(inst.value);
        if (inst.location === "local") {
          const type = this.validateLocal(inst.name);
          if (type && !Ir.Type.equals(type, inst.value.type)) {
            this.error(
              `Write of ${Ir.Type.describe(inst.value.type)} to local '${inst.name}' of type ${Ir.Type.describe(type)}`,
            );
          }
        } else {
          this.validatePointer(inst.pointer);
        }
        break;

      case "compute_offset":
        this.validatePointer(inst.base);
        this.validateValue(inst.offset);
        if (inst.offset.type.kind !== "int") {
          this.error(`Offset for '${inst.dest}' must be an integer`);
        }
        this.define(inst.dest);
        break;

      case "binary":
        this.validateValue(inst.left);
        this.validateValue(inst.right);
        if (!Ir.Type.equals(inst.left.type, inst.right.type)) {
          this.error(
            `Operands of ${inst.op} have different types: ${Ir.Type.describe(inst.left.type)} and ${Ir.Type.describe(inst.right.type)}`,
          );
        }
        this.define(inst.dest);
        break;

      case "call":
        this.validateCall(inst);
        break;
    }
  }

  private validateCall(inst: Ir.Instruction.Call): void {
    for (const arg of inst.arguments) {
      this.validateValue(arg);
    }

    const signature = this.signatures.get(inst.function);
    if (!signature) {
      this.error(`Call to undeclared function '${inst.function}'`);
    } else if (signature.parameters.length !== inst.arguments.length) {
      this.error(
        `Call to '${inst.function}' passes ${inst.arguments.length} arguments, expected ${signature.parameters.length}`,
      );
    }

    if (inst.dest !== undefined) {
      if (inst.returnType.kind === "void") {
        this.error(`Void call to '${inst.function}' cannot define a value`);
      }
      this.define(inst.dest);
    }
  }

  private validateTerminator(
    term: Ir.Block.Terminator,
    func: Ir.Function,
  ): void {
    switch (term.kind) {
      case "jump":
        break;

      case "branch":
        this.validateValue(term.condition);
        if (term.condition.type.kind !== "bool") {
          this.error("Branch condition must be a bool");
        }
        break;

      case "return":
        if (term.value) {
          this.validateValue(term.value);
          if (!Ir.Type.equals(term.value.type, func.returnType)) {
            this.error(
              `Return of ${Ir.Type.describe(term.value.type)} from ${func.name} returning ${Ir.Type.describe(func.returnType)}`,
            );
          }
        } else if (func.returnType.kind !== "void") {
          this.error(`Missing return value in ${func.name}`);
        }
        break;
    }
  }

  private validateValue(value: Ir.Value): void {
    switch (value.kind) {
      case "temp":
        if (!this.tempDefs.has(value.id)) {
          this.error(`Use of undefined temporary '${value.id}'`);
        }
        break;

      case "global":
        if (!this.globals.has(value.name)) {
          this.error(`Reference to unknown global '${value.name}'`);
        }
        break;

      case "const":
        break;
    }
  }

  private validatePointer(value: Ir.Value): void {
    this.validateValue(value);
    if (!Ir.Type.isPointer(value.type)) {
      this.error(`Expected a pointer, found ${Ir.Type.describe(value.type)}`);
    }
  }

  private validateLocal(name: string): Ir.Type | undefined {
    const type = this.localDefs.get(name);
    if (!type) {
      this.error(`Reference to unknown local '${name}'`);
    }
    return type;
  }

  private define(tempId: string): void {
    if (this.tempDefs.has(tempId)) {
      this.error(`Temporary '${tempId}' is defined more than once`);
    }
    this.tempDefs.add(tempId);
  }

  /**
   * Reachable blocks in depth-first preorder, then the rest in map order
   */
  private reachableOrder(func: Ir.Function): string[] {
    const order: string[] = [];
    const visited = new Set<string>();
    const visit = (blockId: string): void => {
      if (visited.has(blockId)) return;
      const block = func.blocks.get(blockId);
      if (!block) return;
      visited.add(blockId);
      order.push(blockId);
      for (const succ of Ir.Block.successors(block.terminator)) {
        visit(succ);
      }
    };

    visit(func.entry);
    for (const blockId of func.blocks.keys()) {
      visit(blockId);
    }
    return order;
  }

  private checkUnreachableBlocks(func: Ir.Function): void {
    const reachable = new Set<string>();
    const worklist = [func.entry];

    for (let blockId = worklist.pop(); blockId; blockId = worklist.pop()) {
      if (reachable.has(blockId)) continue;

      reachable.add(blockId);
      const block = func.blocks.get(blockId);
      if (!block) continue;

      worklist.push(...Ir.Block.successors(block.terminator));
    }

    for (const blockId of func.blocks.keys()) {
      if (!reachable.has(blockId)) {
        this.warning(`Block '${blockId}' is unreachable`);
      }
    }
  }

  private checkPredecessorConsistency(func: Ir.Function): void {
    const actualPreds = new Map<string, Set<string>>();

    for (const [blockId, block] of func.blocks.entries()) {
      for (const target of Ir.Block.successors(block.terminator)) {
        const preds = actualPreds.get(target) ?? new Set<string>();
        preds.add(blockId);
        actualPreds.set(target, preds);
      }
    }

    for (const [blockId, block] of func.blocks.entries()) {
      const expected = actualPreds.get(blockId) ?? new Set<string>();
      const recorded = block.predecessors;

      for (const pred of expected) {
        if (!recorded.has(pred)) {
          this.error(`Block '${blockId}' missing predecessor '${pred}'`);
        }
      }

      for (const pred of recorded) {
        if (!expected.has(pred)) {
          this.error(`Block '${blockId}' has invalid predecessor '${pred}'`);
        }
      }
    }
  }

  private error(message: string): void {
    this.errors.push(message);
  }

  private warning(message: string): void {
    this.warnings.push(message);
  }
}
