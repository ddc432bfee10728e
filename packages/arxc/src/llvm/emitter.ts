/**
 * Textual LLVM IR emission
 *
 * Output uses opaque pointers throughout. Stack slots become `alloca`s at
 * the top of the entry block; everything else maps one instruction to one
 * instruction.
 */

import * as Ir from "#ir";

const NAME = /^[-a-zA-Z$._][-a-zA-Z$._0-9]*$/;

export class Emitter {
  private output: string[] = [];

  emit(module: Ir.Module): string {
    this.output = [];

    this.line(`; ModuleID = ${quote(module.name)}`);
    this.line(`source_filename = ${quote(module.name)}`);
    this.line(`target triple = ${quote(module.target)}`);

    if (module.types.size > 0) {
      this.line("");
      for (const type of module.types.values()) {
        const fields = type.fields.map((field) => Ir.Type.format(field.type));
        this.line(`%${type.name} = type { ${fields.join(", ")} }`);
      }
    }

    if (module.globals.size > 0) {
      this.line("");
      for (const global of module.globals.values()) {
        this.line(
          `@${name(global.name)} = private unnamed_addr constant ${Ir.Type.format(global.type)} ${Ir.Module.escapeBytes(global.bytes)}`,
        );
      }
    }

    if (module.declarations.size > 0) {
      this.line("");
      for (const decl of module.declarations.values()) {
        const params = decl.parameters.map((type) => Ir.Type.format(type));
        this.line(
          `declare ${Ir.Type.format(decl.returnType)} @${name(decl.symbol)}(${params.join(", ")})`,
        );
      }
    }

    for (const func of module.functions.values()) {
      this.line("");
      this.emitFunction(func);
    }

    return this.output.join("\n") + "\n";
  }

  private emitFunction(func: Ir.Function): void {
    const params = func.parameters.map(
      (param) => `${Ir.Type.format(param.type)} %${name(param.tempId)}`,
    );
    this.line(
      `define ${Ir.Type.format(func.returnType)} @${name(func.name)}(${params.join(", ")}) {`,
    );

    const entry = func.blocks.get(func.entry);
    if (entry) {
      this.emitBlock(entry, func.locals);
    }
    for (const block of func.blocks.values()) {
      if (block.id !== func.entry) {
        this.emitBlock(block, []);
      }
    }

    this.line("}");
  }

  private emitBlock(block: Ir.Block, allocas: Ir.Function.Local[]): void {
    this.line(`${name(block.id)}:`);

    for (const local of allocas) {
      this.line(`  %${name(local.id)} = alloca ${Ir.Type.format(local.type)}`);
    }
    for (const inst of block.instructions) {
      this.line(`  ${this.emitInstruction(inst)}`);
    }
    this.line(`  ${this.emitTerminator(block.terminator)}`);
  }

  private emitInstruction(inst: Ir.Instruction): string {
    switch (inst.kind) {
      case "read": {
        const source =
          inst.location === "local"
            ? `%${name(inst.name)}`
            : this.emitValue(inst.pointer);
        return `%${name(inst.dest)} = load ${Ir.Type.format(inst.type)}, ptr ${source}`;
      }

      case "write": {
        const target =
          inst.location === "local"
            ? `%${name(inst.name)}`
            : this.emitValue(inst.pointer);
        return `store ${this.typed(inst.value)}, ptr ${target}`;
      }

      case "compute_offset":
        return `%${name(inst.dest)} = getelementptr i8, ptr ${this.emitValue(inst.base)}, ${this.typed(inst.offset)}`;

      case "binary":
        return `%${name(inst.dest)} = ${opcode(inst.op, inst.left.type)} ${this.typed(inst.left)}, ${this.emitValue(inst.right)}`;

      case "call": {
        const args = inst.arguments.map((arg) => this.typed(arg)).join(", ");
        const call = `call ${Ir.Type.format(inst.returnType)} @${name(inst.function)}(${args})`;
        return inst.dest === undefined ? call : `%${name(inst.dest)} = ${call}`;
      }
    }
  }

  private emitTerminator(term: Ir.Block.Terminator): string {
    switch (term.kind) {
      case "jump":
        return `br label %${name(term.target)}`;

      case "branch":
        return `br ${this.typed(term.condition)}, label %${name(term.trueTarget)}, label %${name(term.falseTarget)}`;

      case "return":
        return term.value ? `ret ${this.typed(term.value)}` : "ret void";
    }
  }

  private typed(value: Ir.Value): string {
    return `${Ir.Type.format(value.type)} ${this.emitValue(value)}`;
  }

  private emitValue(value: Ir.Value): string {
    switch (value.kind) {
      case "const":
        return constant(value);
      case "temp":
        return `%${name(value.id)}`;
      case "global":
        return `@${name(value.name)}`;
    }
  }

  private line(text: string): void {
    this.output.push(text);
  }
}

/**
 * LLVM instruction for a binary operation on operands of the given type
 */
export function opcode(
  op: Ir.Instruction.BinaryOp.Operator,
  type: Ir.Type,
): string {
  if (type.kind === "float") {
    switch (op) {
      case "add":
        return "fadd";
      case "sub":
        return "fsub";
      case "mul":
        return "fmul";
      case "div":
        return "fdiv";
      case "mod":
        return "frem";
      default:
        return `fcmp o${op}`;
    }
  }

  switch (op) {
    case "add":
      return "add";
    case "sub":
      return "sub";
    case "mul":
      return "mul";
    case "div":
      return "sdiv";
    case "mod":
      return "srem";
    case "eq":
    case "ne":
      return `icmp ${op}`;
    default:
      return `icmp s${op}`;
  }
}

function constant(value: Extract<Ir.Value, { kind: "const" }>): string {
  if (typeof value.value === "boolean") {
    return value.value ? "true" : "false";
  }
  if (value.type.kind === "float") {
    return hexDouble(Number(value.value));
  }
  return value.value.toString();
}

/**
 * Doubles are written as their IEEE-754 bit pattern, which LLVM accepts for
 * any value
 */
export function hexDouble(value: number): string {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  return `0x${view.getBigUint64(0).toString(16).toUpperCase().padStart(16, "0")}`;
}

function name(id: string): string {
  return NAME.test(id) ? id : quote(id);
}

/**
 * LLVM string literal; quotes, backslashes and bytes outside printable
 * ASCII are written as `\XX`
 */
function quote(text: string): string {
  let escaped = "";
  for (const byte of new TextEncoder().encode(text)) {
    const printable = byte >= 0x20 && byte < 0x7f;
    escaped +=
      printable && byte !== 0x22 && byte !== 0x5c
        ? String.fromCharCode(byte)
        : `\\${byte.toString(16).toUpperCase().padStart(2, "0")}`;
  }
  return `"${escaped}"`;
}
