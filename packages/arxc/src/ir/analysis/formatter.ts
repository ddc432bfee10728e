/**
 * IR formatter for human-readable text output
 */

import * as Ir from "../spec/index.js";

export class Formatter {
  private indent = 0;
  private output: string[] = [];

  format(module: Ir.Module): string {
    this.output = [];
    this.indent = 0;

    this.line(`module ${module.name} (target ${module.target}) {`);
    this.indent++;

    for (const type of module.types.values()) {
      const fields = type.fields.map((field) => this.formatType(field.type));
      this.line(`type ${type.name} = { ${fields.join(", ")} }`);
    }

    for (const global of module.globals.values()) {
      this.line(
        `global ${global.name}: ${this.formatType(global.type)} = ${Ir.Module.escapeBytes(global.bytes)}`,
      );
    }

    for (const decl of module.declarations.values()) {
      const params = decl.parameters.map((type) => this.formatType(type));
      this.line(
        `declare ${decl.symbol}(${params.join(", ")}) -> ${this.formatType(decl.returnType)}`,
      );
    }

    for (const func of module.functions.values()) {
      this.line("");
      this.formatFunction(func);
    }

    this.indent--;
    this.line("}");

    return this.output.join("\n");
  }

  private formatFunction(func: Ir.Function): void {
    const params = func.parameters.map(
      (param) => `^${param.tempId}: ${this.formatType(param.type)}`,
    );
    this.line(
      `function ${func.name}(${params.join(", ")}) -> ${this.formatType(func.returnType)} {`,
    );
    this.indent++;

    if (func.locals.length > 0) {
      this.line("locals {");
      this.indent++;
      for (const local of func.locals) {
        this.line(`${local.id}: ${this.formatType(local.type)}`);
      }
      this.indent--;
      this.line("}");
    }

    for (const blockId of this.topologicalSort(func)) {
      const block = func.blocks.get(blockId);
      if (block) {
        this.formatBlock(blockId, block);
      }
    }

    this.indent--;
    this.line("}");
  }

  private formatBlock(id: string, block: Ir.Block): void {
    // Only merge points list their predecessors
    const predsStr =
      block.predecessors.size > 1
        ? ` preds=[${Array.from(block.predecessors).sort().join(", ")}]`
        : "";
    this.line(`${id}${predsStr}:`);
    this.indent++;

    for (const inst of block.instructions) {
      this.line(this.formatInstruction(inst));
    }

    this.line(this.formatTerminator(block.terminator));

    this.indent--;
  }

  private formatInstruction(inst: Ir.Instruction): string {
    const destWithType = (dest: string, type?: Ir.Type): string =>
      type ? `%${dest}: ${this.formatType(type)}` : `%${dest}`;

    switch (inst.kind) {
      case "binary":
        return `${destWithType(inst.dest, inst.type)} = ${inst.op} ${this.formatValue(inst.left)}, ${this.formatValue(inst.right)}`;

      case "read": {
        const source =
          inst.location === "local"
            ? `name="${inst.name}"`
            : `pointer=${this.formatValue(inst.pointer)}`;
        return `${destWithType(inst.dest, inst.type)} = read.${inst.location} ${source}`;
      }

      case "write": {
        const target =
          inst.location === "local"
            ? `name="${inst.name}"`
            : `pointer=${this.formatValue(inst.pointer)}`;
        return `write.${inst.location} ${target}, value=${this.formatValue(inst.value)}`;
      }

      case "compute_offset":
        return `${destWithType(inst.dest, Ir.Type.pointer(Ir.Type.int8))} = compute_offset.${inst.location} base=${this.formatValue(inst.base)}, offset=${this.formatValue(inst.offset)}`;

      case "call": {
        const args = inst.arguments
          .map((arg) => this.formatValue(arg))
          .join(", ");
        const callPart = `call ${inst.function}(${args})`;
        return inst.dest
          ? `${destWithType(inst.dest, inst.returnType)} = ${callPart}`
          : callPart;
      }
    }
  }

  private formatTerminator(term: Ir.Block.Terminator): string {
    switch (term.kind) {
      case "jump":
        return `jump ${term.target}`;

      case "branch":
        return `branch ${this.formatValue(term.condition)} ? ${term.trueTarget} : ${term.falseTarget}`;

      case "return":
        return term.value
          ? `return ${this.formatValue(term.value)}`
          : "return void";
    }
  }

  private formatValue(value: Ir.Value): string {
    switch (value.kind) {
      case "const":
        return typeof value.value === "number" && Number.isInteger(value.value)
          ? value.value.toFixed(1)
          : value.value.toString();
      case "temp":
        return `%${value.id}`;
      case "global":
        return `@${value.name}`;
    }
  }

  private formatType(type: Ir.Type): string {
    return Ir.Type.describe(type);
  }

  private line(text: string): void {
    const indentStr = "  ".repeat(this.indent);
    this.output.push(indentStr + text);
  }

  private topologicalSort(func: Ir.Function): string[] {
    const visited = new Set<string>();
    const result: string[] = [];

    const visit = (blockId: string): void => {
      if (visited.has(blockId)) return;
      visited.add(blockId);

      const block = func.blocks.get(blockId);
      if (!block) return;

      // Visit successors first (post-order)
      for (const succ of Ir.Block.successors(block.terminator)) {
        visit(succ);
      }

      result.push(blockId);
    };

    visit(func.entry);

    // Visit any unreachable blocks
    for (const blockId of func.blocks.keys()) {
      visit(blockId);
    }

    return result.reverse();
  }
}
