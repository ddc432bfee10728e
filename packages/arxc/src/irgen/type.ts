import * as Ast from "#ast";
import * as Ir from "#ir";
import * as Runtime from "#runtime";

import { Error as IrgenError, ErrorCode } from "./errors.js";

/**
 * Map a source type to its IR representation
 */
export function fromAstType(type: Ast.Type): Ir.Type {
  switch (type.type) {
    case "ElementaryType":
      return elementary(type.kind);
    case "ListType":
      return Runtime.listPointer;
  }
}

function elementary(kind: Ast.Type.Elementary.Kind): Ir.Type {
  switch (kind) {
    case "int":
      return Ir.Type.int32;
    case "bool":
      return Ir.Type.bool;
    case "float":
      return Ir.Type.float64;
    case "string":
      return Ir.Type.string;
    case "void":
      return Ir.Type.void_;
  }
}

/**
 * Map the declared type of a storage slot; void cannot be stored
 */
export function slotType(type: Ast.Type): Ir.Type {
  if (Ast.Type.isVoid(type)) {
    throw new IrgenError(
      ErrorCode.UNSUPPORTED_TYPE,
      `cannot declare a local of type ${Ast.Type.format(type)}`,
      type.loc ?? undefined,
    );
  }
  return fromAstType(type);
}

/**
 * Name of an IR type as source code spells it, for diagnostics
 */
export function describe(type: Ir.Type): string {
  if (Runtime.isList(type)) {
    return "list";
  }
  switch (type.kind) {
    case "int":
      return type.bits === 32 ? "int" : `i${type.bits}`;
    case "float":
      return "float";
    case "bool":
      return "bool";
    case "void":
      return "void";
    case "pointer":
      return Ir.Type.equals(type, Ir.Type.string)
        ? "string"
        : Ir.Type.describe(type);
    default:
      return Ir.Type.describe(type);
  }
}
