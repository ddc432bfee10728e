import * as Ir from "#ir";
import * as Runtime from "#runtime";

/**
 * Argument and return type tags used by descriptor files
 */
export type Tag = "int" | "bool" | "str" | "float" | "int*" | "list" | "void";

/**
 * Normalize a tag as written in a descriptor. `string` is an alias of `str`,
 * every `list...` spelling means a list, anything unrecognized means void.
 */
export function parseTag(text: string): Tag {
  const tag = text.trim();
  switch (tag) {
    case "int":
    case "bool":
    case "str":
    case "float":
    case "int*":
      return tag;
    case "string":
      return "str";
    default:
      return tag.startsWith("list") ? "list" : "void";
  }
}

/**
 * Tag of a lowered value's type, for overload lookup
 */
export function tagOf(type: Ir.Type): Tag {
  if (Runtime.isList(type)) {
    return "list";
  }
  switch (type.kind) {
    case "int":
      return type.bits === 32 ? "int" : "void";
    case "bool":
      return "bool";
    case "float":
      return "float";
    case "pointer":
      if (Ir.Type.equals(type.target, Ir.Type.int8)) return "str";
      if (Ir.Type.equals(type.target, Ir.Type.int32)) return "int*";
      return "void";
    default:
      return "void";
  }
}

/**
 * IR type a tag stands for in declarations
 */
export function typeOf(tag: Tag): Ir.Type {
  switch (tag) {
    case "int":
      return Ir.Type.int32;
    case "bool":
      return Ir.Type.bool;
    case "str":
      return Ir.Type.string;
    case "float":
      return Ir.Type.float64;
    case "int*":
      return Ir.Type.pointer(Ir.Type.int32);
    case "list":
      return Runtime.listPointer;
    case "void":
      return Ir.Type.void_;
  }
}
