import * as Ir from "#ir";

/**
 * Byte size of a value of the given type in memory
 *
 * Sizes follow the target ABI for scalars; aggregates are packed, with no
 * alignment padding between fields.
 */
export function sizeOf(type: Ir.Type): number {
  switch (type.kind) {
    case "void":
      return 0;
    case "bool":
      return 1;
    case "int":
      return type.bits / 8;
    case "float":
      return type.bits / 8;
    case "pointer":
      return 8;
    case "array":
      return type.size * sizeOf(type.element);
    case "struct":
      return type.fields.reduce((total, field) => total + sizeOf(field.type), 0);
  }
}

/**
 * Assign packed byte offsets to struct fields in declaration order
 */
export function layoutFields(
  fields: { name: string; type: Ir.Type }[],
): Ir.Type.StructField[] {
  let offset = 0;
  return fields.map(({ name, type }) => {
    const field = { name, type, offset };
    offset += sizeOf(type);
    return field;
  });
}
