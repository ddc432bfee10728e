import type { Type } from "./type.js";

/**
 * Ir value - a constant, a reference to a temporary, or the address of a
 * module global
 */
export type Value =
  | { kind: "const"; value: bigint | number | boolean; type: Type }
  | { kind: "temp"; id: string; type: Type }
  | { kind: "global"; name: string; type: Type };

export namespace Value {
  /**
   * Helper to create temporary value references
   */
  export function temp(id: string, type: Type): Value {
    return { kind: "temp", id, type };
  }

  /**
   * Helper to create constant values. Integers are bigints, floats numbers.
   */
  export function constant(
    value: bigint | number | boolean,
    type: Type,
  ): Value {
    return { kind: "const", value, type };
  }

  export function global(name: string, type: Type): Value {
    return { kind: "global", name, type };
  }
}
