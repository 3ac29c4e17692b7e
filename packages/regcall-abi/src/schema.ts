// Schema types describing the shape of contract method arguments and
// return values.
//
// Schemas are plain data, built once (usually from a contract's JSON
// interface) and shared read-only across calls. Positions of struct
// fields and enum variants are the wire contract: reordering them is a
// breaking change even when names stay the same.

// ============================================================================
// Primitive Schemas
// ============================================================================

/** Primitive types with a fixed encoded width. */
export type PrimitiveKind = "unit" | "bool" | "u8" | "u16" | "u32" | "u64" | "byte" | "b256";

export interface PrimitiveSchema {
  kind: PrimitiveKind;
}

/** Fixed-length string, `str[length]`. Length is in UTF-8 bytes. */
export interface StrSchema {
  kind: "str";
  length: number;
}

// ============================================================================
// Container Schemas
// ============================================================================

/** Fixed-size homogeneous sequence, `T[length]`. */
export interface ArraySchema {
  kind: "array";
  element: Schema;
  length: number;
}

/** Dynamic homogeneous sequence, encoded with a length word. */
export interface VectorSchema {
  kind: "vector";
  element: Schema;
}

// ============================================================================
// Composite Schemas
// ============================================================================

export interface TupleSchema {
  kind: "tuple";
  elements: readonly Schema[];
}

/** A named member of a struct, or a named method input. */
export interface Field {
  name: string;
  schema: Schema;
}

export interface StructSchema {
  kind: "struct";
  name: string;
  /** Fields in declaration order. Order is significant for encoding! */
  fields: readonly Field[];
}

/**
 * A variant in an enum. Empty variants carry a `unit` payload.
 */
export interface EnumVariant {
  name: string;
  schema: Schema;
}

/**
 * Enum; the wire tag is the variant's index in `variants`.
 */
export interface EnumSchema {
  kind: "enum";
  name: string;
  variants: readonly EnumVariant[];
}

// ============================================================================
// Union Type
// ============================================================================

export type Schema =
  | PrimitiveSchema
  | StrSchema
  | ArraySchema
  | VectorSchema
  | TupleSchema
  | StructSchema
  | EnumSchema;

/** A contract method: name, named inputs in call order, and output. */
export interface MethodSchema {
  name: string;
  inputs: readonly Field[];
  output: Schema;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Find the index of a variant by name, or -1 when absent.
 */
export function findVariantIndex(schema: EnumSchema, name: string): number {
  return schema.variants.findIndex((v) => v.name === name);
}

/** Abbreviated, human-readable rendering for error messages and logs. */
export function schemaToString(schema: Schema): string {
  switch (schema.kind) {
    case "str":
      return `str[${schema.length}]`;
    case "array":
      return `${schemaToString(schema.element)}[${schema.length}]`;
    case "vector":
      return `Vec<${schemaToString(schema.element)}>`;
    case "tuple":
      return `(${schema.elements.map(schemaToString).join(", ")})`;
    case "struct":
      return `struct ${schema.name} { ${schema.fields.map((f) => f.name).join(", ")} }`;
    case "enum":
      return `enum ${schema.name} { ${schema.variants.map((v) => v.name).join(" | ")} }`;
    default:
      return schema.kind;
  }
}
