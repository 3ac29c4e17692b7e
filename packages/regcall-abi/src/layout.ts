// Encoded widths and structural rules for schemas.

import { AbiError, AbiErrorCode } from "./errors.ts";
import type { EnumSchema, Schema } from "./schema.ts";
import { schemaToString } from "./schema.ts";
import { WORD_SIZE, paddingFor } from "./binary/words.ts";

/** Width of a 256-bit hash in bytes. */
export const B256_SIZE = 32;

/**
 * Encoded width in bytes, or `null` when the schema contains a vector.
 *
 * Enums are sized to their widest variant, so every enum without a
 * vector has a fixed width.
 */
export function encodingWidth(schema: Schema): number | null {
  switch (schema.kind) {
    case "unit":
    case "bool":
    case "u8":
    case "u16":
    case "u32":
    case "u64":
      return WORD_SIZE;
    case "byte":
      return 1;
    case "b256":
      return B256_SIZE;
    case "str":
      return schema.length + paddingFor(schema.length);
    case "array": {
      const w = encodingWidth(schema.element);
      return w === null ? null : w * schema.length;
    }
    case "vector":
      return null;
    case "tuple":
      return sumWidths(schema.elements);
    case "struct":
      return sumWidths(schema.fields.map((f) => f.schema));
    case "enum": {
      const payload = variantsWidth(schema);
      return payload === null ? null : WORD_SIZE + payload;
    }
  }
}

/** Smallest possible encoding; an empty vector counts as its length word. */
export function minimumWidth(schema: Schema): number {
  switch (schema.kind) {
    case "vector":
      return WORD_SIZE;
    case "tuple":
      return schema.elements.reduce((n, s) => n + minimumWidth(s), 0);
    case "struct":
      return schema.fields.reduce((n, f) => n + minimumWidth(f.schema), 0);
    default:
      return encodingWidth(schema) ?? WORD_SIZE;
  }
}

export function isDynamic(schema: Schema): boolean {
  return encodingWidth(schema) === null;
}

/**
 * Width reserved for an enum's payload: the widest variant.
 */
export function enumPayloadWidth(schema: EnumSchema): number {
  const w = variantsWidth(schema);
  if (w === null) {
    throw new AbiError(
      AbiErrorCode.SCHEMA_MISMATCH,
      `enum ${schema.name} has a variant without a fixed width`,
      { schema: schemaToString(schema) },
    );
  }
  return w;
}

function variantsWidth(schema: EnumSchema): number | null {
  let max = 0;
  for (const variant of schema.variants) {
    const w = encodingWidth(variant.schema);
    if (w === null) return null;
    max = Math.max(max, w);
  }
  return max;
}

function sumWidths(schemas: readonly Schema[]): number | null {
  let total = 0;
  for (const s of schemas) {
    const w = encodingWidth(s);
    if (w === null) return null;
    total += w;
  }
  return total;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Reject schemas the calling convention cannot express.
 *
 * A vector is only valid as the last dynamic segment: as a top-level
 * value, or as the final member of a struct or tuple. Vectors inside
 * arrays, enum variants or other vectors are rejected, and so are vectors
 * of zero-sized elements, whose length could not be recovered.
 */
export function validateSchema(schema: Schema, path: string = "<root>"): void {
  const fail = (message: string): never => {
    throw new AbiError(AbiErrorCode.SCHEMA_MISMATCH, message, {
      path,
      schema: schemaToString(schema),
    });
  };

  switch (schema.kind) {
    case "str":
      if (!Number.isInteger(schema.length) || schema.length < 0) {
        fail(`invalid string length ${schema.length}`);
      }
      return;
    case "array":
      if (!Number.isInteger(schema.length) || schema.length < 0) {
        fail(`invalid array length ${schema.length}`);
      }
      if (isDynamic(schema.element)) {
        fail("array elements must have a fixed width");
      }
      validateSchema(schema.element, `${path}.[]`);
      return;
    case "vector":
      if (isDynamic(schema.element)) {
        fail("nested dynamic vectors are not supported");
      }
      if (encodingWidth(schema.element) === 0) {
        fail("vector elements must not be zero-sized");
      }
      validateSchema(schema.element, `${path}.[]`);
      return;
    case "tuple":
      validateMembers(
        schema.elements.map((s, i) => ({ name: String(i), schema: s })),
        path,
        fail,
      );
      return;
    case "struct":
      validateMembers(schema.fields, path, fail);
      return;
    case "enum":
      if (schema.variants.length === 0) {
        fail(`enum ${schema.name} has no variants`);
      }
      for (const variant of schema.variants) {
        if (isDynamic(variant.schema)) {
          fail(`enum variant ${variant.name} must have a fixed width`);
        }
        validateSchema(variant.schema, `${path}.${variant.name}`);
      }
      return;
    default:
      return;
  }
}

function validateMembers(
  members: readonly { name: string; schema: Schema }[],
  path: string,
  fail: (message: string) => never,
): void {
  members.forEach((member, i) => {
    if (i < members.length - 1 && isDynamic(member.schema)) {
      fail(`member ${member.name} is dynamic but not last`);
    }
    validateSchema(member.schema, `${path}.${member.name}`);
  });
}
