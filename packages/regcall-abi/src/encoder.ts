// Schema-driven encoding into the VM's word-aligned layout.
//
// Words are 8 bytes, big-endian. Integers and bools fill one word each,
// right-aligned. `byte` and `b256` use their native 1 and 32 bytes.

import { AbiError, AbiErrorCode } from "./errors.ts";
import type { Schema } from "./schema.ts";
import { schemaToString } from "./schema.ts";
import type { Token } from "./token.ts";
import { enumPayloadWidth, validateSchema, B256_SIZE } from "./layout.ts";
import { WORD_SIZE, U64_MAX, concat, encodeWord, padEnd, paddingFor } from "./binary/words.ts";

// ============================================================================
// Encode Context - tracks the path for error reporting
// ============================================================================

class EncodeContext {
  private path: string[];

  constructor(root?: string) {
    this.path = root === undefined ? [] : [root];
  }

  push(segment: string): void {
    this.path.push(segment);
  }

  pop(): void {
    this.path.pop();
  }

  currentPath(): string {
    return this.path.length === 0 ? "<root>" : this.path.join(".");
  }

  mismatch(message: string, schema: Schema): AbiError {
    const path = this.currentPath();
    return new AbiError(
      AbiErrorCode.SCHEMA_MISMATCH,
      `Encode error at ${path}: ${message}`,
      { path, schema: schemaToString(schema) },
    );
  }

  kindMismatch(schema: Schema, token: Token): AbiError {
    return this.mismatch(`expected ${schema.kind} token, got ${token.kind}`, schema);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Encode one token against its schema.
 *
 * @param label - Root path segment used in error messages (e.g. `arg0`)
 */
export function encodeToken(schema: Schema, token: Token, label?: string): Uint8Array {
  validateSchema(schema, label);
  return encodeImpl(schema, token, new EncodeContext(label));
}

/**
 * Encode a sequence of tokens back to back, in order.
 */
export function encodeTokens(schemas: readonly Schema[], tokens: readonly Token[]): Uint8Array {
  if (schemas.length !== tokens.length) {
    throw new AbiError(
      AbiErrorCode.SCHEMA_MISMATCH,
      `expected ${schemas.length} tokens, got ${tokens.length}`,
    );
  }
  return concat(...schemas.map((schema, i) => encodeToken(schema, tokens[i], `arg${i}`)));
}

// ============================================================================
// Implementation
// ============================================================================

function encodeImpl(schema: Schema, token: Token, ctx: EncodeContext): Uint8Array {
  switch (schema.kind) {
    case "unit":
      if (token.kind !== "unit") throw ctx.kindMismatch(schema, token);
      return new Uint8Array(WORD_SIZE);

    case "bool":
      if (token.kind !== "bool") throw ctx.kindMismatch(schema, token);
      return encodeWord(token.value ? 1n : 0n);

    case "u8":
    case "u16":
    case "u32": {
      if (token.kind !== "u8" && token.kind !== "u16" && token.kind !== "u32") {
        throw ctx.kindMismatch(schema, token);
      }
      if (token.kind !== schema.kind) throw ctx.kindMismatch(schema, token);
      const bits = schema.kind === "u8" ? 8 : schema.kind === "u16" ? 16 : 32;
      checkUint(token.value, bits, schema, ctx);
      return encodeWord(token.value);
    }

    case "u64":
      if (token.kind !== "u64") throw ctx.kindMismatch(schema, token);
      if (token.value < 0n || token.value > U64_MAX) {
        throw ctx.mismatch(`value ${token.value} out of range for u64`, schema);
      }
      return encodeWord(token.value);

    case "byte":
      if (token.kind !== "byte") throw ctx.kindMismatch(schema, token);
      checkUint(token.value, 8, schema, ctx);
      return Uint8Array.of(token.value);

    case "b256":
      if (token.kind !== "b256") throw ctx.kindMismatch(schema, token);
      if (token.value.length !== B256_SIZE) {
        throw ctx.mismatch(`expected ${B256_SIZE} bytes, got ${token.value.length}`, schema);
      }
      return token.value.slice();

    case "str": {
      if (token.kind !== "str") throw ctx.kindMismatch(schema, token);
      const bytes = new TextEncoder().encode(token.value);
      if (bytes.length !== schema.length) {
        throw ctx.mismatch(
          `expected a string of ${schema.length} bytes, got ${bytes.length}`,
          schema,
        );
      }
      return padEnd(bytes, bytes.length + paddingFor(bytes.length));
    }

    case "array": {
      if (token.kind !== "array") throw ctx.kindMismatch(schema, token);
      if (token.elements.length !== schema.length) {
        throw ctx.mismatch(
          `expected ${schema.length} elements, got ${token.elements.length}`,
          schema,
        );
      }
      return concat(...encodeElements(schema.element, token.elements, ctx));
    }

    case "vector": {
      if (token.kind !== "vector") throw ctx.kindMismatch(schema, token);
      return concat(
        encodeWord(token.elements.length),
        ...encodeElements(schema.element, token.elements, ctx),
      );
    }

    case "tuple": {
      if (token.kind !== "tuple") throw ctx.kindMismatch(schema, token);
      if (token.elements.length !== schema.elements.length) {
        throw ctx.mismatch(
          `expected ${schema.elements.length} elements, got ${token.elements.length}`,
          schema,
        );
      }
      const elements = token.elements;
      const parts = schema.elements.map((elementSchema, i) => {
        ctx.push(String(i));
        const bytes = encodeImpl(elementSchema, elements[i], ctx);
        ctx.pop();
        return bytes;
      });
      return concat(...parts);
    }

    case "struct": {
      if (token.kind !== "struct") throw ctx.kindMismatch(schema, token);
      if (token.fields.length !== schema.fields.length) {
        throw ctx.mismatch(
          `struct ${schema.name} has ${schema.fields.length} fields, got ${token.fields.length}`,
          schema,
        );
      }
      const fields = token.fields;
      const parts = schema.fields.map((field, i) => {
        ctx.push(field.name);
        const bytes = encodeImpl(field.schema, fields[i], ctx);
        ctx.pop();
        return bytes;
      });
      return concat(...parts);
    }

    case "enum": {
      if (token.kind !== "enum") throw ctx.kindMismatch(schema, token);
      const variant = schema.variants[token.variant];
      if (!Number.isInteger(token.variant) || variant === undefined) {
        throw ctx.mismatch(
          `variant ${token.variant} out of range for enum ${schema.name} (${schema.variants.length} variants)`,
          schema,
        );
      }
      ctx.push(variant.name);
      const payload = encodeImpl(variant.schema, token.value, ctx);
      ctx.pop();
      // Tag, then zeros up to the widest variant, then the active payload.
      const padding = new Uint8Array(enumPayloadWidth(schema) - payload.length);
      return concat(encodeWord(token.variant), padding, payload);
    }
  }
}

function encodeElements(element: Schema, tokens: Token[], ctx: EncodeContext): Uint8Array[] {
  return tokens.map((t, i) => {
    ctx.push(`[${i}]`);
    const bytes = encodeImpl(element, t, ctx);
    ctx.pop();
    return bytes;
  });
}

function checkUint(value: number, bits: number, schema: Schema, ctx: EncodeContext): void {
  if (!Number.isInteger(value) || value < 0 || value >= 2 ** bits) {
    throw ctx.mismatch(`value ${value} out of range for ${schema.kind}`, schema);
  }
}
