// Mapping between tokens and plain JavaScript values.
//
//   unit            <-> undefined
//   bool            <-> boolean
//   u8 u16 u32 byte <-> number
//   u64             <-> bigint (safe-integer numbers accepted on input)
//   b256            <-> 0x-prefixed hex string (bytes accepted on input)
//   str             <-> string
//   array vector tuple <-> array
//   struct          <-> object keyed by field name
//   enum            <-> { tag: variantName, value }

import { AbiError, AbiErrorCode } from "./errors.ts";
import type { Schema } from "./schema.ts";
import { findVariantIndex, schemaToString } from "./schema.ts";
import type { Token } from "./token.ts";
import { fromHex, toHex } from "./binary/words.ts";

export type NativeValue =
  | undefined
  | boolean
  | number
  | bigint
  | string
  | NativeValue[]
  | { [key: string]: NativeValue };

function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

function mismatch(path: string, schema: Schema, message: string): AbiError {
  return new AbiError(AbiErrorCode.SCHEMA_MISMATCH, `${path}: ${message}`, {
    path,
    schema: schemaToString(schema),
  });
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Uint8Array) return "Uint8Array";
  return typeof value;
}

// ============================================================================
// Native -> Token
// ============================================================================

/**
 * Convert a plain value into a token of `schema`.
 *
 * @throws AbiError (schema_mismatch) naming the path of the first bad value
 */
export function tokenize(schema: Schema, value: unknown, path: string = "<root>"): Token {
  switch (schema.kind) {
    case "unit":
      if (value !== undefined && value !== null) {
        throw mismatch(path, schema, `expected nothing, got ${describe(value)}`);
      }
      return { kind: "unit" };

    case "bool":
      if (typeof value !== "boolean") {
        throw mismatch(path, schema, `expected boolean, got ${describe(value)}`);
      }
      return { kind: "bool", value };

    case "u8":
    case "u16":
    case "u32":
    case "byte": {
      const n = typeof value === "bigint" ? Number(value) : value;
      if (typeof n !== "number" || !Number.isInteger(n)) {
        throw mismatch(path, schema, `expected integer, got ${describe(value)}`);
      }
      return { kind: schema.kind, value: n };
    }

    case "u64":
      if (typeof value === "bigint") return { kind: "u64", value };
      if (typeof value === "number" && Number.isSafeInteger(value)) {
        return { kind: "u64", value: BigInt(value) };
      }
      throw mismatch(path, schema, `expected bigint, got ${describe(value)}`);

    case "b256":
      if (value instanceof Uint8Array) return { kind: "b256", value };
      if (typeof value === "string" && /^(0x)?[0-9a-fA-F]{64}$/.test(value)) {
        return { kind: "b256", value: fromHex(value) };
      }
      throw mismatch(path, schema, `expected 32-byte hex string, got ${describe(value)}`);

    case "str":
      if (typeof value !== "string") {
        throw mismatch(path, schema, `expected string, got ${describe(value)}`);
      }
      return { kind: "str", value };

    case "array":
    case "vector": {
      if (!Array.isArray(value)) {
        throw mismatch(path, schema, `expected array, got ${describe(value)}`);
      }
      const element = schema.element;
      const elements = value.map((v, i) => tokenize(element, v, `${path}.[${i}]`));
      return { kind: schema.kind, elements };
    }

    case "tuple": {
      if (!Array.isArray(value) || value.length !== schema.elements.length) {
        throw mismatch(path, schema, `expected ${schema.elements.length}-element array`);
      }
      const items: unknown[] = value;
      return {
        kind: "tuple",
        elements: schema.elements.map((s, i) => tokenize(s, items[i], `${path}.${i}`)),
      };
    }

    case "struct": {
      if (!isRecord(value)) {
        throw mismatch(path, schema, `expected object, got ${describe(value)}`);
      }
      const record = value;
      return {
        kind: "struct",
        fields: schema.fields.map((f) => {
          if (!(f.name in record)) {
            throw mismatch(path, schema, `missing field ${f.name}`);
          }
          return tokenize(f.schema, record[f.name], `${path}.${f.name}`);
        }),
      };
    }

    case "enum": {
      const tag = isRecord(value) ? value.tag : undefined;
      if (!isRecord(value) || typeof tag !== "string") {
        throw mismatch(path, schema, `expected { tag, value }, got ${describe(value)}`);
      }
      const index = findVariantIndex(schema, tag);
      if (index < 0) {
        throw mismatch(path, schema, `unknown variant ${tag}`);
      }
      const variant = schema.variants[index];
      return {
        kind: "enum",
        variant: index,
        value: tokenize(variant.schema, value.value, `${path}.${variant.name}`),
      };
    }
  }
}

// ============================================================================
// Token -> Native
// ============================================================================

export function detokenize(schema: Schema, token: Token, path: string = "<root>"): NativeValue {
  const wrong = (): AbiError =>
    mismatch(path, schema, `expected ${schema.kind} token, got ${token.kind}`);

  switch (schema.kind) {
    case "unit":
      if (token.kind !== "unit") throw wrong();
      return undefined;
    case "bool":
      if (token.kind !== "bool") throw wrong();
      return token.value;
    case "u8":
    case "u16":
    case "u32":
    case "byte":
      if (token.kind !== "u8" && token.kind !== "u16" && token.kind !== "u32" && token.kind !== "byte") {
        throw wrong();
      }
      if (token.kind !== schema.kind) throw wrong();
      return token.value;
    case "u64":
      if (token.kind !== "u64") throw wrong();
      return token.value;
    case "b256":
      if (token.kind !== "b256") throw wrong();
      return toHex(token.value);
    case "str":
      if (token.kind !== "str") throw wrong();
      return token.value;
    case "array":
    case "vector": {
      if (token.kind !== "array" && token.kind !== "vector") throw wrong();
      if (token.kind !== schema.kind) throw wrong();
      const element = schema.element;
      return token.elements.map((t, i) => detokenize(element, t, `${path}.[${i}]`));
    }
    case "tuple": {
      if (token.kind !== "tuple" || token.elements.length !== schema.elements.length) {
        throw wrong();
      }
      const elements = token.elements;
      return schema.elements.map((s, i) => detokenize(s, elements[i], `${path}.${i}`));
    }
    case "struct": {
      if (token.kind !== "struct" || token.fields.length !== schema.fields.length) {
        throw wrong();
      }
      const fields = token.fields;
      const out: { [key: string]: NativeValue } = {};
      schema.fields.forEach((f, i) => {
        out[f.name] = detokenize(f.schema, fields[i], `${path}.${f.name}`);
      });
      return out;
    }
    case "enum": {
      if (token.kind !== "enum") throw wrong();
      const variant = schema.variants[token.variant];
      if (variant === undefined) throw wrong();
      const result: { [key: string]: NativeValue } = { tag: variant.name };
      const value = detokenize(variant.schema, token.value, `${path}.${variant.name}`);
      if (value !== undefined) result.value = value;
      return result;
    }
  }
}
