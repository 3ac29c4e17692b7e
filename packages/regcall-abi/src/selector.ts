// Method selectors.
//
// A selector is the 8-byte fingerprint the VM dispatches on: the first
// four bytes of SHA-256 over the method's signature string, stored in the
// low half of a word.

import { sha256 } from "@noble/hashes/sha256";
import type { Schema } from "./schema.ts";

export const SELECTOR_SIZE = 8;

/** Signature fragment of one type, e.g. `u8[3]`, `str[23]`, `MyStruct`. */
export function schemaSignature(schema: Schema): string {
  switch (schema.kind) {
    case "unit":
      return "()";
    case "str":
      return `str[${schema.length}]`;
    case "array":
      return `${schemaSignature(schema.element)}[${schema.length}]`;
    case "vector":
      return `Vec<${schemaSignature(schema.element)}>`;
    case "tuple":
      return `(${schema.elements.map(schemaSignature).join(",")})`;
    case "struct":
    case "enum":
      return schema.name;
    default:
      return schema.kind;
  }
}

/**
 * `name(type1,type2,...)`, the string the selector is hashed from.
 */
export function functionSignature(name: string, inputs: readonly Schema[]): string {
  return `${name}(${inputs.map(schemaSignature).join(",")})`;
}

export function computeSelector(name: string, inputs: readonly Schema[]): Uint8Array {
  const digest = sha256(new TextEncoder().encode(functionSignature(name, inputs)));
  const selector = new Uint8Array(SELECTOR_SIZE);
  selector.set(digest.subarray(0, 4), SELECTOR_SIZE - 4);
  return selector;
}
