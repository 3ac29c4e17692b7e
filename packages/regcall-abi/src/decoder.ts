// Schema-driven decoding of VM return payloads.
//
// Left inverse of the encoder: decoding an encoded token with the same
// schema yields the token back and consumes exactly the encoded bytes.

import { AbiError, AbiErrorCode } from "./errors.ts";
import type { Schema } from "./schema.ts";
import { schemaToString } from "./schema.ts";
import type { Token } from "./token.ts";
import { B256_SIZE, encodingWidth, enumPayloadWidth, validateSchema } from "./layout.ts";
import { WORD_SIZE, decodeWord, paddingFor } from "./binary/words.ts";

/** Decoded value and the offset just past it. */
export interface DecodeResult<T> {
  value: T;
  next: number;
}

// ============================================================================
// Decode Context - tracks path and buffer for error reporting
// ============================================================================

/**
 * Context for decode operations - tracks the path through the schema
 * and provides rich error messages when decoding fails.
 */
class DecodeContext {
  private path: string[];

  constructor(
    public readonly buf: Uint8Array,
    root?: string,
  ) {
    this.path = root === undefined ? [] : [root];
  }

  /** Push a path segment (entering a field, element, or variant) */
  push(segment: string): void {
    this.path.push(segment);
  }

  /** Pop a path segment (leaving a field, element, or variant) */
  pop(): void {
    this.path.pop();
  }

  currentPath(): string {
    return this.path.length === 0 ? "<root>" : this.path.join(".");
  }

  /** Create a rich error with context */
  error(code: AbiErrorCode, message: string, offset: number, schema: Schema): AbiError {
    const schemaStr = schemaToString(schema);
    const details = [
      `Error: ${message}`,
      `Path: ${this.currentPath()}`,
      `Offset: ${offset} (0x${offset.toString(16)})`,
      `Buffer length: ${this.buf.length}`,
      `Schema: ${schemaStr}`,
      `Bytes around offset:`,
      this.hexDumpAround(offset, 32),
    ].join("\n  ");

    return new AbiError(code, `Decode error:\n  ${details}`, {
      path: this.currentPath(),
      offset,
      schema: schemaStr,
    });
  }

  /** Fail with TRUNCATED_PAYLOAD unless `len` bytes are available at `offset`. */
  need(offset: number, len: number, schema: Schema): void {
    if (offset + len > this.buf.length) {
      throw this.error(
        AbiErrorCode.TRUNCATED_PAYLOAD,
        `need ${len} bytes, ${Math.max(0, this.buf.length - offset)} remaining`,
        offset,
        schema,
      );
    }
  }

  word(offset: number, schema: Schema): DecodeResult<bigint> {
    this.need(offset, WORD_SIZE, schema);
    return decodeWord(this.buf, offset);
  }

  /** Hex dump of buffer around an offset */
  private hexDumpAround(offset: number, windowSize: number): string {
    const start = Math.max(0, offset - 8);
    const end = Math.min(this.buf.length, offset + windowSize - 8);

    const lines: string[] = [];
    for (let i = start; i < end; i += 16) {
      const lineEnd = Math.min(i + 16, end);
      const bytes: string[] = [];
      for (let j = i; j < lineEnd; j++) {
        const byte = this.buf[j].toString(16).padStart(2, "0");
        bytes.push(j === offset ? `[${byte}]` : byte);
      }
      lines.push(`    ${i.toString(16).padStart(4, "0")}: ${bytes.join(" ")}`);
    }
    return lines.length === 0 ? "    <empty>" : lines.join("\n");
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Decode one value of `schema` starting at `offset`.
 *
 * @throws AbiError on truncated input, malformed lengths or invalid data
 */
export function decodeToken(
  schema: Schema,
  buf: Uint8Array,
  offset: number = 0,
  label?: string,
): DecodeResult<Token> {
  validateSchema(schema, label);
  return decodeImpl(schema, offset, new DecodeContext(buf, label));
}

/**
 * Decode consecutive values, one per schema.
 */
export function decodeTokens(
  schemas: readonly Schema[],
  buf: Uint8Array,
  offset: number = 0,
): DecodeResult<Token[]> {
  const values: Token[] = [];
  let next = offset;
  schemas.forEach((schema, i) => {
    const result = decodeToken(schema, buf, next, `arg${i}`);
    values.push(result.value);
    next = result.next;
  });
  return { value: values, next };
}

// ============================================================================
// Implementation
// ============================================================================

const UINT_MAX: Record<"u8" | "u16" | "u32", bigint> = {
  u8: 0xffn,
  u16: 0xffffn,
  u32: 0xffff_ffffn,
};

function decodeImpl(schema: Schema, offset: number, ctx: DecodeContext): DecodeResult<Token> {
  switch (schema.kind) {
    case "unit": {
      ctx.need(offset, WORD_SIZE, schema);
      return { value: { kind: "unit" }, next: offset + WORD_SIZE };
    }

    case "bool": {
      const w = ctx.word(offset, schema);
      if (w.value > 1n) {
        throw ctx.error(AbiErrorCode.INVALID_DATA, `invalid bool value ${w.value}`, offset, schema);
      }
      return { value: { kind: "bool", value: w.value === 1n }, next: w.next };
    }

    case "u8":
    case "u16":
    case "u32": {
      const w = ctx.word(offset, schema);
      if (w.value > UINT_MAX[schema.kind]) {
        throw ctx.error(
          AbiErrorCode.INVALID_DATA,
          `value ${w.value} out of range for ${schema.kind}`,
          offset,
          schema,
        );
      }
      return { value: { kind: schema.kind, value: Number(w.value) }, next: w.next };
    }

    case "u64": {
      const w = ctx.word(offset, schema);
      return { value: { kind: "u64", value: w.value }, next: w.next };
    }

    case "byte": {
      ctx.need(offset, 1, schema);
      return { value: { kind: "byte", value: ctx.buf[offset] }, next: offset + 1 };
    }

    case "b256": {
      ctx.need(offset, B256_SIZE, schema);
      return {
        value: { kind: "b256", value: ctx.buf.slice(offset, offset + B256_SIZE) },
        next: offset + B256_SIZE,
      };
    }

    case "str": {
      const width = schema.length + paddingFor(schema.length);
      ctx.need(offset, width, schema);
      let value: string;
      try {
        value = new TextDecoder("utf-8", { fatal: true }).decode(
          ctx.buf.subarray(offset, offset + schema.length),
        );
      } catch (e) {
        throw ctx.error(
          AbiErrorCode.INVALID_DATA,
          `invalid utf-8: ${e instanceof Error ? e.message : String(e)}`,
          offset,
          schema,
        );
      }
      return { value: { kind: "str", value }, next: offset + width };
    }

    case "array": {
      const { elements, next } = decodeElements(schema.element, schema.length, offset, ctx);
      return { value: { kind: "array", elements }, next };
    }

    case "vector": {
      const len = ctx.word(offset, schema);
      // Reject impossible lengths before decoding (or allocating) anything.
      const elementWidth = encodingWidth(schema.element) ?? WORD_SIZE;
      const remaining = ctx.buf.length - len.next;
      if (len.value * BigInt(elementWidth) > BigInt(remaining)) {
        throw ctx.error(
          AbiErrorCode.MALFORMED_LENGTH,
          `vector length ${len.value} exceeds ${remaining} remaining bytes`,
          offset,
          schema,
        );
      }
      const { elements, next } = decodeElements(
        schema.element,
        Number(len.value),
        len.next,
        ctx,
      );
      return { value: { kind: "vector", elements }, next };
    }

    case "tuple": {
      const elements: Token[] = [];
      let next = offset;
      schema.elements.forEach((elementSchema, i) => {
        ctx.push(String(i));
        const result = decodeImpl(elementSchema, next, ctx);
        ctx.pop();
        elements.push(result.value);
        next = result.next;
      });
      return { value: { kind: "tuple", elements }, next };
    }

    case "struct": {
      const fields: Token[] = [];
      let next = offset;
      for (const field of schema.fields) {
        ctx.push(field.name);
        const result = decodeImpl(field.schema, next, ctx);
        ctx.pop();
        fields.push(result.value);
        next = result.next;
      }
      return { value: { kind: "struct", fields }, next };
    }

    case "enum": {
      const tag = ctx.word(offset, schema);
      if (tag.value >= BigInt(schema.variants.length)) {
        const valid = schema.variants.map((v, i) => `${i}=${v.name}`).join(", ");
        throw ctx.error(
          AbiErrorCode.INVALID_DATA,
          `unknown enum discriminant: ${tag.value} (valid: ${valid})`,
          offset,
          schema,
        );
      }
      const index = Number(tag.value);
      const variant = schema.variants[index];
      // Payloads narrower than the widest variant are preceded by zero padding.
      const skip = enumPayloadWidth(schema) - (encodingWidth(variant.schema) ?? 0);
      ctx.need(tag.next, skip, schema);
      ctx.push(variant.name);
      const payload = decodeImpl(variant.schema, tag.next + skip, ctx);
      ctx.pop();
      return {
        value: { kind: "enum", variant: index, value: payload.value },
        next: payload.next,
      };
    }
  }
}

function decodeElements(
  element: Schema,
  count: number,
  offset: number,
  ctx: DecodeContext,
): { elements: Token[]; next: number } {
  const elements: Token[] = [];
  let next = offset;
  for (let i = 0; i < count; i++) {
    ctx.push(`[${i}]`);
    const result = decodeImpl(element, next, ctx);
    ctx.pop();
    elements.push(result.value);
    next = result.next;
  }
  return { elements, next };
}
