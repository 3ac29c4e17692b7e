// Tests for schema-driven encoding

import { describe, it, expect } from "vitest";
import { encodeToken, encodeTokens } from "./encoder.ts";
import { AbiError, AbiErrorCode } from "./errors.ts";
import type { EnumSchema, Schema, StructSchema } from "./schema.ts";
import {
  arrayToken,
  b256Token,
  boolToken,
  byteToken,
  enumToken,
  strToken,
  structToken,
  tupleToken,
  u8Token,
  u32Token,
  u64Token,
  unitToken,
  vectorToken,
} from "./token.ts";
import { toHex } from "./binary/words.ts";

// ============================================================================
// Test Schemas
// ============================================================================

const ShakerSchema: EnumSchema = {
  kind: "enum",
  name: "Shaker",
  variants: [
    { name: "Cosmopolitan", schema: { kind: "u64" } },
    { name: "Mojito", schema: { kind: "u64" } },
  ],
};

const CocktailSchema: StructSchema = {
  kind: "struct",
  name: "Cocktail",
  fields: [
    { name: "the_thing_you_mix_in", schema: ShakerSchema },
    { name: "glass", schema: { kind: "u64" } },
  ],
};

const HashOrCountSchema: EnumSchema = {
  kind: "enum",
  name: "HashOrCount",
  variants: [
    { name: "Hash", schema: { kind: "b256" } },
    { name: "Count", schema: { kind: "u64" } },
  ],
};

const HASH = "0x" + "ab".repeat(32);

function hex(schema: Schema, token: Parameters<typeof encodeToken>[1]): string {
  return toHex(encodeToken(schema, token));
}

function captureError(fn: () => unknown): AbiError {
  try {
    fn();
  } catch (e) {
    if (e instanceof AbiError) return e;
    throw e;
  }
  throw new Error("expected an AbiError");
}

// ============================================================================
// Primitives
// ============================================================================

describe("primitive encoding", () => {
  it("encodes u64 as one big-endian word", () => {
    expect(hex({ kind: "u64" }, u64Token(4294967296n))).toBe("0x0000000100000000");
  });

  it("right-aligns small integers in a word", () => {
    expect(hex({ kind: "u8" }, u8Token(255))).toBe("0x00000000000000ff");
    expect(hex({ kind: "u32" }, u32Token(0x01020304))).toBe("0x0000000001020304");
  });

  it("encodes bool as 0 or 1", () => {
    expect(hex({ kind: "bool" }, boolToken(true))).toBe("0x0000000000000001");
    expect(hex({ kind: "bool" }, boolToken(false))).toBe("0x0000000000000000");
  });

  it("encodes unit as a zero word", () => {
    expect(hex({ kind: "unit" }, unitToken())).toBe("0x0000000000000000");
  });

  it("encodes byte as a single raw byte", () => {
    expect(hex({ kind: "byte" }, byteToken(0xab))).toBe("0xab");
  });

  it("encodes b256 as 32 raw bytes", () => {
    expect(hex({ kind: "b256" }, b256Token(HASH))).toBe(HASH);
  });

  it("pads fixed strings to a word multiple", () => {
    expect(hex({ kind: "str", length: 5 }, strToken("hello"))).toBe("0x68656c6c6f000000");
    expect(hex({ kind: "str", length: 8 }, strToken("abcdefgh"))).toBe("0x6162636465666768");
  });
});

// ============================================================================
// Composites
// ============================================================================

describe("composite encoding", () => {
  it("encodes arrays element by element", () => {
    const schema: Schema = { kind: "array", element: { kind: "u8" }, length: 3 };
    expect(hex(schema, arrayToken([u8Token(1), u8Token(2), u8Token(3)]))).toBe(
      "0x" + "0000000000000001" + "0000000000000002" + "0000000000000003",
    );
  });

  it("packs byte arrays without padding", () => {
    const schema: Schema = { kind: "array", element: { kind: "byte" }, length: 3 };
    expect(hex(schema, arrayToken([byteToken(1), byteToken(2), byteToken(3)]))).toBe("0x010203");
  });

  it("encodes a struct with an enum field in declaration order", () => {
    const token = structToken([enumToken(1, u64Token(222)), u64Token(333)]);
    expect(hex(CocktailSchema, token)).toBe(
      "0x" + "0000000000000001" + "00000000000000de" + "000000000000014d",
    );
  });

  it("pads narrower enum payloads up to the widest variant", () => {
    expect(hex(HashOrCountSchema, enumToken(1, u64Token(42)))).toBe(
      "0x" + "0000000000000001" + "00".repeat(24) + "000000000000002a",
    );
    expect(hex(HashOrCountSchema, enumToken(0, b256Token(HASH)))).toBe(
      "0x" + "0000000000000000" + "ab".repeat(32),
    );
  });

  it("encodes vectors as a length word followed by elements", () => {
    const schema: Schema = { kind: "vector", element: { kind: "u64" } };
    expect(hex(schema, vectorToken([u64Token(7), u64Token(8)]))).toBe(
      "0x" + "0000000000000002" + "0000000000000007" + "0000000000000008",
    );
    expect(hex(schema, vectorToken([]))).toBe("0x0000000000000000");
  });

  it("encodes tuples back to back", () => {
    const schema: Schema = { kind: "tuple", elements: [{ kind: "bool" }, { kind: "byte" }] };
    expect(hex(schema, tupleToken([boolToken(true), byteToken(9)]))).toBe(
      "0x000000000000000109",
    );
  });

  it("concatenates a token sequence in order", () => {
    const bytes = encodeTokens([{ kind: "u8" }, { kind: "bool" }], [u8Token(3), boolToken(true)]);
    expect(toHex(bytes)).toBe("0x" + "0000000000000003" + "0000000000000001");
  });

  it("is deterministic", () => {
    const token = structToken([enumToken(0, u64Token(5)), u64Token(6)]);
    expect(encodeToken(CocktailSchema, token)).toEqual(encodeToken(CocktailSchema, token));
  });
});

// ============================================================================
// Schema mismatches
// ============================================================================

describe("encoding errors", () => {
  it("rejects a token of the wrong kind", () => {
    const error = captureError(() => encodeToken({ kind: "u64" }, boolToken(true)));
    expect(error.code).toBe(AbiErrorCode.SCHEMA_MISMATCH);
    expect(error.message).toBe("Encode error at <root>: expected u64 token, got bool");
  });

  it("rejects out-of-range integers", () => {
    const error = captureError(() => encodeToken({ kind: "u8" }, u8Token(256)));
    expect(error.code).toBe(AbiErrorCode.SCHEMA_MISMATCH);
    expect(error.message).toBe("Encode error at <root>: value 256 out of range for u8");
  });

  it("rejects a wrong field count and names the struct", () => {
    const error = captureError(() => encodeToken(CocktailSchema, structToken([u64Token(1)])));
    expect(error.message).toBe(
      "Encode error at <root>: struct Cocktail has 2 fields, got 1",
    );
  });

  it("rejects an enum ordinal out of range", () => {
    const error = captureError(() => encodeToken(ShakerSchema, enumToken(2, u64Token(1))));
    expect(error.code).toBe(AbiErrorCode.SCHEMA_MISMATCH);
    expect(error.message).toBe(
      "Encode error at <root>: variant 2 out of range for enum Shaker (2 variants)",
    );
  });

  it("reports the path of a nested mismatch", () => {
    const token = structToken([enumToken(1, boolToken(true)), u64Token(1)]);
    const error = captureError(() => encodeToken(CocktailSchema, token));
    expect(error.path).toBe("the_thing_you_mix_in.Mojito");
  });

  it("rejects arrays of the wrong length", () => {
    const schema: Schema = { kind: "array", element: { kind: "u8" }, length: 2 };
    expect(() => encodeToken(schema, arrayToken([u8Token(1)]))).toThrow(/expected 2 elements, got 1/);
  });

  it("rejects strings of the wrong length", () => {
    expect(() => encodeToken({ kind: "str", length: 4 }, strToken("abc"))).toThrow(
      /expected a string of 4 bytes, got 3/,
    );
  });

  it("rejects nested dynamic vectors", () => {
    const schema: Schema = {
      kind: "vector",
      element: { kind: "vector", element: { kind: "u64" } },
    };
    const error = captureError(() => encodeToken(schema, vectorToken([])));
    expect(error.code).toBe(AbiErrorCode.SCHEMA_MISMATCH);
    expect(error.message).toBe("nested dynamic vectors are not supported");
  });

  it("rejects token sequences of the wrong arity", () => {
    expect(() => encodeTokens([{ kind: "u8" }], [])).toThrow(/expected 1 tokens, got 0/);
  });
});
