import { describe, it, expect } from "vitest";
import { decodeArguments, encodeArguments } from "./call_data.ts";
import { AbiError, AbiErrorCode } from "./errors.ts";
import type { Schema } from "./schema.ts";
import {
  b256Token,
  boolToken,
  byteToken,
  tupleToken,
  u64Token,
  vectorToken,
} from "./token.ts";
import { fromHex, toHex } from "./binary/words.ts";

const U64: Schema = { kind: "u64" };
const B256: Schema = { kind: "b256" };
const BYTES: Schema = { kind: "vector", element: { kind: "byte" } };
const HASH = "0x" + "cd".repeat(32);

describe("encodeArguments", () => {
  it("stores word-sized arguments inline", () => {
    const data = encodeArguments([U64, { kind: "bool" }], [u64Token(10), boolToken(true)]);
    expect(toHex(data)).toBe("0x" + "000000000000000a" + "0000000000000001");
  });

  it("right-aligns sub-word arguments in their head word", () => {
    const data = encodeArguments([{ kind: "byte" }], [byteToken(0x7f)]);
    expect(toHex(data)).toBe("0x000000000000007f");
  });

  it("passes larger arguments through a pointer into the tail", () => {
    const data = encodeArguments([U64, B256], [u64Token(1), b256Token(HASH)], 100);
    // head: 16 bytes, so the b256 lands at 100 + 16 = 116 (0x74)
    expect(toHex(data)).toBe("0x" + "0000000000000001" + "0000000000000074" + "cd".repeat(32));
  });

  it("chooses indirection by encoded length, not by schema", () => {
    const empty = encodeArguments([BYTES], [vectorToken([])], 0);
    expect(toHex(empty)).toBe("0x0000000000000000");

    const filled = encodeArguments([BYTES], [vectorToken([byteToken(1), byteToken(2)])], 0);
    expect(toHex(filled)).toBe("0x" + "0000000000000008" + "0000000000000002" + "0102");
  });

  it("appends several out-of-line arguments in call order", () => {
    const data = encodeArguments([B256, B256], [b256Token(HASH), b256Token("ee".repeat(32))], 0);
    expect(toHex(data.subarray(0, 16))).toBe("0x" + "0000000000000010" + "0000000000000030");
  });

  it("rejects an argument count mismatch", () => {
    expect(() => encodeArguments([U64], [])).toThrow(/expected 1 arguments, got 0/);
  });
});

describe("decodeArguments", () => {
  it("recovers inline and pointed-to arguments", () => {
    const schemas: Schema[] = [U64, B256, BYTES, { kind: "byte" }];
    const tokens = [
      u64Token(99),
      b256Token(HASH),
      vectorToken([byteToken(4), byteToken(5), byteToken(6)]),
      byteToken(3),
    ];
    const data = encodeArguments(schemas, tokens, 4096);
    expect(decodeArguments(schemas, data, 4096)).toEqual(tokens);
  });

  it("treats a zero head word for a vector as an empty inline vector", () => {
    expect(decodeArguments([BYTES], fromHex("0000000000000000"))).toEqual([vectorToken([])]);
  });

  it("rejects pointers outside the call data", () => {
    try {
      decodeArguments([B256], fromHex("00000000000000ff"), 0);
      expect.unreachable();
    } catch (e) {
      expect(e).toMatchObject({ code: AbiErrorCode.MALFORMED_LENGTH, path: "arg0" });
    }
  });

  it("fails when the head is truncated", () => {
    try {
      decodeArguments([U64, U64], fromHex("0000000000000001"));
      expect.unreachable();
    } catch (e) {
      expect(e).toMatchObject({ code: AbiErrorCode.TRUNCATED_PAYLOAD });
    }
  });
});

describe("zero-sized vector elements", () => {
  const EMPTY_TUPLES: Schema = { kind: "vector", element: { kind: "tuple", elements: [] } };

  it("are refused by both directions", () => {
    const encode = () => encodeArguments([EMPTY_TUPLES], [vectorToken([tupleToken([]), tupleToken([])])]);
    const decode = () => decodeArguments([EMPTY_TUPLES], fromHex("0x0000000000000002"));

    for (const run of [encode, decode]) {
      try {
        run();
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(AbiError);
        expect(e).toMatchObject({
          code: AbiErrorCode.SCHEMA_MISMATCH,
          path: "arg0",
          message: "vector elements must not be zero-sized",
        });
      }
    }
  });
});
