import { describe, it, expect } from "vitest";
import {
  b256Token,
  boolToken,
  enumToken,
  formatToken,
  strToken,
  structToken,
  u64Token,
  unitToken,
  vectorToken,
} from "./token.ts";

describe("formatToken", () => {
  it("renders nested tokens compactly", () => {
    const token = structToken([
      enumToken(1, u64Token(222)),
      vectorToken([boolToken(true), boolToken(false)]),
      strToken("hi"),
      unitToken(),
    ]);
    expect(formatToken(token)).toBe(
      'struct(enum#1(u64(222)), vec[bool(true), bool(false)], "hi", ())',
    );
  });

  it("renders hashes as hex", () => {
    expect(formatToken(b256Token("00".repeat(31) + "01"))).toBe(
      `b256(0x${"00".repeat(31)}01)`,
    );
  });
});
