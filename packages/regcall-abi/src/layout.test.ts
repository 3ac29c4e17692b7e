import { describe, it, expect } from "vitest";
import { encodingWidth, minimumWidth, validateSchema } from "./layout.ts";
import { AbiError } from "./errors.ts";
import type { EnumSchema, Schema } from "./schema.ts";

const Option64: EnumSchema = {
  kind: "enum",
  name: "Option64",
  variants: [
    { name: "None", schema: { kind: "unit" } },
    { name: "Some", schema: { kind: "u64" } },
  ],
};

describe("encodingWidth", () => {
  it("sizes primitives", () => {
    expect(encodingWidth({ kind: "u8" })).toBe(8);
    expect(encodingWidth({ kind: "byte" })).toBe(1);
    expect(encodingWidth({ kind: "b256" })).toBe(32);
    expect(encodingWidth({ kind: "str", length: 9 })).toBe(16);
  });

  it("sizes enums by their widest variant", () => {
    const schema: EnumSchema = {
      kind: "enum",
      name: "Mixed",
      variants: [
        { name: "A", schema: { kind: "byte" } },
        { name: "B", schema: { kind: "b256" } },
      ],
    };
    expect(encodingWidth(schema)).toBe(40);
    expect(encodingWidth({ kind: "array", element: Option64, length: 3 })).toBe(48);
  });

  it("returns null for anything holding a vector", () => {
    const schema: Schema = {
      kind: "struct",
      name: "Batch",
      fields: [
        { name: "id", schema: { kind: "u64" } },
        { name: "items", schema: { kind: "vector", element: { kind: "u64" } } },
      ],
    };
    expect(encodingWidth(schema)).toBeNull();
    expect(minimumWidth(schema)).toBe(16);
  });
});

describe("validateSchema", () => {
  it("accepts a vector as the last struct member", () => {
    expect(() =>
      validateSchema({
        kind: "tuple",
        elements: [{ kind: "u64" }, { kind: "vector", element: Option64 }],
      }),
    ).not.toThrow();
  });

  it("rejects a vector followed by more members", () => {
    expect(() =>
      validateSchema({
        kind: "tuple",
        elements: [{ kind: "vector", element: { kind: "u64" } }, { kind: "u64" }],
      }),
    ).toThrow("member 0 is dynamic but not last");
  });

  it("rejects vectors inside enum variants", () => {
    expect(() =>
      validateSchema({
        kind: "enum",
        name: "Bad",
        variants: [{ name: "List", schema: { kind: "vector", element: { kind: "u8" } } }],
      }),
    ).toThrow(AbiError);
  });

  it("rejects arrays of vectors and empty enums", () => {
    expect(() =>
      validateSchema({
        kind: "array",
        element: { kind: "vector", element: { kind: "u8" } },
        length: 2,
      }),
    ).toThrow("array elements must have a fixed width");
    expect(() => validateSchema({ kind: "enum", name: "Never", variants: [] })).toThrow(
      "enum Never has no variants",
    );
  });

  it("rejects vectors of zero-sized elements", () => {
    const zeroSized: Schema[] = [
      { kind: "tuple", elements: [] },
      { kind: "array", element: { kind: "u64" }, length: 0 },
      { kind: "str", length: 0 },
    ];
    for (const element of zeroSized) {
      expect(() => validateSchema({ kind: "vector", element })).toThrow(
        "vector elements must not be zero-sized",
      );
    }
    expect(() => validateSchema({ kind: "vector", element: { kind: "unit" } })).not.toThrow();
  });
});
