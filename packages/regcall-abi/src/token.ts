// Tokens: schema-tagged intermediate values.
//
// A token mirrors the shape of the schema it is encoded against or was
// decoded from. It is only meaningful next to that schema; in particular
// the enum variant is carried explicitly and never inferred from the
// payload.

import { fromHex, toHex } from "./binary/words.ts";

export interface UnitToken {
  kind: "unit";
}

export interface BoolToken {
  kind: "bool";
  value: boolean;
}

export interface U8Token {
  kind: "u8";
  value: number;
}

export interface U16Token {
  kind: "u16";
  value: number;
}

export interface U32Token {
  kind: "u32";
  value: number;
}

export interface U64Token {
  kind: "u64";
  value: bigint;
}

export interface ByteToken {
  kind: "byte";
  value: number;
}

export interface B256Token {
  kind: "b256";
  value: Uint8Array;
}

export interface StrToken {
  kind: "str";
  value: string;
}

export interface ArrayToken {
  kind: "array";
  elements: Token[];
}

export interface VectorToken {
  kind: "vector";
  elements: Token[];
}

export interface TupleToken {
  kind: "tuple";
  elements: Token[];
}

export interface StructToken {
  kind: "struct";
  /** Field tokens in the struct's declaration order. */
  fields: Token[];
}

export interface EnumToken {
  kind: "enum";
  /** Index of the active variant. */
  variant: number;
  value: Token;
}

export type Token =
  | UnitToken
  | BoolToken
  | U8Token
  | U16Token
  | U32Token
  | U64Token
  | ByteToken
  | B256Token
  | StrToken
  | ArrayToken
  | VectorToken
  | TupleToken
  | StructToken
  | EnumToken;

export type TokenKind = Token["kind"];

// ============================================================================
// Factory functions
// ============================================================================

export function unitToken(): UnitToken {
  return { kind: "unit" };
}

export function boolToken(value: boolean): BoolToken {
  return { kind: "bool", value };
}

export function u8Token(value: number): U8Token {
  return { kind: "u8", value };
}

export function u16Token(value: number): U16Token {
  return { kind: "u16", value };
}

export function u32Token(value: number): U32Token {
  return { kind: "u32", value };
}

export function u64Token(value: bigint | number): U64Token {
  return { kind: "u64", value: BigInt(value) };
}

export function byteToken(value: number): ByteToken {
  return { kind: "byte", value };
}

/** Accepts raw bytes or a hex string (with or without `0x`). */
export function b256Token(value: Uint8Array | string): B256Token {
  return { kind: "b256", value: typeof value === "string" ? fromHex(value) : value };
}

export function strToken(value: string): StrToken {
  return { kind: "str", value };
}

export function arrayToken(elements: Token[]): ArrayToken {
  return { kind: "array", elements };
}

export function vectorToken(elements: Token[]): VectorToken {
  return { kind: "vector", elements };
}

export function tupleToken(elements: Token[]): TupleToken {
  return { kind: "tuple", elements };
}

export function structToken(fields: Token[]): StructToken {
  return { kind: "struct", fields };
}

export function enumToken(variant: number, value: Token = unitToken()): EnumToken {
  return { kind: "enum", variant, value };
}

// ============================================================================
// Formatting
// ============================================================================

/** Compact rendering for logs, e.g. `struct(u64(1), [bool(true)])`. */
export function formatToken(token: Token): string {
  switch (token.kind) {
    case "unit":
      return "()";
    case "b256":
      return `b256(${toHex(token.value)})`;
    case "str":
      return JSON.stringify(token.value);
    case "array":
      return `[${token.elements.map(formatToken).join(", ")}]`;
    case "vector":
      return `vec[${token.elements.map(formatToken).join(", ")}]`;
    case "tuple":
      return `(${token.elements.map(formatToken).join(", ")})`;
    case "struct":
      return `struct(${token.fields.map(formatToken).join(", ")})`;
    case "enum":
      return `enum#${token.variant}(${formatToken(token.value)})`;
    default:
      return `${token.kind}(${String(token.value)})`;
  }
}
