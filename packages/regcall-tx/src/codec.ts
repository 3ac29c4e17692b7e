// Binary encoding of script transactions.
//
// Layout: header struct, script and script data (each padded to a word),
// inputs and outputs as ABI enums, then each witness as a length word
// followed by its padded bytes.

import { sha256 } from "@noble/hashes/sha256";
import {
  AbiError,
  AbiErrorCode,
  WORD_SIZE,
  concat,
  decodeToken,
  decodeWord,
  encodeToken,
  encodeWord,
  padEnd,
  paddingFor,
  toHex,
  tokenize,
  type DecodeResult,
  type Token,
} from "@regcall/abi";

import type { Bytes32, Input, Output, ScriptTransaction } from "./types.ts";
import { InputSchema, OutputSchema, ScriptHeaderSchema } from "./schemas.ts";

// ============================================================================
// Encoding
// ============================================================================

export function encodeTransaction(tx: ScriptTransaction): Uint8Array {
  const header = tokenize(ScriptHeaderSchema, {
    gasPrice: tx.gasPrice,
    gasLimit: tx.gasLimit,
    bytePrice: tx.bytePrice,
    maturity: tx.maturity,
    scriptLength: BigInt(tx.script.length),
    scriptDataLength: BigInt(tx.scriptData.length),
    inputsCount: BigInt(tx.inputs.length),
    outputsCount: BigInt(tx.outputs.length),
    witnessesCount: BigInt(tx.witnesses.length),
  });

  return concat(
    encodeToken(ScriptHeaderSchema, header),
    padToWord(tx.script),
    padToWord(tx.scriptData),
    ...tx.inputs.map(encodeInput),
    ...tx.outputs.map(encodeOutput),
    ...tx.witnesses.map((w) => concat(encodeWord(w.length), padToWord(w))),
  );
}

export function encodeInput(input: Input): Uint8Array {
  const { tag, ...value } = input;
  return encodeToken(InputSchema, tokenize(InputSchema, { tag, value }));
}

export function encodeOutput(output: Output): Uint8Array {
  const { tag, ...value } = output;
  return encodeToken(OutputSchema, tokenize(OutputSchema, { tag, value }));
}

/** SHA-256 of the transaction's encoding. */
export function transactionId(tx: ScriptTransaction): Bytes32 {
  return toHex(sha256(encodeTransaction(tx)));
}

function padToWord(bytes: Uint8Array): Uint8Array {
  return padEnd(bytes, bytes.length + paddingFor(bytes.length));
}

// ============================================================================
// Decoding
// ============================================================================

export function decodeTransaction(buf: Uint8Array, offset = 0): DecodeResult<ScriptTransaction> {
  const header = decodeToken(ScriptHeaderSchema, buf, offset);
  const h = structFields(header.value, "ScriptHeader");
  let next = header.next;

  const script = readBlob(buf, next, u64At(h, 4), "script");
  next = script.next;
  const scriptData = readBlob(buf, next, u64At(h, 5), "scriptData");
  next = scriptData.next;

  const inputs: Input[] = [];
  for (let i = 0n; i < u64At(h, 6); i++) {
    const input = decodeInput(buf, next);
    inputs.push(input.value);
    next = input.next;
  }

  const outputs: Output[] = [];
  for (let i = 0n; i < u64At(h, 7); i++) {
    const output = decodeOutput(buf, next);
    outputs.push(output.value);
    next = output.next;
  }

  const witnesses: Uint8Array[] = [];
  for (let i = 0n; i < u64At(h, 8); i++) {
    if (next + WORD_SIZE > buf.length) {
      throw truncated("witness length", next);
    }
    const len = decodeWord(buf, next);
    const witness = readBlob(buf, len.next, len.value, "witness");
    witnesses.push(witness.value);
    next = witness.next;
  }

  return {
    value: {
      gasPrice: u64At(h, 0),
      gasLimit: u64At(h, 1),
      bytePrice: u64At(h, 2),
      maturity: u64At(h, 3),
      script: script.value,
      scriptData: scriptData.value,
      inputs,
      outputs,
      witnesses,
    },
    next,
  };
}

export function decodeInput(buf: Uint8Array, offset = 0): DecodeResult<Input> {
  const { value, next } = decodeToken(InputSchema, buf, offset);
  const { variant, fields } = enumFields(value, "Input");
  if (variant === 0) {
    return {
      value: {
        tag: "Coin",
        utxoId: b256At(fields, 0),
        outputIndex: u8At(fields, 1),
        owner: b256At(fields, 2),
        amount: u64At(fields, 3),
        assetId: b256At(fields, 4),
        witnessIndex: u8At(fields, 5),
        maturity: u64At(fields, 6),
      },
      next,
    };
  }
  return {
    value: { tag: "Contract", utxoId: b256At(fields, 0), contractId: b256At(fields, 1) },
    next,
  };
}

export function decodeOutput(buf: Uint8Array, offset = 0): DecodeResult<Output> {
  const { value, next } = decodeToken(OutputSchema, buf, offset);
  const { variant, fields } = enumFields(value, "Output");
  switch (variant) {
    case 0:
      return {
        value: { tag: "Coin", to: b256At(fields, 0), amount: u64At(fields, 1), assetId: b256At(fields, 2) },
        next,
      };
    case 1:
      return { value: { tag: "Contract", inputIndex: u8At(fields, 0) }, next };
    case 2:
      return { value: { tag: "Change", to: b256At(fields, 0), assetId: b256At(fields, 1) }, next };
    default:
      return {
        value: {
          tag: "Variable",
          to: b256At(fields, 0),
          amount: u64At(fields, 1),
          assetId: b256At(fields, 2),
        },
        next,
      };
  }
}

// ============================================================================
// Token accessors
// ============================================================================

function unexpected(what: string): AbiError {
  return new AbiError(AbiErrorCode.INVALID_DATA, `unexpected token shape for ${what}`);
}

function structFields(token: Token, what: string): Token[] {
  if (token.kind !== "struct") throw unexpected(what);
  return token.fields;
}

function enumFields(token: Token, what: string): { variant: number; fields: Token[] } {
  if (token.kind !== "enum") throw unexpected(what);
  return { variant: token.variant, fields: structFields(token.value, what) };
}

function u64At(fields: Token[], i: number): bigint {
  const t = fields[i];
  if (t === undefined || t.kind !== "u64") throw unexpected(`u64 field ${i}`);
  return t.value;
}

function u8At(fields: Token[], i: number): number {
  const t = fields[i];
  if (t === undefined || t.kind !== "u8") throw unexpected(`u8 field ${i}`);
  return t.value;
}

function b256At(fields: Token[], i: number): Bytes32 {
  const t = fields[i];
  if (t === undefined || t.kind !== "b256") throw unexpected(`b256 field ${i}`);
  return toHex(t.value);
}

function truncated(what: string, offset: number): AbiError {
  return new AbiError(AbiErrorCode.TRUNCATED_PAYLOAD, `transaction truncated in ${what}`, {
    path: what,
    offset,
  });
}

function readBlob(buf: Uint8Array, offset: number, len: bigint, what: string): DecodeResult<Uint8Array> {
  const available = BigInt(buf.length - offset);
  if (len > available) {
    throw new AbiError(
      AbiErrorCode.MALFORMED_LENGTH,
      `${what} length ${len} exceeds ${available} remaining bytes`,
      { path: what, offset },
    );
  }
  const n = Number(len);
  const width = n + paddingFor(n);
  if (offset + width > buf.length) {
    throw truncated(what, offset);
  }
  return { value: buf.slice(offset, offset + n), next: offset + width };
}
