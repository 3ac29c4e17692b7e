// Argument layout for contract calls.
//
// Every argument owns one head word, in call order. An argument whose
// encoding fits in a word is stored inline, right-aligned. Anything longer
// is appended after the head, and its head word holds a pointer: the
// absolute VM address `baseOffset + offset into the call data`.

import { AbiError, AbiErrorCode } from "./errors.ts";
import type { Schema } from "./schema.ts";
import { schemaToString } from "./schema.ts";
import type { Token } from "./token.ts";
import { decodeToken } from "./decoder.ts";
import { encodeToken } from "./encoder.ts";
import { encodingWidth, minimumWidth, validateSchema } from "./layout.ts";
import { WORD_SIZE, concat, decodeWord, encodeWord, padStart } from "./binary/words.ts";

/**
 * Encode call arguments into head words plus an out-of-line tail.
 *
 * @param baseOffset - VM address at which the returned bytes will live
 */
export function encodeArguments(
  schemas: readonly Schema[],
  tokens: readonly Token[],
  baseOffset: number = 0,
): Uint8Array {
  if (schemas.length !== tokens.length) {
    throw new AbiError(
      AbiErrorCode.SCHEMA_MISMATCH,
      `expected ${schemas.length} arguments, got ${tokens.length}`,
    );
  }

  const headLength = schemas.length * WORD_SIZE;
  const head: Uint8Array[] = [];
  const tail: Uint8Array[] = [];
  let tailLength = 0;

  schemas.forEach((schema, i) => {
    const encoded = encodeToken(schema, tokens[i], `arg${i}`);
    if (encoded.length <= WORD_SIZE) {
      head.push(padStart(encoded, WORD_SIZE));
    } else {
      head.push(encodeWord(baseOffset + headLength + tailLength));
      tail.push(encoded);
      tailLength += encoded.length;
    }
  });

  return concat(...head, ...tail);
}

/**
 * Decode call arguments laid out by {@link encodeArguments}.
 */
export function decodeArguments(
  schemas: readonly Schema[],
  data: Uint8Array,
  baseOffset: number = 0,
): Token[] {
  const headLength = schemas.length * WORD_SIZE;
  if (data.length < headLength) {
    throw new AbiError(
      AbiErrorCode.TRUNCATED_PAYLOAD,
      `call data holds ${data.length} bytes, ${schemas.length} arguments need ${headLength}`,
      { offset: data.length },
    );
  }

  return schemas.map((schema, i) => {
    const label = `arg${i}`;
    validateSchema(schema, label);
    const slot = i * WORD_SIZE;
    const width = encodingWidth(schema);

    if (width !== null && width <= WORD_SIZE) {
      return decodeToken(schema, data, slot + WORD_SIZE - width, label).value;
    }

    const word = decodeWord(data, slot).value;
    // A dynamic value that fits a word (an empty vector) is inline, and its
    // head word is zero; a pointer can never be zero.
    if (width === null && minimumWidth(schema) <= WORD_SIZE && word === 0n) {
      return decodeToken(schema, data, slot, label).value;
    }

    const position = word - BigInt(baseOffset);
    if (position < BigInt(headLength) || position >= BigInt(data.length)) {
      throw new AbiError(
        AbiErrorCode.MALFORMED_LENGTH,
        `argument pointer ${word} is outside the call data (base ${baseOffset}, ${data.length} bytes)`,
        { path: label, offset: slot, schema: schemaToString(schema) },
      );
    }
    return decodeToken(schema, data, Number(position), label).value;
  });
}
