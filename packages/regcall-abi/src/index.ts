// ABI type system: schemas, tokens, and the word-aligned codec.

export {
  WORD_SIZE,
  U64_MAX,
  concat,
  encodeWord,
  decodeWord,
  paddingFor,
  padStart,
  padEnd,
  toHex,
  fromHex,
} from "./binary/words.ts";

export { AbiError, AbiErrorCode, type AbiErrorContext } from "./errors.ts";

export {
  type PrimitiveKind,
  type PrimitiveSchema,
  type StrSchema,
  type ArraySchema,
  type VectorSchema,
  type TupleSchema,
  type Field,
  type StructSchema,
  type EnumVariant,
  type EnumSchema,
  type Schema,
  type MethodSchema,
  findVariantIndex,
  schemaToString,
} from "./schema.ts";

export {
  type Token,
  type TokenKind,
  type UnitToken,
  type BoolToken,
  type U8Token,
  type U16Token,
  type U32Token,
  type U64Token,
  type ByteToken,
  type B256Token,
  type StrToken,
  type ArrayToken,
  type VectorToken,
  type TupleToken,
  type StructToken,
  type EnumToken,
  unitToken,
  boolToken,
  u8Token,
  u16Token,
  u32Token,
  u64Token,
  byteToken,
  b256Token,
  strToken,
  arrayToken,
  vectorToken,
  tupleToken,
  structToken,
  enumToken,
  formatToken,
} from "./token.ts";

export {
  B256_SIZE,
  encodingWidth,
  minimumWidth,
  isDynamic,
  enumPayloadWidth,
  validateSchema,
} from "./layout.ts";

export { encodeToken, encodeTokens } from "./encoder.ts";
export { decodeToken, decodeTokens, type DecodeResult } from "./decoder.ts";
export { encodeArguments, decodeArguments } from "./call_data.ts";
export { SELECTOR_SIZE, schemaSignature, functionSignature, computeSelector } from "./selector.ts";
export { tokenize, detokenize, type NativeValue } from "./native.ts";
