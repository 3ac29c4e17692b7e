// Typed failures raised while encoding or decoding ABI values.

/** ABI error codes. */
export const AbiErrorCode = {
  /** Token shape, arity, ordinal or range disagrees with its schema */
  SCHEMA_MISMATCH: "schema_mismatch",
  /** Buffer ended before the schema was satisfied */
  TRUNCATED_PAYLOAD: "truncated_payload",
  /** A length or pointer word cannot fit in the remaining bytes */
  MALFORMED_LENGTH: "malformed_length",
  /** Bytes are present but not a valid value of the schema */
  INVALID_DATA: "invalid_data",
} as const;

export type AbiErrorCode = (typeof AbiErrorCode)[keyof typeof AbiErrorCode];

export interface AbiErrorContext {
  /** Dotted path to the failing value, e.g. `arg1.inner.[2]` */
  path?: string;
  /** Byte offset in the buffer being decoded */
  offset?: number;
  /** Abbreviated schema of the failing value */
  schema?: string;
}

/**
 * Encode or decode failure with the schema position it happened at.
 */
export class AbiError extends Error {
  readonly code: AbiErrorCode;
  readonly path: string;
  readonly offset: number | null;
  readonly schema: string | null;

  constructor(code: AbiErrorCode, message: string, context: AbiErrorContext = {}) {
    super(message);
    this.name = "AbiError";
    this.code = code;
    this.path = context.path ?? "<root>";
    this.offset = context.offset ?? null;
    this.schema = context.schema ?? null;
  }
}
