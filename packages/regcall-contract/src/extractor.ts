// Response extraction: return value and logs from execution receipts.

import {
  AbiError,
  AbiErrorCode,
  WORD_SIZE,
  decodeToken,
  detokenize,
  encodeWord,
  encodingWidth,
  schemaToString,
  unitToken,
  type NativeValue,
  type Schema,
  type Token,
} from "@regcall/abi";
import { extractLogs, type ContractId, type Receipt } from "@regcall/tx";

/**
 * Decoded outcome of a call.
 */
export interface CallResponse {
  /** Return value as a plain JavaScript value. */
  value: NativeValue;
  /** Return value as decoded against the output schema. */
  token: Token;
  receipts: Receipt[];
  logs: string[];
}

/**
 * Decode the return value emitted by `contractId`.
 *
 * Nested calls return before their caller, so the last return from
 * `contractId` is the one closing the top-level call; earlier ones belong
 * to re-entrant calls into the same contract.
 *
 * A `Return` receipt carries a single word, right-aligned; `ReturnData`
 * carries the full encoding. When the contract emitted neither, the
 * output must be unit.
 */
export function extractReturnToken(
  receipts: readonly Receipt[],
  contractId: ContractId,
  output: Schema,
): Token {
  for (let i = receipts.length - 1; i >= 0; i--) {
    const receipt = receipts[i];
    if (receipt.tag === "Return" && receipt.id === contractId) {
      return decodeReturnWord(output, receipt.val);
    }
    if (receipt.tag === "ReturnData" && receipt.id === contractId) {
      return decodeToken(output, receipt.data, 0, "return").value;
    }
  }

  if (output.kind === "unit") {
    return unitToken();
  }
  throw new AbiError(
    AbiErrorCode.TRUNCATED_PAYLOAD,
    `no return receipt from ${contractId} for ${schemaToString(output)}`,
    { path: "return", schema: schemaToString(output) },
  );
}

function decodeReturnWord(output: Schema, val: bigint): Token {
  const width = encodingWidth(output);
  if (width === null || width > WORD_SIZE) {
    throw new AbiError(
      AbiErrorCode.TRUNCATED_PAYLOAD,
      `single-word return cannot hold ${schemaToString(output)}`,
      { path: "return", schema: schemaToString(output) },
    );
  }
  return decodeToken(output, encodeWord(val), WORD_SIZE - width, "return").value;
}

export function extractResponse(
  receipts: readonly Receipt[],
  contractId: ContractId,
  output: Schema,
): CallResponse {
  const token = extractReturnToken(receipts, contractId, output);
  return {
    value: detokenize(output, token),
    token,
    receipts: [...receipts],
    logs: extractLogs(receipts),
  };
}

/**
 * Decode every `LogData` payload (optionally only those emitted by
 * `contractId`) against `schema`.
 */
export function decodeLogData(
  receipts: readonly Receipt[],
  schema: Schema,
  contractId?: ContractId,
): Token[] {
  const tokens: Token[] = [];
  for (const receipt of receipts) {
    if (receipt.tag !== "LogData") continue;
    if (contractId !== undefined && receipt.id !== contractId) continue;
    tokens.push(decodeToken(schema, receipt.data, 0, "log").value);
  }
  return tokens;
}
