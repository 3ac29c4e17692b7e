// Call descriptors and the script data they are serialized into.
//
// Script data layout:
//
//   amount      8 bytes   forwarded amount
//   assetId    32 bytes   forwarded asset
//   contractId 32 bytes   target contract
//   selector    8 bytes   method fingerprint
//   arguments             head words + out-of-line tail
//
// Argument pointers are absolute VM addresses, so the arguments are
// encoded against `scriptDataOffset + SCRIPT_DATA_HEADER_SIZE`.

import {
  AbiError,
  AbiErrorCode,
  SELECTOR_SIZE,
  WORD_SIZE,
  computeSelector,
  concat,
  decodeWord,
  encodeArguments,
  encodeWord,
  fromHex,
  toHex,
  type MethodSchema,
  type Schema,
  type Token,
} from "@regcall/abi";
import { normalizeBytes32, type AssetId, type ContractId } from "@regcall/tx";

import type { CallParameters, TxParameters } from "./config.ts";

export const SCRIPT_DATA_HEADER_SIZE = WORD_SIZE + 32 + 32 + SELECTOR_SIZE;

/**
 * Everything needed to dispatch one contract call. Frozen once built.
 */
export interface CallDescriptor {
  readonly contractId: ContractId;
  readonly method: string;
  readonly selector: Uint8Array;
  readonly args: readonly Token[];
  readonly encodedArgs: Uint8Array;
  /** VM address the encoded arguments were laid out for. */
  readonly argumentBase: number;
  readonly output: Schema;
  readonly txParams: Readonly<TxParameters>;
  readonly callParams: Readonly<CallParameters>;
  readonly variableOutputs: number;
  readonly dependencies: readonly ContractId[];
}

export interface CallDescriptorInput {
  contractId: ContractId;
  method: MethodSchema;
  args: readonly Token[];
  txParams: Readonly<TxParameters>;
  callParams: Readonly<CallParameters>;
  variableOutputs: number;
  dependencies: readonly ContractId[];
  scriptDataOffset: number;
}

export function createCallDescriptor(input: CallDescriptorInput): CallDescriptor {
  const inputs = input.method.inputs.map((f) => f.schema);
  const argumentBase = input.scriptDataOffset + SCRIPT_DATA_HEADER_SIZE;
  return Object.freeze({
    contractId: normalizeBytes32(input.contractId),
    method: input.method.name,
    selector: computeSelector(input.method.name, inputs),
    args: Object.freeze([...input.args]),
    encodedArgs: encodeArguments(inputs, input.args, argumentBase),
    argumentBase,
    output: input.method.output,
    txParams: input.txParams,
    callParams: input.callParams,
    variableOutputs: input.variableOutputs,
    dependencies: Object.freeze([...input.dependencies]),
  });
}

// ============================================================================
// Script data
// ============================================================================

export function encodeScriptData(descriptor: CallDescriptor): Uint8Array {
  return concat(
    encodeWord(descriptor.callParams.amount),
    fromHex(descriptor.callParams.assetId),
    fromHex(descriptor.contractId),
    descriptor.selector,
    descriptor.encodedArgs,
  );
}

/** Script data split back into its parts; arguments stay encoded. */
export interface DecodedScriptData {
  amount: bigint;
  assetId: AssetId;
  contractId: ContractId;
  selector: Uint8Array;
  /** Encoded arguments, laid out for `argumentBase`. */
  args: Uint8Array;
  argumentBase: number;
}

export function decodeScriptData(data: Uint8Array, scriptDataOffset = 0): DecodedScriptData {
  if (data.length < SCRIPT_DATA_HEADER_SIZE) {
    throw new AbiError(
      AbiErrorCode.TRUNCATED_PAYLOAD,
      `script data holds ${data.length} bytes, header needs ${SCRIPT_DATA_HEADER_SIZE}`,
      { offset: data.length },
    );
  }
  const amount = decodeWord(data, 0);
  let offset = amount.next;
  const assetId = toHex(data.slice(offset, offset + 32));
  offset += 32;
  const contractId = toHex(data.slice(offset, offset + 32));
  offset += 32;
  const selector = data.slice(offset, offset + SELECTOR_SIZE);
  offset += SELECTOR_SIZE;
  return {
    amount: amount.value,
    assetId,
    contractId,
    selector,
    args: data.slice(offset),
    argumentBase: scriptDataOffset + SCRIPT_DATA_HEADER_SIZE,
  };
}
