// Transaction and receipt types for the register-based VM.
//
// Ids are 0x-prefixed, lowercase, 64-digit hex strings. Amounts, gas and
// register values are bigints.

import { sha256 } from "@noble/hashes/sha256";
import { toHex } from "@regcall/abi";

// ============================================================================
// Identifiers
// ============================================================================

export type Bytes32 = string;
export type ContractId = Bytes32;
export type AssetId = Bytes32;
export type Address = Bytes32;

export const ZERO_BYTES32: Bytes32 = `0x${"00".repeat(32)}`;

/** The chain's native asset. */
export const BASE_ASSET_ID: AssetId = ZERO_BYTES32;

/**
 * Validate and lowercase a 32-byte hex id. Accepts ids without `0x`.
 */
export function normalizeBytes32(value: string): Bytes32 {
  const body = value.startsWith("0x") || value.startsWith("0X") ? value.slice(2) : value;
  if (!/^[0-9a-fA-F]{64}$/.test(body)) {
    throw new Error(`invalid 32-byte id: ${value}`);
  }
  return `0x${body.toLowerCase()}`;
}

// ============================================================================
// Inputs
// ============================================================================

export interface InputCoin {
  tag: "Coin";
  utxoId: Bytes32;
  outputIndex: number;
  owner: Address;
  amount: bigint;
  assetId: AssetId;
  witnessIndex: number;
  maturity: bigint;
}

export interface InputContract {
  tag: "Contract";
  utxoId: Bytes32;
  contractId: ContractId;
}

export type Input = InputCoin | InputContract;

export function inputContract(contractId: ContractId, utxoId: Bytes32 = ZERO_BYTES32): InputContract {
  return { tag: "Contract", utxoId, contractId };
}

export function inputCoin(
  fields: Omit<InputCoin, "tag" | "witnessIndex" | "maturity"> &
    Partial<Pick<InputCoin, "witnessIndex" | "maturity">>,
): InputCoin {
  return {
    tag: "Coin",
    utxoId: fields.utxoId,
    outputIndex: fields.outputIndex,
    owner: fields.owner,
    amount: fields.amount,
    assetId: fields.assetId,
    witnessIndex: fields.witnessIndex ?? 0,
    maturity: fields.maturity ?? 0n,
  };
}

// ============================================================================
// Outputs
// ============================================================================

export interface OutputCoin {
  tag: "Coin";
  to: Address;
  amount: bigint;
  assetId: AssetId;
}

/** Carries a contract input's state forward; one per contract input. */
export interface OutputContract {
  tag: "Contract";
  inputIndex: number;
}

export interface OutputChange {
  tag: "Change";
  to: Address;
  assetId: AssetId;
}

/** Slot whose recipient and amount are filled in during execution. */
export interface OutputVariable {
  tag: "Variable";
  to: Address;
  amount: bigint;
  assetId: AssetId;
}

export type Output = OutputCoin | OutputContract | OutputChange | OutputVariable;

export function outputContract(inputIndex: number): OutputContract {
  return { tag: "Contract", inputIndex };
}

export function outputVariable(): OutputVariable {
  return { tag: "Variable", to: ZERO_BYTES32, amount: 0n, assetId: ZERO_BYTES32 };
}

export function outputCoin(to: Address, amount: bigint, assetId: AssetId = BASE_ASSET_ID): OutputCoin {
  return { tag: "Coin", to, amount, assetId };
}

export function outputChange(to: Address, assetId: AssetId = BASE_ASSET_ID): OutputChange {
  return { tag: "Change", to, assetId };
}

// ============================================================================
// Transaction
// ============================================================================

export interface ScriptTransaction {
  gasPrice: bigint;
  gasLimit: bigint;
  bytePrice: bigint;
  maturity: bigint;
  script: Uint8Array;
  scriptData: Uint8Array;
  inputs: Input[];
  outputs: Output[];
  witnesses: Uint8Array[];
}

// ============================================================================
// Receipts
// ============================================================================

export interface ReceiptCall {
  tag: "Call";
  /** Caller: a contract id, or zero for the script itself. */
  id: ContractId;
  to: ContractId;
  amount: bigint;
  assetId: AssetId;
  gas: bigint;
  param1: bigint;
  param2: bigint;
}

export interface ReceiptReturn {
  tag: "Return";
  id: ContractId;
  val: bigint;
}

export interface ReceiptReturnData {
  tag: "ReturnData";
  id: ContractId;
  digest: Bytes32;
  data: Uint8Array;
}

export interface ReceiptPanic {
  tag: "Panic";
  id: ContractId;
  reason: number;
}

export interface ReceiptRevert {
  tag: "Revert";
  id: ContractId;
  ra: bigint;
}

export interface ReceiptLog {
  tag: "Log";
  id: ContractId;
  ra: bigint;
  rb: bigint;
  rc: bigint;
  rd: bigint;
}

export interface ReceiptLogData {
  tag: "LogData";
  id: ContractId;
  ra: bigint;
  rb: bigint;
  digest: Bytes32;
  data: Uint8Array;
}

/** Transfer from a contract to another contract. */
export interface ReceiptTransfer {
  tag: "Transfer";
  id: ContractId;
  to: ContractId;
  amount: bigint;
  assetId: AssetId;
}

/** Transfer from a contract to an address, through a variable output. */
export interface ReceiptTransferOut {
  tag: "TransferOut";
  id: ContractId;
  to: Address;
  amount: bigint;
  assetId: AssetId;
}

export interface ReceiptScriptResult {
  tag: "ScriptResult";
  /** 0 on success */
  result: bigint;
  gasUsed: bigint;
}

export type Receipt =
  | ReceiptCall
  | ReceiptReturn
  | ReceiptReturnData
  | ReceiptPanic
  | ReceiptRevert
  | ReceiptLog
  | ReceiptLogData
  | ReceiptTransfer
  | ReceiptTransferOut
  | ReceiptScriptResult;

export type ReceiptTag = Receipt["tag"];

// ============================================================================
// Receipt factory functions
// ============================================================================

export function receiptCall(
  id: ContractId,
  to: ContractId,
  fields: Partial<Omit<ReceiptCall, "tag" | "id" | "to">> = {},
): ReceiptCall {
  return {
    tag: "Call",
    id,
    to,
    amount: fields.amount ?? 0n,
    assetId: fields.assetId ?? BASE_ASSET_ID,
    gas: fields.gas ?? 0n,
    param1: fields.param1 ?? 0n,
    param2: fields.param2 ?? 0n,
  };
}

export function receiptReturn(id: ContractId, val: bigint): ReceiptReturn {
  return { tag: "Return", id, val };
}

export function receiptReturnData(id: ContractId, data: Uint8Array): ReceiptReturnData {
  return { tag: "ReturnData", id, digest: toHex(sha256(data)), data };
}

export function receiptPanic(id: ContractId, reason: number): ReceiptPanic {
  return { tag: "Panic", id, reason };
}

export function receiptRevert(id: ContractId, ra: bigint): ReceiptRevert {
  return { tag: "Revert", id, ra };
}

export function receiptLog(id: ContractId, ra: bigint, rb = 0n, rc = 0n, rd = 0n): ReceiptLog {
  return { tag: "Log", id, ra, rb, rc, rd };
}

export function receiptLogData(id: ContractId, data: Uint8Array, ra = 0n, rb = 0n): ReceiptLogData {
  return { tag: "LogData", id, ra, rb, digest: toHex(sha256(data)), data };
}

export function receiptTransfer(
  id: ContractId,
  to: ContractId,
  amount: bigint,
  assetId: AssetId = BASE_ASSET_ID,
): ReceiptTransfer {
  return { tag: "Transfer", id, to, amount, assetId };
}

export function receiptTransferOut(
  id: ContractId,
  to: Address,
  amount: bigint,
  assetId: AssetId = BASE_ASSET_ID,
): ReceiptTransferOut {
  return { tag: "TransferOut", id, to, amount, assetId };
}

export function receiptScriptResult(result: bigint, gasUsed: bigint): ReceiptScriptResult {
  return { tag: "ScriptResult", result, gasUsed };
}

// ============================================================================
// Panic reasons
// ============================================================================

/** Panic codes the SDK names in diagnostics. */
export const PanicReason = {
  REVERT: 2,
  OUT_OF_GAS: 3,
  CONTRACT_NOT_FOUND: 7,
  NOT_ENOUGH_BALANCE: 9,
  OUTPUT_NOT_FOUND: 13,
  CONTRACT_NOT_IN_INPUTS: 24,
} as const;

export type PanicReason = (typeof PanicReason)[keyof typeof PanicReason];

export function panicReasonName(reason: number): string {
  switch (reason) {
    case PanicReason.REVERT:
      return "Revert";
    case PanicReason.OUT_OF_GAS:
      return "OutOfGas";
    case PanicReason.CONTRACT_NOT_FOUND:
      return "ContractNotFound";
    case PanicReason.NOT_ENOUGH_BALANCE:
      return "NotEnoughBalance";
    case PanicReason.OUTPUT_NOT_FOUND:
      return "OutputNotFound";
    case PanicReason.CONTRACT_NOT_IN_INPUTS:
      return "ContractNotInInputs";
    default:
      return `Panic(${reason})`;
  }
}
