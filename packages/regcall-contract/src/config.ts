// Transaction and call parameters with their defaults.

import { BASE_ASSET_ID, normalizeBytes32, type AssetId } from "@regcall/tx";

/** Transaction-level parameters. */
export interface TxParameters {
  /** Default: 0 */
  gasPrice: bigint;
  /** Default: 1_000_000 */
  gasLimit: bigint;
  /** Default: 0 */
  bytePrice: bigint;
  /** Default: 0 */
  maturity: bigint;
}

/** Asset forwarded to the called contract. */
export interface CallParameters {
  /** Default: 0 */
  amount: bigint;
  /** Default: the base asset */
  assetId: AssetId;
}

export const DEFAULT_GAS_PRICE = 0n;
export const DEFAULT_GAS_LIMIT = 1_000_000n;
export const DEFAULT_BYTE_PRICE = 0n;
export const DEFAULT_MATURITY = 0n;

export const DEFAULT_TX_PARAMETERS: Readonly<TxParameters> = Object.freeze({
  gasPrice: DEFAULT_GAS_PRICE,
  gasLimit: DEFAULT_GAS_LIMIT,
  bytePrice: DEFAULT_BYTE_PRICE,
  maturity: DEFAULT_MATURITY,
});

export const DEFAULT_CALL_PARAMETERS: Readonly<CallParameters> = Object.freeze({
  amount: 0n,
  assetId: BASE_ASSET_ID,
});

/** Options shared by every call made through a contract handle. */
export interface ContractOptions {
  /**
   * VM address at which script data is loaded. Argument pointers are
   * absolute, so this must match the node. Default: 0
   */
  scriptDataOffset?: number;
  txParams?: Partial<TxParameters>;
  callParams?: Partial<CallParameters>;
}

function checkUnsigned(name: string, value: bigint): bigint {
  if (value < 0n) {
    throw new RangeError(`${name} must not be negative, got ${value}`);
  }
  return value;
}

/** Merge `overrides` onto `base`, validating every value. */
export function resolveTxParameters(
  base: Readonly<TxParameters>,
  overrides: Partial<TxParameters> = {},
): Readonly<TxParameters> {
  return Object.freeze({
    gasPrice: checkUnsigned("gasPrice", overrides.gasPrice ?? base.gasPrice),
    gasLimit: checkUnsigned("gasLimit", overrides.gasLimit ?? base.gasLimit),
    bytePrice: checkUnsigned("bytePrice", overrides.bytePrice ?? base.bytePrice),
    maturity: checkUnsigned("maturity", overrides.maturity ?? base.maturity),
  });
}

export function resolveCallParameters(
  base: Readonly<CallParameters>,
  overrides: Partial<CallParameters> = {},
): Readonly<CallParameters> {
  return Object.freeze({
    amount: checkUnsigned("amount", overrides.amount ?? base.amount),
    assetId: normalizeBytes32(overrides.assetId ?? base.assetId),
  });
}
