// ABI schemas of the transaction encoding.

import type { EnumSchema, StructSchema } from "@regcall/abi";

/**
 * Fixed-size transaction header. The blobs, inputs, outputs and
 * witnesses it counts follow it in that order.
 */
export const ScriptHeaderSchema: StructSchema = {
  kind: "struct",
  name: "ScriptHeader",
  fields: [
    { name: "gasPrice", schema: { kind: "u64" } },
    { name: "gasLimit", schema: { kind: "u64" } },
    { name: "bytePrice", schema: { kind: "u64" } },
    { name: "maturity", schema: { kind: "u64" } },
    { name: "scriptLength", schema: { kind: "u64" } },
    { name: "scriptDataLength", schema: { kind: "u64" } },
    { name: "inputsCount", schema: { kind: "u64" } },
    { name: "outputsCount", schema: { kind: "u64" } },
    { name: "witnessesCount", schema: { kind: "u64" } },
  ],
};

// ============================================================================
// Inputs
// ============================================================================

export const InputCoinSchema: StructSchema = {
  kind: "struct",
  name: "InputCoin",
  fields: [
    { name: "utxoId", schema: { kind: "b256" } },
    { name: "outputIndex", schema: { kind: "u8" } },
    { name: "owner", schema: { kind: "b256" } },
    { name: "amount", schema: { kind: "u64" } },
    { name: "assetId", schema: { kind: "b256" } },
    { name: "witnessIndex", schema: { kind: "u8" } },
    { name: "maturity", schema: { kind: "u64" } },
  ],
};

export const InputContractSchema: StructSchema = {
  kind: "struct",
  name: "InputContract",
  fields: [
    { name: "utxoId", schema: { kind: "b256" } },
    { name: "contractId", schema: { kind: "b256" } },
  ],
};

/** Variant names match the `tag` of each {@link Input}. */
export const InputSchema: EnumSchema = {
  kind: "enum",
  name: "Input",
  variants: [
    { name: "Coin", schema: InputCoinSchema },
    { name: "Contract", schema: InputContractSchema },
  ],
};

// ============================================================================
// Outputs
// ============================================================================

export const OutputCoinSchema: StructSchema = {
  kind: "struct",
  name: "OutputCoin",
  fields: [
    { name: "to", schema: { kind: "b256" } },
    { name: "amount", schema: { kind: "u64" } },
    { name: "assetId", schema: { kind: "b256" } },
  ],
};

export const OutputContractSchema: StructSchema = {
  kind: "struct",
  name: "OutputContract",
  fields: [{ name: "inputIndex", schema: { kind: "u8" } }],
};

export const OutputChangeSchema: StructSchema = {
  kind: "struct",
  name: "OutputChange",
  fields: [
    { name: "to", schema: { kind: "b256" } },
    { name: "assetId", schema: { kind: "b256" } },
  ],
};

export const OutputVariableSchema: StructSchema = {
  kind: "struct",
  name: "OutputVariable",
  fields: [
    { name: "to", schema: { kind: "b256" } },
    { name: "amount", schema: { kind: "u64" } },
    { name: "assetId", schema: { kind: "b256" } },
  ],
};

/** Variant names match the `tag` of each {@link Output}. */
export const OutputSchema: EnumSchema = {
  kind: "enum",
  name: "Output",
  variants: [
    { name: "Coin", schema: OutputCoinSchema },
    { name: "Contract", schema: OutputContractSchema },
    { name: "Change", schema: OutputChangeSchema },
    { name: "Variable", schema: OutputVariableSchema },
  ],
};
