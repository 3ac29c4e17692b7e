// Script transaction assembly.

import {
  inputContract,
  outputContract,
  outputVariable,
  type ContractId,
  type Input,
  type Output,
  type ScriptTransaction,
} from "@regcall/tx";

import type { CallDescriptor } from "./call_descriptor.ts";
import { encodeScriptData } from "./call_descriptor.ts";

/**
 * Contracts the transaction must declare: the target first, then each
 * dependency once.
 */
export function contractInputs(descriptor: CallDescriptor): ContractId[] {
  const ids: ContractId[] = [descriptor.contractId];
  for (const id of descriptor.dependencies) {
    if (!ids.includes(id)) ids.push(id);
  }
  return ids;
}

/**
 * Build the unsigned transaction for a call.
 *
 * @param script - Call script bytecode; it reads the script data and
 *   performs the call. Supplied by the chain integration.
 */
export function buildScriptTransaction(
  descriptor: CallDescriptor,
  script: Uint8Array = new Uint8Array(0),
): ScriptTransaction {
  const ids = contractInputs(descriptor);
  const inputs: Input[] = ids.map((id) => inputContract(id));
  const outputs: Output[] = ids.map((_, i) => outputContract(i));
  for (let i = 0; i < descriptor.variableOutputs; i++) {
    outputs.push(outputVariable());
  }

  return {
    gasPrice: descriptor.txParams.gasPrice,
    gasLimit: descriptor.txParams.gasLimit,
    bytePrice: descriptor.txParams.bytePrice,
    maturity: descriptor.txParams.maturity,
    script: script.slice(),
    scriptData: encodeScriptData(descriptor),
    inputs,
    outputs,
    witnesses: [],
  };
}
