// Immutable builder for a single contract call.

import type { MethodSchema, Token } from "@regcall/abi";
import { normalizeBytes32, type ContractId } from "@regcall/tx";

import type { Caller } from "./caller.ts";
import { createCallDescriptor, type CallDescriptor } from "./call_descriptor.ts";
import {
  resolveCallParameters,
  resolveTxParameters,
  type CallParameters,
  type TxParameters,
} from "./config.ts";
import type { CallResponse } from "./extractor.ts";
import type { DispatchMode } from "./transport.ts";

export interface BuilderState {
  readonly contractId: ContractId;
  readonly method: MethodSchema;
  readonly args: readonly Token[];
  readonly txParams: Readonly<TxParameters>;
  readonly callParams: Readonly<CallParameters>;
  readonly variableOutputs: number;
  readonly dependencies: readonly ContractId[];
  readonly scriptDataOffset: number;
}

/**
 * Configures one call. Every modifier returns a new builder, so a
 * builder can be shared and reused.
 *
 * @example
 * ```typescript
 * const response = await wallet
 *   .method("withdraw", 10n)
 *   .appendVariableOutputs(1)
 *   .txParams({ gasLimit: 2_000_000n })
 *   .commit();
 * ```
 */
export class ContractCallBuilder {
  private readonly caller: Caller;
  private readonly state: BuilderState;

  constructor(caller: Caller, state: BuilderState) {
    this.caller = caller;
    this.state = state;
  }

  private next(changes: Partial<BuilderState>): ContractCallBuilder {
    return new ContractCallBuilder(this.caller, { ...this.state, ...changes });
  }

  txParams(params: Partial<TxParameters>): ContractCallBuilder {
    return this.next({ txParams: resolveTxParameters(this.state.txParams, params) });
  }

  /** Amount and asset forwarded to the called contract. */
  callParams(params: Partial<CallParameters>): ContractCallBuilder {
    return this.next({ callParams: resolveCallParameters(this.state.callParams, params) });
  }

  /**
   * Reserve `count` more variable outputs, one per transfer to an
   * address the contract makes.
   */
  appendVariableOutputs(count: number): ContractCallBuilder {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new RangeError(`variable output count must be a non-negative integer, got ${count}`);
    }
    return this.next({ variableOutputs: this.state.variableOutputs + count });
  }

  /** Declare contracts the target calls into. */
  withDependencies(...ids: ContractId[]): ContractCallBuilder {
    const dependencies = [...this.state.dependencies];
    for (const id of ids.map(normalizeBytes32)) {
      if (!dependencies.includes(id)) dependencies.push(id);
    }
    return this.next({ dependencies });
  }

  build(): CallDescriptor {
    return createCallDescriptor(this.state);
  }

  /** Submit the call; state changes persist. */
  commit(): Promise<CallResponse> {
    return this.dispatch("commit");
  }

  /** Dry-run the call; nothing persists. */
  simulate(): Promise<CallResponse> {
    return this.dispatch("simulate");
  }

  private async dispatch(mode: DispatchMode): Promise<CallResponse> {
    return this.caller.call({ descriptor: this.build(), mode });
  }
}
