// Contract handles: typed entry points over the call builder.

import { AbiError, AbiErrorCode, tokenize, type MethodSchema, type Token } from "@regcall/abi";
import { normalizeBytes32, type ContractId } from "@regcall/tx";

import type { Caller } from "./caller.ts";
import { ContractCallBuilder } from "./call_builder.ts";
import {
  DEFAULT_CALL_PARAMETERS,
  DEFAULT_TX_PARAMETERS,
  resolveCallParameters,
  resolveTxParameters,
  type ContractOptions,
} from "./config.ts";

/**
 * Start a call from already-built tokens.
 */
export function callContract(
  caller: Caller,
  contractId: ContractId,
  method: MethodSchema,
  args: readonly Token[],
  options: ContractOptions = {},
): ContractCallBuilder {
  return new ContractCallBuilder(caller, {
    contractId: normalizeBytes32(contractId),
    method,
    args: [...args],
    txParams: resolveTxParameters(DEFAULT_TX_PARAMETERS, options.txParams),
    callParams: resolveCallParameters(DEFAULT_CALL_PARAMETERS, options.callParams),
    variableOutputs: 0,
    dependencies: [],
    scriptDataOffset: options.scriptDataOffset ?? 0,
  });
}

/**
 * A deployed contract and the methods it exposes.
 *
 * Arguments are plain JavaScript values (bigints for u64, hex strings for
 * b256, `{ tag, value }` for enums) and are checked against the method's
 * input schemas.
 */
export class Contract {
  readonly id: ContractId;
  private readonly methods: Map<string, MethodSchema>;
  private readonly caller: Caller;
  private readonly options: ContractOptions;

  constructor(
    id: ContractId,
    methods: readonly MethodSchema[],
    caller: Caller,
    options: ContractOptions = {},
  ) {
    this.id = normalizeBytes32(id);
    this.methods = new Map(methods.map((m) => [m.name, m]));
    this.caller = caller;
    this.options = options;
  }

  /** Names of the methods this handle knows about. */
  methodNames(): string[] {
    return [...this.methods.keys()];
  }

  method(name: string, ...args: unknown[]): ContractCallBuilder {
    const method = this.methods.get(name);
    if (!method) {
      throw new Error(`unknown method: ${name}`);
    }
    if (args.length !== method.inputs.length) {
      throw new AbiError(
        AbiErrorCode.SCHEMA_MISMATCH,
        `${name} takes ${method.inputs.length} arguments, got ${args.length}`,
        { path: name },
      );
    }
    const tokens = method.inputs.map((input, i) => tokenize(input.schema, args[i], input.name));
    return callContract(this.caller, this.id, method, tokens, this.options);
  }

  /** Same contract, dispatched through another caller. */
  connect(caller: Caller): Contract {
    return new Contract(this.id, [...this.methods.values()], caller, this.options);
  }
}
