// In-process node for tests.
//
// Executes script transactions against contracts written as TypeScript
// handlers and answers with the receipts a real node would produce. The
// script data is decoded exactly as the VM reads it, so argument layout,
// selectors, inputs and variable outputs are all exercised.

import {
  AbiError,
  WORD_SIZE,
  computeSelector,
  decodeArguments,
  decodeWord,
  encodeToken,
  encodingWidth,
  padStart,
  toHex,
  unitToken,
  type MethodSchema,
  type Schema,
  type Token,
} from "@regcall/abi";
import { decodeScriptData, type DecodedScriptData, type NodeTransport } from "@regcall/contract";
import {
  BASE_ASSET_ID,
  CallError,
  PanicReason,
  ZERO_BYTES32,
  normalizeBytes32,
  receiptCall,
  receiptLog,
  receiptLogData,
  receiptPanic,
  receiptReturn,
  receiptReturnData,
  receiptRevert,
  receiptScriptResult,
  receiptTransfer,
  receiptTransferOut,
  type Address,
  type AssetId,
  type ContractId,
  type Receipt,
  type ReceiptPanic,
  type ReceiptRevert,
  type ScriptTransaction,
} from "@regcall/tx";

// ============================================================================
// Contract definitions
// ============================================================================

/**
 * Contract method body. Returning nothing is the same as returning unit.
 */
export type MethodHandler = (ctx: ExecutionContext, args: Token[]) => Token | void;

export interface ContractMethod extends MethodSchema {
  handler: MethodHandler;
}

export interface ContractDefinition {
  methods: readonly ContractMethod[];
  /** Initial storage. */
  storage?: Record<string, Token>;
  /** Initial balances by asset id. */
  balances?: Record<AssetId, bigint>;
}

/** Gas charged per operation. */
export const GasCost = {
  CALL: 1000n,
  STORAGE_WRITE: 50n,
  LOG: 100n,
  TRANSFER: 100n,
} as const;

/** Revert codes the node itself raises. */
export const NodeRevert = {
  UNKNOWN_SELECTOR: 0xffff_ffff_ffff_0001n,
  BAD_ARGUMENTS: 0xffff_ffff_ffff_0002n,
} as const;

export interface MemoryNodeOptions {
  /** Largest gas limit the node accepts. Default: 100_000_000 */
  maxGasPerTx?: bigint;
  /** VM address of the script data. Default: 0 */
  scriptDataOffset?: number;
}

interface DeployedContract {
  methods: Map<string, ContractMethod>;
  bySelector: Map<string, ContractMethod>;
}

interface ContractState {
  storage: Map<string, Token>;
  balances: Map<AssetId, bigint>;
}

interface NodeState {
  contracts: Map<ContractId, ContractState>;
  wallets: Map<Address, Map<AssetId, bigint>>;
}

function cloneState(state: NodeState): NodeState {
  const contracts = new Map<ContractId, ContractState>();
  for (const [id, c] of state.contracts) {
    contracts.set(id, { storage: new Map(c.storage), balances: new Map(c.balances) });
  }
  const wallets = new Map<Address, Map<AssetId, bigint>>();
  for (const [address, balances] of state.wallets) {
    wallets.set(address, new Map(balances));
  }
  return { contracts, wallets };
}

function selectorWord(method: MethodSchema): bigint {
  return decodeWord(computeSelector(method.name, method.inputs.map((f) => f.schema)), 0).value;
}

function returnReceipt(id: ContractId, output: Schema, token: Token): Receipt {
  const data = encodeToken(output, token, "return");
  const width = encodingWidth(output);
  if (width !== null && width <= WORD_SIZE) {
    return receiptReturn(id, decodeWord(padStart(data, WORD_SIZE), 0).value);
  }
  return receiptReturnData(id, data);
}

function isToken(value: Token | void): value is Token {
  return value !== undefined;
}

// ============================================================================
// Execution
// ============================================================================

/** Stops execution; the receipt becomes the failure receipt. */
class ExecutionHalt extends Error {
  constructor(public receipt: ReceiptPanic | ReceiptRevert) {
    super(`execution halted: ${receipt.tag}`);
    this.name = "ExecutionHalt";
  }
}

function halt(receipt: ReceiptPanic | ReceiptRevert): never {
  throw new ExecutionHalt(receipt);
}

class Execution {
  readonly receipts: Receipt[] = [];
  gasUsed = 0n;
  private usedOutputs = new Set<number>();
  private contractInputs: Set<ContractId>;

  constructor(
    private code: Map<ContractId, DeployedContract>,
    readonly state: NodeState,
    private tx: ScriptTransaction,
  ) {
    this.contractInputs = new Set(
      tx.inputs.flatMap((input) => (input.tag === "Contract" ? [input.contractId] : [])),
    );
  }

  charge(id: ContractId, cost: bigint): void {
    this.gasUsed += cost;
    if (this.gasUsed > this.tx.gasLimit) {
      halt(receiptPanic(id, PanicReason.OUT_OF_GAS));
    }
  }

  contractState(id: ContractId): ContractState {
    let state = this.state.contracts.get(id);
    if (!state) {
      state = { storage: new Map(), balances: new Map() };
      this.state.contracts.set(id, state);
    }
    return state;
  }

  private enter(callerId: ContractId, target: ContractId): DeployedContract {
    if (!this.contractInputs.has(target)) {
      halt(receiptPanic(callerId, PanicReason.CONTRACT_NOT_IN_INPUTS));
    }
    const contract = this.code.get(target);
    if (!contract) {
      halt(receiptPanic(callerId, PanicReason.CONTRACT_NOT_FOUND));
    }
    return contract;
  }

  /** The script's call into the target contract. */
  callEntry(script: DecodedScriptData): void {
    const contract = this.enter(ZERO_BYTES32, script.contractId);
    const method = contract.bySelector.get(toHex(script.selector));

    this.receipts.push(
      receiptCall(ZERO_BYTES32, script.contractId, {
        amount: script.amount,
        assetId: script.assetId,
        gas: this.tx.gasLimit - this.gasUsed,
        param1: decodeWord(script.selector, 0).value,
        param2: BigInt(script.argumentBase),
      }),
    );
    this.charge(script.contractId, GasCost.CALL);

    if (!method) {
      halt(receiptRevert(script.contractId, NodeRevert.UNKNOWN_SELECTOR));
    }

    let args: Token[];
    try {
      args = decodeArguments(
        method.inputs.map((f) => f.schema),
        script.args,
        script.argumentBase,
      );
    } catch (e) {
      if (e instanceof AbiError) halt(receiptRevert(script.contractId, NodeRevert.BAD_ARGUMENTS));
      throw e;
    }

    if (script.amount > 0n) {
      this.credit(script.contractId, script.assetId, script.amount);
    }
    this.invoke(script.contractId, ZERO_BYTES32, method, args, script.amount, script.assetId);
  }

  /** A contract calling another contract. */
  callNested(callerId: ContractId, target: ContractId, name: string, args: Token[]): Token {
    const contract = this.enter(callerId, target);
    const method = contract.methods.get(name);
    if (!method) {
      halt(receiptRevert(target, NodeRevert.UNKNOWN_SELECTOR));
    }
    this.receipts.push(
      receiptCall(callerId, target, {
        gas: this.tx.gasLimit - this.gasUsed,
        param1: selectorWord(method),
      }),
    );
    this.charge(target, GasCost.CALL);
    return this.invoke(target, callerId, method, args, 0n, BASE_ASSET_ID);
  }

  private invoke(
    id: ContractId,
    callerId: ContractId,
    method: ContractMethod,
    args: Token[],
    amount: bigint,
    assetId: AssetId,
  ): Token {
    const ctx = new ExecutionContext(this, id, callerId, amount, assetId);
    const returned = method.handler(ctx, args);
    const token = isToken(returned) ? returned : unitToken();
    this.receipts.push(returnReceipt(id, method.output, token));
    return token;
  }

  credit(id: ContractId, assetId: AssetId, amount: bigint): void {
    const balances = this.contractState(id).balances;
    balances.set(assetId, (balances.get(assetId) ?? 0n) + amount);
  }

  debit(id: ContractId, assetId: AssetId, amount: bigint): void {
    const balances = this.contractState(id).balances;
    const balance = balances.get(assetId) ?? 0n;
    if (balance < amount) {
      halt(receiptPanic(id, PanicReason.NOT_ENOUGH_BALANCE));
    }
    balances.set(assetId, balance - amount);
  }

  /** Claim the next unused variable output. */
  claimVariableOutput(id: ContractId): number {
    const index = this.tx.outputs.findIndex(
      (output, i) => output.tag === "Variable" && !this.usedOutputs.has(i),
    );
    if (index < 0) {
      halt(receiptPanic(id, PanicReason.OUTPUT_NOT_FOUND));
    }
    this.usedOutputs.add(index);
    return index;
  }

  hasContractInput(id: ContractId): boolean {
    return this.contractInputs.has(id);
  }
}

/**
 * What a contract handler can do while it runs.
 */
export class ExecutionContext {
  constructor(
    private execution: Execution,
    /** The running contract. */
    readonly contractId: ContractId,
    /** The calling contract, or zero for the script. */
    readonly callerId: ContractId,
    /** Amount forwarded with the call. */
    readonly amount: bigint,
    readonly assetId: AssetId,
  ) {}

  read(key: string): Token | undefined {
    return this.execution.contractState(this.contractId).storage.get(key);
  }

  write(key: string, value: Token): void {
    this.execution.charge(this.contractId, GasCost.STORAGE_WRITE);
    this.execution.contractState(this.contractId).storage.set(key, value);
  }

  balance(assetId: AssetId = BASE_ASSET_ID): bigint {
    return this.execution.contractState(this.contractId).balances.get(assetId) ?? 0n;
  }

  /** Emit a `Log` receipt carrying `value` in its first register. */
  log(value: bigint): void {
    this.execution.charge(this.contractId, GasCost.LOG);
    this.execution.receipts.push(receiptLog(this.contractId, value));
  }

  /** Emit a `LogData` receipt with the encoding of `value`. */
  logData(schema: Schema, value: Token): void {
    this.execution.charge(this.contractId, GasCost.LOG);
    this.execution.receipts.push(receiptLogData(this.contractId, encodeToken(schema, value)));
  }

  /**
   * Send coins to an address. Needs a free variable output; panics with
   * OutputNotFound otherwise.
   */
  transfer(to: Address, amount: bigint, assetId: AssetId = BASE_ASSET_ID): void {
    const recipient = normalizeBytes32(to);
    this.execution.charge(this.contractId, GasCost.TRANSFER);
    this.execution.debit(this.contractId, assetId, amount);
    this.execution.claimVariableOutput(this.contractId);

    const wallets = this.execution.state.wallets;
    const balances = wallets.get(recipient) ?? new Map<AssetId, bigint>();
    balances.set(assetId, (balances.get(assetId) ?? 0n) + amount);
    wallets.set(recipient, balances);

    this.execution.receipts.push(receiptTransferOut(this.contractId, recipient, amount, assetId));
  }

  /** Send coins to another contract, which must be a transaction input. */
  transferToContract(to: ContractId, amount: bigint, assetId: AssetId = BASE_ASSET_ID): void {
    const target = normalizeBytes32(to);
    this.execution.charge(this.contractId, GasCost.TRANSFER);
    if (!this.execution.hasContractInput(target)) {
      halt(receiptPanic(this.contractId, PanicReason.CONTRACT_NOT_IN_INPUTS));
    }
    this.execution.debit(this.contractId, assetId, amount);
    this.execution.credit(target, assetId, amount);
    this.execution.receipts.push(receiptTransfer(this.contractId, target, amount, assetId));
  }

  /** Call a method of another contract and return its result. */
  call(target: ContractId, method: string, args: Token[] = []): Token {
    return this.execution.callNested(this.contractId, normalizeBytes32(target), method, args);
  }

  revert(code: bigint): never {
    halt(receiptRevert(this.contractId, code));
  }
}

// ============================================================================
// Node
// ============================================================================

/**
 * NodeTransport backed by in-memory state.
 *
 * @example
 * ```typescript
 * const node = new MemoryNode();
 * node.deploy(COUNTER_ID, { methods: counterMethods });
 * const counter = new Contract(COUNTER_ID, counterMethods, new Dispatcher(node));
 * ```
 */
export class MemoryNode implements NodeTransport {
  private code = new Map<ContractId, DeployedContract>();
  private state: NodeState = { contracts: new Map(), wallets: new Map() };
  private offline = false;
  private maxGasPerTx: bigint;
  private scriptDataOffset: number;

  /** Committed transactions, successful or not, in submission order. */
  readonly submitted: ScriptTransaction[] = [];

  constructor(options: MemoryNodeOptions = {}) {
    this.maxGasPerTx = options.maxGasPerTx ?? 100_000_000n;
    this.scriptDataOffset = options.scriptDataOffset ?? 0;
  }

  deploy(id: ContractId, definition: ContractDefinition): void {
    const contractId = normalizeBytes32(id);
    const methods = new Map<string, ContractMethod>();
    const bySelector = new Map<string, ContractMethod>();
    for (const method of definition.methods) {
      methods.set(method.name, method);
      bySelector.set(toHex(computeSelector(method.name, method.inputs.map((f) => f.schema))), method);
    }
    this.code.set(contractId, { methods, bySelector });
    this.state.contracts.set(contractId, {
      storage: new Map(Object.entries(definition.storage ?? {})),
      balances: new Map(
        Object.entries(definition.balances ?? {}).map(([asset, amount]) => [normalizeBytes32(asset), amount]),
      ),
    });
  }

  /** While offline, every request fails before reaching the node. */
  setOffline(offline: boolean): void {
    this.offline = offline;
  }

  storage(id: ContractId, key: string): Token | undefined {
    return this.state.contracts.get(normalizeBytes32(id))?.storage.get(key);
  }

  /** Balance of a contract or an address. */
  balanceOf(owner: ContractId | Address, assetId: AssetId = BASE_ASSET_ID): bigint {
    const id = normalizeBytes32(owner);
    const balances = this.state.contracts.get(id)?.balances ?? this.state.wallets.get(id);
    return balances?.get(normalizeBytes32(assetId)) ?? 0n;
  }

  async sendTransaction(tx: ScriptTransaction): Promise<Receipt[]> {
    const script = this.accept(tx);
    this.submitted.push(tx);
    const result = this.execute(tx, script);
    if (result.ok) {
      this.state = result.state;
    }
    return result.receipts;
  }

  async dryRun(tx: ScriptTransaction): Promise<Receipt[]> {
    const script = this.accept(tx);
    return this.execute(tx, script).receipts;
  }

  private accept(tx: ScriptTransaction): DecodedScriptData {
    if (this.offline) {
      throw new Error("node unreachable");
    }
    if (tx.gasLimit > this.maxGasPerTx) {
      throw CallError.validation(`gas limit ${tx.gasLimit} exceeds maximum ${this.maxGasPerTx}`);
    }
    try {
      return decodeScriptData(tx.scriptData, this.scriptDataOffset);
    } catch (e) {
      if (e instanceof AbiError) {
        throw CallError.validation(`malformed script data: ${e.message}`);
      }
      throw e;
    }
  }

  private execute(
    tx: ScriptTransaction,
    script: DecodedScriptData,
  ): { ok: boolean; receipts: Receipt[]; state: NodeState } {
    const execution = new Execution(this.code, cloneState(this.state), tx);
    try {
      execution.callEntry(script);
    } catch (e) {
      if (!(e instanceof ExecutionHalt)) throw e;
      execution.receipts.push(e.receipt, receiptScriptResult(1n, execution.gasUsed));
      return { ok: false, receipts: execution.receipts, state: execution.state };
    }
    execution.receipts.push(receiptScriptResult(0n, execution.gasUsed));
    return { ok: true, receipts: execution.receipts, state: execution.state };
  }
}
