import { describe, it, expect } from "vitest";
import { u64Token, type MethodSchema } from "@regcall/abi";
import {
  CallError,
  CallErrorCode,
  PanicReason,
  ZERO_BYTES32,
  receiptCall,
  receiptLog,
  receiptPanic,
  receiptReturn,
  receiptRevert,
  receiptScriptResult,
  type Receipt,
  type ScriptTransaction,
} from "@regcall/tx";

import { callContract } from "./contract.ts";
import { Dispatcher } from "./dispatcher.ts";
import type { ClientMiddleware } from "./middleware.ts";
import type { NodeTransport, TransactionSigner } from "./transport.ts";

const TARGET = "0x" + "11".repeat(32);

const getCount: MethodSchema = {
  name: "get_count",
  inputs: [],
  output: { kind: "u64" },
};

const addCount: MethodSchema = {
  name: "add_count",
  inputs: [{ name: "amount", schema: { kind: "u64" } }],
  output: { kind: "u64" },
};

type Responder = (tx: ScriptTransaction) => Receipt[];

class StubTransport implements NodeTransport {
  sent: ScriptTransaction[] = [];
  dryRuns: ScriptTransaction[] = [];

  constructor(private respond: Responder) {}

  async sendTransaction(tx: ScriptTransaction): Promise<Receipt[]> {
    this.sent.push(tx);
    return this.respond(tx);
  }

  async dryRun(tx: ScriptTransaction): Promise<Receipt[]> {
    this.dryRuns.push(tx);
    return this.respond(tx);
  }
}

class FailingTransport implements NodeTransport {
  constructor(private error: unknown) {}

  async sendTransaction(): Promise<Receipt[]> {
    throw this.error;
  }

  async dryRun(): Promise<Receipt[]> {
    throw this.error;
  }
}

const witnessSigner: TransactionSigner = {
  async sign(tx) {
    return { ...tx, witnesses: [new Uint8Array([0xaa])] };
  },
};

function returning(val: bigint): Responder {
  return () => [receiptCall(ZERO_BYTES32, TARGET), receiptReturn(TARGET, val), receiptScriptResult(0n, 50n)];
}

async function captureCallError(promise: Promise<unknown>): Promise<CallError> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof CallError) return e;
    throw e;
  }
  throw new Error("expected a CallError");
}

describe("Dispatcher", () => {
  it("dry-runs simulated calls without signing", async () => {
    const transport = new StubTransport(returning(7n));
    const dispatcher = new Dispatcher(transport, { signer: witnessSigner });

    const response = await callContract(dispatcher, TARGET, getCount, []).simulate();

    expect(response.value).toBe(7n);
    expect(transport.sent).toHaveLength(0);
    expect(transport.dryRuns).toHaveLength(1);
    expect(transport.dryRuns[0].witnesses).toEqual([]);
  });

  it("signs and submits committed calls", async () => {
    const transport = new StubTransport(returning(8n));
    const dispatcher = new Dispatcher(transport, { signer: witnessSigner });

    const response = await callContract(dispatcher, TARGET, addCount, [u64Token(1)]).commit();

    expect(response.value).toBe(8n);
    expect(transport.dryRuns).toHaveLength(0);
    expect(transport.sent).toHaveLength(1);
    expect(transport.sent[0].witnesses).toEqual([new Uint8Array([0xaa])]);
  });

  it("places the call script in the transaction", async () => {
    const transport = new StubTransport(returning(0n));
    const dispatcher = new Dispatcher(transport, { callScript: new Uint8Array([9, 9]) });

    await callContract(dispatcher, TARGET, getCount, []).simulate();

    expect(Array.from(transport.dryRuns[0].script)).toEqual([9, 9]);
  });

  it("turns a revert into an execution failure that keeps the receipts", async () => {
    const receipts = [
      receiptCall(ZERO_BYTES32, TARGET),
      receiptLog(TARGET, 0x10n),
      receiptRevert(TARGET, 42n),
      receiptScriptResult(1n, 70n),
    ];
    const dispatcher = new Dispatcher(new StubTransport(() => receipts));

    const error = await captureCallError(callContract(dispatcher, TARGET, getCount, []).commit());

    expect(error.code).toBe(CallErrorCode.EXECUTION_REVERT);
    expect(error.message).toBe(`Execution reverted: ${TARGET} reverted with 0x2a`);
    expect(error.receipts).toEqual(receipts);
    expect(error.logs).toEqual(["0x0000000000000010"]);
    expect(error.retryable).toBe(false);
  });

  it("names the panic reason", async () => {
    const dispatcher = new Dispatcher(
      new StubTransport(() => [receiptPanic(TARGET, PanicReason.OUTPUT_NOT_FOUND)]),
    );

    const error = await captureCallError(callContract(dispatcher, TARGET, getCount, []).simulate());

    expect(error.isRevert()).toBe(true);
    expect(error.message).toBe(`Execution reverted: ${TARGET} panicked: OutputNotFound`);
  });

  it("treats a non-zero script result as a failure", async () => {
    const dispatcher = new Dispatcher(new StubTransport(() => [receiptScriptResult(3n, 1n)]));

    const error = await captureCallError(callContract(dispatcher, TARGET, getCount, []).simulate());

    expect(error.message).toBe("Execution reverted: script failed with result 3");
  });

  it("wraps transport errors as retryable transport failures", async () => {
    const cause = new Error("connection refused");
    const dispatcher = new Dispatcher(new FailingTransport(cause));

    const error = await captureCallError(callContract(dispatcher, TARGET, getCount, []).commit());

    expect(error.code).toBe(CallErrorCode.TRANSPORT_FAILURE);
    expect(error.message).toBe("Transport failure: connection refused");
    expect(error.retryable).toBe(true);
    expect(error.cause).toBe(cause);
  });

  it("propagates signer errors without submitting", async () => {
    const transport = new StubTransport(returning(1n));
    const cause = new Error("key locked");
    const dispatcher = new Dispatcher(transport, {
      signer: {
        async sign() {
          throw cause;
        },
      },
    });

    await expect(callContract(dispatcher, TARGET, getCount, []).commit()).rejects.toBe(cause);
    expect(transport.sent).toHaveLength(0);
  });

  it("passes node rejections through unchanged", async () => {
    const rejection = CallError.validation("gas limit 5 exceeds maximum 1");
    const dispatcher = new Dispatcher(new FailingTransport(rejection));

    const error = await captureCallError(callContract(dispatcher, TARGET, getCount, []).commit());

    expect(error).toBe(rejection);
    expect(error.isValidationFailure()).toBe(true);
  });

  it("runs middleware added with with()", async () => {
    const seen: string[] = [];
    const middleware: ClientMiddleware = {
      pre(_ctx, request) {
        seen.push(`pre ${request.method} ${request.mode}`);
      },
      post(_ctx, request, outcome) {
        seen.push(`post ${request.method} ${outcome.ok}`);
      },
    };
    const caller = new Dispatcher(new StubTransport(returning(1n))).with(middleware);

    await callContract(caller, TARGET, getCount, []).simulate();

    expect(seen).toEqual(["pre get_count simulate", "post get_count true"]);
  });
});
