import { describe, it, expect } from "vitest";
import { AbiErrorCode, boolToken, u64Token, type MethodSchema } from "@regcall/abi";

import type { Caller, CallerRequest } from "./caller.ts";
import { MiddlewareCaller } from "./caller.ts";
import { callContract } from "./contract.ts";
import type { CallResponse } from "./extractor.ts";
import type { ClientMiddleware } from "./middleware.ts";

const TARGET = "0x" + "55".repeat(32);
const DEP_A = "0x" + "66".repeat(32);
const DEP_B = "0x" + "77".repeat(32);

const withdraw: MethodSchema = {
  name: "withdraw",
  inputs: [{ name: "amount", schema: { kind: "u64" } }],
  output: { kind: "unit" },
};

class RecordingCaller implements Caller {
  requests: CallerRequest[] = [];

  async call(request: CallerRequest): Promise<CallResponse> {
    this.requests.push(request);
    return { value: undefined, token: { kind: "unit" }, receipts: [], logs: [] };
  }

  with(middleware: ClientMiddleware): Caller {
    return new MiddlewareCaller(this, [middleware]);
  }
}

function builder(caller: Caller = new RecordingCaller()) {
  return callContract(caller, TARGET, withdraw, [u64Token(10)]);
}

describe("ContractCallBuilder", () => {
  it("starts from the defaults", () => {
    const descriptor = builder().build();
    expect(descriptor.txParams).toEqual({ gasPrice: 0n, gasLimit: 1_000_000n, bytePrice: 0n, maturity: 0n });
    expect(descriptor.callParams).toEqual({ amount: 0n, assetId: "0x" + "00".repeat(32) });
    expect(descriptor.variableOutputs).toBe(0);
    expect(descriptor.dependencies).toEqual([]);
  });

  it("returns a new builder from every modifier", () => {
    const base = builder();
    const configured = base.appendVariableOutputs(1).txParams({ gasLimit: 5n });

    expect(base.build().variableOutputs).toBe(0);
    expect(base.build().txParams.gasLimit).toBe(1_000_000n);
    expect(configured.build().variableOutputs).toBe(1);
    expect(configured.build().txParams.gasLimit).toBe(5n);
  });

  it("merges parameter overrides", () => {
    const descriptor = builder()
      .txParams({ gasPrice: 2n })
      .txParams({ maturity: 9n })
      .callParams({ amount: 100n, assetId: "AA".repeat(32) })
      .build();

    expect(descriptor.txParams).toEqual({ gasPrice: 2n, gasLimit: 1_000_000n, bytePrice: 0n, maturity: 9n });
    expect(descriptor.callParams).toEqual({ amount: 100n, assetId: "0x" + "aa".repeat(32) });
  });

  it("accumulates variable outputs", () => {
    expect(builder().appendVariableOutputs(2).appendVariableOutputs(1).build().variableOutputs).toBe(3);
  });

  it("rejects invalid configuration immediately", () => {
    expect(() => builder().appendVariableOutputs(-1)).toThrow(RangeError);
    expect(() => builder().appendVariableOutputs(1.5)).toThrow(RangeError);
    expect(() => builder().txParams({ gasLimit: -1n })).toThrow("gasLimit must not be negative, got -1");
    expect(() => builder().withDependencies("0x1234")).toThrow("invalid 32-byte id: 0x1234");
  });

  it("normalizes and deduplicates dependencies", () => {
    const descriptor = builder()
      .withDependencies(DEP_A, "77".repeat(32))
      .withDependencies("0X" + "66".repeat(32), DEP_B)
      .build();
    expect(descriptor.dependencies).toEqual([DEP_A, DEP_B]);
  });

  it("dispatches the same descriptor in either mode", async () => {
    const caller = new RecordingCaller();
    const configured = builder(caller).appendVariableOutputs(1);

    await configured.simulate();
    await configured.commit();

    expect(caller.requests.map((r) => r.mode)).toEqual(["simulate", "commit"]);
    expect(caller.requests[0].descriptor).toEqual(caller.requests[1].descriptor);
  });

  it("surfaces argument errors when the call is dispatched", async () => {
    const caller = new RecordingCaller();
    const bad = callContract(caller, TARGET, withdraw, [boolToken(true)]);

    await expect(bad.commit()).rejects.toMatchObject({ code: AbiErrorCode.SCHEMA_MISMATCH });
    expect(caller.requests).toHaveLength(0);
  });
});
