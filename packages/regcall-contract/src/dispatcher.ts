// Dispatcher: turns call descriptors into transactions, submits them and
// classifies the outcome.

import createDebug from "debug";
import { CallError, describeFailure, findExecutionFailure, type Receipt } from "@regcall/tx";

import type { Caller, CallerRequest } from "./caller.ts";
import { MiddlewareCaller } from "./caller.ts";
import { extractResponse, type CallResponse } from "./extractor.ts";
import type { ClientMiddleware } from "./middleware.ts";
import { buildScriptTransaction } from "./transaction.ts";
import type { NodeTransport, TransactionSigner } from "./transport.ts";

const log = createDebug("regcall:dispatch");

export interface DispatcherOptions {
  /** Signs committing transactions. Dry runs are never signed. */
  signer?: TransactionSigner;
  /** Call script bytecode placed in every transaction. Default: empty */
  callScript?: Uint8Array;
}

/**
 * The terminal Caller: one transaction per call, no retries.
 */
export class Dispatcher implements Caller {
  private transport: NodeTransport;
  private signer?: TransactionSigner;
  private callScript: Uint8Array;

  constructor(transport: NodeTransport, options: DispatcherOptions = {}) {
    this.transport = transport;
    this.signer = options.signer;
    this.callScript = options.callScript ?? new Uint8Array(0);
  }

  async call(request: CallerRequest): Promise<CallResponse> {
    const { descriptor, mode } = request;
    let tx = buildScriptTransaction(descriptor, this.callScript);

    log(
      "%s %s on %s (%d inputs, %d outputs)",
      mode,
      descriptor.method,
      descriptor.contractId,
      tx.inputs.length,
      tx.outputs.length,
    );

    // Signing failures are not transport failures; they propagate as thrown.
    if (mode === "commit" && this.signer) {
      tx = await this.signer.sign(tx);
    }

    let receipts: Receipt[];
    try {
      if (mode === "commit") {
        receipts = await this.transport.sendTransaction(tx);
      } else {
        receipts = await this.transport.dryRun(tx);
      }
    } catch (e) {
      if (e instanceof CallError) throw e;
      log("transport failed for %s: %O", descriptor.method, e);
      throw CallError.transport(e);
    }

    const failure = findExecutionFailure(receipts);
    if (failure) {
      log("%s failed: %s", descriptor.method, describeFailure(failure));
      throw CallError.revert(describeFailure(failure), receipts);
    }

    return extractResponse(receipts, descriptor.contractId, descriptor.output);
  }

  with(middleware: ClientMiddleware): Caller {
    return new MiddlewareCaller(this, [middleware]);
  }
}
