// Caller abstraction for contract calls.
//
// A Caller takes an encoded call descriptor and a dispatch mode and
// returns the decoded response. Middleware is composed with with().

import createDebug from "debug";

import type { CallDescriptor } from "./call_descriptor.ts";
import type { CallResponse } from "./extractor.ts";
import type { ClientMiddleware, ClientContext, CallRequest, CallOutcome } from "./middleware.ts";
import { Extensions, RejectionError } from "./middleware.ts";
import type { DispatchMode } from "./transport.ts";

const log = createDebug("regcall:dispatch");

export interface CallerRequest {
  descriptor: CallDescriptor;
  mode: DispatchMode;
}

/**
 * Caller interface used by call builders.
 */
export interface Caller {
  /**
   * Dispatch a call.
   *
   * @throws CallError for transport, validation and execution failures
   * @throws AbiError when the return payload does not match the output schema
   */
  call(request: CallerRequest): Promise<CallResponse>;

  /**
   * Wrap this caller with middleware.
   *
   * Middleware is applied in order: first added runs first on pre,
   * and last on post (onion model).
   */
  with(middleware: ClientMiddleware): Caller;
}

/**
 * Caller implementation that applies middleware around another Caller.
 */
export class MiddlewareCaller implements Caller {
  private inner: Caller;
  private middlewares: ClientMiddleware[];

  constructor(inner: Caller, middlewares: ClientMiddleware[]) {
    this.inner = inner;
    this.middlewares = middlewares;
  }

  async call(request: CallerRequest): Promise<CallResponse> {
    const ctx: ClientContext = {
      extensions: new Extensions(),
    };

    const callRequest: CallRequest = {
      method: request.descriptor.method,
      contractId: request.descriptor.contractId,
      mode: request.mode,
      args: request.descriptor.args,
      descriptor: request.descriptor,
    };

    for (const mw of this.middlewares) {
      if (mw.pre) {
        const rejection = await mw.pre(ctx, callRequest);
        if (rejection) {
          const error = RejectionError.from(rejection);
          await this.runPostHooks(ctx, callRequest, { ok: false, error });
          throw error;
        }
      }
    }

    let value: CallResponse;

    try {
      value = await this.inner.call(request);
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      await this.runPostHooks(ctx, callRequest, { ok: false, error });
      throw e;
    }

    await this.runPostHooks(ctx, callRequest, { ok: true, value });

    return value;
  }

  private async runPostHooks(
    ctx: ClientContext,
    request: CallRequest,
    outcome: CallOutcome,
  ): Promise<void> {
    // Reverse order (onion model); every hook runs even if one throws.
    for (let i = this.middlewares.length - 1; i >= 0; i--) {
      const mw = this.middlewares[i];
      if (mw.post) {
        try {
          await mw.post(ctx, request, outcome);
        } catch (e) {
          log("post hook failed for %s: %O", request.method, e);
        }
      }
    }
  }

  with(middleware: ClientMiddleware): Caller {
    return new MiddlewareCaller(this.inner, [...this.middlewares, middleware]);
  }
}
