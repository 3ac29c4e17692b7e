// Client-side middleware for contract calls.
//
// Middleware observes calls before they are dispatched and after their
// outcome is known, enabling logging, tracing, metrics and policy checks
// (for example refusing to commit above a gas budget).

import type { ContractId } from "@regcall/tx";
import type { Token } from "@regcall/abi";
import type { CallDescriptor } from "./call_descriptor.ts";
import type { CallResponse } from "./extractor.ts";
import type { DispatchMode } from "./transport.ts";

/**
 * Extensions provide type-safe, symbol-keyed storage for middleware state.
 *
 * @example
 * ```typescript
 * const START = Symbol("start");
 * ctx.extensions.set(START, performance.now());
 * const start = ctx.extensions.get<number>(START);
 * ```
 */
export class Extensions {
  private data = new Map<symbol, unknown>();

  set<T>(key: symbol, value: T): void {
    this.data.set(key, value);
  }

  get<T>(key: symbol): T | undefined {
    return this.data.get(key) as T | undefined;
  }

  has(key: symbol): boolean {
    return this.data.has(key);
  }

  delete(key: symbol): boolean {
    return this.data.delete(key);
  }
}

/**
 * Context passed to middleware hooks; lives for a single call.
 */
export interface ClientContext {
  extensions: Extensions;
}

/**
 * An outgoing contract call as seen by middleware. Read-only: the
 * descriptor is already encoded.
 */
export interface CallRequest {
  readonly method: string;
  readonly contractId: ContractId;
  readonly mode: DispatchMode;
  readonly args: readonly Token[];
  readonly descriptor: CallDescriptor;
}

export type CallOutcome =
  | { ok: true; value: CallResponse }
  | { ok: false; error: Error };

export type RejectionCode =
  | "permission-denied"
  | "budget-exceeded"
  | "invalid-request"
  | "internal"
  | string;

/**
 * Rejection returned by middleware to abort a call before dispatch.
 */
export interface Rejection {
  code: RejectionCode;
  message: string;
}

/**
 * Error thrown when middleware rejects a call.
 */
export class RejectionError extends Error {
  public readonly code: RejectionCode;

  constructor(rejection: Rejection) {
    super(rejection.message);
    this.name = "RejectionError";
    this.code = rejection.code;
  }

  static from(rejection: Rejection): RejectionError {
    return new RejectionError(rejection);
  }
}

/**
 * Client middleware interface.
 *
 * @example
 * ```typescript
 * const noCommits: ClientMiddleware = {
 *   pre(ctx, request) {
 *     if (request.mode === "commit") {
 *       return { code: "permission-denied", message: "read-only session" };
 *     }
 *   },
 * };
 * ```
 */
export interface ClientMiddleware {
  /**
   * Called before dispatch. Return a Rejection to abort the call.
   */
  pre?(ctx: ClientContext, request: CallRequest): Promise<Rejection | void> | Rejection | void;

  /**
   * Called once the outcome is known. Errors thrown here are logged and
   * do not affect the call.
   */
  post?(ctx: ClientContext, request: CallRequest, outcome: CallOutcome): Promise<void> | void;
}
