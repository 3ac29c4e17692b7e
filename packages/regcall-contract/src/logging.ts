// Logging middleware for contract callers.
//
// Logs each call with timing information through the `debug` package.
// Enable with DEBUG=regcall:* (or the configured namespace).

import createDebug from "debug";
import { AbiError, formatToken } from "@regcall/abi";
import { CallError } from "@regcall/tx";

import type { ClientMiddleware, ClientContext, CallRequest, CallOutcome } from "./middleware.ts";

const START_TIME = Symbol("logging:start-time");

/** Receives one log line and its structured payload. */
export type LogSink = (message: string, data: Record<string, unknown>) => void;

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "regcall:call".
   */
  namespace?: string;

  /**
   * Log request arguments. Defaults to true.
   */
  logArgs?: boolean;

  /**
   * Log return values. Defaults to true.
   */
  logResults?: boolean;

  /**
   * Log the receipt list. Defaults to false (it can be long).
   */
  logReceipts?: boolean;

  /**
   * Minimum duration (ms) to log. Calls faster than this are skipped.
   * Defaults to 0 (log all calls).
   */
  minDuration?: number;

  /**
   * Replaces the debug logger. Every call is logged when set.
   */
  sink?: LogSink;
}

/**
 * Create a logging middleware that logs every call with timing information.
 *
 * Logs structured objects:
 * - Request: { type: "request", method, contractId, mode, args? }
 * - Response: { type: "response", method, duration, ok, result?, logs, receipts? }
 *
 * @example
 * ```typescript
 * const caller = new Dispatcher(transport).with(loggingMiddleware());
 * await counter.connect(caller).method("increment").commit();
 * ```
 */
export function loggingMiddleware(options: LoggingOptions = {}): ClientMiddleware {
  const logArgs = options.logArgs ?? true;
  const logResults = options.logResults ?? true;
  const logReceipts = options.logReceipts ?? false;
  const minDuration = options.minDuration ?? 0;

  const debugLog = createDebug(options.namespace ?? "regcall:call");
  const sink = options.sink;
  const enabled = (): boolean => sink !== undefined || debugLog.enabled;
  const emit: LogSink = sink ?? ((message, data) => debugLog("%s %O", message, data));

  return {
    pre(ctx: ClientContext, request: CallRequest): void {
      ctx.extensions.set(START_TIME, performance.now());

      if (!enabled()) return;

      const logObj: Record<string, unknown> = {
        type: "request",
        method: request.method,
        contractId: request.contractId,
        mode: request.mode,
      };

      if (logArgs && request.args.length > 0) {
        logObj.args = request.args.map(formatToken);
      }

      emit(`→ ${request.method}`, logObj);
    },

    post(ctx: ClientContext, request: CallRequest, outcome: CallOutcome): void {
      const startTime = ctx.extensions.get<number>(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;
      if (!enabled()) return;

      const logObj: Record<string, unknown> = {
        type: "response",
        method: request.method,
        mode: request.mode,
        duration: `${duration.toFixed(2)}ms`,
      };

      if (outcome.ok) {
        logObj.ok = true;
        if (logResults) {
          logObj.result = formatToken(outcome.value.token);
        }
        logObj.logs = outcome.value.logs;
        if (logReceipts) {
          logObj.receipts = outcome.value.receipts;
        }
        emit(`← ${request.method}: ✓ ${duration.toFixed(2)}ms`, logObj);
        return;
      }

      logObj.ok = false;
      const error = outcome.error;

      if (error instanceof CallError) {
        logObj.errorCode = error.code;
        logObj.error = error.message;
        logObj.logs = error.logs;
        if (logReceipts) {
          logObj.receipts = error.receipts;
        }
      } else if (error instanceof AbiError) {
        logObj.errorCode = error.code;
        logObj.error = error.message;
        logObj.path = error.path;
      } else {
        logObj.error = { name: error.name, message: error.message };
      }

      emit(`← ${request.method}: ✗ ${duration.toFixed(2)}ms`, logObj);
    },
  };
}
