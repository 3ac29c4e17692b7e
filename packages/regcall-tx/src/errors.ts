// Dispatch failures.
//
// Every failure keeps the receipts produced before it, so logs emitted
// up to a revert are still available for diagnostics.

import type { Receipt } from "./types.ts";
import { extractLogs } from "./receipts.ts";

export const CallErrorCode = {
  /** Node unreachable or the request failed in transit; retryable */
  TRANSPORT_FAILURE: "transport_failure",
  /** Node rejected the transaction; retry needs a different transaction */
  VALIDATION_FAILURE: "validation_failure",
  /** Execution reverted or panicked */
  EXECUTION_REVERT: "execution_revert",
} as const;

export type CallErrorCode = (typeof CallErrorCode)[keyof typeof CallErrorCode];

export interface CallErrorOptions {
  receipts?: readonly Receipt[];
  cause?: unknown;
}

export class CallError extends Error {
  readonly code: CallErrorCode;
  readonly receipts: readonly Receipt[];

  constructor(code: CallErrorCode, message: string, options: CallErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CallError";
    this.code = code;
    this.receipts = options.receipts ?? [];
  }

  /** Logs captured before the failure, in execution order. */
  get logs(): string[] {
    return extractLogs(this.receipts);
  }

  get retryable(): boolean {
    return this.code === CallErrorCode.TRANSPORT_FAILURE;
  }

  isTransportFailure(): boolean {
    return this.code === CallErrorCode.TRANSPORT_FAILURE;
  }

  isValidationFailure(): boolean {
    return this.code === CallErrorCode.VALIDATION_FAILURE;
  }

  isRevert(): boolean {
    return this.code === CallErrorCode.EXECUTION_REVERT;
  }

  static transport(cause: unknown): CallError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new CallError(CallErrorCode.TRANSPORT_FAILURE, `Transport failure: ${detail}`, { cause });
  }

  static validation(message: string, receipts: readonly Receipt[] = []): CallError {
    return new CallError(CallErrorCode.VALIDATION_FAILURE, `Validation failure: ${message}`, {
      receipts,
    });
  }

  static revert(message: string, receipts: readonly Receipt[]): CallError {
    return new CallError(CallErrorCode.EXECUTION_REVERT, `Execution reverted: ${message}`, {
      receipts,
    });
  }
}
