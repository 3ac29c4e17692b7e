// Helpers for reading execution receipts.

import { encodeWord, toHex } from "@regcall/abi";
import type { Receipt, ReceiptPanic, ReceiptRevert, ReceiptScriptResult } from "./types.ts";
import { panicReasonName } from "./types.ts";

/**
 * Log entries in execution order: a `Log` receipt yields the hex word of
 * its `ra` register, a `LogData` receipt the hex of its data.
 */
export function extractLogs(receipts: readonly Receipt[]): string[] {
  const logs: string[] = [];
  for (const receipt of receipts) {
    if (receipt.tag === "Log") {
      logs.push(toHex(encodeWord(receipt.ra)));
    } else if (receipt.tag === "LogData") {
      logs.push(toHex(receipt.data));
    }
  }
  return logs;
}

export type ExecutionFailure = ReceiptRevert | ReceiptPanic | ReceiptScriptResult;

/**
 * First receipt showing that execution did not complete: a revert, a
 * panic, or a non-zero script result.
 */
export function findExecutionFailure(receipts: readonly Receipt[]): ExecutionFailure | undefined {
  for (const receipt of receipts) {
    if (receipt.tag === "Revert" || receipt.tag === "Panic") return receipt;
    if (receipt.tag === "ScriptResult" && receipt.result !== 0n) return receipt;
  }
  return undefined;
}

export function describeFailure(failure: ExecutionFailure): string {
  switch (failure.tag) {
    case "Revert":
      return `${failure.id} reverted with 0x${failure.ra.toString(16)}`;
    case "Panic":
      return `${failure.id} panicked: ${panicReasonName(failure.reason)}`;
    case "ScriptResult":
      return `script failed with result ${failure.result}`;
  }
}
