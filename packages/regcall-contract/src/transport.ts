/**
 * Node transport abstraction.
 *
 * The SDK never talks to a node directly; it hands assembled
 * transactions to a NodeTransport. Implementations own the framing
 * (GraphQL, HTTP, in-process) and map node rejections to
 * `CallError.validation(...)`. Any other thrown error is treated as a
 * transport failure.
 */

import type { Receipt, ScriptTransaction } from "@regcall/tx";

/** `commit` persists state changes; `simulate` is a dry run. */
export type DispatchMode = "commit" | "simulate";

export interface NodeTransport {
  /**
   * Submit a transaction and wait for inclusion.
   *
   * Resolves with every receipt of the execution, including reverts.
   */
  sendTransaction(tx: ScriptTransaction): Promise<Receipt[]>;

  /**
   * Execute against current state without persisting anything.
   */
  dryRun(tx: ScriptTransaction): Promise<Receipt[]>;
}

/** Wallet collaborator: signs (and may fund) committing transactions. */
export interface TransactionSigner {
  sign(tx: ScriptTransaction): Promise<ScriptTransaction>;
}
