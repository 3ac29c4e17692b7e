// Retrying transport decorator.
//
// Retries transport failures with exponential backoff. Node rejections
// (CallErrors other than transport failures) are passed through at once.

import createDebug from "debug";
import { CallError, type Receipt, type ScriptTransaction } from "@regcall/tx";

import type { NodeTransport } from "./transport.ts";

const log = createDebug("regcall:retry");

/** Backoff configuration for retry attempts. */
export interface BackoffConfig {
  /** Initial delay in milliseconds. Default: 1000 */
  initial: number;
  /** Maximum delay in milliseconds. Default: 30000 */
  max: number;
  /** Multiplier for exponential backoff. Default: 2 */
  factor: number;
  /** Jitter factor (0-1) to randomize delays. Default: 0.1 */
  jitter: number;
}

export interface RetryOptions {
  /** Total attempts, including the first. Default: 3 */
  maxAttempts?: number;
  backoff?: Partial<BackoffConfig>;
  /** Called before each retry with the attempt about to be made. */
  onRetry?: (attempt: number, delay: number, error: unknown) => void;
  /** Default: setTimeout */
  sleep?: (ms: number) => Promise<void>;
}

/** Error thrown when every attempt failed. */
export class RetryExhaustedError extends Error {
  constructor(
    public attempts: number,
    public lastError: unknown,
  ) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    super(`gave up after ${attempts} attempts: ${detail}`, { cause: lastError });
    this.name = "RetryExhaustedError";
  }
}

function isRetryable(error: unknown): boolean {
  return !(error instanceof CallError) || error.retryable;
}

/**
 * Delay before attempt `attempt + 1`, given `attempt` failures so far.
 */
export function backoffDelay(config: BackoffConfig, attempt: number, random: number = Math.random()): number {
  const base = Math.min(config.initial * Math.pow(config.factor, attempt - 1), config.max);
  const jitterAmount = base * config.jitter * (random * 2 - 1);
  return Math.max(0, Math.floor(base + jitterAmount));
}

/**
 * NodeTransport that retries the wrapped transport's transport failures.
 *
 * Commits are retried too: a transaction that reached the node before the
 * failure may be submitted twice, which the node rejects as a duplicate.
 *
 * @example
 * ```typescript
 * const transport = new RetryingTransport(httpTransport, {
 *   maxAttempts: 5,
 *   backoff: { initial: 200, max: 5000 },
 * });
 * const caller = new Dispatcher(transport);
 * ```
 */
export class RetryingTransport implements NodeTransport {
  private inner: NodeTransport;
  private maxAttempts: number;
  private backoff: BackoffConfig;
  private onRetry?: (attempt: number, delay: number, error: unknown) => void;
  private sleep: (ms: number) => Promise<void>;

  constructor(inner: NodeTransport, options: RetryOptions = {}) {
    const maxAttempts = options.maxAttempts ?? 3;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    const backoff = options.backoff ?? {};
    this.inner = inner;
    this.maxAttempts = maxAttempts;
    this.backoff = {
      initial: backoff.initial ?? 1000,
      max: backoff.max ?? 30000,
      factor: backoff.factor ?? 2,
      jitter: backoff.jitter ?? 0.1,
    };
    this.onRetry = options.onRetry;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  sendTransaction(tx: ScriptTransaction): Promise<Receipt[]> {
    return this.attempt("sendTransaction", () => this.inner.sendTransaction(tx));
  }

  dryRun(tx: ScriptTransaction): Promise<Receipt[]> {
    return this.attempt("dryRun", () => this.inner.dryRun(tx));
  }

  private async attempt(op: string, fn: () => Promise<Receipt[]>): Promise<Receipt[]> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (e) {
        if (!isRetryable(e)) throw e;
        if (attempt >= this.maxAttempts) {
          throw new RetryExhaustedError(attempt, e);
        }
        const delay = backoffDelay(this.backoff, attempt);
        log("%s failed (attempt %d), retrying in %dms: %O", op, attempt, delay, e);
        this.onRetry?.(attempt + 1, delay, e);
        await this.sleep(delay);
      }
    }
  }
}
