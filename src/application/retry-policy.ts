import { IngestError, RetryExhaustedError } from '../domain/index.js';

export type FailureClass = 'retryable' | 'fatal';

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Growth factor between consecutive delays. */
  multiplier?: number;
  /** Total time budget across attempts, measured from the first attempt. */
  maxElapsedMs?: number;
  /** Fraction of the exponential delay added as random jitter. */
  jitterRatio?: number;
  random?: () => number;
}

export interface RetryRuntime {
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  onRetry?: (details: { attempt: number; delayMs: number; error: unknown }) => void;
}

const RETRYABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
]);

const RETRYABLE_KEYWORDS = ['connection', 'timeout', 'timed out', 'network', 'rate limit', 'too many requests', 'busy', '502', '503', '504'];

function errorCode(err: Error): string | undefined {
  if (!('code' in err)) return undefined;
  const code = err.code;
  return typeof code === 'string' ? code : undefined;
}

function sleepFor(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Computes a capped exponential delay with bounded jitter.
 *
 * `attempt` is 1-based: the delay before the second attempt is `nextDelay(1)`.
 */
export function computeBackoffMs(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  multiplier: number,
  jitterRatio: number,
  random: () => number,
): number {
  const base = Math.max(1, baseDelayMs);
  const max = Math.max(base, maxDelayMs);
  const exponential = Math.min(max, base * Math.max(1, multiplier) ** Math.max(0, attempt - 1));
  const jitterWindow = Math.floor(exponential * Math.max(0, jitterRatio));
  const jitter = Math.floor(random() * (jitterWindow + 1));

  return Math.min(max, exponential + jitter);
}

/**
 * Classifies failures and drives retries with exponential backoff.
 *
 * Network, timeout, rate-limit and busy-server conditions are retryable;
 * schema, validation, permission and authentication conditions are fatal.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly maxElapsedMs: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly multiplier: number;
  private readonly jitterRatio: number;
  private readonly random: () => number;

  constructor(opts: RetryPolicyOptions) {
    if (!Number.isInteger(opts.maxAttempts) || opts.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${opts.maxAttempts}`);
    }
    this.maxAttempts = opts.maxAttempts;
    this.baseDelayMs = opts.baseDelayMs;
    this.maxDelayMs = opts.maxDelayMs;
    this.multiplier = opts.multiplier ?? 2;
    this.maxElapsedMs = opts.maxElapsedMs ?? Number.POSITIVE_INFINITY;
    this.jitterRatio = opts.jitterRatio ?? 0.2;
    this.random = opts.random ?? Math.random;
  }

  classify(err: unknown): FailureClass {
    if (err instanceof IngestError) {
      return err.retryable ? 'retryable' : 'fatal';
    }

    if (err instanceof Error) {
      const code = errorCode(err);
      if (code !== undefined && RETRYABLE_CODES.has(code)) return 'retryable';
      if (err.name === 'AbortError' || err.name === 'TimeoutError') return 'retryable';

      const text = err.message.toLowerCase();
      if (RETRYABLE_KEYWORDS.some((keyword) => text.includes(keyword))) return 'retryable';
    }

    return 'fatal';
  }

  nextDelay(attempt: number): number {
    return computeBackoffMs(
      attempt,
      this.baseDelayMs,
      this.maxDelayMs,
      this.multiplier,
      this.jitterRatio,
      this.random,
    );
  }

  /**
   * Runs `operation` until it succeeds, fails fatally, or the attempt/time
   * budget runs out. Fatal errors are rethrown as-is; exhaustion throws
   * RetryExhaustedError carrying the last cause.
   */
  async execute<T>(
    operationName: string,
    operation: (attempt: number) => Promise<T>,
    runtime: RetryRuntime = {},
  ): Promise<T> {
    const sleep = runtime.sleep ?? sleepFor;
    const now = runtime.now ?? Date.now;
    const startedAt = now();
    let attempt = 1;

    while (true) {
      try {
        return await operation(attempt);
      } catch (err: unknown) {
        if (this.classify(err) === 'fatal') {
          throw err;
        }

        const elapsedMs = now() - startedAt;
        if (attempt >= this.maxAttempts) {
          throw new RetryExhaustedError(operationName, attempt, elapsedMs, err);
        }

        const delayMs = Math.max(this.nextDelay(attempt), retryAfterHint(err));
        if (elapsedMs + delayMs > this.maxElapsedMs) {
          throw new RetryExhaustedError(operationName, attempt, elapsedMs, err);
        }

        runtime.onRetry?.({ attempt, delayMs, error: err });
        attempt += 1;
        await sleep(delayMs);
      }
    }
  }
}

/** Rate-limited errors may carry a minimum wait from the server. */
function retryAfterHint(err: unknown): number {
  if (err instanceof Error && 'retryAfterMs' in err) {
    const hint = err.retryAfterMs;
    if (typeof hint === 'number' && Number.isFinite(hint)) return Math.max(0, hint);
  }
  return 0;
}
