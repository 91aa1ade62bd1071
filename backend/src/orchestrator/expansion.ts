import type { TimeWindow } from '../retrieval/request.js';

export interface ExpansionPolicy {
  enabled: boolean;
  maxRetryAttempts: number;
  factor: number;
}

/**
 * Window for the `attempt`-th retry of `original`: the duration grows by
 * `factor` per attempt and stays anchored at the original end instant.
 */
export function expandWindow(original: Required<TimeWindow>, factor: number, attempt: number): Required<TimeWindow> {
  const duration = original.end - original.start;
  const expanded = Math.round(duration * Math.pow(factor, attempt));
  return { start: Math.max(0, original.end - expanded), end: original.end };
}

/**
 * Retry bookkeeping for one turn. Attempts are keyed by the signature of the
 * request the model originally asked for, so an expansion never starts its
 * own retry chain.
 */
export class RetryState {
  private readonly attempts = new Map<string, number>();
  private readonly tried = new Map<string, Array<Required<TimeWindow>>>();
  private readonly exhausted = new Set<string>();
  multiplier = 1;
  toolCallsThisTurn = 0;

  /** Reserves one dispatch against `max`; false when the budget is spent. */
  reserveDispatch(max: number): boolean {
    if (this.toolCallsThisTurn >= max) {
      return false;
    }
    this.toolCallsThisTurn += 1;
    return true;
  }

  attemptsFor(signature: string): number {
    return this.attempts.get(signature) ?? 0;
  }

  nextAttempt(signature: string, factor: number): number {
    const attempt = this.attemptsFor(signature) + 1;
    this.attempts.set(signature, attempt);
    this.multiplier = Math.pow(factor, attempt);
    return attempt;
  }

  recordWindow(signature: string, window: Required<TimeWindow>): void {
    const windows = this.tried.get(signature) ?? [];
    windows.push(window);
    this.tried.set(signature, windows);
  }

  windowsTried(signature: string): Array<Required<TimeWindow>> {
    return this.tried.get(signature) ?? [];
  }

  markExhausted(signature: string): void {
    this.exhausted.add(signature);
  }

  isExhausted(signature: string): boolean {
    return this.exhausted.has(signature);
  }
}
