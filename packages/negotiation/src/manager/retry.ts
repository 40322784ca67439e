interface Attempts {
  stateCount: number;
  count: number;
  nextAttemptAt: number;
}

export interface RetryPolicy {
  limit: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Failed send attempts per negotiation. Kept in memory so a failed attempt
 * never writes to the store: the key is the record's stateCount, and any
 * persisted transition starts the count over.
 */
export class RetryTracker {
  private readonly attempts = new Map<string, Attempts>();

  constructor(private readonly policy: RetryPolicy) {}

  isDue(id: string, stateCount: number, now: number): boolean {
    const entry = this.current(id, stateCount);
    return !entry || entry.nextAttemptAt <= now;
  }

  /** Record a failure. Returns false once the retry limit is exhausted. */
  recordFailure(id: string, stateCount: number, now: number): boolean {
    const count = (this.current(id, stateCount)?.count ?? 0) + 1;
    const delay = Math.min(this.policy.baseDelayMs * 2 ** (count - 1), this.policy.maxDelayMs);
    this.attempts.set(id, { stateCount, count, nextAttemptAt: now + delay });
    return count < this.policy.limit;
  }

  attemptsFor(id: string, stateCount: number): number {
    return this.current(id, stateCount)?.count ?? 0;
  }

  clear(id: string): void {
    this.attempts.delete(id);
  }

  get size(): number {
    return this.attempts.size;
  }

  private current(id: string, stateCount: number): Attempts | undefined {
    const entry = this.attempts.get(id);
    return entry?.stateCount === stateCount ? entry : undefined;
  }
}
