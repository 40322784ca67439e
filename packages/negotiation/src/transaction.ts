/** Scoped unit of work around the store calls of one logical request. */
export interface TransactionContext {
  execute<T>(work: () => Promise<T>): Promise<T>;
}

/** Used when no transactional store is configured. */
export class NoopTransactionContext implements TransactionContext {
  execute<T>(work: () => Promise<T>): Promise<T> {
    return work();
  }
}
