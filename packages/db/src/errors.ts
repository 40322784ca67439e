/** A query or write the Postgres store cannot express. */
export class NegotiationStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NegotiationStoreError";
  }
}
