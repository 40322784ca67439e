import type { ContractNegotiationCommand } from './types.js';

/** In-process FIFO of commands awaiting application. Not persisted. */
export class CommandQueue {
  private items: ContractNegotiationCommand[] = [];

  enqueue(command: ContractNegotiationCommand): void {
    this.items.push(command);
  }

  /** Remove and return every queued command in submission order. */
  drain(): ContractNegotiationCommand[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  /** Put commands back at the head of the queue, keeping their order. */
  requeue(commands: ContractNegotiationCommand[]): void {
    this.items = [...commands, ...this.items];
  }

  /** The oldest command still waiting for a negotiation, if any. */
  pendingFor(negotiationId: string): ContractNegotiationCommand | null {
    return this.items.find((c) => c.negotiationId === negotiationId) ?? null;
  }

  get size(): number {
    return this.items.length;
  }
}
