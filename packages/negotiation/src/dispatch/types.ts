import type { ProtocolMessage } from '@covenant/protocol';

export type DispatchResult =
  | { ok: true }
  // fatal: the counter-party rejected the message for good; otherwise retried
  | { ok: false; fatal: boolean; detail: string };

/** Delivers protocol messages to the counter-party. */
export interface MessageDispatcher {
  send(message: ProtocolMessage): Promise<DispatchResult>;
}
