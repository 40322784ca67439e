import { messageUrl, type ProtocolMessage } from "@covenant/protocol";
import type { DispatchResult, MessageDispatcher } from "@covenant/negotiation";

export const PARTICIPANT_HEADER = "x-participant-id";

/** Statuses worth another attempt. Every other 4xx is final. */
const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([408, 409, 425, 429]);

export interface HttpDispatcherOptions {
  fetch?: typeof fetch;
  timeoutMs?: number;
}

/** Posts protocol messages as JSON to the counter-party's protocol routes. */
export class HttpMessageDispatcher implements MessageDispatcher {
  private readonly fetch: typeof fetch;
  private readonly timeoutMs: number;

  constructor(
    private readonly participantId: string,
    options: HttpDispatcherOptions = {},
  ) {
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async send(message: ProtocolMessage): Promise<DispatchResult> {
    const url = messageUrl(message.counterPartyAddress, message.type);
    let response: Response;
    try {
      response = await this.fetch(url, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          [PARTICIPANT_HEADER]: this.participantId,
        },
        body: JSON.stringify(message),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return { ok: false, fatal: false, detail: `POST ${url} failed: ${reason}` };
    }

    if (response.ok) return { ok: true };
    const detail = `POST ${url} answered ${response.status}`;
    const transient = response.status >= 500 || TRANSIENT_STATUSES.has(response.status);
    return { ok: false, fatal: !transient, detail };
  }
}
