import { describe, it, expect, vi } from "vitest";
import type { ContractRequestMessage } from "@covenant/protocol";
import { HttpMessageDispatcher } from "../src/dispatch/http-dispatcher.js";
import { makeOffer } from "./helpers.js";

const message: ContractRequestMessage = {
  type: "ContractRequestMessage",
  protocol: "negotiation-http",
  counterPartyAddress: "http://provider/",
  processId: "c-1",
  consumerId: "consumer-agent",
  callbackAddress: "http://consumer",
  contractOffer: makeOffer(),
};

const REQUEST_URL = "http://provider/protocol/negotiations/request";

function dispatcherAnswering(status: number) {
  const fetch = vi.fn<typeof globalThis.fetch>().mockResolvedValue(new Response(null, { status }));
  return { fetch, dispatcher: new HttpMessageDispatcher("consumer-agent", { fetch }) };
}

describe("HttpMessageDispatcher", () => {
  it("posts the message as JSON to the route for its type", async () => {
    const { fetch, dispatcher } = dispatcherAnswering(204);

    expect(await dispatcher.send(message)).toEqual({ ok: true });
    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe(REQUEST_URL);
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "content-type": "application/json", "x-participant-id": "consumer-agent" });
    expect(init?.body).toBe(JSON.stringify(message));
  });

  it.each([500, 503, 408, 409, 425, 429])("treats %i as transient", async (status) => {
    const { dispatcher } = dispatcherAnswering(status);
    expect(await dispatcher.send(message)).toEqual({ ok: false, fatal: false, detail: `POST ${REQUEST_URL} answered ${status}` });
  });

  it.each([400, 403, 404])("treats %i as fatal", async (status) => {
    const { dispatcher } = dispatcherAnswering(status);
    expect(await dispatcher.send(message)).toEqual({ ok: false, fatal: true, detail: `POST ${REQUEST_URL} answered ${status}` });
  });

  it("treats a network error as transient", async () => {
    const fetch = vi.fn<typeof globalThis.fetch>().mockRejectedValue(new TypeError("fetch failed"));
    const dispatcher = new HttpMessageDispatcher("consumer-agent", { fetch });

    expect(await dispatcher.send(message)).toEqual({
      ok: false,
      fatal: false,
      detail: `POST ${REQUEST_URL} failed: fetch failed`,
    });
  });
});
