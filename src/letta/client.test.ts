import { describe, expect, it, vi } from "vitest";
import { LettaClient, splitSseData } from "./client.js";
import { LettaApiError, LettaNetworkError } from "./errors.js";

const BASE = "http://letta.test";

function clientWith(fetchImpl: typeof fetch, token?: string): LettaClient {
  return new LettaClient({ baseUrl: `${BASE}/`, token, timeoutMs: 5_000, fetch: fetchImpl });
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function sse(...events: string[]): Response {
  return new Response(events.map((e) => `data: ${e}\n\n`).join(""), {
    status: 200,
    headers: { "Content-Type": "text/event-stream" },
  });
}

describe("LettaClient", () => {
  describe("sendMessage", () => {
    it("posts a user message with the bearer token", async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(json({ messages: [] }));
      await clientWith(fetchMock, "test-secret").sendMessage("agent-1", "hello");

      expect(fetchMock).toHaveBeenCalledWith(
        `${BASE}/v1/agents/agent-1/messages`,
        expect.objectContaining({
          method: "POST",
          body: JSON.stringify({ messages: [{ role: "user", content: [{ type: "text", text: "hello" }] }] }),
          headers: { "Content-Type": "application/json", Authorization: "Bearer test-secret" },
        }),
      );
    });

    it("sends no authorization header without a token", async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(json({}));
      await clientWith(fetchMock).sendMessage("agent-1", "hello");
      expect(fetchMock).toHaveBeenCalledWith(
        expect.any(String),
        expect.objectContaining({ headers: { "Content-Type": "application/json" } }),
      );
    });

    it("encodes the agent id into the path", async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(json({}));
      await clientWith(fetchMock).sendMessage("agent/../x", "hello");
      expect(fetchMock).toHaveBeenCalledWith(`${BASE}/v1/agents/agent%2F..%2Fx/messages`, expect.anything());
    });

    it("raises LettaApiError with status and body on a non-2xx response", async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response("Agent not found", { status: 404 }));
      const error = await clientWith(fetchMock).sendMessage("ghost", "hello").catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LettaApiError);
      expect(error).toMatchObject({
        status: 404,
        body: "Agent not found",
        message: "Letta send message failed with HTTP 404: Agent not found",
      });
    });

    it("raises LettaNetworkError when the request never completes", async () => {
      const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new TypeError("fetch failed"));
      const error = await clientWith(fetchMock).sendMessage("agent-1", "hello").catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LettaNetworkError);
      expect(error).toMatchObject({ timedOut: false, message: "Letta send message request failed: fetch failed" });
    });

    it("flags timeouts", async () => {
      const timeout = new DOMException("The operation was aborted due to timeout", "TimeoutError");
      const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(timeout);
      const error = await clientWith(fetchMock).sendMessage("agent-1", "hello").catch((err: unknown) => err);
      expect(error).toMatchObject({ timedOut: true });
    });
  });

  describe("streamMessage", () => {
    it("drains the stream", async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
        sse(JSON.stringify({ message_type: "assistant_message", content: "ok" }), "[DONE]"),
      );
      await expect(clientWith(fetchMock).streamMessage("agent-1", "hello")).resolves.toBeUndefined();
      expect(fetchMock).toHaveBeenCalledWith(
        `${BASE}/v1/agents/agent-1/messages/stream`,
        expect.objectContaining({ headers: { "Content-Type": "application/json", Accept: "text/event-stream" } }),
      );
    });

    it("raises on an error event inside the stream", async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(sse(JSON.stringify({ error: "model overloaded" })));
      await expect(clientWith(fetchMock).streamMessage("agent-1", "hello")).rejects.toThrow(
        "Letta stream message failed with HTTP 200: model overloaded",
      );
    });
  });

  it("lists agents", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      json([
        { id: "agent-1", name: "Helper", created_at: "2025-01-01T00:00:00Z" },
        { id: "agent-2" },
      ]),
    );
    const agents = await clientWith(fetchMock).listAgents();
    expect(agents).toEqual([
      { id: "agent-1", name: "Helper", createdAt: "2025-01-01T00:00:00Z", lastUpdated: undefined },
      { id: "agent-2", name: "Unknown", createdAt: undefined, lastUpdated: undefined },
    ]);
    expect(fetchMock).toHaveBeenCalledWith(`${BASE}/v1/agents/`, expect.objectContaining({ method: "GET" }));
  });

  it("rejects an agent list that is not an array", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(json({ agents: [] }));
    const error = await clientWith(fetchMock).listAgents().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LettaApiError);
    expect(error).toMatchObject({
      status: 200,
      message: "Letta list agents failed with HTTP 200: Unexpected response shape: Expected array, received object",
    });
  });

  it("rejects agents without an id and bodies that are not JSON", async () => {
    const missingId = vi.fn<typeof fetch>().mockResolvedValue(json([{ name: "Nameless" }]));
    await expect(clientWith(missingId).listAgents()).rejects.toThrow(
      "Letta list agents failed with HTTP 200: Unexpected response shape: 0.id: Required",
    );

    const html = vi.fn<typeof fetch>().mockResolvedValue(new Response("<html>", { status: 200 }));
    await expect(clientWith(html).getAgent("agent-1")).rejects.toThrow(
      "Letta get agent failed with HTTP 200: Response is not JSON: <html>",
    );
  });

  it("returns undefined for an unknown agent", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response("not found", { status: 404 }));
    await expect(clientWith(fetchMock).getAgent("ghost")).resolves.toBeUndefined();
  });

  it("ping reports the agent count", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(json([{ id: "a" }, { id: "b" }]));
    await expect(clientWith(fetchMock).ping()).resolves.toEqual({ agentCount: 2 });
  });
});

describe("splitSseData", () => {
  it("returns complete events and keeps the partial tail", () => {
    const { payloads, rest } = splitSseData('data: {"a":1}\n\nevent: x\ndata: two\n\ndata: par');
    expect(payloads).toEqual(['{"a":1}', "two"]);
    expect(rest).toBe("data: par");
  });

  it("joins multi-line data fields", () => {
    expect(splitSseData("data: one\ndata: two\n\n").payloads).toEqual(["one\ntwo"]);
  });
});
