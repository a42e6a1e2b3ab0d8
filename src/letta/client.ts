/**
 * Minimal Letta REST client: the calls the scheduler and its surfaces need.
 *
 * Built once at startup and passed to whoever needs it.
 */

import { z } from "zod";
import { LettaApiError, LettaNetworkError } from "./errors.js";

export type LettaClientOptions = {
  baseUrl: string;
  token?: string;
  timeoutMs?: number;
  /** Injected for tests. */
  fetch?: typeof fetch;
};

export type AgentSummary = {
  id: string;
  name: string;
  createdAt?: string;
  lastUpdated?: string;
};

const agentResponseSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  created_at: z.string().nullish(),
  last_updated: z.string().nullish(),
});

type LettaAgentResponse = z.infer<typeof agentResponseSchema>;

/**
 * What the delivery path needs from the agent-messaging service.
 */
export interface AgentMessagingApi {
  /** Standard (non-streaming) message create. */
  sendMessage(agentId: string, text: string): Promise<void>;
  /** Streaming message create; resolves once the stream has been drained. */
  streamMessage(agentId: string, text: string): Promise<void>;
}

function userMessageBody(text: string): string {
  return JSON.stringify({
    messages: [{ role: "user", content: [{ type: "text", text }] }],
  });
}

/**
 * Read a JSON body and check its shape. A body that is not JSON or does not
 * match raises LettaApiError with the response status.
 */
async function parseBody<S extends z.ZodTypeAny>(response: Response, schema: S, operation: string): Promise<z.output<S>> {
  const text = await response.text();
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new LettaApiError(response.status, `Response is not JSON: ${text}`, operation);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new LettaApiError(response.status, `Unexpected response shape: ${where}${issue?.message ?? "invalid"}`, operation);
  }
  return parsed.data;
}

function toAgentSummary(agent: LettaAgentResponse): AgentSummary {
  return {
    id: agent.id,
    name: agent.name ?? "Unknown",
    createdAt: agent.created_at ?? undefined,
    lastUpdated: agent.last_updated ?? undefined,
  };
}

/**
 * Pull `data:` payloads out of a chunk of server-sent events text.
 * Returns the payloads and the unterminated remainder.
 */
export function splitSseData(buffer: string): { payloads: string[]; rest: string } {
  const events = buffer.split(/\r?\n\r?\n/);
  const rest = events.pop() ?? "";
  const payloads: string[] = [];
  for (const event of events) {
    const data = event
      .split(/\r?\n/)
      .filter((line) => line.startsWith("data:"))
      .map((line) => line.slice(5).trimStart())
      .join("\n");
    if (data) payloads.push(data);
  }
  return { payloads, rest };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function streamErrorIn(payload: string): string | undefined {
  if (payload === "[DONE]") return undefined;
  const parsed = parseJson(payload);
  if (parsed && typeof parsed === "object" && "error" in parsed) {
    const { error } = parsed as { error: unknown };
    return typeof error === "string" ? error : JSON.stringify(error);
  }
  return undefined;
}

export class LettaClient implements AgentMessagingApi {
  private readonly baseUrl: string;
  private readonly token: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: LettaClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.token = opts.token;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  async sendMessage(agentId: string, text: string): Promise<void> {
    const response = await this.request(
      "send message",
      `/v1/agents/${encodeURIComponent(agentId)}/messages`,
      { method: "POST", body: userMessageBody(text) },
    );
    // Drain so the connection can be reused.
    await response.text();
  }

  async streamMessage(agentId: string, text: string): Promise<void> {
    const response = await this.request(
      "stream message",
      `/v1/agents/${encodeURIComponent(agentId)}/messages/stream`,
      { method: "POST", body: userMessageBody(text), headers: { Accept: "text/event-stream" } },
    );

    if (!response.body) return;
    const decoder = new TextDecoder();
    let buffer = "";
    const checkPayloads = (payloads: string[]): void => {
      for (const payload of payloads) {
        const error = streamErrorIn(payload);
        if (error !== undefined) {
          throw new LettaApiError(response.status, error, "stream message");
        }
      }
    };

    const reader = response.body.getReader();
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });
      const { payloads, rest } = splitSseData(buffer);
      buffer = rest;
      checkPayloads(payloads);
    }
    buffer += decoder.decode();
    checkPayloads(splitSseData(`${buffer}\n\n`).payloads);
  }

  async listAgents(): Promise<AgentSummary[]> {
    const response = await this.request("list agents", "/v1/agents/", { method: "GET" });
    const data = await parseBody(response, z.array(agentResponseSchema), "list agents");
    return data.map(toAgentSummary);
  }

  /**
   * Look up one agent. Returns undefined when the server answers 404.
   */
  async getAgent(agentId: string): Promise<AgentSummary | undefined> {
    try {
      const response = await this.request(
        "get agent",
        `/v1/agents/${encodeURIComponent(agentId)}`,
        { method: "GET" },
      );
      return toAgentSummary(await parseBody(response, agentResponseSchema, "get agent"));
    } catch (err) {
      if (err instanceof LettaApiError && err.status === 404) return undefined;
      throw err;
    }
  }

  /**
   * Connection test: lists agents and reports how many there are.
   */
  async ping(): Promise<{ agentCount: number }> {
    const agents = await this.listAgents();
    return { agentCount: agents.length };
  }

  // --- Internal ---

  private async request(
    operation: string,
    pathname: string,
    init: { method: string; body?: string; headers?: Record<string, string> },
  ): Promise<Response> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      ...init.headers,
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${pathname}`, {
        method: init.method,
        body: init.body,
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
      const reason = err instanceof Error ? err.message : String(err);
      throw new LettaNetworkError(`Letta ${operation} request failed: ${reason}`, timedOut, { cause: err });
    }

    if (!response.ok) {
      const body = await response.text().catch(() => response.statusText);
      throw new LettaApiError(response.status, body, operation);
    }
    return response;
  }
}
