/**
 * Builders and fakes shared by the scheduler tests.
 */

import { LettaApiError } from "../letta/errors.js";
import type { AgentMessagingApi } from "../letta/client.js";
import type { Schedule, ScheduleSpec } from "./types.js";

let seq = 0;

export function makeSchedule(overrides: Partial<Omit<Schedule, "state">> & { state?: Partial<Schedule["state"]> } = {}): Schedule {
  seq++;
  const spec: ScheduleSpec = overrides.spec ?? { kind: "once", at: "2025-01-01T12:00:00.000Z" };
  return {
    id: overrides.id ?? `sched-${String(seq).padStart(4, "0")}`,
    recipientId: overrides.recipientId ?? "agent-1",
    message: overrides.message ?? "hello",
    spec,
    active: overrides.active ?? true,
    deactivatedReason: overrides.deactivatedReason,
    maxRepetitions: overrides.maxRepetitions ?? null,
    createdAt: overrides.createdAt ?? "2025-01-01T00:00:00.000Z",
    state: {
      nextRunAtMs: Date.parse("2025-01-01T12:00:00Z"),
      repetitionCount: 0,
      consecutiveFailures: 0,
      ...overrides.state,
    },
  };
}

export type SentMessage = { agentId: string; text: string; transport: "standard" | "stream" };

type Behavior = (agentId: string, text: string) => void | Promise<void>;

/**
 * In-process stand-in for the Letta messaging endpoints. Each call pops the
 * next scripted behavior; with none left it succeeds.
 */
export class FakeMessagingApi implements AgentMessagingApi {
  readonly sent: SentMessage[] = [];
  sendCalls = 0;
  streamCalls = 0;
  private readonly sendScript: Behavior[] = [];
  private readonly streamScript: Behavior[] = [];

  onSend(...behaviors: Behavior[]): this {
    this.sendScript.push(...behaviors);
    return this;
  }

  onStream(...behaviors: Behavior[]): this {
    this.streamScript.push(...behaviors);
    return this;
  }

  async sendMessage(agentId: string, text: string): Promise<void> {
    this.sendCalls++;
    await this.sendScript.shift()?.(agentId, text);
    this.sent.push({ agentId, text, transport: "standard" });
  }

  async streamMessage(agentId: string, text: string): Promise<void> {
    this.streamCalls++;
    await this.streamScript.shift()?.(agentId, text);
    this.sent.push({ agentId, text, transport: "stream" });
  }
}

export function failWith(status: number, body = "error"): Behavior {
  return () => {
    throw new LettaApiError(status, body, "send message");
  };
}
