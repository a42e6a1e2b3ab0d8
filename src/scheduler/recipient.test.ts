import { describe, expect, it, vi } from "vitest";
import { ValidationError } from "./errors.js";
import { RecipientResolver } from "./recipient.js";

describe("RecipientResolver", () => {
  it("prefers an explicit agent id", async () => {
    const resolver = new RecipientResolver({ defaultAgentId: "agent-default" });
    resolver.setSessionDefault("agent-session");
    await expect(resolver.resolve("  agent-explicit ")).resolves.toEqual({ recipientId: "agent-explicit", source: "explicit" });
  });

  it("falls back to the session default, then the process default", async () => {
    const resolver = new RecipientResolver({ defaultAgentId: "agent-default" });
    await expect(resolver.resolve()).resolves.toEqual({ recipientId: "agent-default", source: "default" });

    resolver.setSessionDefault("agent-session");
    await expect(resolver.resolve("")).resolves.toEqual({ recipientId: "agent-session", source: "session" });

    resolver.setSessionDefault(" ");
    expect(resolver.getSessionDefault()).toBeUndefined();
  });

  it("uses the only agent on the server when enabled", async () => {
    const listAgents = vi.fn().mockResolvedValue([{ id: "agent-only", name: "Solo" }]);
    const resolver = new RecipientResolver({ singleAgentFallback: true, listAgents });
    await expect(resolver.resolve()).resolves.toEqual({ recipientId: "agent-only", source: "single_agent" });
  });

  it("does not list agents when the fallback is off", async () => {
    const listAgents = vi.fn().mockResolvedValue([{ id: "agent-only", name: "Solo" }]);
    const resolver = new RecipientResolver({ singleAgentFallback: false, listAgents });
    await expect(resolver.resolve()).rejects.toThrow(ValidationError);
    expect(listAgents).not.toHaveBeenCalled();
  });

  it("explains what it tried when nothing resolves", async () => {
    const listAgents = vi.fn().mockResolvedValue([
      { id: "a", name: "A" },
      { id: "b", name: "B" },
    ]);
    const resolver = new RecipientResolver({ singleAgentFallback: true, listAgents });
    await expect(resolver.resolve()).rejects.toThrow(
      "No recipient agent. Tried: agentId argument, session default, DEFAULT_AGENT_ID, single-agent fallback (2 agents on server)",
    );
  });
});
