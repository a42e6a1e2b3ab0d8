/**
 * Picks the recipient for a new schedule when the caller may not name one.
 *
 * Order: explicit argument, session default, process default, then the only
 * agent on the server (when enabled).
 */

import { ValidationError } from "./errors.js";
import type { AgentSummary } from "../letta/client.js";

export type RecipientSource = "explicit" | "session" | "default" | "single_agent";

export type ResolvedRecipient = {
  recipientId: string;
  source: RecipientSource;
};

export type RecipientResolverOptions = {
  defaultAgentId?: string;
  singleAgentFallback?: boolean;
  /** Needed only for the single-agent fallback. */
  listAgents?: () => Promise<AgentSummary[]>;
};

export class RecipientResolver {
  private sessionDefault: string | undefined;

  constructor(private readonly opts: RecipientResolverOptions = {}) {}

  setSessionDefault(agentId: string | undefined): void {
    const trimmed = agentId?.trim();
    this.sessionDefault = trimmed ? trimmed : undefined;
  }

  getSessionDefault(): string | undefined {
    return this.sessionDefault;
  }

  /**
   * @throws {ValidationError} when no layer yields a recipient
   */
  async resolve(explicit?: string): Promise<ResolvedRecipient> {
    const named = explicit?.trim();
    if (named) return { recipientId: named, source: "explicit" };
    if (this.sessionDefault) return { recipientId: this.sessionDefault, source: "session" };
    if (this.opts.defaultAgentId) return { recipientId: this.opts.defaultAgentId, source: "default" };

    const tried = ["agentId argument", "session default", "DEFAULT_AGENT_ID"];
    if (this.opts.singleAgentFallback && this.opts.listAgents) {
      const agents = await this.opts.listAgents();
      if (agents.length === 1) {
        return { recipientId: agents[0].id, source: "single_agent" };
      }
      tried.push(`single-agent fallback (${agents.length} agents on server)`);
    }

    throw new ValidationError("agentId", `No recipient agent. Tried: ${tried.join(", ")}`);
  }
}
