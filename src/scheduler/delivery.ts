/**
 * Delivers one scheduled message to its recipient agent.
 *
 * Inner retry layer: up to `maxAttempts` tries with exponential backoff for
 * transient errors. Permanent errors return at once. The outer layer (the
 * next executor pass) is handled by the state updater.
 */

import { LettaApiError, LettaNetworkError } from "../letta/errors.js";
import type { AgentMessagingApi } from "../letta/client.js";
import type { DeliveryOutcome } from "./types.js";

export type DeliveryOptions = {
  maxAttempts?: number;
  baseBackoffMs?: number;
  /** Injected for tests. */
  sleep?: (ms: number) => Promise<void>;
};

export type ErrorClass = "transient" | "permanent";

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_BACKOFF_MS = 1_000;

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function errorText(err: unknown): string {
  if (err instanceof LettaApiError) return `${err.message}\n${err.body}`;
  return err instanceof Error ? err.message : String(err);
}

/**
 * Letta servers running a ChatML inner-monologue wrapper fail the standard
 * create endpoint with a KeyError on 'description'; the streaming endpoint
 * takes a different code path and succeeds.
 */
export function isChatMlDescriptionBug(err: unknown): boolean {
  const text = errorText(err);
  return text.includes("'description'") && text.includes("ChatMLInnerMonologueWrapper");
}

/**
 * Auth failures, unknown agents and rejected payloads never succeed on retry.
 * Timeouts, throttling, 5xx and network errors might.
 */
export function classifyError(err: unknown): ErrorClass {
  if (err instanceof LettaNetworkError) return "transient";
  if (err instanceof LettaApiError) {
    const { status } = err;
    if (status === 408 || status === 429 || status >= 500) return "transient";
    if (status >= 400) return "permanent";
  }
  return "transient";
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class DeliveryClient {
  private readonly maxAttempts: number;
  private readonly baseBackoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly api: AgentMessagingApi,
    opts: DeliveryOptions = {},
  ) {
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.baseBackoffMs = opts.baseBackoffMs ?? DEFAULT_BASE_BACKOFF_MS;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  async deliver(recipientId: string, message: string): Promise<DeliveryOutcome> {
    let lastReason = "no attempt made";

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const attempts = attempt + 1;
      let failure: unknown;

      try {
        await this.api.sendMessage(recipientId, message);
        if (attempt > 0) {
          console.log(`[delivery] Delivered to ${recipientId} on attempt ${attempts}`);
        }
        return { status: "delivered", attempts, transport: "standard" };
      } catch (err) {
        failure = err;
      }

      if (isChatMlDescriptionBug(failure)) {
        console.warn(`[delivery] ChatML description bug from ${recipientId}; trying streaming endpoint`);
        try {
          await this.api.streamMessage(recipientId, message);
          console.log(`[delivery] Streaming fallback delivered to ${recipientId}`);
          return { status: "delivered", attempts, transport: "stream" };
        } catch (streamErr) {
          console.warn(`[delivery] Streaming fallback failed for ${recipientId}: ${reasonOf(streamErr)}`);
          failure = streamErr;
        }
      }

      lastReason = reasonOf(failure);
      if (classifyError(failure) === "permanent") {
        console.warn(`[delivery] Permanent failure for ${recipientId}: ${lastReason}`);
        return { status: "permanent_failure", reason: lastReason, attempts };
      }

      console.warn(
        `[delivery] Attempt ${attempts}/${this.maxAttempts} to ${recipientId} failed: ${lastReason}`,
      );
      if (attempts < this.maxAttempts) {
        await this.sleep(this.baseBackoffMs * 2 ** attempt);
      }
    }

    console.error(`[delivery] All ${this.maxAttempts} attempts to ${recipientId} failed: ${lastReason}`);
    return { status: "transient_failure", reason: lastReason, attempts: this.maxAttempts };
  }
}
