import { LettaClient } from "./letta/client.js";
import { DeliveryClient } from "./scheduler/delivery.js";
import { RecipientResolver } from "./scheduler/recipient.js";
import { SchedulerService } from "./scheduler/service.js";
import { ScheduleStore, createFileBackend, type StoreBackend } from "./scheduler/store.js";
import type { Config } from "./config.js";

export type Runtime = {
  store: ScheduleStore;
  letta: LettaClient;
  scheduler: SchedulerService;
  resolver: RecipientResolver;
};

/**
 * Build and open everything a surface needs. Each entry point calls this
 * once; nothing here is a module-level singleton.
 */
export async function createRuntime(
  cfg: Config,
  opts: { backend?: StoreBackend; fetch?: typeof fetch } = {},
): Promise<Runtime> {
  const store = new ScheduleStore(opts.backend ?? createFileBackend(cfg.storePath));
  await store.open();

  const letta = new LettaClient({
    baseUrl: cfg.lettaBaseUrl,
    token: cfg.lettaToken,
    timeoutMs: cfg.lettaTimeoutMs,
    fetch: opts.fetch,
  });

  const delivery = new DeliveryClient(letta, {
    maxAttempts: cfg.deliveryMaxAttempts,
    baseBackoffMs: cfg.deliveryBackoffMs,
  });

  const scheduler = new SchedulerService({
    store,
    delivery,
    policy: { maxConsecutiveTransientFailures: cfg.maxConsecutiveTransientFailures },
    staleClaimMs: cfg.staleClaimMs,
  });

  const resolver = new RecipientResolver({
    defaultAgentId: cfg.defaultAgentId,
    singleAgentFallback: cfg.singleAgentFallback,
    listAgents: () => letta.listAgents(),
  });

  return { store, letta, scheduler, resolver };
}
