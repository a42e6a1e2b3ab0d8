import { config } from "./config.js";
import { createRuntime } from "./runtime.js";
import { createBot } from "./telegram/bot.js";

async function main() {
  console.log("[init] Starting promptclock...");
  console.log(`[init] Store: ${config.storePath}`);
  console.log(`[init] Letta server: ${config.lettaBaseUrl}${config.lettaToken ? " (authenticated)" : ""}`);
  console.log(`[init] Poll interval: ${config.pollIntervalSeconds}s`);
  console.log(
    `[init] Delivery: ${config.deliveryMaxAttempts} attempts, ` +
    `retry ceiling ${config.maxConsecutiveTransientFailures || "(none)"}`,
  );

  const runtime = await createRuntime(config);
  const { store, letta, scheduler } = runtime;

  const released = await store.releaseStaleClaims(Date.now(), config.staleClaimMs);
  if (released > 0) {
    console.log(`[init] Released ${released} stale in-flight claim(s)`);
  }

  try {
    const { agentCount } = await letta.ping();
    console.log(`[init] Letta reachable (${agentCount} agents)`);
  } catch (err) {
    console.warn("[init] Letta not reachable yet; deliveries will retry");
    console.warn("[init]", err instanceof Error ? err.message : err);
  }

  const bot = config.telegramBotToken
    ? createBot({ token: config.telegramBotToken, scheduler, allowedUsers: config.allowedUsers })
    : undefined;

  const loop = scheduler.runLoop(config.pollIntervalSeconds);

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n[shutdown] Received ${signal}, shutting down...`);

    // Waits for the in-flight pass to finish its current schedule
    await scheduler.stop();
    await loop;

    if (bot) {
      await bot.stop();
    }

    console.log("[shutdown] Done.");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  if (bot) {
    console.log(`[init] Operator bot starting (allowed users: ${config.allowedUsers.length > 0 ? config.allowedUsers.join(", ") : "(all)"})`);
    bot
      .start({
        allowed_updates: ["message"],
        onStart: (botInfo) => {
          console.log(`[init] Bot @${botInfo.username} is running!`);
        },
      })
      .catch((err) => {
        console.error("[bot] Polling stopped:", err);
      });
  }

  await loop;
}

main().catch((err) => {
  console.error("[fatal]", err);
  process.exit(1);
});
