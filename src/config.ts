import path from "node:path";
import os from "node:os";
import { config as loadEnv } from "dotenv";

loadEnv();

function expandHome(p: string): string {
  if (p.startsWith("~/") || p === "~") {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

function optionalEnv(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

/** Non-negative integer from env, falling back when unset or malformed. */
function intEnv(key: string, fallback: number): number {
  const raw = optionalEnv(key);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : fallback;
}

function boolEnv(key: string, fallback: boolean): boolean {
  const raw = optionalEnv(key)?.toLowerCase();
  if (raw === undefined) return fallback;
  return raw === "1" || raw === "true" || raw === "yes";
}

const dataDir = expandHome(optionalEnv("DATA_DIR") ?? "~/.promptclock");

export const config = {
  dataDir,
  storePath: expandHome(optionalEnv("PROMPTCLOCK_STORE") ?? "") || path.join(dataDir, "schedules.json"),

  lettaBaseUrl: optionalEnv("LETTA_BASE_URL") ?? "http://localhost:8283",
  // API key wins; a server password doubles as the bearer token for self-hosted servers.
  lettaToken: optionalEnv("LETTA_API_KEY") ?? optionalEnv("LETTA_SERVER_PASSWORD"),
  lettaTimeoutMs: intEnv("LETTA_TIMEOUT_MS", 30_000),

  pollIntervalSeconds: Math.max(1, intEnv("POLL_INTERVAL_SECONDS", 60)),
  deliveryMaxAttempts: Math.max(1, intEnv("DELIVERY_MAX_ATTEMPTS", 3)),
  deliveryBackoffMs: intEnv("DELIVERY_BACKOFF_MS", 1_000),
  /** 0 disables the ceiling. */
  maxConsecutiveTransientFailures: intEnv("MAX_CONSECUTIVE_TRANSIENT_FAILURES", 10),
  staleClaimMs: intEnv("STALE_CLAIM_SECONDS", 3_600) * 1_000,

  defaultAgentId: optionalEnv("DEFAULT_AGENT_ID") ?? optionalEnv("LETTA_AGENT_ID"),
  /** Use the only agent on the server when nothing else names a recipient. */
  singleAgentFallback: boolEnv("SINGLE_AGENT_FALLBACK", false),

  /** Run the executor loop inside the MCP server process. */
  mcpAutostartLoop: boolEnv("MCP_AUTOSTART_LOOP", false),

  telegramBotToken: optionalEnv("TELEGRAM_BOT_TOKEN"),
  allowedUsers: (process.env.ALLOWED_TELEGRAM_USERS ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map(Number)
    .filter((n) => Number.isFinite(n) && n > 0),
} as const;

export type Config = typeof config;
