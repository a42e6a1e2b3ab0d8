import type { PassSummary, Schedule, StoreStats } from "../scheduler/types.js";

export const TELEGRAM_MAX_CHARS = 4096;

/**
 * Split text into Telegram-sized chunks, preferring newline then space
 * boundaries.
 */
export function chunkText(text: string, maxLen = TELEGRAM_MAX_CHARS): string[] {
  if (text.length <= maxLen) return [text];

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= maxLen) {
      chunks.push(remaining);
      break;
    }

    let splitAt = remaining.lastIndexOf("\n", maxLen);
    if (splitAt < maxLen * 0.5) {
      splitAt = remaining.lastIndexOf(" ", maxLen);
    }
    if (splitAt < maxLen * 0.3) {
      splitAt = maxLen;
    }

    chunks.push(remaining.slice(0, splitAt));
    remaining = remaining.slice(splitAt).trimStart();
  }

  return chunks;
}

function shortTime(ms: number): string {
  return `${new Date(ms).toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

export function describeSpec(schedule: Schedule): string {
  const { spec } = schedule;
  switch (spec.kind) {
    case "once":
      return "one-time";
    case "cron":
      return `cron: ${spec.expr}`;
    case "interval": {
      const cap = schedule.maxRepetitions !== null
        ? ` (${schedule.state.repetitionCount}/${schedule.maxRepetitions})`
        : "";
      return `every ${spec.every}${cap}`;
    }
  }
}

export function formatScheduleLine(schedule: Schedule): string {
  const id = schedule.id.slice(0, 8);
  const status = schedule.active ? "" : ` [${schedule.deactivatedReason ?? "inactive"}]`;
  const next = schedule.active ? shortTime(schedule.state.nextRunAtMs) : "none";
  const prompt = schedule.message.length > 60 ? `${schedule.message.slice(0, 60)}…` : schedule.message;
  return `${id} | ${schedule.recipientId} | ${describeSpec(schedule)}${status} | next: ${next}\n  → ${prompt}`;
}

export function formatScheduleList(schedules: Schedule[], title: string): string {
  if (schedules.length === 0) return "No schedules.";
  return `${title}:\n\n${schedules.map(formatScheduleLine).join("\n\n")}`;
}

export function formatPass(summary: PassSummary): string {
  if (summary.results.length === 0) return "Nothing was due.";
  const lines = summary.results.map((r) => {
    const error = r.error ? `: ${r.error.slice(0, 100)}` : "";
    return `${r.id.slice(0, 8)} ${r.status}${error}`;
  });
  return [
    `Delivered ${summary.delivered}, failed ${summary.failed}, rescheduled ${summary.rescheduled}`,
    ...lines,
  ].join("\n");
}

export function formatStats(stats: StoreStats): string {
  return [
    `Total: ${stats.total}`,
    `Active: ${stats.active}`,
    `Inactive: ${stats.inactive}`,
    `Due now: ${stats.due}`,
    `In flight: ${stats.inFlight}`,
    `Oldest: ${stats.oldestCreatedAt ?? "-"}`,
    `Newest: ${stats.newestCreatedAt ?? "-"}`,
  ].join("\n");
}
