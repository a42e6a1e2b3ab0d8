import type { Context } from "grammy";
import type { SchedulerService } from "../scheduler/service.js";
import type { Schedule } from "../scheduler/types.js";
import { chunkText, formatPass, formatScheduleList, formatStats } from "./format.js";

async function replyChunked(ctx: Context, text: string): Promise<void> {
  for (const chunk of chunkText(text)) {
    await ctx.reply(chunk);
  }
}

function argumentOf(ctx: Context, command: string): string {
  return ctx.message?.text?.replace(new RegExp(`^/${command}(@\\S+)?\\s*`), "").trim() ?? "";
}

export async function handleStart(ctx: Context): Promise<void> {
  await ctx.reply(
    "promptclock operator bot\n\n" +
    "Commands:\n" +
    "/schedules [agent] - active schedules, optionally for one agent\n" +
    "/all - every schedule, including finished and cancelled\n" +
    "/cancel <id-prefix> - cancel a schedule\n" +
    "/runonce - deliver everything due now\n" +
    "/stats - store counts",
  );
}

export function handleSchedules(scheduler: SchedulerService) {
  return async (ctx: Context): Promise<void> => {
    const agent = argumentOf(ctx, "schedules");
    const schedules = await scheduler.listSchedules({ recipientId: agent || undefined });
    await replyChunked(ctx, formatScheduleList(schedules, agent ? `Active schedules for ${agent}` : "Active schedules"));
  };
}

export function handleAll(scheduler: SchedulerService) {
  return async (ctx: Context): Promise<void> => {
    const schedules = await scheduler.listSchedules({ includeInactive: true });
    await replyChunked(ctx, formatScheduleList(schedules, "All schedules"));
  };
}

/**
 * Schedules whose id starts with the prefix. Exact matches win.
 */
export function matchByPrefix(schedules: Schedule[], prefix: string): Schedule[] {
  const exact = schedules.filter((s) => s.id === prefix);
  if (exact.length > 0) return exact;
  return schedules.filter((s) => s.id.startsWith(prefix));
}

export function handleCancel(scheduler: SchedulerService) {
  return async (ctx: Context): Promise<void> => {
    const prefix = argumentOf(ctx, "cancel");
    if (!prefix) {
      await ctx.reply("Usage: /cancel <id-prefix>");
      return;
    }

    const matches = matchByPrefix(await scheduler.listSchedules({ includeInactive: true }), prefix);
    if (matches.length === 0) {
      await ctx.reply(`No schedule found matching "${prefix}".`);
      return;
    }
    if (matches.length > 1) {
      await ctx.reply(`"${prefix}" matches ${matches.length} schedules; use a longer prefix.`);
      return;
    }

    try {
      const cancelled = await scheduler.cancelSchedule(matches[0].id);
      await ctx.reply(`Schedule ${cancelled.id.slice(0, 8)} cancelled.`);
    } catch (err) {
      await ctx.reply(`Failed to cancel: ${err instanceof Error ? err.message : String(err)}`);
    }
  };
}

export function handleRunOnce(scheduler: SchedulerService) {
  return async (ctx: Context): Promise<void> => {
    try {
      const summary = await scheduler.runOnce();
      await replyChunked(ctx, formatPass(summary));
    } catch (err) {
      await ctx.reply(`Pass failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  };
}

export function handleStats(scheduler: SchedulerService) {
  return async (ctx: Context): Promise<void> => {
    await ctx.reply(formatStats(await scheduler.stats()));
  };
}
