import { Bot } from "grammy";
import type { SchedulerService } from "../scheduler/service.js";
import {
  handleAll,
  handleCancel,
  handleRunOnce,
  handleSchedules,
  handleStart,
  handleStats,
} from "./commands.js";

export type BotOptions = {
  token: string;
  scheduler: SchedulerService;
  /** Telegram user ids allowed to use the bot; empty allows everyone. */
  allowedUsers: readonly number[];
};

export function isAllowed(userId: number, allowedUsers: readonly number[]): boolean {
  return allowedUsers.length === 0 || allowedUsers.includes(userId);
}

export function createBot(opts: BotOptions): Bot {
  const bot = new Bot(opts.token);

  // Access control middleware
  bot.use(async (ctx, next) => {
    const userId = ctx.from?.id;
    if (!userId) return;

    if (!isAllowed(userId, opts.allowedUsers)) {
      console.warn(`[bot] Unauthorized user: ${userId} (${ctx.from?.username ?? "unknown"})`);
      await ctx.reply("Unauthorized. Your user ID is not in the allowed list.");
      return;
    }

    await next();
  });

  bot.command("start", handleStart);
  bot.command("help", handleStart);
  bot.command("schedules", handleSchedules(opts.scheduler));
  bot.command("all", handleAll(opts.scheduler));
  bot.command("cancel", handleCancel(opts.scheduler));
  bot.command("runonce", handleRunOnce(opts.scheduler));
  bot.command("stats", handleStats(opts.scheduler));

  bot.catch((err) => {
    console.error(`[bot] Update ${err.ctx.update.update_id} failed:`, err.error);
  });

  return bot;
}
