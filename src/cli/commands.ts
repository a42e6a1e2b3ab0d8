/**
 * Command-line surface: argument parsing and command dispatch.
 *
 * Every command resolves to a structured result; the entry point prints it
 * as JSON and sets the exit code.
 */

import {
  cancelParams,
  describeIssues,
  listParams,
  scheduleCronParams,
  scheduleEveryParams,
  scheduleTimeParams,
  toCreateInput,
  type ScheduleParams,
} from "../scheduler/input.js";
import { describePass, describeSchedule, failure, success, toErrorResult, type SurfaceResult } from "../scheduler/result.js";
import type { Runtime } from "../runtime.js";

export const COMMANDS = ["register", "list", "cancel", "execute", "stats", "test", "agents", "help"] as const;
export type CommandName = (typeof COMMANDS)[number];

export type ParsedArgs = {
  command: CommandName;
  flags: Record<string, string | true>;
};

const BOOLEAN_FLAGS = new Set(["all", "loop", "help"]);

function isCommand(value: string): value is CommandName {
  return (COMMANDS as readonly string[]).includes(value);
}

/**
 * Parse `<command> --flag value --switch` style arguments.
 *
 * @throws {Error} on an unknown command or a flag missing its value
 */
export function parseCliArgs(argv: string[]): ParsedArgs {
  const [first, ...rest] = argv;
  if (!first || first === "--help" || first === "-h") {
    return { command: "help", flags: {} };
  }
  if (!isCommand(first)) {
    throw new Error(`Unknown command: ${first}`);
  }

  const flags: Record<string, string | true> = {};
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith("--")) {
      throw new Error(`Unexpected argument: ${arg}`);
    }
    const eq = arg.indexOf("=");
    const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    if (eq >= 0) {
      flags[name] = arg.slice(eq + 1);
    } else if (BOOLEAN_FLAGS.has(name)) {
      flags[name] = true;
    } else {
      const value = rest[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`Flag --${name} needs a value`);
      }
      flags[name] = value;
      i++;
    }
  }
  return { command: first, flags };
}

export const HELP_TEXT = `
promptclock - schedule prompts to Letta agents

Usage:
  promptclock <command> [flags]

Commands:
  register  --agent-id <id> --prompt <text> (--time <when> | --cron <expr> | --every <interval>)
            [--start-at <when>] [--max-repetitions <n>]
  list      [--agent-id <id>] [--all]
  cancel    --id <schedule-id>
  execute   [--loop] [--interval <seconds>]
  stats
  test      Check the Letta connection
  agents    List agents on the Letta server
  help      Show this help message

Examples:
  promptclock register --agent-id agent-1 --prompt "Check the build" --time "2025-12-25 10:00:00 UTC"
  promptclock register --agent-id agent-1 --prompt "Daily standup" --cron "0 9 * * *"
  promptclock register --agent-id agent-1 --prompt "Ping" --every 5m --max-repetitions 3
  promptclock execute --loop --interval 60
`;

function stringFlag(flags: ParsedArgs["flags"], name: string): string | undefined {
  const value = flags[name];
  return typeof value === "string" ? value : undefined;
}

function numberFlag(flags: ParsedArgs["flags"], name: string): number | undefined {
  const raw = stringFlag(flags, name);
  return raw === undefined ? undefined : Number(raw);
}

/** Build the schedule parameters for `register`, or an error result. */
export function registerParams(flags: ParsedArgs["flags"]): ScheduleParams | SurfaceResult {
  const kinds = ["time", "cron", "every"].filter((k) => stringFlag(flags, k) !== undefined);
  if (kinds.length !== 1) {
    return failure("VALIDATION_ERROR", "Specify exactly one of --time, --cron or --every");
  }

  const base = { agentId: stringFlag(flags, "agent-id"), prompt: stringFlag(flags, "prompt") };
  if (kinds[0] === "time") {
    const parsed = scheduleTimeParams.safeParse({ ...base, time: stringFlag(flags, "time") });
    return parsed.success ? { kind: "once", ...parsed.data } : failure("VALIDATION_ERROR", describeIssues(parsed.error));
  }
  if (kinds[0] === "cron") {
    const parsed = scheduleCronParams.safeParse({ ...base, cron: stringFlag(flags, "cron") });
    return parsed.success ? { kind: "cron", ...parsed.data } : failure("VALIDATION_ERROR", describeIssues(parsed.error));
  }
  const parsed = scheduleEveryParams.safeParse({
    ...base,
    every: stringFlag(flags, "every"),
    startAt: stringFlag(flags, "start-at"),
    maxRepetitions: numberFlag(flags, "max-repetitions"),
  });
  return parsed.success ? { kind: "interval", ...parsed.data } : failure("VALIDATION_ERROR", describeIssues(parsed.error));
}

function isResult(value: ScheduleParams | SurfaceResult): value is SurfaceResult {
  return "status" in value;
}

/**
 * Run one command against an opened runtime. Never throws; errors come back
 * as `{ status: "error" }` results.
 */
export async function runCommand(args: ParsedArgs, runtime: Runtime, signal?: AbortSignal): Promise<SurfaceResult> {
  const { scheduler, resolver, letta } = runtime;
  const { flags } = args;

  try {
    switch (args.command) {
      case "help":
        return success({ help: HELP_TEXT.trim() });

      case "register": {
        const params = registerParams(flags);
        if (isResult(params)) return params;
        const { recipientId } = await resolver.resolve(params.agentId);
        const schedule = await scheduler.createSchedule(toCreateInput(params, recipientId));
        return success({
          id: schedule.id,
          nextRun: new Date(schedule.state.nextRunAtMs).toISOString(),
          message: `Scheduled ${schedule.spec.kind} prompt ${schedule.id}`,
        });
      }

      case "list": {
        const parsed = listParams.safeParse({ agentId: stringFlag(flags, "agent-id"), includeInactive: flags.all === true });
        if (!parsed.success) return failure("VALIDATION_ERROR", describeIssues(parsed.error));
        const schedules = await scheduler.listSchedules({
          recipientId: parsed.data.agentId,
          includeInactive: parsed.data.includeInactive,
        });
        return success({ schedules: schedules.map(describeSchedule), count: schedules.length });
      }

      case "cancel": {
        const parsed = cancelParams.safeParse({ id: stringFlag(flags, "id") });
        if (!parsed.success) return failure("VALIDATION_ERROR", describeIssues(parsed.error));
        const schedule = await scheduler.cancelSchedule(parsed.data.id);
        return success({ cancelled: schedule.id });
      }

      case "execute": {
        if (flags.loop !== true) {
          return success(describePass(await scheduler.runOnce()));
        }
        const interval = numberFlag(flags, "interval") ?? 60;
        await scheduler.runLoop(interval, signal);
        return success({ message: "Executor loop stopped" });
      }

      case "stats":
        return success({ stats: await scheduler.stats() });

      case "test": {
        const { agentCount } = await letta.ping();
        return success({ message: `Connected to Letta server (${agentCount} agents)`, agentCount });
      }

      case "agents": {
        const agents = await letta.listAgents();
        return success({ agents, count: agents.length });
      }
    }
  } catch (err) {
    return toErrorResult(err);
  }
}
