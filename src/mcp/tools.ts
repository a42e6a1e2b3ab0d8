import { z } from "zod";
import {
  cancelParams,
  describeIssues,
  listParams,
  scheduleCronParams,
  scheduleEveryParams,
  scheduleTimeParams,
  setDefaultAgentParams,
  toCreateInput,
  type ScheduleParams,
} from "../scheduler/input.js";
import { describePass, describeSchedule, failure, success, toErrorResult, type SurfaceResult } from "../scheduler/result.js";
import type { LettaClient } from "../letta/client.js";
import type { RecipientResolver } from "../scheduler/recipient.js";
import type { SchedulerService } from "../scheduler/service.js";

const emptyParams = z.object({});

export type ToolContext = {
  scheduler: SchedulerService;
  resolver: RecipientResolver;
  letta: Pick<LettaClient, "ping" | "listAgents">;
};

export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export type ToolHandler = (args: unknown) => Promise<ToolResponse>;

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: z.ZodRawShape;
  handler: ToolHandler;
};

function respond(result: SurfaceResult): ToolResponse {
  return {
    content: [{ type: "text", text: JSON.stringify(result) }],
    ...(result.status === "error" ? { isError: true } : {}),
  };
}

/**
 * Parse tool arguments, run the body, and wrap whatever happens as a JSON
 * text response. Errors never escape to the transport.
 */
function tool<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  body: (params: z.output<S>) => Promise<SurfaceResult>,
): ToolHandler {
  return async (args) => {
    const parsed = schema.safeParse(args ?? {});
    if (!parsed.success) {
      return respond(failure("VALIDATION_ERROR", describeIssues(parsed.error)));
    }
    try {
      return respond(await body(parsed.data));
    } catch (err) {
      const result = toErrorResult(err);
      if (result.code === "EXECUTION_ERROR" || result.code === "STORE_ERROR") {
        console.error(`[mcp] ${name} failed:`, err);
      }
      return respond(result);
    }
  };
}

export function createTools(ctx: ToolContext): ToolDefinition[] {
  const { scheduler, resolver, letta } = ctx;

  async function register(params: ScheduleParams): Promise<SurfaceResult> {
    const { recipientId, source } = await resolver.resolve(params.agentId);
    const schedule = await scheduler.createSchedule(toCreateInput(params, recipientId));
    return success({
      id: schedule.id,
      nextRun: new Date(schedule.state.nextRunAtMs).toISOString(),
      agentId: recipientId,
      agentSource: source,
      message: `Scheduled ${schedule.spec.kind} prompt ${schedule.id}`,
    });
  }

  return [
    {
      name: "promptclock_schedule_time",
      description: `Schedule a one-time prompt to an agent.

Parameters:
- time: ISO 8601 ("2025-12-25T10:00:00Z") or natural language ("tomorrow at 9am"); zoneless times are UTC; must be in the future
- prompt: message to deliver
- agentId: recipient; defaults to the session or process default

Returns: { status, id, nextRun, agentId }`,
      inputSchema: scheduleTimeParams.shape,
      handler: tool("promptclock_schedule_time", scheduleTimeParams, (p) => register({ kind: "once", ...p })),
    },
    {
      name: "promptclock_schedule_cron",
      description: `Schedule a recurring prompt with a 5-field cron expression (UTC).

Example: "0 9 * * 1-5" delivers at 09:00 UTC on weekdays.

Returns: { status, id, nextRun, agentId }`,
      inputSchema: scheduleCronParams.shape,
      handler: tool("promptclock_schedule_cron", scheduleCronParams, (p) => register({ kind: "cron", ...p })),
    },
    {
      name: "promptclock_schedule_every",
      description: `Schedule a prompt that repeats on a fixed interval.

Parameters:
- every: "30s", "5m", "1h" (a bare number is seconds)
- startAt: optional first delivery time, must be in the future
- maxRepetitions: optional cap on deliveries

Returns: { status, id, nextRun, agentId }`,
      inputSchema: scheduleEveryParams.shape,
      handler: tool("promptclock_schedule_every", scheduleEveryParams, (p) => register({ kind: "interval", ...p })),
    },
    {
      name: "promptclock_list",
      description: "List scheduled prompts, soonest first. Inactive ones only with includeInactive.",
      inputSchema: listParams.shape,
      handler: tool("promptclock_list", listParams, async (p) => {
        const schedules = await scheduler.listSchedules({ recipientId: p.agentId, includeInactive: p.includeInactive });
        return success({ schedules: schedules.map(describeSchedule), count: schedules.length });
      }),
    },
    {
      name: "promptclock_cancel",
      description: "Cancel a scheduled prompt by ID. Cancelling an inactive schedule is a no-op.",
      inputSchema: cancelParams.shape,
      handler: tool("promptclock_cancel", cancelParams, async (p) => {
        const schedule = await scheduler.cancelSchedule(p.id);
        return success({ cancelled: schedule.id, schedule: describeSchedule(schedule) });
      }),
    },
    {
      name: "promptclock_execute",
      description: "Deliver every due prompt now (one executor pass) and report the outcome.",
      inputSchema: {},
      handler: tool("promptclock_execute", emptyParams, async () => success(describePass(await scheduler.runOnce()))),
    },
    {
      name: "promptclock_stats",
      description: "Counts of schedules in the store: total, active, inactive, due and in flight.",
      inputSchema: {},
      handler: tool("promptclock_stats", emptyParams, async () => success({ stats: await scheduler.stats() })),
    },
    {
      name: "promptclock_test",
      description: "Check the connection to the Letta server.",
      inputSchema: {},
      handler: tool("promptclock_test", emptyParams, async () => {
        const { agentCount } = await letta.ping();
        return success({ message: `Connected to Letta server (${agentCount} agents)`, agentCount });
      }),
    },
    {
      name: "promptclock_agents",
      description: "List agents on the Letta server.",
      inputSchema: {},
      handler: tool("promptclock_agents", emptyParams, async () => {
        const agents = await letta.listAgents();
        return success({ agents, count: agents.length });
      }),
    },
    {
      name: "promptclock_set_default_agent",
      description: "Set the recipient used by schedule tools when agentId is omitted, for this session.",
      inputSchema: setDefaultAgentParams.shape,
      handler: tool("promptclock_set_default_agent", setDefaultAgentParams, async (p) => {
        resolver.setSessionDefault(p.agentId);
        return success({ agentId: p.agentId, message: `Default agent set to ${p.agentId}` });
      }),
    },
  ];
}
