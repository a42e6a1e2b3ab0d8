import { z } from "zod";
import type { CreateScheduleInput } from "./service.js";

const agentId = z
  .string()
  .trim()
  .min(1)
  .optional()
  .describe("Recipient agent ID. Omit to use the session or process default.");

const prompt = z.string().trim().min(1).describe("Message to deliver to the agent");

export const scheduleTimeParams = z.object({
  agentId,
  prompt,
  time: z
    .string()
    .trim()
    .min(1)
    .describe('When to deliver: ISO 8601 ("2025-12-25T10:00:00Z") or a phrase ("tomorrow at 9am"). Zoneless times are UTC.'),
});

export const scheduleCronParams = z.object({
  agentId,
  prompt,
  cron: z.string().trim().min(1).describe('5-field cron expression evaluated in UTC, e.g. "0 9 * * *"'),
});

export const scheduleEveryParams = z.object({
  agentId,
  prompt,
  every: z.string().trim().min(1).describe('Interval such as "30s", "5m" or "1h"; a bare number is seconds'),
  startAt: z.string().trim().min(1).optional().describe("First delivery time; must be in the future"),
  maxRepetitions: z.number().int().positive().optional().describe("Stop after this many deliveries"),
});

export const listParams = z.object({
  agentId: z.string().trim().min(1).optional().describe("Only schedules for this agent"),
  includeInactive: z.boolean().default(false).describe("Include completed and cancelled schedules"),
});

export const cancelParams = z.object({
  id: z.string().trim().min(1).describe("Schedule ID"),
});

export const setDefaultAgentParams = z.object({
  agentId: z.string().trim().min(1).describe("Agent to use when a schedule names none"),
});

export type ScheduleTimeParams = z.infer<typeof scheduleTimeParams>;
export type ScheduleCronParams = z.infer<typeof scheduleCronParams>;
export type ScheduleEveryParams = z.infer<typeof scheduleEveryParams>;
export type ListParams = z.infer<typeof listParams>;
export type CancelParams = z.infer<typeof cancelParams>;

export type ScheduleParams =
  | ({ kind: "once" } & ScheduleTimeParams)
  | ({ kind: "cron" } & ScheduleCronParams)
  | ({ kind: "interval" } & ScheduleEveryParams);

/**
 * Map validated surface parameters onto a service call, given the
 * already-resolved recipient.
 */
export function toCreateInput(params: ScheduleParams, recipientId: string): CreateScheduleInput {
  switch (params.kind) {
    case "once":
      return { recipientId, message: params.prompt, kind: "once", spec: params.time };
    case "cron":
      return { recipientId, message: params.prompt, kind: "cron", spec: params.cron };
    case "interval":
      return {
        recipientId,
        message: params.prompt,
        kind: "interval",
        spec: params.every,
        startAt: params.startAt,
        maxRepetitions: params.maxRepetitions ?? null,
      };
  }
}

/** First zod issue as "field: message". */
export function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid input";
  const where = issue.path.join(".");
  return where ? `${where}: ${issue.message}` : issue.message;
}
