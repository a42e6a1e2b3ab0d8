#!/usr/bin/env node
/**
 * promptclock CLI
 *
 * Usage:
 *   promptclock register --agent-id <id> --prompt <text> --cron "0 9 * * *"
 *   promptclock list --all
 *   promptclock execute --loop --interval 60
 */

import { config } from "./config.js";
import { createRuntime } from "./runtime.js";
import { HELP_TEXT, parseCliArgs, runCommand, type ParsedArgs } from "./cli/commands.js";

async function main(): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.log(HELP_TEXT);
    return 1;
  }

  if (args.command === "help" || args.flags.help === true) {
    console.log(HELP_TEXT);
    return 0;
  }

  // Progress logs go to stderr; stdout is the JSON result.
  console.log = console.error.bind(console);
  console.info = console.error.bind(console);

  const runtime = await createRuntime(config);
  const controller = new AbortController();
  process.on("SIGINT", () => controller.abort());
  process.on("SIGTERM", () => controller.abort());

  const result = await runCommand(args, runtime, controller.signal);
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  return result.status === "success" ? 0 : 1;
}

main().then(
  (code) => process.exit(code),
  (err) => {
    console.error("[fatal]", err);
    process.exit(1);
  },
);
