import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { config } from "../config.js";
import { createRuntime } from "../runtime.js";
import { createTools } from "./tools.js";

// stdout carries JSON-RPC; everything else goes to stderr.
console.log = console.error.bind(console);
console.info = console.error.bind(console);
console.warn = console.error.bind(console);

async function main(): Promise<void> {
  const runtime = await createRuntime(config);
  const { scheduler } = runtime;

  const server = new McpServer({ name: "promptclock", version: "0.1.0" });
  for (const tool of createTools(runtime)) {
    server.registerTool(
      tool.name,
      { description: tool.description, inputSchema: tool.inputSchema },
      (args) => tool.handler(args),
    );
  }

  let loop: Promise<void> | undefined;
  if (config.mcpAutostartLoop) {
    loop = scheduler.runLoop(config.pollIntervalSeconds).catch((err) => {
      console.error("[mcp] Executor loop not started:", err instanceof Error ? err.message : err);
    });
  }

  let closing = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (closing) return;
    closing = true;
    console.error(`[mcp] Shutting down (${reason})`);
    await scheduler.stop();
    await loop;
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.stdin.on("close", () => void shutdown("stdin closed"));

  await server.connect(new StdioServerTransport());
  console.error(`[mcp] promptclock MCP server ready (store: ${runtime.store.location})`);
}

main().catch((err) => {
  console.error("[mcp] Error starting MCP server", err);
  process.exit(1);
});
