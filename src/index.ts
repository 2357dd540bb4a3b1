/**
 * claim-letter-mcp: MCP server entry point.
 *
 * Tools exposed:
 *   letter.types         supported letter types and instruction coverage
 *   letter.instructions  preview the canonical instruction document
 *   letter.generate      drafting → formatting → compliance letter pipeline
 */

import "dotenv/config";

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";

import { config, log } from "./config";
import { loadCanonicalInstructions } from "./letter/instructions";
import { createTextGenerator } from "./llm/generator";
import { handleToolCall, TOOL_DEFINITIONS, type ToolDeps } from "./server/tools";

function createServer(deps: ToolDeps): Server {
  const server = new Server(
    { name: "claim-letter-mcp", version: "1.0.0" },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOL_DEFINITIONS,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    handleToolCall(request.params.name, request.params.arguments, deps)
  );

  return server;
}

// ─── Start Server ─────────────────────────────────────────────────────────────

async function main() {
  // Loaded once; shared read-only by every request.
  const instructions = await loadCanonicalInstructions(config.instructionsPath);
  const generator = createTextGenerator(config);

  log("info", "Starting claim-letter-mcp", {
    instructionsPath: instructions.sourcePath,
    provider: generator.provider,
    outputDir: config.outputDir,
  });

  const server = createServer({ config, instructions, generator });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log("info", "claim-letter-mcp running on stdio");

  const shutdown = () => {
    server
      .close()
      .catch((err: unknown) => log("error", "Error closing server", err))
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  log("error", "Fatal error", err);
  process.exit(1);
});
