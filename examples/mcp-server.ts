/**
 * MCP Server Example
 *
 * Serves every rentahuman tool over stdio so that any MCP client
 * (Claude Desktop, Cursor, an agent runtime) can use it.
 *
 * Client configuration:
 *   { "command": "npx", "args": ["tsx", "examples/mcp-server.ts"],
 *     "env": { "RENTAHUMAN_API_KEY": "rah_..." } }
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { RentAHumanToolkit, createLogger, createMcpServer } from "../src/index.js";

async function main() {
  // stdout carries the protocol; logs go to stderr via console.error
  const logger = createLogger("warn");
  const toolkit = new RentAHumanToolkit({ logger });
  const server = createMcpServer(toolkit);
  await server.connect(new StdioServerTransport());
}

main().catch((err: unknown) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
