import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolRequest,
} from "@modelcontextprotocol/sdk/types.js";
import { SDK_VERSION } from "../client.js";
import type { ToolGroup } from "../tools/definitions.js";
import type { RentAHumanToolkit } from "../tools/toolkit.js";
import { runTool } from "./shared.js";

export interface McpServerOptions {
  /** Server name reported to MCP clients. Defaults to `"rentahuman"`. */
  name?: string;
  version?: string;
  /** Expose only one tool group. */
  group?: ToolGroup;
}

/**
 * Builds an MCP server that lists the toolkit's tools and runs them.
 * The caller connects a transport:
 *
 * ```typescript
 * import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
 *
 * const server = createMcpServer(new RentAHumanToolkit());
 * await server.connect(new StdioServerTransport());
 * ```
 */
export function createMcpServer(
  toolkit: RentAHumanToolkit,
  options: McpServerOptions = {},
): Server {
  const tools = toolkit.getTools(options.group);
  const logger = toolkit.client.logger;

  const server = new Server(
    {
      name: options.name ?? "rentahuman",
      version: options.version ?? SDK_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
    const { name, arguments: args } = request.params;
    logger.debug(`MCP call_tool ${name}`);
    const tool = tools.find((t) => t.name === name);
    const outcome = tool
      ? await runTool(() => tool.invoke(args ?? {}))
      : { text: `Error: Unknown tool: ${name}`, isError: true };
    return {
      content: [{ type: "text" as const, text: outcome.text }],
      ...(outcome.isError ? { isError: true } : {}),
    };
  });

  return server;
}
