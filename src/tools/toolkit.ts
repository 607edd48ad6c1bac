import type { AnyZodObject } from "zod";
import { RentAHumanClient } from "../client.js";
import { ValidationError } from "../errors.js";
import type { RentAHumanClientOptions } from "../types.js";
import {
  type JsonSchemaObject,
  type ToolGroup,
  toolDefinitions,
} from "./definitions.js";
import { toolHandlers } from "./handlers.js";
import { type ToolName, toolArgSchemas } from "./schemas.js";

/**
 * A framework-neutral tool: everything an adapter needs to register it.
 */
export interface RentAHumanTool {
  name: ToolName;
  description: string;
  group: ToolGroup;
  /** JSON Schema of the arguments. */
  inputSchema: JsonSchemaObject;
  /** zod schema of the same arguments. */
  argsSchema: AnyZodObject;
  /** Validates `args`, runs the operation and returns a text answer. */
  invoke(args: unknown): Promise<string>;
}

/**
 * Bundles the rentahuman tools around one client.
 *
 * @example
 * ```typescript
 * const toolkit = new RentAHumanToolkit({ apiKey: process.env.RENTAHUMAN_API_KEY });
 * const tools = toolkit.getTools();          // all 15 tools
 * const readOnly = toolkit.getSearchTools(); // no API key needed
 * ```
 */
export class RentAHumanToolkit {
  readonly client: RentAHumanClient;

  constructor(clientOrOptions: RentAHumanClient | RentAHumanClientOptions = {}) {
    this.client =
      clientOrOptions instanceof RentAHumanClient
        ? clientOrOptions
        : new RentAHumanClient(clientOrOptions);
  }

  /**
   * Returns every tool, or only those of one group.
   */
  getTools(group?: ToolGroup): RentAHumanTool[] {
    return toolDefinitions
      .filter((def) => group === undefined || def.group === group)
      .map((def) => {
        const handler = toolHandlers[def.name];
        return {
          name: def.name,
          description: def.description,
          group: def.group,
          inputSchema: def.inputSchema,
          argsSchema: toolArgSchemas[def.name],
          invoke: (args: unknown) => handler(this.client, args),
        };
      });
  }

  /** Discovery tools; these work without an API key. */
  getSearchTools(): RentAHumanTool[] {
    return this.getTools("search");
  }

  getBookingTools(): RentAHumanTool[] {
    return this.getTools("bookings");
  }

  getBountyTools(): RentAHumanTool[] {
    return this.getTools("bounties");
  }

  getConversationTools(): RentAHumanTool[] {
    return this.getTools("conversations");
  }

  /**
   * Runs a tool by name.
   *
   * @throws {ValidationError} If no tool has that name or the arguments are invalid.
   */
  async invoke(name: string, args: unknown): Promise<string> {
    const definition = toolDefinitions.find((def) => def.name === name);
    if (!definition) {
      throw new ValidationError(`Unknown tool: ${name}`);
    }
    return toolHandlers[definition.name](this.client, args);
  }
}
