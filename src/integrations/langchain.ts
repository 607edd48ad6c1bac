/**
 * LangChain.js adapter.
 *
 * Returns plain objects in the `DynamicStructuredTool` shape so that
 * `@langchain/core` stays a peer of the caller rather than a dependency here.
 *
 * @example
 * ```typescript
 * import { DynamicStructuredTool } from '@langchain/core/tools';
 * import { RentAHumanToolkit, toLangChainTools } from 'rentahuman-sdk';
 *
 * const toolkit = new RentAHumanToolkit({ apiKey: process.env.RENTAHUMAN_API_KEY });
 * const tools = toLangChainTools(toolkit).map((t) => new DynamicStructuredTool(t));
 * ```
 */

import type { AnyZodObject } from "zod";
import type { ToolGroup } from "../tools/definitions.js";
import type { RentAHumanToolkit } from "../tools/toolkit.js";
import { runTool } from "./shared.js";

export interface LangChainToolDefinition {
  name: string;
  description: string;
  schema: AnyZodObject;
  func(input: unknown): Promise<string>;
}

export function toLangChainTools(
  toolkit: RentAHumanToolkit,
  group?: ToolGroup,
): LangChainToolDefinition[] {
  return toolkit.getTools(group).map((tool) => ({
    name: tool.name,
    description: tool.description,
    schema: tool.argsSchema,
    func: async (input: unknown) => (await runTool(() => tool.invoke(input))).text,
  }));
}
