/**
 * Vercel AI SDK adapter.
 *
 * The record can be passed straight to `generateText({ tools })`; each
 * entry matches what the `tool()` helper from `ai` produces.
 *
 * @example
 * ```typescript
 * import { generateText } from 'ai';
 * import { openai } from '@ai-sdk/openai';
 *
 * const result = await generateText({
 *   model: openai('gpt-4o'),
 *   tools: toVercelAITools(toolkit),
 *   prompt: 'Find a photographer in San Francisco under $60/hr',
 * });
 * ```
 */

import type { AnyZodObject } from "zod";
import type { ToolGroup } from "../tools/definitions.js";
import type { RentAHumanToolkit } from "../tools/toolkit.js";
import { runTool } from "./shared.js";

export interface VercelAITool {
  description: string;
  parameters: AnyZodObject;
  execute(args: unknown): Promise<string>;
}

export function toVercelAITools(
  toolkit: RentAHumanToolkit,
  group?: ToolGroup,
): Record<string, VercelAITool> {
  return Object.fromEntries(
    toolkit.getTools(group).map((tool) => [
      tool.name,
      {
        description: tool.description,
        parameters: tool.argsSchema,
        execute: async (args: unknown) => (await runTool(() => tool.invoke(args))).text,
      },
    ]),
  );
}
