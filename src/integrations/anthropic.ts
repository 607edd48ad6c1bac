/**
 * Anthropic tool-use adapter.
 *
 * @example
 * ```typescript
 * const response = await anthropic.messages.create({
 *   model: 'claude-sonnet-4-5',
 *   max_tokens: 1024,
 *   tools: toAnthropicTools(toolkit),
 *   messages,
 * });
 * const results = await Promise.all(
 *   response.content
 *     .filter((block) => block.type === 'tool_use')
 *     .map((block) => handleAnthropicToolUse(toolkit, block)),
 * );
 * messages.push({ role: 'user', content: results });
 * ```
 */

import type { JsonSchemaObject, ToolGroup } from "../tools/definitions.js";
import type { RentAHumanToolkit } from "../tools/toolkit.js";
import { runTool } from "./shared.js";

export interface AnthropicTool {
  name: string;
  description: string;
  input_schema: JsonSchemaObject;
}

export interface AnthropicToolUseBlock {
  type?: "tool_use";
  id: string;
  name: string;
  input: unknown;
}

export interface AnthropicToolResultBlock {
  type: "tool_result";
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

export function toAnthropicTools(
  toolkit: RentAHumanToolkit,
  group?: ToolGroup,
): AnthropicTool[] {
  return toolkit.getTools(group).map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: tool.inputSchema,
  }));
}

export async function handleAnthropicToolUse(
  toolkit: RentAHumanToolkit,
  block: AnthropicToolUseBlock,
): Promise<AnthropicToolResultBlock> {
  const outcome = await runTool(() => toolkit.invoke(block.name, block.input));
  const result: AnthropicToolResultBlock = {
    type: "tool_result",
    tool_use_id: block.id,
    content: outcome.text,
  };
  if (outcome.isError) {
    result.is_error = true;
  }
  return result;
}
