/**
 * OpenAI function-calling adapter.
 *
 * @example
 * ```typescript
 * const completion = await openai.chat.completions.create({
 *   model: 'gpt-4o',
 *   messages,
 *   tools: toOpenAITools(toolkit),
 * });
 * for (const call of completion.choices[0].message.tool_calls ?? []) {
 *   messages.push(await handleOpenAIToolCall(toolkit, call));
 * }
 * ```
 */

import { ValidationError } from "../errors.js";
import type { JsonSchemaObject, ToolGroup } from "../tools/definitions.js";
import type { RentAHumanToolkit } from "../tools/toolkit.js";
import { runTool } from "./shared.js";

export interface OpenAIFunctionTool {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: JsonSchemaObject;
  };
}

/** A tool call as it appears on an assistant message. */
export interface OpenAIToolCall {
  id: string;
  type?: "function";
  function: {
    name: string;
    /** JSON-encoded arguments. */
    arguments: string;
  };
}

export interface OpenAIToolMessage {
  role: "tool";
  tool_call_id: string;
  content: string;
}

export function toOpenAITools(
  toolkit: RentAHumanToolkit,
  group?: ToolGroup,
): OpenAIFunctionTool[] {
  return toolkit.getTools(group).map((tool) => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema,
    },
  }));
}

function parseArguments(raw: string, toolName: string): unknown {
  if (raw.trim() === "") {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Invalid JSON arguments for ${toolName}`, {
      cause: error,
    });
  }
}

/**
 * Executes one tool call and returns the `tool` message to append to the
 * conversation. SDK errors are reported in `content` as `Error: ...`.
 */
export async function handleOpenAIToolCall(
  toolkit: RentAHumanToolkit,
  toolCall: OpenAIToolCall,
): Promise<OpenAIToolMessage> {
  const { name } = toolCall.function;
  const outcome = await runTool(async () =>
    toolkit.invoke(name, parseArguments(toolCall.function.arguments, name)),
  );
  return {
    role: "tool",
    tool_call_id: toolCall.id,
    content: outcome.text,
  };
}
