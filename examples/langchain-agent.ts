/**
 * LangChain Tool Integration Example
 *
 * Shows the tool objects handed to a LangChain agent and drives one of
 * them directly, the way the agent executor would.
 *
 * Prerequisites (for a real agent):
 *   npm install @langchain/core @langchain/langgraph rentahuman-sdk
 *
 * Run with: npx tsx examples/langchain-agent.ts
 */

import { RentAHumanToolkit, toLangChainTools } from "../src/index.js";

// NOTE: In a real project:
//
// import { DynamicStructuredTool } from '@langchain/core/tools';
// import { createReactAgent } from '@langchain/langgraph/prebuilt';
//
// const tools = toLangChainTools(toolkit).map((t) => new DynamicStructuredTool(t));
// const agent = createReactAgent({ llm, tools });

async function main() {
  const toolkit = new RentAHumanToolkit({
    apiKey: process.env.RENTAHUMAN_API_KEY,
  });

  // Read-only tools need no API key
  const tools = toLangChainTools(toolkit, "search");
  console.log("Registered tools:", tools.map((t) => t.name).join(", "));

  const search = tools.find((t) => t.name === "search_humans");
  if (!search) {
    return;
  }

  // The agent passes arguments validated against `search.schema`
  console.log(await search.func({ skill: "Packages", max_rate: 40, limit: 3 }));
}

main().catch((err: unknown) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
