import { RentAHumanError } from "../errors.js";

export interface ToolOutcome {
  text: string;
  isError: boolean;
}

/**
 * Runs a tool call and folds SDK errors into text the model can read.
 * Anything that is not a {@link RentAHumanError} is a bug and is rethrown.
 */
export async function runTool(call: () => Promise<string>): Promise<ToolOutcome> {
  try {
    return { text: await call(), isError: false };
  } catch (error) {
    if (error instanceof RentAHumanError) {
      return { text: `Error: ${error.message}`, isError: true };
    }
    throw error;
  }
}
