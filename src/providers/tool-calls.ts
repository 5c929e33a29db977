import {
  ToolArgumentError,
  ToolExecutionError,
  UnknownToolError,
} from "../errors.js";
import type { ToolRegistry } from "../tools/index.js";

export interface ToolCallOutcome {
  content: string;
  isError: boolean;
}

/**
 * Run a model-requested tool. Registry failures go back to the model as an
 * error result; anything else propagates.
 */
export async function runToolCall(
  registry: ToolRegistry,
  name: string,
  input: unknown
): Promise<ToolCallOutcome> {
  try {
    const result = await registry.call(name, input);
    console.log(`  [tools] ${name} ok`);
    return { content: JSON.stringify(result ?? null), isError: false };
  } catch (error) {
    if (
      error instanceof UnknownToolError ||
      error instanceof ToolArgumentError ||
      error instanceof ToolExecutionError
    ) {
      console.warn(`  [tools] ${error.message}`);
      return { content: JSON.stringify({ error: error.message }), isError: true };
    }
    throw error;
  }
}

/**
 * OpenAI sends tool arguments as a JSON string.
 */
export function parseToolArguments(raw: string): unknown {
  if (raw.trim() === "") return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    // Left for the registry's schema check to reject
    return raw;
  }
}
