import type { AgentConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import { AnthropicGenerator } from "./anthropic.js";
import { OpenAIGenerator } from "./openai.js";
import type { TextGenerator } from "./types.js";

export { AnthropicGenerator } from "./anthropic.js";
export { OpenAIGenerator } from "./openai.js";
export { runToolCall, parseToolArguments, type ToolCallOutcome } from "./tool-calls.js";
export {
  DEFAULT_MAX_TOOL_ROUNDS,
  type LlmProvider,
  type GenerationRequest,
  type GeneratorOptions,
  type TextGenerator,
} from "./types.js";

/**
 * Build the generator for the configured provider.
 */
export function createTextGenerator(config: AgentConfig): TextGenerator {
  const shared = {
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    timeoutMs: config.providerTimeoutMs,
  };

  const apiKey = apiKeyFor(config);

  switch (config.llmProvider) {
    case "anthropic":
      return new AnthropicGenerator({
        ...shared,
        apiKey,
        model: config.anthropicModel,
      });
    case "openai":
      return new OpenAIGenerator({
        ...shared,
        apiKey,
        model: config.openaiModel,
      });
  }
}

function apiKeyFor(config: AgentConfig): string {
  const apiKey =
    config.llmProvider === "anthropic" ? config.anthropicApiKey : config.openaiApiKey;
  if (!apiKey) {
    throw new ConfigError([`No API key configured for ${config.llmProvider}`]);
  }
  return apiKey;
}
