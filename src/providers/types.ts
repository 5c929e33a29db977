import type { ToolRegistry } from "../tools/index.js";

export type LlmProvider = "anthropic" | "openai";

export interface GenerationRequest {
  system: string;
  prompt: string;
  /** When present, the model may call these tools before answering */
  tools?: ToolRegistry;
}

/**
 * A hosted text-generation model.
 */
export interface TextGenerator {
  readonly provider: LlmProvider;
  readonly model: string;
  generate(request: GenerationRequest): Promise<string>;
}

export interface GeneratorOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  /** Tool-use round trips allowed before the final answer */
  maxToolRounds?: number;
}

export const DEFAULT_MAX_TOOL_ROUNDS = 3;
