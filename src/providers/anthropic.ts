import Anthropic, { APIConnectionTimeoutError } from "@anthropic-ai/sdk";
import { ProviderError, ProviderTimeoutError } from "../errors.js";
import type { ToolRegistry } from "../tools/index.js";
import { runToolCall } from "./tool-calls.js";
import {
  DEFAULT_MAX_TOOL_ROUNDS,
  type GenerationRequest,
  type GeneratorOptions,
  type TextGenerator,
} from "./types.js";

export class AnthropicGenerator implements TextGenerator {
  readonly provider = "anthropic" as const;
  readonly model: string;
  private readonly client: Anthropic;

  constructor(private readonly options: GeneratorOptions) {
    this.model = options.model;
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(request: GenerationRequest): Promise<string> {
    const registry = request.tools;
    const tools = registry?.toAnthropicTools() ?? [];
    const messages: Anthropic.MessageParam[] = [
      { role: "user", content: request.prompt },
    ];

    let response = await this.send(request.system, messages, tools);
    const maxRounds = this.options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;

    for (
      let round = 0;
      registry && response.stop_reason === "tool_use" && round < maxRounds;
      round++
    ) {
      messages.push({ role: "assistant", content: toContentParams(response.content) });
      messages.push({
        role: "user",
        content: await this.answerToolUses(registry, response.content),
      });
      response = await this.send(request.system, messages, tools);
    }

    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");

    if (!text.trim()) {
      throw new ProviderError(
        `Empty response from ${this.model} (stop reason: ${response.stop_reason ?? "none"})`,
        this.provider
      );
    }

    return text;
  }

  private async answerToolUses(
    registry: ToolRegistry,
    content: Anthropic.ContentBlock[]
  ): Promise<Anthropic.ToolResultBlockParam[]> {
    const results: Anthropic.ToolResultBlockParam[] = [];

    for (const block of content) {
      if (block.type !== "tool_use") continue;

      const outcome = await runToolCall(registry, block.name, block.input);
      results.push({
        type: "tool_result",
        tool_use_id: block.id,
        content: outcome.content,
        ...(outcome.isError && { is_error: true }),
      });
    }

    return results;
  }

  private async send(
    system: string,
    messages: Anthropic.MessageParam[],
    tools: Anthropic.Tool[]
  ): Promise<Anthropic.Message> {
    try {
      return await this.client.messages.create({
        model: this.model,
        max_tokens: this.options.maxTokens,
        temperature: this.options.temperature,
        system,
        messages,
        ...(tools.length > 0 && { tools }),
      });
    } catch (error) {
      if (error instanceof APIConnectionTimeoutError) {
        throw new ProviderTimeoutError(this.provider, this.options.timeoutMs, {
          cause: error,
        });
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`Anthropic request failed: ${detail}`, this.provider, {
        cause: error,
      });
    }
  }
}

/**
 * Echo the assistant turn back as request params, keeping only the
 * block kinds a follow-up request needs.
 */
function toContentParams(
  content: Anthropic.ContentBlock[]
): Anthropic.ContentBlockParam[] {
  const params: Anthropic.ContentBlockParam[] = [];

  for (const block of content) {
    if (block.type === "text") {
      params.push({ type: "text", text: block.text });
    } else if (block.type === "tool_use") {
      params.push({
        type: "tool_use",
        id: block.id,
        name: block.name,
        input: block.input,
      });
    }
  }

  return params;
}
