import OpenAI, { APIConnectionTimeoutError } from "openai";
import { ProviderError, ProviderTimeoutError } from "../errors.js";
import { parseToolArguments, runToolCall } from "./tool-calls.js";
import {
  DEFAULT_MAX_TOOL_ROUNDS,
  type GenerationRequest,
  type GeneratorOptions,
  type TextGenerator,
} from "./types.js";

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;
type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;

export class OpenAIGenerator implements TextGenerator {
  readonly provider = "openai" as const;
  readonly model: string;
  private readonly client: OpenAI;

  constructor(private readonly options: GeneratorOptions) {
    this.model = options.model;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(request: GenerationRequest): Promise<string> {
    const registry = request.tools;
    const tools = registry?.toOpenAITools() ?? [];
    const messages: ChatMessage[] = [
      { role: "system", content: request.system },
      { role: "user", content: request.prompt },
    ];

    let completion = await this.send(messages, tools);
    const maxRounds = this.options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;

    for (let round = 0; registry && round < maxRounds; round++) {
      const message = completion.choices[0]?.message;
      const toolCalls = message?.tool_calls ?? [];
      if (!message || toolCalls.length === 0) break;

      messages.push({
        role: "assistant",
        content: message.content,
        tool_calls: toolCalls,
      });

      // One tool message per call id
      for (const call of toolCalls) {
        const outcome = await runToolCall(
          registry,
          call.function.name,
          parseToolArguments(call.function.arguments)
        );
        messages.push({ role: "tool", tool_call_id: call.id, content: outcome.content });
      }

      completion = await this.send(messages, tools);
    }

    const choice = completion.choices[0];
    const text = choice?.message.content ?? "";

    if (!text.trim()) {
      throw new ProviderError(
        `Empty response from ${this.model} (finish reason: ${choice?.finish_reason ?? "none"})`,
        this.provider
      );
    }

    return text;
  }

  private async send(messages: ChatMessage[], tools: ChatTool[]): Promise<ChatCompletion> {
    try {
      return await this.client.chat.completions.create({
        model: this.model,
        messages,
        temperature: this.options.temperature,
        max_tokens: this.options.maxTokens,
        ...(tools.length > 0 && { tools }),
      });
    } catch (error) {
      if (error instanceof APIConnectionTimeoutError) {
        throw new ProviderTimeoutError(this.provider, this.options.timeoutMs, {
          cause: error,
        });
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`OpenAI request failed: ${detail}`, this.provider, {
        cause: error,
      });
    }
  }
}
