import type Anthropic from "@anthropic-ai/sdk";
import type OpenAI from "openai";
import { z } from "zod";
import {
  ToolArgumentError,
  ToolExecutionError,
  ToolRegistrationError,
  UnknownToolError,
} from "../errors.js";

export interface ToolDefinition<S extends z.ZodObject = z.ZodObject> {
  name: string;
  description: string;
  /** Arguments are checked against this schema before the handler runs */
  parameters: S;
  handler(args: z.output<S>): unknown;
}

type OpenAITool = OpenAI.Chat.Completions.ChatCompletionTool;

const TOOL_NAME = /^[a-zA-Z0-9_-]{1,64}$/;

/**
 * Named tools the model may call during classification.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  register<S extends z.ZodObject>(tool: ToolDefinition<S>): this {
    if (!TOOL_NAME.test(tool.name)) {
      throw new ToolRegistrationError(
        `Tool name "${tool.name}" must be 1-64 letters, digits, "_" or "-"`
      );
    }
    if (this.tools.has(tool.name)) {
      throw new ToolRegistrationError(`Tool "${tool.name}" is already registered`);
    }

    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): string[] {
    return Array.from(this.tools.keys());
  }

  count(): number {
    return this.tools.size;
  }

  async call(name: string, args: unknown): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name, this.list());
    }

    const parsed = tool.parameters.safeParse(args ?? {});
    if (!parsed.success) {
      throw new ToolArgumentError(
        name,
        parsed.error.issues.map(
          (issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`
        )
      );
    }

    try {
      return await tool.handler(parsed.data);
    } catch (error) {
      throw new ToolExecutionError(name, error);
    }
  }

  toAnthropicTools(): Anthropic.Tool[] {
    return Array.from(this.tools.values(), (tool): Anthropic.Tool => ({
      name: tool.name,
      description: tool.description,
      input_schema: { type: "object", ...objectSchema(tool.parameters) },
    }));
  }

  toOpenAITools(): OpenAITool[] {
    return Array.from(this.tools.values(), (tool): OpenAITool => ({
      type: "function",
      function: {
        name: tool.name,
        description: tool.description,
        parameters: { type: "object", ...objectSchema(tool.parameters) },
      },
    }));
  }
}

function objectSchema(schema: z.ZodObject): {
  properties: Record<string, unknown>;
  required: string[];
} {
  const json = z.toJSONSchema(schema);
  return {
    properties: { ...json.properties },
    required: json.required ?? [],
  };
}
