import { APIConnectionTimeoutError } from "openai";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { ProviderError, ProviderTimeoutError } from "../errors.js";
import { ToolRegistry } from "../tools/index.js";
import { OpenAIGenerator } from "./openai.js";

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("openai", async (importOriginal) => {
  const actual = await importOriginal<typeof import("openai")>();
  class FakeOpenAI {
    chat = { completions: { create } };
  }
  return { ...actual, default: FakeOpenAI };
});

function generator(): OpenAIGenerator {
  return new OpenAIGenerator({
    apiKey: "test-key",
    model: "gpt-test",
    maxTokens: 256,
    temperature: 0.2,
    timeoutMs: 500,
  });
}

function completion(content: string | null, extra: Record<string, unknown> = {}) {
  return {
    choices: [
      {
        message: { role: "assistant", content, ...extra },
        finish_reason: extra.tool_calls ? "tool_calls" : "stop",
      },
    ],
  };
}

const tools = new ToolRegistry().register({
  name: "lookup_order",
  description: "Find an order by number",
  parameters: z.object({ orderNumber: z.string() }),
  handler: ({ orderNumber }) => ({ orderNumber, status: "packed" }),
});

describe("OpenAIGenerator", () => {
  beforeEach(() => {
    create.mockReset();
  });

  it("sends system and user messages", async () => {
    create.mockResolvedValueOnce(completion("reply"));

    expect(await generator().generate({ system: "sys", prompt: "hello" })).toBe("reply");
    expect(create).toHaveBeenCalledWith({
      model: "gpt-test",
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "hello" },
      ],
      temperature: 0.2,
      max_tokens: 256,
    });
  });

  it("answers each tool call with a tool message", async () => {
    const toolCalls = [
      {
        id: "call_1",
        type: "function",
        function: { name: "lookup_order", arguments: '{"orderNumber":"SO-9"}' },
      },
      {
        id: "call_2",
        type: "function",
        function: { name: "lookup_order", arguments: "{}" },
      },
    ];
    create
      .mockResolvedValueOnce(completion(null, { tool_calls: toolCalls }))
      .mockResolvedValueOnce(completion("final"));

    const text = await generator().generate({ system: "sys", prompt: "hello", tools });

    expect(text).toBe("final");
    const sent = create.mock.calls[1]?.[0];
    expect(sent.tools).toEqual(tools.toOpenAITools());
    expect(sent.messages.slice(2)).toEqual([
      { role: "assistant", content: null, tool_calls: toolCalls },
      { role: "tool", tool_call_id: "call_1", content: '{"orderNumber":"SO-9","status":"packed"}' },
      {
        role: "tool",
        tool_call_id: "call_2",
        content: expect.stringContaining("Invalid arguments for tool"),
      },
    ]);
  });

  it("fails on an empty final reply", async () => {
    create.mockResolvedValueOnce(completion(""));

    await expect(generator().generate({ system: "sys", prompt: "hello" })).rejects.toThrow(
      "Empty response from gpt-test (finish reason: stop)"
    );
  });

  it("reports timeouts as ProviderTimeoutError", async () => {
    create.mockRejectedValueOnce(new APIConnectionTimeoutError());

    await expect(
      generator().generate({ system: "sys", prompt: "hello" })
    ).rejects.toThrow(new ProviderTimeoutError("openai", 500));
  });

  it("wraps other failures as ProviderError", async () => {
    create.mockRejectedValueOnce(new Error("invalid api key"));

    const error = await generator()
      .generate({ system: "sys", prompt: "hello" })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toHaveProperty("message", "OpenAI request failed: invalid api key");
    expect(error).toHaveProperty("provider", "openai");
  });
});
