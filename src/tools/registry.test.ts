import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import {
  ToolArgumentError,
  ToolExecutionError,
  ToolRegistrationError,
  UnknownToolError,
} from "../errors.js";
import { ToolRegistry } from "./registry.js";

const EchoParams = z.object({
  text: z.string().describe("Text to echo"),
});

type EchoHandler = (args: { text: string }) => unknown;

function echoRegistry(
  handler: EchoHandler = vi.fn(({ text }: { text: string }) => text.toUpperCase())
) {
  const registry = new ToolRegistry().register({
    name: "echo",
    description: "Echo text back in capitals",
    parameters: EchoParams,
    handler,
  });
  return { registry, handler };
}

describe("ToolRegistry", () => {
  it("registers tools by name", () => {
    const { registry } = echoRegistry();

    expect(registry.has("echo")).toBe(true);
    expect(registry.get("echo")?.description).toBe("Echo text back in capitals");
    expect(registry.list()).toEqual(["echo"]);
    expect(registry.count()).toBe(1);
  });

  it("refuses duplicate names", () => {
    const { registry } = echoRegistry();

    expect(() =>
      registry.register({
        name: "echo",
        description: "again",
        parameters: z.object({}),
        handler: () => null,
      })
    ).toThrow(new ToolRegistrationError('Tool "echo" is already registered'));
  });

  it("refuses names the providers would reject", () => {
    expect(() =>
      new ToolRegistry().register({
        name: "look up order",
        description: "",
        parameters: z.object({}),
        handler: () => null,
      })
    ).toThrow(ToolRegistrationError);
  });

  it("validates arguments and calls the handler", async () => {
    const { registry, handler } = echoRegistry();

    expect(await registry.call("echo", { text: "hi" })).toBe("HI");
    expect(handler).toHaveBeenCalledWith({ text: "hi" });
  });

  it("names the missing tool and the registered ones", async () => {
    const { registry } = echoRegistry();

    await expect(registry.call("lookup_order", {})).rejects.toThrow(
      new UnknownToolError("lookup_order", ["echo"])
    );
    await expect(new ToolRegistry().call("echo", {})).rejects.toThrow(
      'Tool "echo" is not registered (available: none)'
    );
  });

  it("rejects invalid arguments before the handler runs", async () => {
    const { registry, handler } = echoRegistry();

    const error = await registry.call("echo", { text: 42 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolArgumentError);
    if (error instanceof ToolArgumentError) {
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]).toMatch(/^text: /);
    }
    expect(handler).not.toHaveBeenCalled();
  });

  it("treats missing arguments as an empty object", async () => {
    const registry = new ToolRegistry().register({
      name: "ping",
      description: "",
      parameters: z.object({}),
      handler: () => "pong",
    });

    expect(await registry.call("ping", undefined)).toBe("pong");
  });

  it("wraps handler failures", async () => {
    const cause = new Error("db down");
    const { registry } = echoRegistry(
      vi.fn(() => {
        throw cause;
      })
    );

    const error = await registry.call("echo", { text: "hi" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error).toHaveProperty("message", 'Tool "echo" failed: db down');
    expect(error).toHaveProperty("cause", cause);
  });

  it("describes tools for Anthropic", () => {
    const { registry } = echoRegistry();

    expect(registry.toAnthropicTools()).toEqual([
      {
        name: "echo",
        description: "Echo text back in capitals",
        input_schema: {
          type: "object",
          properties: { text: { type: "string", description: "Text to echo" } },
          required: ["text"],
        },
      },
    ]);
  });

  it("describes tools for OpenAI", () => {
    const { registry } = echoRegistry();

    expect(registry.toOpenAITools()).toEqual([
      {
        type: "function",
        function: {
          name: "echo",
          description: "Echo text back in capitals",
          parameters: {
            type: "object",
            properties: { text: { type: "string", description: "Text to echo" } },
            required: ["text"],
          },
        },
      },
    ]);
  });
});
