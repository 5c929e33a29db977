import { existsSync, readFileSync } from "node:fs";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LlmProvider } from "./providers/types.js";

export interface AgentConfig {
  llmProvider: LlmProvider;
  anthropicApiKey?: string;
  openaiApiKey?: string;
  anthropicModel: string;
  openaiModel: string;
  embeddingModel: string;
  knowledgeBasePath: string;
  feedbackLogPath: string;
  confidenceThreshold: number;
  enableLearning: boolean;
  /** Knowledge-base entries retrieved per classification */
  contextSize: number;
  maxTokens: number;
  temperature: number;
  providerTimeoutMs: number;
}

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => ["true", "false", "1", "0", "yes", "no"].includes(v), {
    message: "expected true or false",
  })
  .transform((v) => v === "true" || v === "1" || v === "yes");

const EnvSchema = z.object({
  LLM_PROVIDER: z.enum(["anthropic", "openai"]).default("anthropic"),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default("claude-haiku-4-5"),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  KNOWLEDGE_BASE_PATH: z.string().default("./data/knowledge_base.db"),
  FEEDBACK_LOG_PATH: z.string().default("./data/feedback_log.db"),
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  ENABLE_LEARNING: flag.default(true),
  CONTEXT_SIZE: z.coerce.number().int().min(0).max(20).default(3),
  MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export interface LoadConfigOptions {
  /** Off for tools that never call the generation provider */
  requireProviderKey?: boolean;
}

/**
 * Read configuration from environment variables. Blank values count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  options: LoadConfigOptions = {}
): AgentConfig {
  const requireProviderKey = options.requireProviderKey ?? true;
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.map(String).join(".")}: ${issue.message}`
      )
    );
  }

  const vars = parsed.data;
  const problems: string[] = [];

  if (requireProviderKey) {
    if (vars.LLM_PROVIDER === "anthropic" && !vars.ANTHROPIC_API_KEY) {
      problems.push("ANTHROPIC_API_KEY is required when LLM_PROVIDER is anthropic");
    }
    if (vars.LLM_PROVIDER === "openai" && !vars.OPENAI_API_KEY) {
      problems.push("OPENAI_API_KEY is required when LLM_PROVIDER is openai");
    }
  }
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return {
    llmProvider: vars.LLM_PROVIDER,
    ...(vars.ANTHROPIC_API_KEY !== undefined && { anthropicApiKey: vars.ANTHROPIC_API_KEY }),
    ...(vars.OPENAI_API_KEY !== undefined && { openaiApiKey: vars.OPENAI_API_KEY }),
    anthropicModel: vars.ANTHROPIC_MODEL,
    openaiModel: vars.OPENAI_MODEL,
    embeddingModel: vars.EMBEDDING_MODEL,
    knowledgeBasePath: vars.KNOWLEDGE_BASE_PATH,
    feedbackLogPath: vars.FEEDBACK_LOG_PATH,
    confidenceThreshold: vars.CONFIDENCE_THRESHOLD,
    enableLearning: vars.ENABLE_LEARNING,
    contextSize: vars.CONTEXT_SIZE,
    maxTokens: vars.MAX_TOKENS,
    temperature: vars.TEMPERATURE,
    providerTimeoutMs: vars.PROVIDER_TIMEOUT_MS,
  };
}

/**
 * Like `loadConfig`, with values from a `.env` file filling in whatever
 * the process environment leaves unset.
 */
export function loadConfigWithDotenv(
  path: string = ".env",
  env: Record<string, string | undefined> = process.env
): AgentConfig {
  const fileVars = existsSync(path) ? parseDotenv(readFileSync(path)) : {};
  return loadConfig({ ...fileVars, ...definedOnly(env) });
}

function definedOnly(
  env: Record<string, string | undefined>
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") result[key] = value;
  }
  return result;
}
