// pattern: Functional Core
import { z } from "zod";

const AgentConfigSchema = z.object({
  max_steps: z.number().int().positive().default(50),
  max_parallel_tools: z.number().int().positive().default(4),
  workspace_dir: z.string().default("./workspace"),
  system_prompt_path: z.string().optional(),
  enable_bash: z.boolean().default(true),
});

const ModelConfigSchema = z.object({
  provider: z.enum(["anthropic", "openai-compat"]),
  name: z.string(),
  api_key: z.string().optional(),
  base_url: z.string().url().optional(),
  max_tokens: z.number().int().positive().default(16384),
  temperature: z.number().min(0).max(2).optional(),
});

const RetryConfigSchema = z.object({
  enabled: z.boolean().default(true),
  max_retries: z.number().int().positive().default(3),
  initial_backoff_ms: z.number().int().nonnegative().default(1000),
  max_backoff_ms: z.number().int().positive().default(30000),
  backoff_multiplier: z.number().min(1).default(2),
});

const MemoryConfigSchema = z.object({
  // relative paths resolve against the workspace directory
  path: z.string().default(".agent_memory.json"),
});

const McpSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  config_path: z.string().default("mcp.json"),
  discovery_timeout_ms: z.number().int().positive().default(8000),
  call_timeout_ms: z.number().int().positive().default(60000),
});

const LoggingConfigSchema = z.object({
  level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("warn"),
  dir: z.string().optional(),
  run_log: z.boolean().default(true),
});

const AppConfigSchema = z.object({
  agent: AgentConfigSchema.default({}),
  model: ModelConfigSchema,
  retry: RetryConfigSchema.default({}),
  memory: MemoryConfigSchema.default({}),
  mcp: McpSettingsSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

/**
 * One external tool provider, keyed by name under `mcpServers` in mcp.json.
 */
const McpServerConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
  disabled: z.boolean().default(false),
  description: z.string().optional(),
  discovery_timeout_ms: z.number().int().positive().optional(),
  call_timeout_ms: z.number().int().positive().optional(),
});

// entries are validated one at a time so a bad one only costs its own provider
const McpConfigSchema = z.object({
  mcpServers: z.record(z.unknown()).default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type McpSettings = z.infer<typeof McpSettingsSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type McpServerConfig = z.infer<typeof McpServerConfigSchema>;

export type InvalidMcpServer = {
  provider: string;
  error: string;
};

export type McpConfig = {
  mcpServers: Record<string, McpServerConfig>;
  invalid: Array<InvalidMcpServer>;
};

export {
  AppConfigSchema,
  AgentConfigSchema,
  ModelConfigSchema,
  RetryConfigSchema,
  MemoryConfigSchema,
  McpSettingsSchema,
  LoggingConfigSchema,
  McpServerConfigSchema,
  McpConfigSchema,
};
