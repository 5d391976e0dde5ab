import TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import type { ZodError } from "zod";
import type { Logger } from "../logging/index.js";
import {
  AppConfigSchema,
  McpConfigSchema,
  McpServerConfigSchema,
  type AppConfig,
  type McpConfig,
  type McpServerConfig,
} from "./schema.js";

export type {
  AppConfig,
  AgentConfig,
  ModelConfig,
  RetryConfig,
  MemoryConfig,
  McpSettings,
  LoggingConfig,
  McpServerConfig,
  McpConfig,
  InvalidMcpServer,
} from "./schema.js";

function section(parsed: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = parsed[key];
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = resolve(configPath ?? "config.toml");
  const raw = readFileSync(resolvedPath, "utf-8");
  const parsed: Record<string, unknown> = TOML.parse(raw);

  // Environment variable overrides for secrets
  const envOverrides: Record<string, unknown> = {};

  const modelObj = section(parsed, "model");
  const envKey = modelObj["provider"] === "openai-compat"
    ? process.env["OPENAI_COMPAT_API_KEY"]
    : process.env["ANTHROPIC_API_KEY"];
  if (envKey) {
    modelObj["api_key"] = envKey;
    envOverrides["model"] = modelObj;
  }

  if (process.env["TOOLLOOP_LOG_LEVEL"]) {
    const loggingObj = section(parsed, "logging");
    loggingObj["level"] = process.env["TOOLLOOP_LOG_LEVEL"];
    envOverrides["logging"] = loggingObj;
  }

  const merged = { ...parsed, ...envOverrides };
  return AppConfigSchema.parse(merged);
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Read the MCP provider document. A missing, unreadable or malformed document
 * means no providers; an invalid entry is reported in `invalid` and skipped.
 */
export function loadMcpConfig(path: string, logger: Logger): McpConfig {
  const resolvedPath = resolve(path);
  if (!existsSync(resolvedPath)) {
    return { mcpServers: {}, invalid: [] };
  }

  let document: unknown;
  try {
    document = JSON.parse(readFileSync(resolvedPath, "utf-8"));
  } catch (error) {
    logger.warn({ path: resolvedPath, err: error }, "could not read MCP config, no external tools loaded");
    return { mcpServers: {}, invalid: [] };
  }

  const parsed = McpConfigSchema.safeParse(document);
  if (!parsed.success) {
    logger.warn(
      { path: resolvedPath, error: describeIssues(parsed.error) },
      "malformed MCP config, no external tools loaded",
    );
    return { mcpServers: {}, invalid: [] };
  }

  const mcpServers: Record<string, McpServerConfig> = {};
  const invalid: McpConfig["invalid"] = [];
  for (const [name, entry] of Object.entries(parsed.data.mcpServers)) {
    const server = McpServerConfigSchema.safeParse(entry);
    if (server.success) {
      mcpServers[name] = server.data;
      continue;
    }
    const error = describeIssues(server.error);
    logger.warn({ provider: name, error }, "invalid MCP server entry, skipping");
    invalid.push({ provider: name, error });
  }

  return { mcpServers, invalid };
}

export function resolveMemoryPath(config: AppConfig): string {
  const workspace = resolve(config.agent.workspace_dir);
  return isAbsolute(config.memory.path) ? config.memory.path : join(workspace, config.memory.path);
}

export function resolveLogDir(config: AppConfig): string {
  return config.logging.dir ? resolve(config.logging.dir) : join(homedir(), ".toolloop", "log");
}
