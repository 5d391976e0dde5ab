// pattern: Imperative Shell

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { makeNoopLogger } from "../logging/index.js";
import { loadConfig, loadMcpConfig, resolveMemoryPath } from "./config.js";
import { writeFileSync, unlinkSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

const getTempPath = (extension: string) =>
  join(tmpdir(), `test-config-${Date.now()}-${Math.random().toString(36).slice(2)}.${extension}`);

const baseTomlContent = `
[model]
provider = "anthropic"
name = "claude-3-5-sonnet-20241022"
`;

describe("loadConfig", () => {
  let tempPath: string;

  beforeEach(() => {
    tempPath = getTempPath("toml");
  });

  afterEach(() => {
    delete process.env["ANTHROPIC_API_KEY"];
    delete process.env["OPENAI_COMPAT_API_KEY"];
    delete process.env["TOOLLOOP_LOG_LEVEL"];
    try {
      unlinkSync(tempPath);
    } catch {
      // file might not exist
    }
  });

  it("should fill defaults for omitted sections", () => {
    writeFileSync(tempPath, baseTomlContent);

    const config = loadConfig(tempPath);

    expect(config.agent.max_steps).toBe(50);
    expect(config.agent.max_parallel_tools).toBe(4);
    expect(config.agent.enable_bash).toBe(true);
    expect(config.model.max_tokens).toBe(16384);
    expect(config.mcp.discovery_timeout_ms).toBe(8000);
    expect(config.memory.path).toBe(".agent_memory.json");
    expect(config.retry.max_retries).toBe(3);
  });

  it("should read values from TOML sections", () => {
    writeFileSync(
      tempPath,
      `${baseTomlContent}
[agent]
max_steps = 12
workspace_dir = "/srv/work"

[mcp]
config_path = "/etc/toolloop/mcp.json"
`,
    );

    const config = loadConfig(tempPath);

    expect(config.agent.max_steps).toBe(12);
    expect(config.agent.workspace_dir).toBe("/srv/work");
    expect(config.mcp.config_path).toBe("/etc/toolloop/mcp.json");
    expect(resolveMemoryPath(config)).toBe("/srv/work/.agent_memory.json");
  });

  it("should override the anthropic api key from the environment", () => {
    writeFileSync(tempPath, `${baseTomlContent}api_key = "toml-key"\n`);
    process.env["ANTHROPIC_API_KEY"] = "env-key";

    const config = loadConfig(tempPath);

    expect(config.model.api_key).toBe("env-key");
  });

  it("should use OPENAI_COMPAT_API_KEY for openai-compat models", () => {
    writeFileSync(
      tempPath,
      `
[model]
provider = "openai-compat"
name = "local-model"
base_url = "http://localhost:11434/v1"
`,
    );
    process.env["ANTHROPIC_API_KEY"] = "wrong-key";
    process.env["OPENAI_COMPAT_API_KEY"] = "compat-key";

    const config = loadConfig(tempPath);

    expect(config.model.api_key).toBe("compat-key");
  });

  it("should keep the TOML key when no env var is set", () => {
    writeFileSync(tempPath, `${baseTomlContent}api_key = "toml-key"\n`);

    expect(loadConfig(tempPath).model.api_key).toBe("toml-key");
  });

  it("should override the log level from the environment", () => {
    writeFileSync(tempPath, `${baseTomlContent}\n[logging]\nlevel = "info"\n`);
    process.env["TOOLLOOP_LOG_LEVEL"] = "debug";

    expect(loadConfig(tempPath).logging.level).toBe("debug");
  });

  it("should reject a config without a model section", () => {
    writeFileSync(tempPath, `[agent]\nmax_steps = 3\n`);

    expect(() => loadConfig(tempPath)).toThrow();
  });
});

describe("loadMcpConfig", () => {
  let tempPath: string;

  beforeEach(() => {
    tempPath = getTempPath("json");
  });

  afterEach(() => {
    try {
      unlinkSync(tempPath);
    } catch {
      // file might not exist
    }
  });

  it("should return no providers when the file is missing", () => {
    expect(loadMcpConfig(tempPath, makeNoopLogger())).toEqual({ mcpServers: {}, invalid: [] });
  });

  it("should parse providers with defaults", () => {
    writeFileSync(
      tempPath,
      JSON.stringify({
        mcpServers: {
          memory: { command: "npx", args: ["-y", "@modelcontextprotocol/server-memory"] },
          search: { command: "search-server", env: { SEARCH_API_KEY: "test-secret" }, disabled: true },
        },
      }),
    );

    const config = loadMcpConfig(tempPath, makeNoopLogger());

    expect(config.mcpServers["memory"]).toEqual({
      command: "npx",
      args: ["-y", "@modelcontextprotocol/server-memory"],
      env: {},
      disabled: false,
    });
    expect(config.mcpServers["search"]?.disabled).toBe(true);
    expect(config.mcpServers["search"]?.env).toEqual({ SEARCH_API_KEY: "test-secret" });
  });

  it("should skip a provider without a command and keep the others", () => {
    writeFileSync(
      tempPath,
      JSON.stringify({ mcpServers: { good: { command: "good-server" }, broken: { args: [] } } }),
    );

    const config = loadMcpConfig(tempPath, makeNoopLogger());

    expect(Object.keys(config.mcpServers)).toEqual(["good"]);
    expect(config.invalid).toEqual([{ provider: "broken", error: "command: Required" }]);
  });

  it("should treat an unparseable document as no providers", () => {
    writeFileSync(tempPath, "{ not json");

    expect(loadMcpConfig(tempPath, makeNoopLogger())).toEqual({ mcpServers: {}, invalid: [] });
  });

  it("should treat a document of the wrong shape as no providers", () => {
    writeFileSync(tempPath, JSON.stringify({ mcpServers: ["not", "a", "map"] }));

    expect(loadMcpConfig(tempPath, makeNoopLogger())).toEqual({ mcpServers: {}, invalid: [] });
  });
});
